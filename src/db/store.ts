/**
 * Persistence contract for the planner.
 *
 * Every method is async and rejects with PersistenceError when the backing
 * store cannot complete the call. Callers decide how to degrade.
 */
import type { Cents } from '../domain/money.js';
import type {
  BudgetPercentages,
  Debt,
  Income,
  Month,
  QuickExpenseShortcut,
  RecordedSpendType,
  SpendTotals,
  SpendType,
  Tip,
  Transaction,
  UserProfile,
} from '../domain/types.js';

export type RecordKind = 'incomes' | 'transactions' | 'debts' | 'shortcuts';

export type TransactionFields = Omit<Transaction, 'id' | 'createdAt'>;

/** A sub-collection record without its id */
export type RecordInput =
  | { kind: 'incomes'; fields: Omit<Income, 'id'> }
  | { kind: 'transactions'; fields: TransactionFields }
  | { kind: 'debts'; fields: Omit<Debt, 'id'> }
  | { kind: 'shortcuts'; fields: Omit<QuickExpenseShortcut, 'id'> };

export interface PlannerStore {
  /** null when the user has never onboarded */
  loadUserProfile(userId: string): Promise<UserProfile | null>;
  saveUserProfile(profile: UserProfile): Promise<void>;

  listIncomes(userId: string): Promise<Income[]>;
  /** Transactions dated within the given month, oldest first */
  listTransactions(userId: string, month: Month): Promise<Transaction[]>;
  listDebts(userId: string): Promise<Debt[]>;
  listShortcuts(userId: string): Promise<QuickExpenseShortcut[]>;

  /** Insert when id is omitted, upsert otherwise. Resolves to the record id. */
  saveRecord(userId: string, record: RecordInput, id?: string): Promise<string>;
  /** Resolves to false when nothing matched */
  deleteRecord(userId: string, kind: RecordKind, id: string): Promise<boolean>;

  /** Denormalized running total; callers must not depend on it succeeding */
  incrementMonthlySummaryField(
    userId: string,
    month: Month,
    spendType: RecordedSpendType,
    delta: Cents,
  ): Promise<void>;
  getMonthlySummary(userId: string, month: Month): Promise<SpendTotals>;

  updateBudgetPercentages(userId: string, percentages: BudgetPercentages): Promise<void>;
  setPendingOverspend(userId: string, spendType: SpendType, amount: Cents): Promise<void>;
  clearPendingOverspend(userId: string, spendType: SpendType): Promise<void>;
  /**
   * Writes the shifted percentages and the exceeded type's pending entry
   * together, or neither. A null pending clears the entry.
   */
  applyOverspendMove(
    userId: string,
    percentages: BudgetPercentages,
    exceeded: SpendType,
    pending: Cents | null,
  ): Promise<void>;
  updateShownTipIds(userId: string, ids: string[]): Promise<void>;

  listTips(): Promise<Tip[]>;
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/** Missing user row on an update; the profile must be created by onboarding first */
export class UnknownUserError extends PersistenceError {
  constructor(userId: string) {
    super(`No profile stored for user ${userId}`);
    this.name = 'UnknownUserError';
  }
}

// Helper function to generate cuid-like IDs
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}
