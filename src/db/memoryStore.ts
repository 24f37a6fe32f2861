/**
 * Process-local PlannerStore. Nothing survives a restart; used by tests and
 * by throwaway runs that do not need SQLite.
 */
import { emptyTotals, normalizeSpendType } from '../domain/computations.js';
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
import {
  generateId,
  UnknownUserError,
  type PlannerStore,
  type RecordInput,
  type RecordKind,
} from './store.js';

interface UserRecords {
  incomes: Map<string, Income>;
  transactions: Map<string, Transaction>;
  debts: Map<string, Debt>;
  shortcuts: Map<string, QuickExpenseShortcut>;
}

function emptyRecords(): UserRecords {
  return {
    incomes: new Map(),
    transactions: new Map(),
    debts: new Map(),
    shortcuts: new Map(),
  };
}

function cloneProfile(profile: UserProfile): UserProfile {
  return {
    ...profile,
    budgetPercentages: { ...profile.budgetPercentages },
    pendingOverspend: { ...profile.pendingOverspend },
    shownTipIds: [...profile.shownTipIds],
  };
}

export class MemoryPlannerStore implements PlannerStore {
  private readonly profiles = new Map<string, UserProfile>();
  private readonly records = new Map<string, UserRecords>();
  private readonly summaries = new Map<string, SpendTotals>();

  constructor(private readonly tips: Tip[] = []) {}

  async loadUserProfile(userId: string): Promise<UserProfile | null> {
    const profile = this.profiles.get(userId);
    return profile ? cloneProfile(profile) : null;
  }

  async saveUserProfile(profile: UserProfile): Promise<void> {
    this.profiles.set(profile.userId, cloneProfile(profile));
  }

  async listIncomes(userId: string): Promise<Income[]> {
    return [...this.recordsFor(userId).incomes.values()];
  }

  async listTransactions(userId: string, month: Month): Promise<Transaction[]> {
    return [...this.recordsFor(userId).transactions.values()].filter((t) => t.date.startsWith(`${month}-`));
  }

  async listDebts(userId: string): Promise<Debt[]> {
    return [...this.recordsFor(userId).debts.values()];
  }

  async listShortcuts(userId: string): Promise<QuickExpenseShortcut[]> {
    return [...this.recordsFor(userId).shortcuts.values()];
  }

  async saveRecord(userId: string, record: RecordInput, id?: string): Promise<string> {
    const records = this.recordsFor(userId);
    const recordId = id ?? generateId();

    switch (record.kind) {
      case 'incomes':
        records.incomes.set(recordId, { id: recordId, ...record.fields });
        break;
      case 'transactions': {
        const existing = records.transactions.get(recordId);
        records.transactions.set(recordId, {
          id: recordId,
          ...record.fields,
          createdAt: existing?.createdAt ?? new Date().toISOString(),
        });
        break;
      }
      case 'debts':
        records.debts.set(recordId, { id: recordId, ...record.fields });
        break;
      case 'shortcuts':
        records.shortcuts.set(recordId, { id: recordId, ...record.fields });
        break;
    }
    return recordId;
  }

  async deleteRecord(userId: string, kind: RecordKind, id: string): Promise<boolean> {
    return this.recordsFor(userId)[kind].delete(id);
  }

  async incrementMonthlySummaryField(
    userId: string,
    month: Month,
    spendType: RecordedSpendType,
    delta: Cents,
  ): Promise<void> {
    const key = `${userId}:${month}`;
    const totals = this.summaries.get(key) ?? emptyTotals();
    totals[normalizeSpendType(spendType)] += delta;
    this.summaries.set(key, totals);
  }

  async getMonthlySummary(userId: string, month: Month): Promise<SpendTotals> {
    return { ...(this.summaries.get(`${userId}:${month}`) ?? emptyTotals()) };
  }

  async updateBudgetPercentages(userId: string, percentages: BudgetPercentages): Promise<void> {
    this.profileFor(userId).budgetPercentages = { ...percentages };
  }

  async setPendingOverspend(userId: string, spendType: SpendType, amount: Cents): Promise<void> {
    this.profileFor(userId).pendingOverspend[spendType] = amount;
  }

  async clearPendingOverspend(userId: string, spendType: SpendType): Promise<void> {
    delete this.profileFor(userId).pendingOverspend[spendType];
  }

  async applyOverspendMove(
    userId: string,
    percentages: BudgetPercentages,
    exceeded: SpendType,
    pending: Cents | null,
  ): Promise<void> {
    const profile = this.profileFor(userId);
    profile.budgetPercentages = { ...percentages };
    if (pending === null) {
      delete profile.pendingOverspend[exceeded];
    } else {
      profile.pendingOverspend[exceeded] = pending;
    }
  }

  async updateShownTipIds(userId: string, ids: string[]): Promise<void> {
    this.profileFor(userId).shownTipIds = [...ids];
  }

  async listTips(): Promise<Tip[]> {
    return [...this.tips];
  }

  private recordsFor(userId: string): UserRecords {
    let records = this.records.get(userId);
    if (!records) {
      records = emptyRecords();
      this.records.set(userId, records);
    }
    return records;
  }

  private profileFor(userId: string): UserProfile {
    const profile = this.profiles.get(userId);
    if (!profile) throw new UnknownUserError(userId);
    return profile;
  }
}
