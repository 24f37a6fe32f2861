/**
 * In-memory view of one user's planner data for the current month.
 */
import {
  allocate,
  defaultPercentages,
  monthToDateByType,
  totalIncome,
} from '../domain/computations.js';
import type { Cents } from '../domain/money.js';
import type { BudgetPosition } from '../domain/overspend.js';
import type {
  Debt,
  Income,
  Month,
  QuickExpenseShortcut,
  Transaction,
  UserProfile,
} from '../domain/types.js';
import type { PlannerStore } from '../db/store.js';

export interface PlannerSnapshot {
  userId: string;
  month: Month;
  /** No stored profile: the client should run onboarding */
  isNew: boolean;
  /** Built from defaults because the store could not be read */
  degraded: boolean;
  profile: UserProfile;
  incomes: Income[];
  /** Only transactions dated in `month` */
  transactions: Transaction[];
  debts: Debt[];
  shortcuts: QuickExpenseShortcut[];
}

export function defaultProfile(userId: string): UserProfile {
  return {
    userId,
    displayName: '',
    goal: '',
    budgetPercentages: defaultPercentages(),
    pendingOverspend: {},
    shownTipIds: [],
  };
}

export function emptySnapshot(
  userId: string,
  month: Month,
  flags: { isNew: boolean; degraded: boolean },
): PlannerSnapshot {
  return {
    userId,
    month,
    ...flags,
    profile: defaultProfile(userId),
    incomes: [],
    transactions: [],
    debts: [],
    shortcuts: [],
  };
}

export async function loadSnapshot(store: PlannerStore, userId: string, month: Month): Promise<PlannerSnapshot> {
  const profile = await store.loadUserProfile(userId);
  if (!profile) {
    return emptySnapshot(userId, month, { isNew: true, degraded: false });
  }

  const [incomes, transactions, debts, shortcuts] = await Promise.all([
    store.listIncomes(userId),
    store.listTransactions(userId, month),
    store.listDebts(userId),
    store.listShortcuts(userId),
  ]);

  return { userId, month, isNew: false, degraded: false, profile, incomes, transactions, debts, shortcuts };
}

export function snapshotIncome(snapshot: PlannerSnapshot): Cents {
  return totalIncome(snapshot.incomes);
}

/** Allocations from current percentages and month-to-date spend */
export function snapshotPosition(snapshot: PlannerSnapshot): BudgetPosition {
  const [year, month] = snapshot.month.split('-').map(Number);
  return {
    allocated: allocate(snapshotIncome(snapshot), snapshot.profile.budgetPercentages),
    spent: monthToDateByType(snapshot.transactions, year, month),
  };
}
