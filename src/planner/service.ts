/**
 * Planner operations exposed to the presentation layer.
 *
 * Reads go through the per-user snapshot cache. Every write invalidates the
 * user's snapshot once the write attempt finishes, whatever its outcome.
 * Store failures are logged and reported as `save_failed`; in-memory state
 * is never updated ahead of a successful write.
 */
import {
  currentMonth,
  isoDate,
  monthReport,
  budgetStatus,
  allocate,
} from '../domain/computations.js';
import { avalanche, snowball, type DebtPlan } from '../domain/debtPlan.js';
import type { Cents } from '../domain/money.js';
import {
  applyMove,
  available,
  checkSpend,
  DEFAULT_OVERAGE_EPSILON,
  suggestMoveAmount,
  validateMoveAmount,
  type MoveOption,
  type MoveRejection,
} from '../domain/overspend.js';
import { debtCondition, incomeLevel, pickNext } from '../domain/tips.js';
import {
  CONTRIBUTION_CATEGORY,
  DEFAULT_INCOME_NAME,
  type BudgetPercentages,
  type BudgetStatus,
  type Debt,
  type Income,
  type MonthReport,
  type PendingOverspend,
  type QuickExpenseShortcut,
  type RecordedSpendType,
  type SpendTotals,
  type SpendType,
  type Tip,
  type UserProfile,
} from '../domain/types.js';
import type { PlannerStore, RecordInput, RecordKind } from '../db/store.js';
import { PlannerCache } from './cache.js';
import {
  beginEpisode,
  isOfferedSource,
  toEnteringAmount,
  type EnteringAmount,
  type OverspendChoice,
  type ReconciliationEpisode,
} from './reconciliation.js';
import {
  defaultProfile,
  emptySnapshot,
  loadSnapshot,
  snapshotIncome,
  snapshotPosition,
  type PlannerSnapshot,
} from './snapshot.js';

export interface PlannerServiceOptions {
  store: PlannerStore;
  /** Residual overage (cents) treated as fully covered */
  overageEpsilon?: Cents;
  now?: () => Date;
  random?: () => number;
}

export type SaveFailed = { status: 'save_failed' };
export type NotFound = { status: 'not_found' };
/** The user has no profile yet; onboarding must come first */
export type NeedsOnboarding = { status: 'needs_onboarding' };
export type AlreadyOnboarded = { status: 'already_onboarded' };
export type Saved<T> = { status: 'ok'; value: T } | SaveFailed;

export const SAVE_FAILED_MESSAGE = 'No se pudo guardar. Inténtalo más tarde.';

const SAVE_FAILED: SaveFailed = { status: 'save_failed' };
const NOT_FOUND: NotFound = { status: 'not_found' };
const NEEDS_ONBOARDING: NeedsOnboarding = { status: 'needs_onboarding' };
const ALREADY_ONBOARDED: AlreadyOnboarded = { status: 'already_onboarded' };

export interface ExpenseInput {
  amount: Cents;
  category: string;
  spendType: SpendType;
  description: string;
}

export interface OnboardingInput {
  displayName: string;
  goal: string;
  income: Cents;
  percentages?: BudgetPercentages;
}

export type RecordOutcome =
  | {
      status: 'ok';
      transactionId: string;
      spendType: SpendType;
      allocated: Cents;
      spent: Cents;
      remaining: Cents;
    }
  | {
      status: 'over_budget';
      transactionId: string;
      spendType: SpendType;
      overage: Cents;
      moveOptions: MoveOption[];
      /** null when nothing can be moved and the overage went straight to pending */
      episode: ReconciliationEpisode | null;
      autoRecorded: boolean;
      pendingRecorded: boolean;
    }
  | {
      /** Saved, but the budget could not be reloaded to check it */
      status: 'recorded';
      transactionId: string;
      spendType: SpendType;
      checked: false;
    }
  | NeedsOnboarding
  | SaveFailed;

export type ResolveOutcome =
  | {
      status: 'resolved';
      exceeded: SpendType;
      movedAmount: Cents;
      remainingPending: Cents;
      percentages: BudgetPercentages;
    }
  | { status: 'awaiting_amount'; episode: EnteringAmount }
  | {
      status: 'rejected';
      episode: ReconciliationEpisode;
      reason: MoveRejection | 'source_unavailable' | 'unexpected_choice';
      available?: Cents;
    }
  | { status: 'save_failed'; episode: ReconciliationEpisode };

export interface DebtPlans {
  avalanche: DebtPlan;
  snowball: DebtPlan;
  avalancheText: string;
  snowballText: string;
}

export interface MonthStatus {
  rows: BudgetStatus[];
  pendingOverspend: PendingOverspend;
}

export class PlannerService {
  private readonly store: PlannerStore;
  private readonly cache = new PlannerCache();
  private readonly epsilon: Cents;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(options: PlannerServiceOptions) {
    this.store = options.store;
    this.epsilon = options.overageEpsilon ?? DEFAULT_OVERAGE_EPSILON;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  // --- Snapshot ---

  async loadPlanner(userId: string): Promise<PlannerSnapshot> {
    const month = currentMonth(this.now());
    const cached = this.cache.get(userId, month);
    if (cached) return cached;

    try {
      const snapshot = await loadSnapshot(this.store, userId, month);
      this.cache.set(snapshot);
      return snapshot;
    } catch (error) {
      console.error(`Error loading planner for user ${userId}:`, error);
      return emptySnapshot(userId, month, { isNew: false, degraded: true });
    }
  }

  isCached(userId: string): boolean {
    return this.cache.has(userId);
  }

  // --- Onboarding & budget ---

  async onboard(userId: string, input: OnboardingInput): Promise<Saved<string> | AlreadyOnboarded> {
    let existing: UserProfile | null;
    try {
      existing = await this.store.loadUserProfile(userId);
    } catch (error) {
      console.error('Error checking existing profile:', error);
      return SAVE_FAILED;
    }
    if (existing) return ALREADY_ONBOARDED;

    return this.mutate(userId, 'saving onboarding', async () => {
      await this.store.saveUserProfile({
        ...defaultProfile(userId),
        displayName: input.displayName,
        goal: input.goal,
        ...(input.percentages ? { budgetPercentages: { ...input.percentages } } : {}),
      });
      return this.store.saveRecord(userId, {
        kind: 'incomes',
        fields: { name: DEFAULT_INCOME_NAME, amount: input.income },
      });
    });
  }

  /** Percentages must already be validated (see parsePercentages) */
  async setBudgetPercentages(
    userId: string,
    percentages: BudgetPercentages,
  ): Promise<Saved<BudgetPercentages> | NeedsOnboarding> {
    if (!(await this.hasProfile(userId))) return NEEDS_ONBOARDING;
    return this.mutate(userId, 'updating budget percentages', async () => {
      await this.store.updateBudgetPercentages(userId, percentages);
      return percentages;
    });
  }

  // --- Transactions ---

  async recordTransaction(userId: string, expense: ExpenseInput): Promise<RecordOutcome> {
    if (!(await this.hasProfile(userId))) return NEEDS_ONBOARDING;

    const today = this.now();
    let transactionId: string;
    try {
      transactionId = await this.store.saveRecord(userId, {
        kind: 'transactions',
        fields: { ...expense, date: isoDate(today) },
      });
    } catch (error) {
      console.error('Error saving transaction:', error);
      return SAVE_FAILED;
    } finally {
      this.cache.invalidate(userId);
    }

    await this.bumpMonthlySummary(userId, currentMonth(today), expense.spendType, expense.amount);

    const snapshot = await this.loadPlanner(userId);
    if (snapshot.degraded) {
      return { status: 'recorded', transactionId, spendType: expense.spendType, checked: false };
    }
    const position = snapshotPosition(snapshot);
    const check = checkSpend(position, expense.spendType);

    if (check.status === 'ok') {
      return {
        status: 'ok',
        transactionId,
        spendType: check.spendType,
        allocated: position.allocated[check.spendType],
        spent: position.spent[check.spendType],
        remaining: check.remaining,
      };
    }

    if (check.moveOptions.length > 0) {
      return {
        status: 'over_budget',
        transactionId,
        spendType: check.spendType,
        overage: check.overage,
        moveOptions: check.moveOptions,
        episode: beginEpisode(userId, check.spendType, check.overage, check.moveOptions, expense.description),
        autoRecorded: false,
        pendingRecorded: false,
      };
    }

    const pending = await this.mutate(userId, 'recording pending overspend', () =>
      this.store.setPendingOverspend(userId, check.spendType, check.overage),
    );
    return {
      status: 'over_budget',
      transactionId,
      spendType: check.spendType,
      overage: check.overage,
      moveOptions: [],
      episode: null,
      autoRecorded: true,
      pendingRecorded: pending.status === 'ok',
    };
  }

  /** Expense from a saved shortcut; the description is the shortcut's name */
  async recordShortcutExpense(userId: string, shortcutId: string): Promise<RecordOutcome | NotFound> {
    const snapshot = await this.loadPlanner(userId);
    if (snapshot.isNew) return NEEDS_ONBOARDING;
    const shortcut = snapshot.shortcuts.find((s) => s.id === shortcutId);
    if (!shortcut) return NOT_FOUND;

    return this.recordTransaction(userId, {
      amount: shortcut.amount,
      category: shortcut.category,
      spendType: shortcut.spendType,
      description: shortcut.name,
    });
  }

  /** Savings / investment contribution, counted against Inversión */
  async recordContribution(userId: string, amount: Cents, description: string): Promise<RecordOutcome> {
    return this.recordTransaction(userId, {
      amount,
      category: CONTRIBUTION_CATEGORY,
      spendType: 'Inversión',
      description,
    });
  }

  // --- Overspend reconciliation ---

  async resolveOverspend(episode: ReconciliationEpisode, choice: OverspendChoice): Promise<ResolveOutcome> {
    switch (choice.kind) {
      case 'leave':
        return this.leaveOverspend(episode);
      case 'move_from':
        return this.chooseSource(episode, choice.source);
      case 'amount':
        if (episode.step !== 'entering_amount') {
          return { status: 'rejected', episode, reason: 'unexpected_choice' };
        }
        return this.moveFunds(episode, choice.amount);
    }
  }

  private async leaveOverspend(episode: ReconciliationEpisode): Promise<ResolveOutcome> {
    const { userId, exceeded, overage } = episode;
    const saved = await this.mutate(userId, 'recording pending overspend', () =>
      this.store.setPendingOverspend(userId, exceeded, overage),
    );
    if (saved.status !== 'ok') return { status: 'save_failed', episode };

    const snapshot = await this.loadPlanner(userId);
    return {
      status: 'resolved',
      exceeded,
      movedAmount: 0,
      remainingPending: overage,
      percentages: snapshot.profile.budgetPercentages,
    };
  }

  private async chooseSource(episode: ReconciliationEpisode, source: SpendType): Promise<ResolveOutcome> {
    if (!isOfferedSource(episode, source)) {
      return { status: 'rejected', episode, reason: 'source_unavailable' };
    }

    const snapshot = await this.loadPlanner(episode.userId);
    const availableAmount = available(snapshotPosition(snapshot), source);
    if (availableAmount <= 0) {
      return { status: 'rejected', episode, reason: 'source_unavailable', available: availableAmount };
    }

    return {
      status: 'awaiting_amount',
      episode: toEnteringAmount(episode, source, availableAmount, suggestMoveAmount(episode.overage, availableAmount)),
    };
  }

  private async moveFunds(episode: EnteringAmount, amount: Cents): Promise<ResolveOutcome> {
    const { userId, exceeded, source, overage } = episode;
    const snapshot = await this.loadPlanner(userId);
    const availableAmount = available(snapshotPosition(snapshot), source);

    const rejection = validateMoveAmount(amount, availableAmount);
    if (rejection) {
      return {
        status: 'rejected',
        episode: { ...episode, available: availableAmount },
        reason: rejection,
        available: availableAmount,
      };
    }

    const result = applyMove({
      percentages: snapshot.profile.budgetPercentages,
      pending: snapshot.profile.pendingOverspend,
      totalIncome: snapshotIncome(snapshot),
      exceeded,
      source,
      overage,
      amount,
      epsilon: this.epsilon,
    });

    const saved = await this.mutate(userId, 'moving budget between spend types', () =>
      this.store.applyOverspendMove(
        userId,
        result.percentages,
        exceeded,
        result.pendingRecorded ? result.remainingOverage : null,
      ),
    );
    if (saved.status !== 'ok') return { status: 'save_failed', episode };

    return {
      status: 'resolved',
      exceeded,
      movedAmount: amount,
      remainingPending: result.pendingRecorded ? result.remainingOverage : 0,
      percentages: result.percentages,
    };
  }

  // --- Incomes, debts, shortcuts ---

  async addIncome(userId: string, fields: Omit<Income, 'id'>): Promise<Saved<string> | NeedsOnboarding> {
    return this.saveNew(userId, { kind: 'incomes', fields });
  }

  async updateIncome(userId: string, id: string, fields: Omit<Income, 'id'>): Promise<Saved<string> | NotFound> {
    const snapshot = await this.loadPlanner(userId);
    if (!snapshot.incomes.some((i) => i.id === id)) return NOT_FOUND;
    return this.mutate(userId, 'updating income', () => this.store.saveRecord(userId, { kind: 'incomes', fields }, id));
  }

  async deleteIncome(userId: string, id: string): Promise<Saved<boolean>> {
    return this.deleteRecord(userId, 'incomes', id);
  }

  async addDebt(userId: string, fields: Omit<Debt, 'id'>): Promise<Saved<string> | NeedsOnboarding> {
    return this.saveNew(userId, { kind: 'debts', fields });
  }

  async updateDebt(userId: string, id: string, fields: Omit<Debt, 'id'>): Promise<Saved<string> | NotFound> {
    const snapshot = await this.loadPlanner(userId);
    if (!snapshot.debts.some((d) => d.id === id)) return NOT_FOUND;
    return this.mutate(userId, 'updating debt', () => this.store.saveRecord(userId, { kind: 'debts', fields }, id));
  }

  async deleteDebt(userId: string, id: string): Promise<Saved<boolean>> {
    return this.deleteRecord(userId, 'debts', id);
  }

  async addShortcut(
    userId: string,
    fields: Omit<QuickExpenseShortcut, 'id'>,
  ): Promise<Saved<string> | NeedsOnboarding> {
    return this.saveNew(userId, { kind: 'shortcuts', fields });
  }

  async updateShortcut(
    userId: string,
    id: string,
    fields: Omit<QuickExpenseShortcut, 'id'>,
  ): Promise<Saved<string> | NotFound> {
    const snapshot = await this.loadPlanner(userId);
    if (!snapshot.shortcuts.some((s) => s.id === id)) return NOT_FOUND;
    return this.mutate(userId, 'updating shortcut', () =>
      this.store.saveRecord(userId, { kind: 'shortcuts', fields }, id),
    );
  }

  async deleteShortcut(userId: string, id: string): Promise<Saved<boolean>> {
    return this.deleteRecord(userId, 'shortcuts', id);
  }

  // --- Debt plans, tips, reports ---

  async computeDebtPlans(userId: string, extraMonthly: Cents): Promise<DebtPlans> {
    const { debts } = await this.loadPlanner(userId);
    const avalanchePlan = avalanche(debts, extraMonthly);
    const snowballPlan = snowball(debts, extraMonthly);
    return {
      avalanche: avalanchePlan,
      snowball: snowballPlan,
      avalancheText: avalanchePlan.text,
      snowballText: snowballPlan.text,
    };
  }

  async nextTip(userId: string): Promise<Tip | null> {
    const snapshot = await this.loadPlanner(userId);

    let tips: Tip[];
    try {
      tips = await this.store.listTips();
    } catch (error) {
      console.error('Error loading tips:', error);
      return null;
    }

    const pick = pickNext(
      tips,
      incomeLevel(snapshotIncome(snapshot)),
      debtCondition(snapshot.debts.length > 0),
      snapshot.profile.shownTipIds,
      this.random,
    );
    if (!pick) return null;

    await this.mutate(userId, 'saving shown tips', () => this.store.updateShownTipIds(userId, pick.shownIds));
    return pick.tip;
  }

  async monthStatus(userId: string): Promise<MonthStatus> {
    const snapshot = await this.loadPlanner(userId);
    const position = snapshotPosition(snapshot);
    return {
      rows: budgetStatus(position.allocated, position.spent),
      pendingOverspend: snapshot.profile.pendingOverspend,
    };
  }

  async fullReport(userId: string): Promise<MonthReport> {
    const snapshot = await this.loadPlanner(userId);
    return monthReport(
      snapshot.month,
      snapshotIncome(snapshot),
      snapshot.profile.budgetPercentages,
      snapshotPosition(snapshot).spent,
      snapshot.profile.pendingOverspend,
    );
  }

  /**
   * Status from the denormalized monthly totals instead of the transaction
   * list. Can lag behind if an increment failed; falls back to zeros.
   */
  async quickStatus(userId: string): Promise<BudgetStatus[]> {
    const snapshot = await this.loadPlanner(userId);
    let spent: SpendTotals;
    try {
      spent = await this.store.getMonthlySummary(userId, snapshot.month);
    } catch (error) {
      console.error('Error reading monthly summary:', error);
      spent = snapshotPosition(snapshot).spent;
    }
    return budgetStatus(allocate(snapshotIncome(snapshot), snapshot.profile.budgetPercentages), spent);
  }

  // --- Helpers ---

  private async saveNew(userId: string, record: RecordInput): Promise<Saved<string> | NeedsOnboarding> {
    if (!(await this.hasProfile(userId))) return NEEDS_ONBOARDING;
    return this.mutate(userId, `saving ${record.kind}`, () => this.store.saveRecord(userId, record));
  }

  private async deleteRecord(userId: string, kind: RecordKind, id: string): Promise<Saved<boolean>> {
    return this.mutate(userId, `deleting ${kind}`, () => this.store.deleteRecord(userId, kind, id));
  }

  /** A degraded read counts as onboarded so the write can still be attempted */
  private async hasProfile(userId: string): Promise<boolean> {
    return !(await this.loadPlanner(userId)).isNew;
  }

  private async bumpMonthlySummary(
    userId: string,
    month: string,
    spendType: RecordedSpendType,
    amount: Cents,
  ): Promise<void> {
    try {
      await this.store.incrementMonthlySummaryField(userId, month, spendType, amount);
    } catch (error) {
      console.error(`Error updating monthly summary for ${userId}:`, error);
    }
  }

  private async mutate<T>(userId: string, label: string, write: () => Promise<T>): Promise<Saved<T>> {
    try {
      return { status: 'ok', value: await write() };
    } catch (error) {
      console.error(`Error ${label}:`, error);
      return SAVE_FAILED;
    } finally {
      this.cache.invalidate(userId);
    }
  }
}
