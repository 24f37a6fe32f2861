/**
 * JSON views of planner values. Amounts leave the API as major units
 * (12.5 for $12.50); percentages stay as fractions.
 */
import { fromCents } from '../../src/domain/money.js';
import type { MoveOption } from '../../src/domain/overspend.js';
import {
  SPEND_TYPES,
  type BudgetStatus,
  type Debt,
  type MonthReport,
  type PendingOverspend,
  type QuickExpenseShortcut,
  type Transaction,
} from '../../src/domain/types.js';
import type { ReconciliationEpisode } from '../../src/planner/reconciliation.js';
import type {
  DebtPlans,
  MonthStatus,
  NeedsOnboarding,
  RecordOutcome,
  ResolveOutcome,
  SaveFailed,
} from '../../src/planner/service.js';
import type { PlannerSnapshot } from '../../src/planner/snapshot.js';

export function pendingJson(pending: PendingOverspend): Record<string, number> {
  const out: Record<string, number> = {};
  for (const spendType of SPEND_TYPES) {
    const amount = pending[spendType];
    if (amount !== undefined) out[spendType] = fromCents(amount);
  }
  return out;
}

export function statusRowJson(row: BudgetStatus) {
  return {
    spendType: row.spendType,
    allocated: fromCents(row.allocated),
    spent: fromCents(row.spent),
    remaining: fromCents(row.remaining),
  };
}

function optionJson(option: MoveOption) {
  return { source: option.source, available: fromCents(option.available) };
}

function debtJson(debt: Debt) {
  return {
    id: debt.id,
    name: debt.name,
    balance: fromCents(debt.balance),
    annualRate: debt.annualRate,
    minimumPayment: fromCents(debt.minimumPayment),
  };
}

function transactionJson(t: Transaction) {
  return { ...t, amount: fromCents(t.amount) };
}

function shortcutJson(s: QuickExpenseShortcut) {
  return { ...s, amount: fromCents(s.amount) };
}

export function episodeJson(episode: ReconciliationEpisode) {
  const base = {
    step: episode.step,
    exceeded: episode.exceeded,
    overage: fromCents(episode.overage),
    cause: episode.cause,
    options: episode.options.map(optionJson),
  };
  if (episode.step === 'choosing_source') return base;
  return {
    ...base,
    source: episode.source,
    available: fromCents(episode.available),
    suggested: fromCents(episode.suggested),
  };
}

export function snapshotJson(snapshot: PlannerSnapshot) {
  const { profile } = snapshot;
  return {
    userId: snapshot.userId,
    month: snapshot.month,
    isNew: snapshot.isNew,
    degraded: snapshot.degraded,
    profile: {
      displayName: profile.displayName,
      goal: profile.goal,
      budgetPercentages: profile.budgetPercentages,
      pendingOverspend: pendingJson(profile.pendingOverspend),
    },
    incomes: snapshot.incomes.map((i) => ({ ...i, amount: fromCents(i.amount) })),
    transactions: snapshot.transactions.map(transactionJson),
    debts: snapshot.debts.map(debtJson),
    shortcuts: snapshot.shortcuts.map(shortcutJson),
  };
}

export function recordOutcomeJson(outcome: Exclude<RecordOutcome, SaveFailed | NeedsOnboarding>) {
  switch (outcome.status) {
    case 'ok':
      return {
        status: outcome.status,
        transactionId: outcome.transactionId,
        spendType: outcome.spendType,
        allocated: fromCents(outcome.allocated),
        spent: fromCents(outcome.spent),
        remaining: fromCents(outcome.remaining),
      };
    case 'over_budget':
      return {
        status: outcome.status,
        transactionId: outcome.transactionId,
        spendType: outcome.spendType,
        overage: fromCents(outcome.overage),
        moveOptions: outcome.moveOptions.map(optionJson),
        episode: outcome.episode ? episodeJson(outcome.episode) : null,
        autoRecorded: outcome.autoRecorded,
        pendingRecorded: outcome.pendingRecorded,
      };
    case 'recorded':
      return {
        status: outcome.status,
        transactionId: outcome.transactionId,
        spendType: outcome.spendType,
        checked: outcome.checked,
      };
  }
}

export function resolveOutcomeJson(outcome: Exclude<ResolveOutcome, { status: 'save_failed' }>) {
  switch (outcome.status) {
    case 'resolved':
      return {
        status: outcome.status,
        exceeded: outcome.exceeded,
        movedAmount: fromCents(outcome.movedAmount),
        remainingPending: fromCents(outcome.remainingPending),
        percentages: outcome.percentages,
      };
    case 'awaiting_amount':
      return { status: outcome.status, episode: episodeJson(outcome.episode) };
    case 'rejected':
      return {
        status: outcome.status,
        reason: outcome.reason,
        ...(outcome.available !== undefined ? { available: fromCents(outcome.available) } : {}),
        episode: episodeJson(outcome.episode),
      };
  }
}

export function monthStatusJson(status: MonthStatus) {
  return {
    rows: status.rows.map(statusRowJson),
    pendingOverspend: pendingJson(status.pendingOverspend),
  };
}

export function reportJson(report: MonthReport) {
  return {
    month: report.month,
    totalIncome: fromCents(report.totalIncome),
    rows: report.rows.map(statusRowJson),
    totalSpent: fromCents(report.totalSpent),
    netBalance: fromCents(report.netBalance),
    pendingOverspend: pendingJson(report.pendingOverspend),
  };
}

export function debtPlansJson(plans: DebtPlans) {
  return {
    avalanche: { order: plans.avalanche.order.map(debtJson), text: plans.avalancheText },
    snowball: { order: plans.snowball.order.map(debtJson), text: plans.snowballText },
  };
}
