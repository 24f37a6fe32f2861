/**
 * Overspend math: detecting an over-budget spend type and shifting budget
 * share from another spend type to cover it.
 *
 * A move is a permanent reallocation of future budget share, not a one-off
 * transfer: the moved amount is converted into a fraction of total income
 * and taken from the source's percentage.
 */
import type { Cents } from './money.js';
import {
  SPEND_TYPES,
  type BudgetPercentages,
  type PendingOverspend,
  type SpendTotals,
  type SpendType,
} from './types.js';

/** Allocations and month-to-date spend for one user and month */
export interface BudgetPosition {
  allocated: SpendTotals;
  spent: SpendTotals;
}

export interface MoveOption {
  source: SpendType;
  available: Cents;
}

export type SpendCheck =
  | { status: 'ok'; spendType: SpendType; remaining: Cents }
  | { status: 'over_budget'; spendType: SpendType; overage: Cents; moveOptions: MoveOption[] };

export type MoveRejection = 'not_positive' | 'exceeds_available';

export interface MoveRequest {
  percentages: BudgetPercentages;
  pending: PendingOverspend;
  totalIncome: Cents;
  exceeded: SpendType;
  source: SpendType;
  overage: Cents;
  amount: Cents;
  /** Residual overage at or below this is treated as covered */
  epsilon: Cents;
}

export interface MoveResult {
  percentages: BudgetPercentages;
  pending: PendingOverspend;
  remainingOverage: Cents;
  /** True when the residual was above epsilon and is now pending */
  pendingRecorded: boolean;
}

/** Default epsilon: one cent */
export const DEFAULT_OVERAGE_EPSILON: Cents = 1;

export function available(position: BudgetPosition, spendType: SpendType): Cents {
  return position.allocated[spendType] - position.spent[spendType];
}

/** Every other spend type that still has money left this month */
export function moveOptions(position: BudgetPosition, exceeded: SpendType): MoveOption[] {
  return SPEND_TYPES.filter((t) => t !== exceeded)
    .map((source) => ({ source, available: available(position, source) }))
    .filter((option) => option.available > 0);
}

/**
 * Compare a spend type's allocation with its month-to-date spend
 * (which already includes the newly recorded transaction).
 */
export function checkSpend(position: BudgetPosition, spendType: SpendType): SpendCheck {
  const remaining = available(position, spendType);
  if (remaining >= 0) {
    return { status: 'ok', spendType, remaining };
  }
  return {
    status: 'over_budget',
    spendType,
    overage: -remaining,
    moveOptions: moveOptions(position, spendType),
  };
}

export function suggestMoveAmount(overage: Cents, availableAmount: Cents): Cents {
  return Math.min(overage, availableAmount);
}

export function validateMoveAmount(amount: Cents, availableAmount: Cents): MoveRejection | null {
  if (amount <= 0) return 'not_positive';
  if (amount > availableAmount) return 'exceeds_available';
  return null;
}

/** Returns fresh objects; the request's maps are left untouched. */
export function applyMove(request: MoveRequest): MoveResult {
  const { exceeded, source, amount, totalIncome } = request;
  const percentages: BudgetPercentages = { ...request.percentages };

  if (totalIncome > 0) {
    const delta = amount / totalIncome;
    percentages[source] -= delta;
    percentages[exceeded] += delta;
  }

  const pending: PendingOverspend = { ...request.pending };
  const remainingOverage = request.overage - amount;
  const pendingRecorded = remainingOverage > request.epsilon;
  if (pendingRecorded) {
    pending[exceeded] = remainingOverage;
  } else {
    delete pending[exceeded];
  }

  return { percentages, pending, remainingOverage, pendingRecorded };
}
