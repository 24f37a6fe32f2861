/**
 * Pure domain computations: budget model and spend aggregation.
 * No DB, no IO. Data in, data out.
 */
import { scale, sumCents, type Cents } from './money.js';
import {
  DEFAULT_PERCENTAGES,
  LEGACY_SPEND_TYPE,
  SPEND_TYPES,
  type BudgetPercentages,
  type BudgetStatus,
  type Income,
  type Month,
  type MonthReport,
  type PendingOverspend,
  type RecordedSpendType,
  type SpendTotals,
  type SpendType,
  type Transaction,
} from './types.js';

export function emptyTotals(): SpendTotals {
  return { Necesidades: 0, Deseos: 0, Inversión: 0 };
}

export function totalIncome(incomes: Income[]): Cents {
  return sumCents(incomes.map((i) => i.amount));
}

/**
 * Per-spend-type allocation = total income × stored fraction.
 * Missing fractions allocate zero; a user without income gets all zeros.
 */
export function allocate(total: Cents, percentages: Partial<BudgetPercentages>): SpendTotals {
  const allocated = emptyTotals();
  for (const spendType of SPEND_TYPES) {
    allocated[spendType] = scale(total, percentages[spendType] ?? 0);
  }
  return allocated;
}

export function isSpendType(value: string): value is SpendType {
  return SPEND_TYPES.some((t) => t === value);
}

export function normalizeSpendType(spendType: RecordedSpendType): SpendType {
  return spendType === LEGACY_SPEND_TYPE ? 'Inversión' : spendType;
}

/**
 * Stored percentage maps may still carry the legacy key or miss a bucket.
 * Legacy "Ahorro/Deudas" becomes "Inversión"; unknown keys are dropped.
 * Returns null when the map is empty so callers can fall back to defaults.
 */
export function normalizePercentages(raw: Record<string, number>): BudgetPercentages | null {
  const keys = Object.keys(raw);
  if (keys.length === 0) return null;

  const result: BudgetPercentages = { Necesidades: 0, Deseos: 0, Inversión: 0 };
  for (const key of keys) {
    const value = raw[key];
    if (key === LEGACY_SPEND_TYPE) {
      result.Inversión = value;
    } else if (isSpendType(key)) {
      result[key] = value;
    }
  }
  return result;
}

export function hasLegacyPercentageKey(raw: Record<string, number>): boolean {
  return LEGACY_SPEND_TYPE in raw;
}

export function defaultPercentages(): BudgetPercentages {
  return { ...DEFAULT_PERCENTAGES };
}

/** YYYY-MM for a calendar year and month (1–12) */
export function monthKey(year: number, month: number): Month {
  return `${year}-${String(month).padStart(2, '0')}`;
}

/** Get current month as YYYY-MM */
export function currentMonth(now: Date = new Date()): Month {
  return monthKey(now.getFullYear(), now.getMonth() + 1);
}

/** Local calendar date as YYYY-MM-DD */
export function isoDate(now: Date = new Date()): string {
  const d = String(now.getDate()).padStart(2, '0');
  return `${currentMonth(now)}-${d}`;
}

/** Filter transactions to a single month (YYYY-MM) */
export function forMonth(txns: Transaction[], month: Month): Transaction[] {
  return txns.filter((t) => t.date.startsWith(`${month}-`));
}

/**
 * Month-to-date spend per spend type.
 * Legacy "Ahorro/Deudas" entries count as Inversión.
 */
export function monthToDateByType(txns: Transaction[], year: number, month: number): SpendTotals {
  const totals = emptyTotals();
  for (const t of forMonth(txns, monthKey(year, month))) {
    totals[normalizeSpendType(t.spendType)] += t.amount;
  }
  return totals;
}

/** remaining = allocated − spent, per spend type */
export function budgetStatus(allocated: SpendTotals, spent: SpendTotals): BudgetStatus[] {
  return SPEND_TYPES.map((spendType) => ({
    spendType,
    allocated: allocated[spendType],
    spent: spent[spendType],
    remaining: allocated[spendType] - spent[spendType],
  }));
}

export function monthReport(
  month: Month,
  income: Cents,
  percentages: BudgetPercentages,
  spent: SpendTotals,
  pendingOverspend: PendingOverspend,
): MonthReport {
  const rows = budgetStatus(allocate(income, percentages), spent);
  const totalSpent = spent.Necesidades + spent.Deseos;
  return {
    month,
    totalIncome: income,
    rows,
    totalSpent,
    netBalance: income - totalSpent - spent.Inversión,
    pendingOverspend,
  };
}
