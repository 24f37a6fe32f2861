/**
 * Domain types for the budget planner.
 * Pure data. No DB, no IO.
 */
import type { Cents } from './money.js';

/** The three top-level budget buckets every expense falls into */
export const SPEND_TYPES = ['Necesidades', 'Deseos', 'Inversión'] as const;
export type SpendType = (typeof SPEND_TYPES)[number];

/** Older records used this name for what is now Inversión */
export const LEGACY_SPEND_TYPE = 'Ahorro/Deudas';
export type RecordedSpendType = SpendType | typeof LEGACY_SPEND_TYPE;

/** Fraction of total income per spend type; the three sum to 1 */
export type BudgetPercentages = Record<SpendType, number>;

/** Money per spend type (allocations, month-to-date spend, availability) */
export type SpendTotals = Record<SpendType, Cents>;

/** Unresolved overage carried forward per spend type */
export type PendingOverspend = Partial<Record<SpendType, Cents>>;

/** YYYY-MM string */
export type Month = string;

export interface Income {
  id: string;
  name: string;
  amount: Cents;               // monthly, > 0
}

export interface Transaction {
  id: string;
  amount: Cents;               // > 0
  category: string;            // display tag, e.g. "Comida"
  spendType: RecordedSpendType;
  description: string;
  date: string;                // YYYY-MM-DD
  createdAt: string;           // ISO timestamp
}

export interface Debt {
  id: string;
  name: string;
  balance: Cents;              // >= 0
  annualRate: number;          // percent, 0 < r < 200
  minimumPayment: Cents;       // >= 0
}

export interface QuickExpenseShortcut {
  id: string;
  name: string;
  amount: Cents;
  category: string;
  spendType: SpendType;
}

export const INCOME_LEVELS = ['Nivel 1', 'Nivel 2', 'Nivel 3', 'Nivel 4', 'Nivel 5'] as const;
export type IncomeLevel = (typeof INCOME_LEVELS)[number];
export const ALL_LEVELS = 'Todos';

export const DEBT_CONDITIONS = ['Con deudas', 'Sin deudas'] as const;
export type DebtCondition = (typeof DEBT_CONDITIONS)[number];

export interface Tip {
  id: string;
  title: string;
  explanation: string;
  incomeLevels: (IncomeLevel | typeof ALL_LEVELS)[];
  conditions: DebtCondition[];
}

export interface UserProfile {
  userId: string;
  displayName: string;
  goal: string;
  budgetPercentages: BudgetPercentages;
  pendingOverspend: PendingOverspend;
  shownTipIds: string[];
}

/** Per-spend-type position for one month */
export interface BudgetStatus {
  spendType: SpendType;
  allocated: Cents;
  spent: Cents;
  remaining: Cents;            // can be negative (overspent)
}

export interface MonthReport {
  month: Month;
  totalIncome: Cents;
  rows: BudgetStatus[];
  totalSpent: Cents;           // Necesidades + Deseos
  netBalance: Cents;           // income − all three spend types
  pendingOverspend: PendingOverspend;
}

export const DEFAULT_PERCENTAGES: BudgetPercentages = {
  Necesidades: 0.5,
  Deseos: 0.3,
  Inversión: 0.2,
};

export const GOALS = [
  'Pagar mis deudas',
  'Ahorrar para una meta',
  'Empezar a invertir',
  'Solo entender mis gastos',
] as const;

/** Display tags offered for expenses; any other text is accepted too */
export const EXPENSE_CATEGORIES = ['Comida', 'Transporte', 'Hogar', 'Entretenimiento', 'Salud', 'Otro'] as const;

export const CONTRIBUTION_CATEGORY = 'Aportación';
export const DEFAULT_INCOME_NAME = 'Ingreso Principal';
