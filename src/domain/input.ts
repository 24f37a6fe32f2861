/**
 * Parsing of user-typed values at the boundary. Each parser returns null
 * for input the client should re-prompt for; nothing here throws.
 */
import { parseAmount, type Cents } from './money.js';
import type { BudgetPercentages } from './types.js';

const PERCENT_SUM_TOLERANCE = 1e-6;

function parseNumber(input: string | number): number | null {
  if (typeof input === 'number') return Number.isFinite(input) ? input : null;
  const cleaned = input.replace(/[%\s]/g, '').replace(',', '.');
  if (!/^[+-]?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

/** Amount > 0 (expenses, incomes, shortcuts, moves) */
export function parsePositiveAmount(input: string | number): Cents | null {
  const amount = parseAmount(input);
  return amount !== null && amount > 0 ? amount : null;
}

/** Amount >= 0 (debt balances, minimum payments, extra monthly payment) */
export function parseNonNegativeAmount(input: string | number): Cents | null {
  const amount = parseAmount(input);
  return amount !== null && amount >= 0 ? amount : null;
}

/** Annual interest rate in percent, 0 < r < 200 */
export function parseRate(input: string | number): number | null {
  const rate = parseNumber(input);
  return rate !== null && rate > 0 && rate < 200 ? rate : null;
}

/** A single percentage in [0, 100]; decimals such as 12.5 are allowed */
export function parsePercent(input: string | number): number | null {
  const value = parseNumber(input);
  return value !== null && value >= 0 && value <= 100 ? value : null;
}

/**
 * Three percentages (e.g. 50 / 30 / 20) that must add up to 100.
 * Returned as fractions of income.
 */
export function parsePercentages(
  necesidades: string | number,
  deseos: string | number,
  inversion: string | number,
): BudgetPercentages | null {
  const nec = parsePercent(necesidades);
  const des = parsePercent(deseos);
  const inv = parsePercent(inversion);
  if (nec === null || des === null || inv === null) return null;
  if (Math.abs(nec + des + inv - 100) > PERCENT_SUM_TOLERANCE) return null;
  return { Necesidades: nec / 100, Deseos: des / 100, Inversión: inv / 100 };
}
