/**
 * Debt payoff orderings and the step-by-step plan text.
 * Debt records are only read here, never changed.
 */
import { formatMoney, formatRate, sumCents, type Cents } from './money.js';
import type { Debt } from './types.js';

export type DebtStrategy = 'avalanche' | 'snowball';

export interface DebtPlan {
  strategy: DebtStrategy;
  order: Debt[];
  text: string;
}

export const NO_DEBTS_MESSAGE = 'No tienes deudas registradas.';

/** Highest annual rate first; ties keep their original order */
export function avalancheOrder(debts: Debt[]): Debt[] {
  return [...debts].sort((a, b) => b.annualRate - a.annualRate);
}

/** Smallest balance first; ties keep their original order */
export function snowballOrder(debts: Debt[]): Debt[] {
  return [...debts].sort((a, b) => a.balance - b.balance);
}

export function renderPlan(ordered: Debt[], extraMonthly: Cents): string {
  if (ordered.length === 0) return NO_DEBTS_MESSAGE;

  const minimums = sumCents(ordered.map((d) => d.minimumPayment));
  const lines = [
    `1. Paga el mínimo en TODAS tus deudas (${formatMoney(minimums)} al mes).`,
    `2. Usa tu dinero extra mensual (${formatMoney(extraMonthly)}) para atacar la primera deuda.`,
    '',
    ...ordered.map(
      (d, i) =>
        `Prioridad #${i + 1}: ${d.name} (Saldo: ${formatMoney(d.balance)}, Tasa: ${formatRate(d.annualRate)})`,
    ),
    '',
    '3. Al liquidar una deuda, suma su pago mínimo al dinero extra y ataca la siguiente.',
  ];
  return lines.join('\n');
}

export function avalanche(debts: Debt[], extraMonthly: Cents): DebtPlan {
  const order = avalancheOrder(debts);
  return { strategy: 'avalanche', order, text: renderPlan(order, extraMonthly) };
}

export function snowball(debts: Debt[], extraMonthly: Cents): DebtPlan {
  const order = snowballOrder(debts);
  return { strategy: 'snowball', order, text: renderPlan(order, extraMonthly) };
}
