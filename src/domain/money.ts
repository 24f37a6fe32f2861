/**
 * Money helpers.
 * Amounts are integer minor units (cents). Fractions are applied with a
 * single rounding step so repeated percentage splits never drift.
 */

/** Integer minor units (2 decimals) */
export type Cents = number;

export const CENTS_PER_UNIT = 100;

const AMOUNT_PATTERN = /^([+-]?)(\d+)(?:\.(\d*))?$/;

const groupFormatter = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function toCents(major: number): Cents {
  return Math.round(major * CENTS_PER_UNIT);
}

export function fromCents(amount: Cents): number {
  return amount / CENTS_PER_UNIT;
}

/** amount × fraction, rounded once to whole cents */
export function scale(amount: Cents, fraction: number): Cents {
  return Math.round(amount * fraction);
}

export function sumCents(values: Cents[]): Cents {
  return values.reduce((sum, v) => sum + v, 0);
}

/**
 * Parse user input such as "1,500.50", "$ 20" or 12.5 into cents.
 * Extra decimals round half-up. Returns null for anything that is not a number.
 */
export function parseAmount(input: string | number): Cents | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? toCents(input) : null;
  }

  const cleaned = input.replace(/[$,\s]/g, '');
  const match = AMOUNT_PATTERN.exec(cleaned);
  if (!match) return null;

  const [, sign, whole, fraction = ''] = match;
  const padded = `${fraction}00`;
  let cents = Number(whole) * CENTS_PER_UNIT + Number(padded.slice(0, 2));
  if (Number(padded.charAt(2)) >= 5) cents += 1;
  if (!Number.isSafeInteger(cents)) return null;

  return sign === '-' ? -cents : cents;
}

/** $1,234.50; negative amounts render as $-1,234.50 */
export function formatMoney(amount: Cents): string {
  return `$${groupFormatter.format(fromCents(amount))}`;
}

/** Annual rate given in percent (25 → "25.00%") */
export function formatRate(percent: number): string {
  return `${percent.toFixed(2)}%`;
}
