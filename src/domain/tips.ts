/**
 * Tip selection by income level and debt presence.
 * Shown tips are excluded until every eligible tip has been seen once.
 */
import { toCents, type Cents } from './money.js';
import { ALL_LEVELS, type DebtCondition, type IncomeLevel, type Tip } from './types.js';

/** Lower bounds (currency units) of Nivel 2..5 */
const LEVEL_THRESHOLDS: [Cents, IncomeLevel][] = [
  [toCents(9000), 'Nivel 1'],
  [toCents(30000), 'Nivel 2'],
  [toCents(80000), 'Nivel 3'],
  [toCents(150000), 'Nivel 4'],
];

export interface TipPick {
  tip: Tip;
  /** Exclusion list to persist after this pick */
  shownIds: string[];
}

export function incomeLevel(total: Cents): IncomeLevel {
  for (const [upper, level] of LEVEL_THRESHOLDS) {
    if (total < upper) return level;
  }
  return 'Nivel 5';
}

export function debtCondition(hasAnyDebt: boolean): DebtCondition {
  return hasAnyDebt ? 'Con deudas' : 'Sin deudas';
}

export function eligibleTips(
  tips: Tip[],
  level: IncomeLevel,
  condition: DebtCondition,
  excluded: ReadonlySet<string>,
): Tip[] {
  return tips.filter(
    (tip) =>
      (tip.incomeLevels.includes(level) || tip.incomeLevels.includes(ALL_LEVELS)) &&
      tip.conditions.includes(condition) &&
      !excluded.has(tip.id),
  );
}

function choose(candidates: Tip[], random: () => number): Tip {
  const index = Math.min(Math.floor(random() * candidates.length), candidates.length - 1);
  return candidates[index];
}

/**
 * Uniform pick among eligible, not-yet-shown tips. When everything has been
 * shown the exclusion list resets once before giving up.
 */
export function pickNext(
  tips: Tip[],
  level: IncomeLevel,
  condition: DebtCondition,
  excludedIds: string[],
  random: () => number = Math.random,
): TipPick | null {
  const fresh = eligibleTips(tips, level, condition, new Set(excludedIds));
  if (fresh.length > 0) {
    const tip = choose(fresh, random);
    const shownIds = excludedIds.includes(tip.id) ? excludedIds : [...excludedIds, tip.id];
    return { tip, shownIds };
  }

  if (excludedIds.length === 0) return null;

  const all = eligibleTips(tips, level, condition, new Set());
  if (all.length === 0) return null;
  const tip = choose(all, random);
  return { tip, shownIds: [tip.id] };
}
