import { describe, expect, it } from 'vitest';
import { allocate } from './computations.js';
import { toCents } from './money.js';
import {
  applyMove,
  checkSpend,
  DEFAULT_OVERAGE_EPSILON,
  moveOptions,
  suggestMoveAmount,
  validateMoveAmount,
  type BudgetPosition,
  type MoveRequest,
} from './overspend.js';
import type { BudgetPercentages } from './types.js';

const PERCENTAGES: BudgetPercentages = { Necesidades: 0.5, Deseos: 0.3, Inversión: 0.2 };
const INCOME = toCents(10000);

// 10000 income, Deseos already at 1000 before a 2500 expense
function position(spent: Partial<BudgetPosition['spent']> = {}): BudgetPosition {
  return {
    allocated: allocate(INCOME, PERCENTAGES),
    spent: { Necesidades: toCents(4000), Deseos: toCents(3500), Inversión: 0, ...spent },
  };
}

function moveRequest(overrides: Partial<MoveRequest> = {}): MoveRequest {
  return {
    percentages: PERCENTAGES,
    pending: {},
    totalIncome: INCOME,
    exceeded: 'Deseos',
    source: 'Necesidades',
    overage: toCents(500),
    amount: toCents(500),
    epsilon: DEFAULT_OVERAGE_EPSILON,
    ...overrides,
  };
}

describe('checkSpend', () => {
  it('reports the overage once month-to-date exceeds the allocation', () => {
    expect(checkSpend(position(), 'Deseos')).toEqual({
      status: 'over_budget',
      spendType: 'Deseos',
      overage: toCents(500),
      moveOptions: [
        { source: 'Necesidades', available: toCents(1000) },
        { source: 'Inversión', available: toCents(2000) },
      ],
    });
  });

  it('is ok with the remaining balance when within budget, including exactly at the limit', () => {
    expect(checkSpend(position({ Deseos: toCents(1000) }), 'Deseos')).toEqual({
      status: 'ok',
      spendType: 'Deseos',
      remaining: toCents(2000),
    });
    expect(checkSpend(position({ Deseos: toCents(3000) }), 'Deseos')).toEqual({
      status: 'ok',
      spendType: 'Deseos',
      remaining: 0,
    });
  });
});

describe('moveOptions', () => {
  it('offers only other spend types with money left', () => {
    const options = moveOptions(position({ Necesidades: toCents(5000) }), 'Deseos');
    expect(options).toEqual([{ source: 'Inversión', available: toCents(2000) }]);
  });

  it('is empty when nothing else has availability', () => {
    const options = moveOptions(position({ Necesidades: toCents(6000), Inversión: toCents(2000) }), 'Deseos');
    expect(options).toEqual([]);
  });
});

describe('move amount', () => {
  it('suggests the smaller of overage and availability', () => {
    expect(suggestMoveAmount(toCents(500), toCents(1000))).toBe(toCents(500));
    expect(suggestMoveAmount(toCents(500), toCents(120))).toBe(toCents(120));
  });

  it('rejects non-positive amounts and amounts above availability', () => {
    expect(validateMoveAmount(0, 1000)).toBe('not_positive');
    expect(validateMoveAmount(-5, 1000)).toBe('not_positive');
    expect(validateMoveAmount(1001, 1000)).toBe('exceeds_available');
    expect(validateMoveAmount(1000, 1000)).toBeNull();
  });
});

describe('applyMove', () => {
  it('shifts budget share and clears pending when the move covers the overage', () => {
    const result = applyMove(moveRequest({ pending: { Deseos: toCents(40) } }));
    expect(result.percentages.Necesidades).toBeCloseTo(0.45, 9);
    expect(result.percentages.Deseos).toBeCloseTo(0.35, 9);
    expect(result.percentages.Inversión).toBe(0.2);
    expect(result.remainingOverage).toBe(0);
    expect(result.pendingRecorded).toBe(false);
    expect(result.pending).toEqual({});
  });

  it('records the rest as pending on a partial move', () => {
    const result = applyMove(moveRequest({ amount: toCents(200) }));
    expect(result.pending).toEqual({ Deseos: toCents(300) });
    expect(result.remainingOverage).toBe(toCents(300));
    expect(result.pendingRecorded).toBe(true);
    expect(result.percentages.Deseos).toBeCloseTo(0.32, 9);
  });

  it('treats a residual at or below epsilon as covered', () => {
    const atEpsilon = applyMove(moveRequest({ overage: 50001, amount: 50000 }));
    expect(atEpsilon.pending).toEqual({});
    expect(atEpsilon.pendingRecorded).toBe(false);

    const aboveEpsilon = applyMove(moveRequest({ overage: 50002, amount: 50000 }));
    expect(aboveEpsilon.pending).toEqual({ Deseos: 2 });

    const wider = applyMove(moveRequest({ overage: 50100, amount: 50000, epsilon: 100 }));
    expect(wider.pending).toEqual({});
  });

  it('leaves percentages alone when there is no income', () => {
    const result = applyMove(moveRequest({ totalIncome: 0, amount: toCents(200) }));
    expect(result.percentages).toEqual(PERCENTAGES);
    expect(result.pending).toEqual({ Deseos: toCents(300) });
  });

  it('keeps the three fractions summing to one', () => {
    const result = applyMove(moveRequest({ amount: toCents(123.45), overage: toCents(123.45) }));
    const sum = result.percentages.Necesidades + result.percentages.Deseos + result.percentages.Inversión;
    expect(sum).toBeCloseTo(1, 9);
  });

  it('does not touch the request objects', () => {
    const pending = { Deseos: toCents(10), Necesidades: toCents(5) };
    const percentages = { ...PERCENTAGES };
    applyMove(moveRequest({ pending, percentages }));
    expect(pending).toEqual({ Deseos: toCents(10), Necesidades: toCents(5) });
    expect(percentages).toEqual(PERCENTAGES);
  });
});
