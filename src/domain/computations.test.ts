import { describe, expect, it } from 'vitest';
import {
  allocate,
  budgetStatus,
  currentMonth,
  forMonth,
  hasLegacyPercentageKey,
  isoDate,
  monthKey,
  monthReport,
  monthToDateByType,
  normalizePercentages,
  normalizeSpendType,
  totalIncome,
} from './computations.js';
import type { Income, RecordedSpendType, Transaction } from './types.js';

// --- Test data factories ---

function makeTxn(overrides: Partial<Transaction> = {}): Transaction {
  return {
    id: 'txn-1',
    amount: 1000,
    category: 'Comida',
    spendType: 'Necesidades',
    description: 'súper',
    date: '2025-03-10',
    createdAt: '2025-03-10T12:00:00.000Z',
    ...overrides,
  };
}

function makeIncome(amount: number, id = 'inc-1'): Income {
  return { id, name: 'Sueldo', amount };
}

describe('totalIncome and allocate', () => {
  it('sums every income record', () => {
    expect(totalIncome([makeIncome(100000), makeIncome(25050, 'inc-2')])).toBe(125050);
    expect(totalIncome([])).toBe(0);
  });

  it('allocates income by fraction', () => {
    expect(allocate(100000, { Necesidades: 0.5, Deseos: 0.3, Inversión: 0.2 })).toEqual({
      Necesidades: 50000,
      Deseos: 30000,
      Inversión: 20000,
    });
  });

  it('allocates zero for missing fractions and for zero income', () => {
    expect(allocate(100000, { Necesidades: 0.6 })).toEqual({ Necesidades: 60000, Deseos: 0, Inversión: 0 });
    expect(allocate(0, { Necesidades: 0.5, Deseos: 0.3, Inversión: 0.2 })).toEqual({
      Necesidades: 0,
      Deseos: 0,
      Inversión: 0,
    });
  });
});

describe('legacy spend type handling', () => {
  it('maps the legacy spend type onto Inversión', () => {
    const legacy: RecordedSpendType = 'Ahorro/Deudas';
    expect(normalizeSpendType(legacy)).toBe('Inversión');
    expect(normalizeSpendType('Deseos')).toBe('Deseos');
  });

  it('renames the legacy percentage key and drops unknown keys', () => {
    const raw = { Necesidades: 0.5, Deseos: 0.3, 'Ahorro/Deudas': 0.2, Otro: 0.1 };
    expect(hasLegacyPercentageKey(raw)).toBe(true);
    expect(normalizePercentages(raw)).toEqual({ Necesidades: 0.5, Deseos: 0.3, Inversión: 0.2 });
  });

  it('fills missing buckets with zero and returns null for an empty map', () => {
    expect(normalizePercentages({ Necesidades: 1 })).toEqual({ Necesidades: 1, Deseos: 0, Inversión: 0 });
    expect(normalizePercentages({})).toBeNull();
    expect(hasLegacyPercentageKey({ Inversión: 0.2 })).toBe(false);
  });
});

describe('dates', () => {
  it('builds month keys and local dates', () => {
    expect(monthKey(2025, 3)).toBe('2025-03');
    expect(monthKey(2025, 12)).toBe('2025-12');
    expect(currentMonth(new Date(2025, 0, 31))).toBe('2025-01');
    expect(isoDate(new Date(2025, 6, 4))).toBe('2025-07-04');
  });

  it('filters transactions to one month', () => {
    const txns = [
      makeTxn({ id: 'a', date: '2025-03-01' }),
      makeTxn({ id: 'b', date: '2025-04-01' }),
      makeTxn({ id: 'c', date: '2025-03-31' }),
    ];
    expect(forMonth(txns, '2025-03').map((t) => t.id)).toEqual(['a', 'c']);
  });
});

describe('monthToDateByType', () => {
  it('sums only the requested month per spend type', () => {
    const txns = [
      makeTxn({ amount: 1000, spendType: 'Necesidades' }),
      makeTxn({ amount: 250, spendType: 'Deseos' }),
      makeTxn({ amount: 400, spendType: 'Deseos', date: '2025-03-28' }),
      makeTxn({ amount: 9999, spendType: 'Deseos', date: '2025-02-28' }),
      makeTxn({ amount: 300, spendType: 'Inversión' }),
    ];
    expect(monthToDateByType(txns, 2025, 3)).toEqual({ Necesidades: 1000, Deseos: 650, Inversión: 300 });
  });

  it('counts legacy entries as Inversión', () => {
    const txns = [makeTxn({ amount: 500, spendType: 'Ahorro/Deudas' }), makeTxn({ amount: 200, spendType: 'Inversión' })];
    expect(monthToDateByType(txns, 2025, 3)).toEqual({ Necesidades: 0, Deseos: 0, Inversión: 700 });
  });

  it('returns zeros for a month without transactions', () => {
    expect(monthToDateByType([makeTxn()], 2024, 3)).toEqual({ Necesidades: 0, Deseos: 0, Inversión: 0 });
  });
});

describe('budgetStatus and monthReport', () => {
  const allocated = { Necesidades: 50000, Deseos: 30000, Inversión: 20000 };
  const spent = { Necesidades: 20000, Deseos: 35000, Inversión: 5000 };

  it('reports remaining per spend type, negative when overspent', () => {
    expect(budgetStatus(allocated, spent)).toEqual([
      { spendType: 'Necesidades', allocated: 50000, spent: 20000, remaining: 30000 },
      { spendType: 'Deseos', allocated: 30000, spent: 35000, remaining: -5000 },
      { spendType: 'Inversión', allocated: 20000, spent: 5000, remaining: 15000 },
    ]);
  });

  it('counts Necesidades and Deseos as spent and nets all three against income', () => {
    const report = monthReport('2025-03', 100000, { Necesidades: 0.5, Deseos: 0.3, Inversión: 0.2 }, spent, {
      Deseos: 5000,
    });
    expect(report.totalSpent).toBe(55000);
    expect(report.netBalance).toBe(40000);
    expect(report.rows[1]).toEqual({ spendType: 'Deseos', allocated: 30000, spent: 35000, remaining: -5000 });
    expect(report.pendingOverspend).toEqual({ Deseos: 5000 });
  });
});
