import { describe, expect, it } from 'vitest';
import { MAX_INSTALLMENTS, buildInstallmentPlan, installmentDescription, installmentItems } from './installments.js';
import { formatTimestamp } from './computations.js';

describe('buildInstallmentPlan', () => {
  it('splits 100 into three installments of 33.33 a month apart', () => {
    const result = buildInstallmentPlan({
      category: 'hogar',
      totalAmount: 100,
      description: 'pava',
      count: 3,
      start: new Date(2025, 0, 15),
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.installmentAmount).toBe(33.33);
    const items = [...installmentItems(result.value)];
    expect(items.map((item) => item.amount)).toEqual([33.33, 33.33, 33.33]);
    expect(items.map((item) => formatTimestamp(item.date))).toEqual([
      '2025-01-15 00:00:00',
      '2025-02-15 00:00:00',
      '2025-03-15 00:00:00',
    ]);
    expect(items.map((item) => item.description)).toEqual([
      'pava (cuota 1/3)',
      'pava (cuota 2/3)',
      'pava (cuota 3/3)',
    ]);
  });

  it('clamps to the end of shorter months', () => {
    const result = buildInstallmentPlan({
      category: 'tech',
      totalAmount: 500,
      description: '',
      count: 2,
      start: new Date(2024, 0, 31),
    });

    if (!result.ok) throw new Error('expected a plan');
    const items = [...installmentItems(result.value)];
    expect(items.map((item) => formatTimestamp(item.date))).toEqual([
      '2024-01-31 00:00:00',
      '2024-02-29 00:00:00',
    ]);
    expect(items[0].description).toBe('(cuota 1/2)');
  });

  it('rejects a zero or fractional count', () => {
    const base = { category: 'x', totalAmount: 10, description: '', start: new Date(2025, 0, 1) };
    expect(buildInstallmentPlan({ ...base, count: 0 })).toEqual({
      ok: false,
      error: { code: 'InvalidInstallmentCount', token: '0', reason: 'not_positive' },
    });
    expect(buildInstallmentPlan({ ...base, count: 1.5 })).toEqual({
      ok: false,
      error: { code: 'InvalidInstallmentCount', token: '1.5', reason: 'not_integer' },
    });
  });

  it('caps the number of installments', () => {
    const base = { category: 'x', totalAmount: 10, description: '', start: new Date(2025, 0, 1) };
    expect(buildInstallmentPlan({ ...base, count: MAX_INSTALLMENTS }).ok).toBe(true);
    expect(buildInstallmentPlan({ ...base, count: 20000000 })).toEqual({
      ok: false,
      error: { code: 'InvalidInstallmentCount', token: '20000000', reason: 'too_many' },
    });
  });
});

describe('installmentItems', () => {
  it('yields installments lazily', () => {
    const result = buildInstallmentPlan({
      category: 'auto',
      totalAmount: 3600,
      description: 'seguro',
      count: MAX_INSTALLMENTS,
      start: new Date(2025, 0, 1),
    });
    if (!result.ok) throw new Error('expected a plan');

    const items = installmentItems(result.value);
    const first = items.next();
    expect(first.done).toBe(false);
    if (first.done) return;
    expect(first.value).toMatchObject({ index: 1, amount: 10, description: 'seguro (cuota 1/360)' });
    expect([...items]).toHaveLength(MAX_INSTALLMENTS - 1);
  });
});

describe('installmentDescription', () => {
  it('appends the installment index', () => {
    expect(installmentDescription('heladera nueva', 4, 12)).toBe('heladera nueva (cuota 4/12)');
  });
});
