import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createLedgerRepo } from './repo.js';
import { MemoryRowStore, type TableName } from './rowStore.js';
import type { CellValue } from '../domain/types.js';

/** Memory store whose movement appends fail on the given call numbers (1-based) */
class FlakyStore extends MemoryRowStore {
  private appends = 0;

  constructor(private readonly failOn: number[]) {
    super();
  }

  override async appendRow(table: TableName, values: CellValue[]): Promise<void> {
    if (table === 'movements') {
      this.appends++;
      if (this.failOn.includes(this.appends)) {
        throw new Error(`append ${this.appends} failed`);
      }
    }
    return super.appendRow(table, values);
  }
}

const fixedNow = new Date(2025, 2, 10, 14, 30, 0);

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('recordMovement', () => {
  it('appends exactly one row with year and month taken from the timestamp', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store, { now: () => fixedNow });

    await repo.recordMovement({
      kind: 'expense',
      category: 'Comida',
      amount: 5.5,
      description: 'empanadas',
      currency: 'ARS',
      user: 'Ana',
    });

    expect(await store.readAllRows('movements')).toEqual([
      {
        date: '2025-03-10 14:30:00',
        user: 'Ana',
        kind: 'expense',
        category: 'Comida',
        description: 'empanadas',
        amount: 5.5,
        year: 2025,
        month: 3,
        currency: 'ARS',
      },
    ]);
  });

  it('uses an explicit timestamp over the clock', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store, { now: () => fixedNow });

    const movement = await repo.recordMovement({
      kind: 'income',
      category: 'sueldo',
      amount: 2000,
      description: '',
      currency: 'USD',
      user: 'Ana',
      timestamp: new Date(2024, 11, 31, 23, 59, 59),
    });

    expect(movement.year).toBe(2024);
    expect(movement.month).toBe(12);
    expect(movement.date).toBe('2024-12-31 23:59:59');
  });
});

describe('summarizeMonth', () => {
  it('reads the store on every call', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store, { now: () => fixedNow });
    const period = { year: 2025, month: 3 };
    const base = { category: 'x', description: '', currency: 'ARS' as const, user: 'Ana' };

    expect(await repo.summarizeMonth(period)).toEqual({ income: 0, expense: 0, excludedForeign: 0, skipped: 0 });

    await repo.recordMovement({ ...base, kind: 'income', amount: 1000 });
    await repo.recordMovement({ ...base, kind: 'expense', amount: 250 });
    await repo.recordMovement({ ...base, kind: 'expense', amount: 40, currency: 'USD' });

    expect(await repo.summarizeMonth(period)).toEqual({ income: 1000, expense: 250, excludedForeign: 1, skipped: 0 });
  });

  it('returns zeros when only foreign-currency rows exist for the month', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store, { now: () => fixedNow });
    await repo.recordMovement({ kind: 'expense', category: 'x', amount: 10, description: '', currency: 'USD', user: 'Ana' });

    const totals = await repo.summarizeMonth({ year: 2025, month: 3 });
    expect([totals.income, totals.expense]).toEqual([0, 0]);
  });
});

describe('upsertBudget / upsertGoal', () => {
  it('keeps one row per category when set twice', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store);

    expect(await repo.upsertBudget('Comida', 1000)).toBe('created');
    expect(await repo.upsertBudget('Comida', 1000)).toBe('updated');

    expect(await store.readAllRows('budgets')).toEqual([{ category: 'Comida', monthly_amount: 1000 }]);
  });

  it('matches keys case-insensitively and only touches the amount', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store);
    await repo.upsertBudget('Ocio', 300);
    await repo.upsertBudget('Comida', 1000);

    await repo.upsertBudget('comida', 1500);

    expect(await repo.listBudgets()).toEqual([
      { category: 'Ocio', monthlyAmount: 300 },
      { category: 'Comida', monthlyAmount: 1500 },
    ]);
  });

  it('does not duplicate rows under concurrent upserts of the same key', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store);

    await Promise.all([
      repo.upsertGoal('Viaje', 100),
      repo.upsertGoal('viaje', 200),
      repo.upsertGoal('VIAJE', 300),
    ]);

    expect(await repo.listGoals()).toEqual([{ name: 'Viaje', targetAmount: 300 }]);
  });

  it('keeps budgets and goals apart', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store);
    await repo.upsertBudget('auto', 10);
    await repo.upsertGoal('auto', 20);

    expect(await repo.listBudgets()).toEqual([{ category: 'auto', monthlyAmount: 10 }]);
    expect(await repo.listGoals()).toEqual([{ name: 'auto', targetAmount: 20 }]);
  });
});

describe('getBudgetStatus', () => {
  it('reports spend against each budget for the month', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store, { now: () => fixedNow });
    await repo.upsertBudget('Comida', 1000);
    await repo.recordMovement({ kind: 'expense', category: 'comida', amount: 400, description: '', currency: 'ARS', user: 'Ana' });

    expect(await repo.getBudgetStatus({ year: 2025, month: 3 })).toEqual([
      { category: 'Comida', budgeted: 1000, spent: 400, remaining: 600 },
    ]);
  });
});

describe('scheduleInstallments', () => {
  it('records one ARS expense per installment', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store);

    const result = await repo.scheduleInstallments({
      category: 'hogar',
      totalAmount: 100,
      description: 'pava electrica',
      count: 3,
      start: new Date(2025, 0, 31),
      user: 'Ana',
    });

    expect(result.ok).toBe(true);
    const rows = await store.readAllRows('movements');
    expect(rows.map((row) => [row.date, row.amount, row.description, row.kind, row.currency, row.month])).toEqual([
      ['2025-01-31 00:00:00', 33.33, 'pava electrica (cuota 1/3)', 'expense', 'ARS', 1],
      ['2025-02-28 00:00:00', 33.33, 'pava electrica (cuota 2/3)', 'expense', 'ARS', 2],
      ['2025-03-31 00:00:00', 33.33, 'pava electrica (cuota 3/3)', 'expense', 'ARS', 3],
    ]);
  });

  it('attempts every installment and reports a fault after a failed append', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const store = new FlakyStore([2]);
    const repo = createLedgerRepo(store);

    const result = await repo.scheduleInstallments({
      category: 'tech',
      totalAmount: 90,
      description: 'auriculares',
      count: 3,
      start: new Date(2025, 4, 1),
      user: 'Ana',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('HandlerFault');
    const rows = await store.readAllRows('movements');
    expect(rows.map((row) => row.description)).toEqual(['auriculares (cuota 1/3)', 'auriculares (cuota 3/3)']);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });

  it('records nothing for an invalid count', async () => {
    const store = new MemoryRowStore();
    const repo = createLedgerRepo(store);

    const result = await repo.scheduleInstallments({
      category: 'x',
      totalAmount: 10,
      description: '',
      count: 0,
      start: new Date(2025, 0, 1),
      user: 'Ana',
    });

    expect(result.ok).toBe(false);
    expect(await store.readAllRows('movements')).toEqual([]);
  });
});
