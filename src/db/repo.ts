/**
 * Repository layer: ledger operations over an injected RowStore.
 *
 * The store is the only source of truth — nothing is cached here, every query
 * reads the table again.
 */
import {
  budgetStatuses,
  formatTimestamp,
  readNumberCell,
  sameKey,
  summarizeRows,
} from '../domain/computations.js';
import { buildInstallmentPlan, installmentItems, type InstallmentRequest } from '../domain/installments.js';
import {
  fail,
  ok,
  type Budget,
  type BudgetStatus,
  type Currency,
  type Goal,
  type InstallmentSchedule,
  type Movement,
  type MovementKind,
  type MonthTotals,
  type RawRow,
  type Result,
  type UpsertOutcome,
  type YearMonth,
} from '../domain/types.js';
import { KeyedLock } from './keyedLock.js';
import { FIRST_DATA_ROW, type RowStore, type TableName } from './rowStore.js';

export interface MovementInput {
  kind: MovementKind;
  category: string;
  amount: number;
  description: string;
  currency: Currency;
  user: string;
  timestamp?: Date;
}

export type InstallmentInput = InstallmentRequest & { user: string };

export interface LedgerRepo {
  recordMovement(input: MovementInput): Promise<Movement>;
  listMovements(): Promise<RawRow[]>;
  summarizeMonth(period: YearMonth): Promise<MonthTotals>;
  upsertBudget(category: string, amount: number): Promise<UpsertOutcome>;
  upsertGoal(name: string, amount: number): Promise<UpsertOutcome>;
  listBudgets(): Promise<Budget[]>;
  listGoals(): Promise<Goal[]>;
  getBudgetStatus(period: YearMonth): Promise<BudgetStatus[]>;
  scheduleInstallments(input: InstallmentInput): Promise<Result<InstallmentSchedule>>;
}

/** Column holding the amount in both keyed tables */
const AMOUNT_COLUMN = 2;

export function createLedgerRepo(
  store: RowStore,
  options: { now?: () => Date; lock?: KeyedLock } = {},
): LedgerRepo {
  const now = options.now ?? (() => new Date());
  const lock = options.lock ?? new KeyedLock();

  // --- Movements ---

  async function recordMovement(input: MovementInput): Promise<Movement> {
    const timestamp = input.timestamp ?? now();
    const movement: Movement = {
      date: formatTimestamp(timestamp),
      user: input.user,
      kind: input.kind,
      category: input.category,
      description: input.description,
      amount: input.amount,
      year: timestamp.getFullYear(),
      month: timestamp.getMonth() + 1,
      currency: input.currency,
    };

    await store.appendRow('movements', [
      movement.date,
      movement.user,
      movement.kind,
      movement.category,
      movement.description,
      movement.amount,
      movement.year,
      movement.month,
      movement.currency,
    ]);
    console.log('Movement recorded:', movement);
    return movement;
  }

  async function listMovements(): Promise<RawRow[]> {
    return store.readAllRows('movements');
  }

  async function summarizeMonth(period: YearMonth): Promise<MonthTotals> {
    const rows = await store.readAllRows('movements');
    return summarizeRows(rows, period);
  }

  // --- Budgets & goals ---

  /**
   * Overwrite the amount of the first row whose key matches case-insensitively,
   * or append a new row. Serialized per table + key so concurrent calls for the
   * same key cannot both append.
   */
  async function upsertKeyed(
    table: Extract<TableName, 'budgets' | 'goals'>,
    keyColumn: string,
    key: string,
    amount: number,
  ): Promise<UpsertOutcome> {
    return lock.run(`${table}:${key.toLowerCase()}`, async () => {
      const rows = await store.readAllRows(table);
      const index = rows.findIndex((row) => sameKey(String(row[keyColumn] ?? '').trim(), key));
      if (index >= 0) {
        await store.updateCell(table, index + FIRST_DATA_ROW, AMOUNT_COLUMN, amount);
        return 'updated';
      }
      await store.appendRow(table, [key, amount]);
      return 'created';
    });
  }

  async function listBudgets(): Promise<Budget[]> {
    const rows = await store.readAllRows('budgets');
    return rows.map((row) => ({
      category: String(row.category ?? ''),
      monthlyAmount: readNumberCell(row.monthly_amount) ?? 0,
    }));
  }

  async function listGoals(): Promise<Goal[]> {
    const rows = await store.readAllRows('goals');
    return rows.map((row) => ({
      name: String(row.name ?? ''),
      targetAmount: readNumberCell(row.target_amount) ?? 0,
    }));
  }

  async function getBudgetStatus(period: YearMonth): Promise<BudgetStatus[]> {
    const [budgets, rows] = await Promise.all([listBudgets(), store.readAllRows('movements')]);
    return budgetStatuses(budgets, rows, period);
  }

  // --- Installments ---

  /**
   * Records one ARS expense per installment. Every append is attempted even if
   * an earlier one failed; any failure is reported once, after the loop.
   */
  async function scheduleInstallments(input: InstallmentInput): Promise<Result<InstallmentSchedule>> {
    const plan = buildInstallmentPlan(input);
    if (!plan.ok) return plan;

    const failures: unknown[] = [];
    for (const item of installmentItems(plan.value)) {
      try {
        await recordMovement({
          kind: 'expense',
          category: input.category,
          amount: item.amount,
          description: item.description,
          currency: 'ARS',
          user: input.user,
          timestamp: item.date,
        });
      } catch (error) {
        console.error(`Error recording installment ${item.index}/${plan.value.count}:`, error);
        failures.push(error);
      }
    }

    if (failures.length > 0) {
      return fail({ code: 'HandlerFault', cause: failures[0] });
    }
    return ok(plan.value);
  }

  return {
    recordMovement,
    listMovements,
    summarizeMonth,
    upsertBudget: (category, amount) => upsertKeyed('budgets', 'category', category, amount),
    upsertGoal: (name, amount) => upsertKeyed('goals', 'name', name, amount),
    listBudgets,
    listGoals,
    getBudgetStatus,
    scheduleInstallments,
  };
}
