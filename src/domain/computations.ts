/**
 * Pure domain computations.
 * No DB, no transport, no IO — only data in, data out.
 */
import {
  BASE_CURRENCY,
  fail,
  ok,
  type Budget,
  type BudgetStatus,
  type CellValue,
  type MonthTotals,
  type RawRow,
  type Result,
  type YearMonth,
} from './types.js';

// --- Amounts ---

const DECIMAL_RE = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a user-typed amount. A comma is taken as the decimal separator
 * ("5,5" → 5.5); thousands separators are not supported.
 */
export function parseAmount(token: string): Result<number> {
  const normalized = token.trim().replace(/,/g, '.');
  if (!DECIMAL_RE.test(normalized)) {
    return fail({ code: 'InvalidAmount', token });
  }
  const value = Number(normalized);
  if (!Number.isFinite(value) || value < 0) {
    return fail({ code: 'InvalidAmount', token });
  }
  return ok(value);
}

/** Half-up rounding to `digits` decimal places */
export function roundHalfUp(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

// --- Dates ---

export function daysInMonth(year: number, monthIndex: number): number {
  return new Date(year, monthIndex + 1, 0).getDate();
}

/**
 * Advance a date by whole calendar months, keeping the day of month unless the
 * target month is shorter (Jan 31 + 1 → Feb 28/29). Time of day is kept.
 */
export function addMonthsClamped(date: Date, months: number): Date {
  const target = new Date(date.getFullYear(), date.getMonth() + months, 1);
  const day = Math.min(date.getDate(), daysInMonth(target.getFullYear(), target.getMonth()));
  return new Date(
    target.getFullYear(),
    target.getMonth(),
    day,
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
  );
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** YYYY-MM-DD HH:mm:ss in local time */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function currentMonth(now: Date = new Date()): YearMonth {
  return { year: now.getFullYear(), month: now.getMonth() + 1 };
}

/** Parse a YYYY-MM label; null when malformed */
export function parseMonthLabel(label: string): YearMonth | null {
  const match = /^(\d{4})-(\d{2})$/.exec(label);
  if (!match) return null;
  const month = Number(match[2]);
  if (month < 1 || month > 12) return null;
  return { year: Number(match[1]), month };
}

// --- Row cells ---

/** Integer cell; empty counts as 0, anything else unreadable is null */
export function readIntegerCell(value: CellValue | undefined): number | null {
  if (value === undefined || value === '') return 0;
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  const text = value.trim();
  return /^[+-]?\d+$/.test(text) ? Number(text) : null;
}

/** Numeric cell; empty counts as 0, anything else unreadable is null */
export function readNumberCell(value: CellValue | undefined): number | null {
  if (value === undefined || value === '') return 0;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const text = value.trim().replace(/,/g, '.');
  if (!DECIMAL_RE.test(text)) return null;
  return Number(text);
}

function readTextCell(value: CellValue | undefined): string {
  return value === undefined ? '' : String(value).trim();
}

export function sameKey(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

// --- Aggregation ---

interface MonthRow {
  kind: string;
  category: string;
  amount: number;
}

/**
 * Rows of the given month, split into ARS rows and a count of foreign ones.
 * Rows whose year, month or amount cannot be read are counted in `skipped`.
 */
function monthRows(
  rows: RawRow[],
  { year, month }: YearMonth,
): { rows: MonthRow[]; excludedForeign: number; skipped: number } {
  const result: MonthRow[] = [];
  let excludedForeign = 0;
  let skipped = 0;

  for (const row of rows) {
    const rowYear = readIntegerCell(row.year);
    const rowMonth = readIntegerCell(row.month);
    if (rowYear === null || rowMonth === null) {
      skipped++;
      continue;
    }
    if (rowYear !== year || rowMonth !== month) continue;

    const currency = (readTextCell(row.currency) || BASE_CURRENCY).toUpperCase();
    if (currency !== BASE_CURRENCY) {
      excludedForeign++;
      continue;
    }

    const amount = readNumberCell(row.amount);
    if (amount === null) {
      skipped++;
      continue;
    }

    result.push({
      kind: readTextCell(row.kind).toLowerCase(),
      category: readTextCell(row.category),
      amount,
    });
  }

  return { rows: result, excludedForeign, skipped };
}

/** Income and expense totals of one month, ARS only */
export function summarizeRows(rows: RawRow[], period: YearMonth): MonthTotals {
  const selected = monthRows(rows, period);
  let income = 0;
  let expense = 0;

  for (const row of selected.rows) {
    if (row.kind === 'income') income += row.amount;
    else if (row.kind === 'expense') expense += row.amount;
  }

  return { income, expense, excludedForeign: selected.excludedForeign, skipped: selected.skipped };
}

/**
 * How much is left in each budget for the month.
 * remaining = budgeted − ARS expenses in that category
 */
export function budgetStatuses(budgets: Budget[], rows: RawRow[], period: YearMonth): BudgetStatus[] {
  const spentByCategory = new Map<string, number>();
  for (const row of monthRows(rows, period).rows) {
    if (row.kind !== 'expense') continue;
    const key = row.category.toLowerCase();
    spentByCategory.set(key, (spentByCategory.get(key) || 0) + row.amount);
  }

  return budgets.map((budget) => {
    const spent = spentByCategory.get(budget.category.toLowerCase()) || 0;
    return {
      category: budget.category,
      budgeted: budget.monthlyAmount,
      spent,
      remaining: budget.monthlyAmount - spent,
    };
  });
}
