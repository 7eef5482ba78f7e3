/**
 * Domain types for the chat ledger.
 * Pure data — no DB, no transport, no IO.
 */

/** A single cell as the row store hands it back */
export type CellValue = string | number;

/** One store row keyed by column header */
export type RawRow = Record<string, CellValue | undefined>;

export type MovementKind = 'expense' | 'income';

export type Currency = 'ARS' | 'USD';

/** One recorded income or expense */
export interface Movement {
  date: string;          // YYYY-MM-DD HH:mm:ss (local time)
  user: string;
  kind: MovementKind;
  category: string;
  description: string;
  amount: number;        // non-negative, original precision
  year: number;          // derived from date
  month: number;         // 1–12, derived from date
  currency: Currency;
}

/** Monthly spending target, unique per category (case-insensitive) */
export interface Budget {
  category: string;
  monthlyAmount: number;
}

/** Savings target, unique per name (case-insensitive) */
export interface Goal {
  name: string;
  targetAmount: number;
}

export interface YearMonth {
  year: number;
  month: number;         // 1–12
}

/** ARS-only totals for one calendar month */
export interface MonthTotals {
  income: number;
  expense: number;
  excludedForeign: number;  // rows of the month left out for a non-ARS currency
  skipped: number;          // rows with unreadable year/month/amount
}

export interface BudgetStatus {
  category: string;
  budgeted: number;
  spent: number;
  remaining: number;     // can be negative (overspent)
}

export type UpsertOutcome = 'created' | 'updated';

export interface InstallmentPlanItem {
  index: number;         // 1-based
  date: Date;
  amount: number;
  description: string;
}

export interface InstallmentSchedule {
  category: string;
  totalAmount: number;
  description: string;
  start: Date;           // date of the first installment
  count: number;
  installmentAmount: number;
}

// --- Errors as values ---

export type LedgerError =
  | { code: 'MissingArguments' }
  | { code: 'InvalidAmount'; token: string }
  | { code: 'InvalidInstallmentCount'; token: string; reason: 'not_integer' | 'not_positive' | 'too_many' }
  | { code: 'UnrecognizedCommand'; command: string }
  | { code: 'HandlerFault'; cause?: unknown };

export type Result<T> = { ok: true; value: T } | { ok: false; error: LedgerError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: LedgerError): Result<T> {
  return { ok: false, error };
}

export const BASE_CURRENCY: Currency = 'ARS';
