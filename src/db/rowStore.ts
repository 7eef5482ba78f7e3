/**
 * Row store contract shared by the SQLite store (server) and the in-memory store.
 *
 * Tables behave like spreadsheet sheets: row 1 holds the headers, so the first
 * data row is row 2. Columns are 1-indexed in header order.
 */
import type { CellValue, RawRow } from '../domain/types.js';

export type TableName = 'movements' | 'budgets' | 'goals';

export const TABLE_HEADERS = {
  movements: ['date', 'user', 'kind', 'category', 'description', 'amount', 'year', 'month', 'currency'],
  budgets: ['category', 'monthly_amount'],
  goals: ['name', 'target_amount'],
} as const satisfies Record<TableName, readonly string[]>;

/** First data row (row 1 is the header row) */
export const FIRST_DATA_ROW = 2;

export interface RowStore {
  appendRow(table: TableName, values: CellValue[]): Promise<void>;
  /** All data rows in insertion order, keyed by header */
  readAllRows(table: TableName): Promise<RawRow[]>;
  updateCell(table: TableName, row: number, column: number, value: CellValue): Promise<void>;
}

export class RowStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RowStoreError';
  }
}

export function headersOf(table: TableName): readonly string[] {
  return TABLE_HEADERS[table];
}

export function columnName(table: TableName, column: number): string {
  const name = headersOf(table)[column - 1];
  if (name === undefined) {
    throw new RowStoreError(`Column ${column} does not exist in ${table}`);
  }
  return name;
}

export function toRecord(table: TableName, values: readonly CellValue[]): RawRow {
  const record: RawRow = {};
  headersOf(table).forEach((header, i) => {
    record[header] = values[i];
  });
  return record;
}

/**
 * Process-local store. Every call yields to the event loop before touching
 * data, so interleavings look like they would against a remote store.
 */
export class MemoryRowStore implements RowStore {
  private readonly tables: Record<TableName, CellValue[][]> = {
    movements: [],
    budgets: [],
    goals: [],
  };

  async appendRow(table: TableName, values: CellValue[]): Promise<void> {
    await tick();
    if (values.length > headersOf(table).length) {
      throw new RowStoreError(`Too many values for ${table}: ${values.length}`);
    }
    this.tables[table].push([...values]);
  }

  async readAllRows(table: TableName): Promise<RawRow[]> {
    await tick();
    return this.tables[table].map((values) => toRecord(table, values));
  }

  async updateCell(table: TableName, row: number, column: number, value: CellValue): Promise<void> {
    await tick();
    const values = this.tables[table][row - FIRST_DATA_ROW];
    if (values === undefined) {
      throw new RowStoreError(`Row ${row} does not exist in ${table}`);
    }
    columnName(table, column);
    values[column - 1] = value;
  }
}

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
