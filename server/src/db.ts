import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { CellValue, RawRow } from '../../src/domain/types.js';
import {
  FIRST_DATA_ROW,
  RowStoreError,
  columnName,
  headersOf,
  type RowStore,
  type TableName,
} from '../../src/db/rowStore.js';

type SqlValue = string | number | bigint | null;
type SqlRow = Record<string, SqlValue>;

/**
 * Open (or create) the ledger database and bring its schema up to date.
 * `timeoutMs` is SQLite's busy timeout: how long a write waits on a lock.
 */
export function openDatabase(dbPath: string, timeoutMs: number): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath, { timeout: timeoutMs });

  // Enable WAL mode for better performance
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  migrate(db);
  return db;
}

/** Create missing tables and columns; safe to run on every start */
export function migrate(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS movements (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      date TEXT NOT NULL,
      user TEXT NOT NULL DEFAULT '',
      kind TEXT NOT NULL,
      category TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      amount REAL NOT NULL,
      year INTEGER NOT NULL,
      month INTEGER NOT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_movements_period ON movements(year, month)
  `);

  // --- Migrations: add new columns safely ---

  // Ledgers created before USD movements were supported have no currency column
  const movementCols = db.pragma('table_info(movements)') as { name: string }[];
  const movementColNames = new Set(movementCols.map((c) => c.name));
  if (!movementColNames.has('currency')) {
    db.exec(`ALTER TABLE movements ADD COLUMN currency TEXT NOT NULL DEFAULT 'ARS'`);
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS budgets (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      category TEXT NOT NULL,
      monthly_amount REAL NOT NULL DEFAULT 0
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS goals (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      target_amount REAL NOT NULL DEFAULT 0
    )
  `);
}

function toCell(value: SqlValue | undefined): CellValue {
  if (value === null || value === undefined) return '';
  if (typeof value === 'bigint') return Number(value);
  return value;
}

/**
 * RowStore over SQLite. Row order is insertion order (by id), so row N is the
 * (N - 1)th data row just like in a sheet with a header row.
 */
export class SqliteRowStore implements RowStore {
  constructor(private readonly db: Database.Database) {}

  async appendRow(table: TableName, values: CellValue[]): Promise<void> {
    const headers = headersOf(table);
    if (values.length > headers.length) {
      throw new RowStoreError(`Too many values for ${table}: ${values.length}`);
    }
    const columns = headers.slice(0, values.length);
    const placeholders = columns.map(() => '?').join(', ');
    this.db
      .prepare(`INSERT INTO ${table} (${columns.join(', ')}) VALUES (${placeholders})`)
      .run(...values);
  }

  async readAllRows(table: TableName): Promise<RawRow[]> {
    const headers = headersOf(table);
    const rows = this.db
      .prepare<[], SqlRow>(`SELECT ${headers.join(', ')} FROM ${table} ORDER BY id ASC`)
      .all();

    return rows.map((row) => {
      const record: RawRow = {};
      for (const header of headers) {
        record[header] = toCell(row[header]);
      }
      return record;
    });
  }

  async updateCell(table: TableName, row: number, column: number, value: CellValue): Promise<void> {
    const field = columnName(table, column);
    if (!Number.isInteger(row) || row < FIRST_DATA_ROW) {
      throw new RowStoreError(`Row ${row} does not exist in ${table}`);
    }

    const result = this.db
      .prepare(`
        UPDATE ${table} SET ${field} = ?
        WHERE id = (SELECT id FROM ${table} ORDER BY id ASC LIMIT 1 OFFSET ?)
      `)
      .run(value, row - FIRST_DATA_ROW);

    if (result.changes === 0) {
      throw new RowStoreError(`Row ${row} does not exist in ${table}`);
    }
  }
}
