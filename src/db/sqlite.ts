/**
 * Scoped read-only access to the SQLite file using better-sqlite3.
 * Every call opens its own handle and closes it on the way out.
 */

import Database from 'better-sqlite3';
import type { ColumnInfo, ForeignKeyInfo, QueryParams, Row, Scalar, TableInfo } from '../types.js';
import type { ReadyStore } from './bootstrap.js';

export interface StatementResult {
  columns: string[];
  rows: Row[];
}

export function withConnection<T>(store: ReadyStore, fn: (db: Database.Database) => T): T {
  const db = new Database(store.path, {
    readonly: true,
    fileMustExist: true,
    timeout: store.busyTimeoutMs,
  });
  try {
    return fn(db);
  } finally {
    db.close();
  }
}

/**
 * Prepares and runs a single statement. Rows are read as arrays and keyed
 * by the statement's column names in order, so a repeated name keeps the
 * last value. Integers are read as bigints and narrowed to numbers only
 * when they fit in 2^53.
 */
export function runStatement(db: Database.Database, sql: string, params?: QueryParams): StatementResult {
  const stmt = db.prepare(sql);
  const bind: unknown[] = params === undefined ? [] : Array.isArray(params) ? params : [params];

  if (!stmt.reader) {
    stmt.run(...bind);
    return { columns: [], rows: [] };
  }

  const columns = stmt.columns().map(c => c.name);
  const raw = stmt.safeIntegers(true).raw(true).all(...bind);

  const rows = raw.map(values => {
    const row: Row = {};
    const cells = Array.isArray(values) ? values : [];
    columns.forEach((name, i) => {
      row[name] = toScalar(cells[i]);
    });
    return row;
  });

  return { columns, rows };
}

function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return null;
  if (typeof value === 'bigint') {
    return Number.isSafeInteger(Number(value)) ? Number(value) : value;
  }
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value;
  return String(value);
}

// --- Catalog ---

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: string | null;
  pk: number;
}

interface ForeignKeyRow {
  table: string;
  from: string;
  to: string | null;
}

export function listTableNames(db: Database.Database): string[] {
  const rows = db
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\' ORDER BY name`)
    .pluck()
    .all();
  return rows.filter((name): name is string => typeof name === 'string');
}

export function readTableInfo(db: Database.Database, table: string): TableInfo {
  const columns = db.prepare<[string], TableInfoRow>('SELECT * FROM pragma_table_info(?)').all(table);
  const foreignKeys = db.prepare<[string], ForeignKeyRow>('SELECT * FROM pragma_foreign_key_list(?)').all(table);

  return {
    columns: columns.map((col): ColumnInfo => ({
      name: col.name,
      type: col.type,
      nullable: col.notnull === 0,
      default: col.dflt_value,
      primary_key: col.pk > 0,
    })),
    foreign_keys: foreignKeys.map((fk): ForeignKeyInfo => ({
      column: fk.from,
      references_table: fk.table,
      references_column: fk.to,
    })),
  };
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
