/**
 * SQLite wrapper
 * Thin helpers over better-sqlite3 so stores never touch statements directly.
 * Rows are validated with zod on the way out.
 */

import Database from 'better-sqlite3';
import type { z } from 'zod';

import { TransientStoreError } from './errors.js';

export type SQLiteDatabase = Database.Database;

export interface SQLiteOptions {
  readonly?: boolean;
  walMode?: boolean;
  /** How long a write waits on another connection's lock; default 5000 */
  busyTimeoutMs?: number;
}

export type SQLiteParam = string | number | bigint | null;

// SQLite result codes that mean "try again later" rather than "bad query"
const TRANSIENT_CODES = ['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_CANTOPEN', 'SQLITE_FULL'];

export function isTransientSQLiteError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  const code = error.code;
  return typeof code === 'string' && TRANSIENT_CODES.some((prefix) => code.startsWith(prefix));
}

/**
 * Re-throw storage-level failures as TransientStoreError, anything else unchanged
 */
export function rethrowStoreError(error: unknown, operation: string): never {
  if (isTransientSQLiteError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    throw new TransientStoreError(`${operation} failed: ${message}`, { operation });
  }
  throw error;
}

export function createSQLiteDatabase(dbPath: string, options: SQLiteOptions = {}): SQLiteDatabase {
  let db: SQLiteDatabase;
  try {
    db = new Database(dbPath, { readonly: options.readonly ?? false });
  } catch (error) {
    rethrowStoreError(error, `open ${dbPath}`);
  }

  if (options.walMode && dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);

  return db;
}

export function sqliteExec(db: SQLiteDatabase, sql: string): void {
  db.exec(sql);
}

export function sqliteRun(db: SQLiteDatabase, sql: string, params: SQLiteParam[] = []): number {
  return db.prepare(sql).run(...params).changes;
}

export function sqliteAll<S extends z.ZodTypeAny>(
  db: SQLiteDatabase,
  sql: string,
  params: SQLiteParam[],
  schema: S
): Array<z.infer<S>> {
  return db.prepare(sql).all(...params).map((row) => schema.parse(row));
}

export function sqliteGet<S extends z.ZodTypeAny>(
  db: SQLiteDatabase,
  sql: string,
  params: SQLiteParam[],
  schema: S
): z.infer<S> | null {
  const row = db.prepare(sql).get(...params);
  if (row === undefined) return null;
  return schema.parse(row);
}

export function sqliteClose(db: SQLiteDatabase): void {
  if (db.open) {
    db.close();
  }
}

/**
 * Timestamps are stored as ISO-8601 UTC with milliseconds so that
 * lexicographic comparison in SQL matches chronological order.
 */
export function toSQLiteTimestamp(date: Date): string {
  return date.toISOString();
}

export function toDateFromSQLite(value: string): Date {
  return new Date(value);
}
