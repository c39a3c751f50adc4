import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import * as schema from './schema/index.js';
import { dirname, resolve } from 'node:path';
import { mkdirSync } from 'node:fs';

export type TodoDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

/**
 * Anything queries can run against: the database itself or an open transaction.
 */
export type TodoSession = BaseSQLiteDatabase<'sync', Database.RunResult, typeof schema>;

/** Default database file, relative to the working directory */
export const DEFAULT_DB_PATH = 'todo.db';

/** Returns the default database path, resolved against the working directory */
export function getDefaultDbPath(): string {
  return resolve(DEFAULT_DB_PATH);
}

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL CHECK (length(title) BETWEEN 1 AND 200),
    description TEXT CHECK (description IS NULL OR length(description) <= 2000),
    completed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);
`;

/**
 * Create a Drizzle database connection with proper pragmas.
 * If no path is given, uses the default.
 * Pass ':memory:' for in-memory databases (tests).
 *
 * The schema is not touched here; call {@link initSchema} once at startup.
 */
export function createDb(path?: string): TodoDb {
  const dbPath = path ?? getDefaultDbPath();

  // Ensure directory exists for file-based databases
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(resolve(dbPath)), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Set pragmas — must happen on every connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  return drizzle(sqlite, { schema });
}

/** Create the tasks table if it does not exist yet. Idempotent. */
export function initSchema(db: TodoDb): void {
  getRawDb(db).exec(CREATE_SCHEMA_SQL);
}

/**
 * Create an in-memory database with schema applied. For tests.
 */
export function createTestDb(): TodoDb {
  const db = createDb(':memory:');
  initSchema(db);
  return db;
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (raw exec, pragmas, close).
 */
export function getRawDb(db: TodoDb): Database.Database {
  return db.$client;
}

/** Close the underlying connection. Safe to call twice. */
export function closeDb(db: TodoDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}
