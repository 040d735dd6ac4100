/**
 * SQLite Database Client
 *
 * Features:
 * - WAL mode for crash safety + concurrent reads
 * - Schema applied and versioned on init
 * - Type-safe query helpers
 */

import Database from 'better-sqlite3';
import { existsSync } from 'fs';
import { createHash } from 'crypto';
import { nanoid } from 'nanoid';
import { SCHEMA_SQL, SCHEMA_VERSION } from './schema.js';

export const DEFAULT_DB_PATH = './data/trailpace.db';

export interface DbConfig {
  path: string;
}

let db: Database.Database | null = null;

export function resolveDbPath(dbPath?: string): string {
  return dbPath ?? process.env.DATABASE_PATH ?? DEFAULT_DB_PATH;
}

/**
 * Get or create database connection
 */
export function getDb(config?: DbConfig): Database.Database {
  if (db) return db;

  db = new Database(resolveDbPath(config?.path));

  // In-memory databases stay in 'memory' journal mode
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');
  db.pragma('synchronous = NORMAL');

  return db;
}

/**
 * Close database connection
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Initialize database with schema
 */
export function initializeDb(dbPath?: string): Database.Database {
  const database = getDb({ path: resolveDbPath(dbPath) });

  database.exec(SCHEMA_SQL);
  database
    .prepare(
      `INSERT OR IGNORE INTO schema_versions (version, description, migration_hash)
       VALUES (?, ?, ?)`
    )
    .run(SCHEMA_VERSION, 'initial', createHash('sha256').update(SCHEMA_SQL).digest('hex').slice(0, 16));

  return database;
}

/**
 * Check if database is initialized
 */
export function isDbInitialized(dbPath?: string): boolean {
  const path = resolveDbPath(dbPath);
  if (!existsSync(path)) return false;

  try {
    const database = new Database(path, { readonly: true });
    const result = database
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='schema_versions'")
      .get();
    database.close();
    return !!result;
  } catch {
    return false;
  }
}

/**
 * Generate a unique ID
 */
export function generateId(prefix?: string): string {
  const id = nanoid(12);
  return prefix ? `${prefix}_${id}` : id;
}

/**
 * Run a query and return all results
 */
export function query<T>(sql: string, params?: unknown[]): T[] {
  const database = getDb();
  const stmt = database.prepare(sql);
  return (params ? stmt.all(...params) : stmt.all()) as T[];
}

/**
 * Run a query and return first result
 */
export function queryOne<T>(sql: string, params?: unknown[]): T | undefined {
  const database = getDb();
  const stmt = database.prepare(sql);
  return (params ? stmt.get(...params) : stmt.get()) as T | undefined;
}

/**
 * Execute a statement
 */
export function execute(sql: string, params?: unknown[]): Database.RunResult {
  const database = getDb();
  const stmt = database.prepare(sql);
  return params ? stmt.run(...params) : stmt.run();
}

/**
 * Get database info
 */
export function getDbInfo(): {
  path: string;
  journalMode: string;
  schemaVersion: string | null;
  tableCount: number;
} {
  const database = getDb();

  const journalMode = String(database.pragma('journal_mode', { simple: true }));

  const schemaVersion = queryOne<{ version: string }>(
    'SELECT version FROM schema_versions ORDER BY applied_at DESC LIMIT 1'
  );

  const tableCount = queryOne<{ count: number }>(
    "SELECT COUNT(*) AS count FROM sqlite_master WHERE type='table'"
  );

  return {
    path: database.name,
    journalMode,
    schemaVersion: schemaVersion?.version ?? null,
    tableCount: tableCount?.count ?? 0,
  };
}
