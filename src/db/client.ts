import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import { getConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

export type CatalogDb = BetterSQLite3Database<typeof schema>;

export interface DbHandle {
  db: CatalogDb;
  sqlite: Database.Database;
}

/**
 * Open (or create) the catalog database. Nothing is read here: a corrupt
 * file only surfaces once `ensureSchema` or a query touches it.
 */
export function openDatabase(dbPath: string): DbHandle {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const sqlite = new Database(dbPath);
  return { db: drizzle(sqlite, { schema }), sqlite };
}

const initialized = new WeakSet<Database.Database>();

/** Create tables if they don't exist. Throws when the file is not a usable database. */
export function ensureSchema(sqlite: Database.Database): void {
  if (initialized.has(sqlite)) return;

  sqlite.pragma('journal_mode = WAL');
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS wallpapers (
      catalog TEXT NOT NULL CHECK(catalog IN ('video', 'image')),
      path TEXT NOT NULL,
      position INTEGER NOT NULL DEFAULT 0,
      score REAL NOT NULL DEFAULT 100,
      skip_streak INTEGER NOT NULL DEFAULT 0,
      last_selected_at INTEGER,
      PRIMARY KEY (catalog, path)
    );

    CREATE TABLE IF NOT EXISTS rotation_log (
      id TEXT PRIMARY KEY,
      catalog TEXT NOT NULL CHECK(catalog IN ('video', 'image')),
      path TEXT NOT NULL,
      selected_at INTEGER NOT NULL,
      outcome TEXT NOT NULL CHECK(outcome IN ('ok', 'render_failed')),
      error TEXT
    );

    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at INTEGER NOT NULL
    );
  `);

  initialized.add(sqlite);
}

let _handle: DbHandle | null = null;

export function getDb(): DbHandle {
  if (!_handle) {
    const dbPath = getConfig().DATABASE_PATH;
    _handle = openDatabase(dbPath);
    logger.debug({ dbPath }, 'Database opened');
  }
  return _handle;
}

export function closeDb(): void {
  _handle?.sqlite.close();
  _handle = null;
}
