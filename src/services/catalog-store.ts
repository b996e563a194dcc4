import { asc, desc, eq, sql } from 'drizzle-orm';
import { ensureSchema, type DbHandle } from '../db/client.js';
import { rotationLog, wallpapers, type RotationLogEntry } from '../db/schema.js';
import type { Catalog, CatalogKind, Item } from '../rotation/types.js';
import { logger } from '../utils/logger.js';
import { PersistError, errorMessage } from '../utils/errors.js';
import { getSetting, setSetting } from './settings.js';

export interface HistoryInput {
  path: string;
  selectedAt: Date;
  outcome: 'ok' | 'render_failed';
  error?: string;
}

/**
 * Serialize/deserialize boundary for one catalog. No merging or validation
 * happens here.
 */
export interface CatalogStore {
  /** Persisted items, or an empty list when nothing usable was persisted. */
  load(): Item[];
  /** Replace the persisted catalog. Throws `PersistError`. */
  save(items: Catalog): void;
  loadRotationCount(): number;
  /** Throws `PersistError`. */
  saveRotationCount(count: number): void;
  /** Throws `PersistError`. */
  appendHistory(entry: HistoryInput): void;
  recentHistory(limit?: number): RotationLogEntry[];
}

export class SqliteCatalogStore implements CatalogStore {
  constructor(
    private readonly handle: DbHandle,
    readonly kind: CatalogKind,
  ) {}

  private get counterKey(): string {
    return `rotationCount:${this.kind}`;
  }

  load(): Item[] {
    try {
      ensureSchema(this.handle.sqlite);
      const rows = this.handle.db.select().from(wallpapers)
        .where(eq(wallpapers.catalog, this.kind))
        .orderBy(asc(wallpapers.position))
        .all();

      return rows.map(row => ({
        path: row.path,
        score: Number.isFinite(row.score) ? row.score : 0,
        skipStreak: Math.max(0, Math.trunc(row.skipStreak)),
        lastSelectedAt: row.lastSelectedAt ?? null,
      }));
    } catch (err) {
      logger.warn({ catalog: this.kind, err: errorMessage(err) }, 'Persisted catalog unreadable, starting empty');
      return [];
    }
  }

  save(items: Catalog): void {
    const { db, sqlite } = this.handle;
    try {
      ensureSchema(sqlite);
      db.transaction((tx) => {
        tx.delete(wallpapers).where(eq(wallpapers.catalog, this.kind)).run();
        items.forEach((item, position) => {
          tx.insert(wallpapers).values({
            catalog: this.kind,
            path: item.path,
            position,
            score: item.score,
            skipStreak: item.skipStreak,
            lastSelectedAt: item.lastSelectedAt,
          }).run();
        });
      });
    } catch (err) {
      throw new PersistError(`Failed to save ${this.kind} catalog: ${errorMessage(err)}`, { cause: err });
    }
    logger.debug({ catalog: this.kind, count: items.length }, 'Catalog saved');
  }

  loadRotationCount(): number {
    try {
      ensureSchema(this.handle.sqlite);
      const value = getSetting(this.handle.db, this.counterKey);
      return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : 0;
    } catch (err) {
      logger.warn({ catalog: this.kind, err: errorMessage(err) }, 'Rotation counter unreadable, starting at 0');
      return 0;
    }
  }

  saveRotationCount(count: number): void {
    try {
      ensureSchema(this.handle.sqlite);
      setSetting(this.handle.db, this.counterKey, count);
    } catch (err) {
      throw new PersistError(`Failed to save ${this.kind} rotation counter: ${errorMessage(err)}`, { cause: err });
    }
  }

  appendHistory(entry: HistoryInput): void {
    try {
      ensureSchema(this.handle.sqlite);
      this.handle.db.insert(rotationLog).values({
        catalog: this.kind,
        path: entry.path,
        selectedAt: entry.selectedAt,
        outcome: entry.outcome,
        error: entry.error,
      }).run();
    } catch (err) {
      throw new PersistError(`Failed to record rotation: ${errorMessage(err)}`, { cause: err });
    }
  }

  recentHistory(limit = 10): RotationLogEntry[] {
    try {
      ensureSchema(this.handle.sqlite);
      return this.handle.db.select().from(rotationLog)
        .where(eq(rotationLog.catalog, this.kind))
        .orderBy(desc(rotationLog.selectedAt), desc(sql`rowid`))
        .limit(limit)
        .all();
    } catch (err) {
      logger.warn({ catalog: this.kind, err: errorMessage(err) }, 'Rotation history unreadable');
      return [];
    }
  }
}
