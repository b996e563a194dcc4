import type { RotationLogEntry } from '../db/schema.js';
import type { Renderer } from '../renderers/renderer.js';
import type { CatalogStore, HistoryInput } from '../services/catalog-store.js';
import type { RandomSource } from '../rotation/random.js';
import type { Catalog, Item } from '../rotation/types.js';
import { RenderError } from '../utils/errors.js';

export function makeItem(path: string, score: number, skipStreak = 0): Item {
  return { path, score, skipStreak, lastSelectedAt: null };
}

export function totalScore(catalog: Catalog): number {
  return catalog.reduce((sum, item) => sum + item.score, 0);
}

/** In-process stand-in for the SQLite store. */
export class MemoryCatalogStore implements CatalogStore {
  items: Item[] = [];
  rotationCount = 0;
  history: RotationLogEntry[] = [];
  saves = 0;
  failSaves = false;

  constructor(initial: Item[] = []) {
    this.items = initial.map(item => ({ ...item }));
  }

  load(): Item[] {
    return this.items.map(item => ({ ...item }));
  }

  save(items: Catalog): void {
    if (this.failSaves) throw new Error('disk full');
    this.saves++;
    this.items = items.map(item => ({ ...item }));
  }

  loadRotationCount(): number {
    return this.rotationCount;
  }

  saveRotationCount(count: number): void {
    this.rotationCount = count;
  }

  appendHistory(entry: HistoryInput): void {
    this.history.unshift({
      id: `h${this.history.length + 1}`,
      catalog: 'video',
      path: entry.path,
      selectedAt: entry.selectedAt,
      outcome: entry.outcome,
      error: entry.error ?? null,
    });
  }

  recentHistory(limit = 10): RotationLogEntry[] {
    return this.history.slice(0, limit);
  }
}

/** Records every path it is asked to show; fails on demand. */
export class FakeRenderer implements Renderer {
  readonly name = 'fake';
  readonly extensions = ['mp4', 'png'];
  shown: string[] = [];
  fail = false;
  /** When set, `set` waits for it before showing anything. */
  pending: Promise<void> | null = null;

  async set(path: string): Promise<void> {
    if (this.pending) await this.pending;
    if (this.fail) throw new RenderError(this.name, 'renderer crashed');
    this.shown.push(path);
  }

  async stop(): Promise<void> {}

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

/** Replays `values` in order, wrapping around. */
export function sequence(...values: number[]): RandomSource {
  let i = 0;
  return {
    next() {
      const value = values[i % values.length];
      i++;
      return value;
    },
  };
}
