import { scanCatalog, listMediaFiles, type ListMediaFiles } from '../rotation/scanner.js';
import { catalogStats, select, type CatalogStats } from '../rotation/selector.js';
import { mathRandom, type RandomSource } from '../rotation/random.js';
import { WeightEngine } from '../rotation/weight-engine.js';
import type { Catalog, CatalogKind, Item, PickStrategy, ScoreConfig } from '../rotation/types.js';
import type { Renderer } from '../renderers/renderer.js';
import type { RotationLogEntry } from '../db/schema.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { CatalogStore } from './catalog-store.js';

export interface RotationControllerOptions {
  kind: CatalogKind;
  scanDir: string;
  store: CatalogStore;
  renderer: Renderer;
  scoreConfig: ScoreConfig;
  /** Absolute score distance from the top that still counts as "top". */
  tolerance: number;
  strategy: PickStrategy;
  /** Apply the score update even when the renderer failed. */
  updateOnRenderFailure?: boolean;
  random?: RandomSource;
  clock?: () => Date;
  listFiles?: ListMediaFiles;
}

export type AdvanceResult =
  | { status: 'empty' }
  | { status: 'ok'; item: Item }
  | { status: 'render-failed'; item: Item; error: string; updated: boolean };

export interface ControllerStatus {
  kind: CatalogKind;
  renderer: string;
  scanDir: string;
  rotations: number;
  stats: CatalogStats;
  /** Highest score first. */
  items: Item[];
  history: RotationLogEntry[];
}

function epochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Owns the in-memory catalog of one wallpaper kind for the lifetime of the
 * process and runs each rotation step in order:
 * select, render, update scores, persist.
 */
export class RotationController {
  readonly kind: CatalogKind;
  private catalog: Catalog = [];
  private readonly weights: WeightEngine;
  private readonly random: RandomSource;
  private readonly clock: () => Date;
  private readonly listFiles: ListMediaFiles;
  private readonly updateOnRenderFailure: boolean;

  constructor(private readonly options: RotationControllerOptions) {
    this.kind = options.kind;
    this.random = options.random ?? mathRandom;
    this.clock = options.clock ?? (() => new Date());
    this.listFiles = options.listFiles ?? listMediaFiles;
    this.updateOnRenderFailure = options.updateOnRenderFailure ?? true;
    this.weights = new WeightEngine(options.scoreConfig, this.random);
  }

  get size(): number {
    return this.catalog.length;
  }

  /** Copies of the current items, in catalog order. */
  items(): Item[] {
    return this.catalog.map(item => ({ ...item }));
  }

  /** Load persisted state and reconcile it with the scan directory. Returns the item count. */
  async open(): Promise<number> {
    this.weights.restoreRotations(this.options.store.loadRotationCount());
    return this.rescan(this.options.store.load());
  }

  /** Full rescan, keeping the scores of files that are still present. */
  async reset(): Promise<number> {
    const persisted = new Map(this.options.store.load().map(item => [item.path, item]));
    for (const item of this.catalog) {
      persisted.set(item.path, item);
    }
    const count = await this.rescan([...persisted.values()]);
    logger.info({ catalog: this.kind, count }, 'Catalog rescanned');
    return count;
  }

  private async rescan(persisted: Item[]): Promise<number> {
    const { scanDir, renderer, scoreConfig, store } = this.options;
    this.catalog = await scanCatalog(scanDir, renderer.extensions, persisted, scoreConfig, this.listFiles);

    // An empty scan (unmounted drive, wrong directory) leaves the stored scores alone
    if (this.catalog.length > 0) {
      store.save(this.catalog);
    }
    return this.catalog.length;
  }

  /**
   * One rotation step. Throws `PersistError` when the result cannot be
   * saved; the in-memory catalog is already updated at that point.
   */
  async advance(): Promise<AdvanceResult> {
    const { renderer, store, scoreConfig, tolerance, strategy } = this.options;

    const index = select(this.catalog, {
      tolerance,
      perturbationRatio: scoreConfig.perturbationRatio,
      strategy,
      random: this.random,
    });
    if (index === null) {
      logger.warn({ catalog: this.kind, dir: this.options.scanDir }, 'No wallpapers to rotate');
      return { status: 'empty' };
    }

    const now = this.clock();
    const chosen = this.catalog[index];
    logger.info({ catalog: this.kind, path: chosen.path, score: chosen.score }, 'Switching wallpaper');

    let renderFailure: string | null = null;
    try {
      await renderer.set(chosen.path);
    } catch (err) {
      renderFailure = errorMessage(err);
      logger.error({ catalog: this.kind, path: chosen.path, err: renderFailure }, 'Renderer failed');
    }

    const updated = renderFailure === null || this.updateOnRenderFailure;
    if (updated) {
      this.weights.applySelection(this.catalog, index, epochSeconds(now));
      store.save(this.catalog);
      store.saveRotationCount(this.weights.rotations);
    }

    store.appendHistory({
      path: chosen.path,
      selectedAt: now,
      outcome: renderFailure === null ? 'ok' : 'render_failed',
      error: renderFailure ?? undefined,
    });

    const item = { ...chosen };
    if (renderFailure !== null) {
      return { status: 'render-failed', item, error: renderFailure, updated };
    }
    return { status: 'ok', item };
  }

  status(historyLimit = 10): ControllerStatus {
    return {
      kind: this.kind,
      renderer: this.options.renderer.name,
      scanDir: this.options.scanDir,
      rotations: this.weights.rotations,
      stats: catalogStats(this.catalog),
      items: this.items().sort((a, b) => b.score - a.score),
      history: this.options.store.recentHistory(historyLimit),
    };
  }
}
