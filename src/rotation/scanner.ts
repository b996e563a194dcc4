import { promises as fs, type Stats } from 'fs';
import path from 'path';
import { logger } from '../utils/logger.js';
import { WeightEngine } from './weight-engine.js';
import type { Catalog, Item, ScoreConfig } from './types.js';

export interface ScannedFile {
  path: string;
  /** Modification time in epoch seconds; 0 when it could not be read. */
  mtime: number;
}

export type ListMediaFiles = (dir: string, extensions: readonly string[]) => Promise<ScannedFile[]>;

function hasExtension(file: string, extensions: ReadonlySet<string>): boolean {
  const ext = path.extname(file).slice(1).toLowerCase();
  return ext.length > 0 && extensions.has(ext);
}

/**
 * Walk `dir` recursively, following symbolic links, and return every regular
 * file whose extension (case-insensitive) is in `extensions`. Entries that
 * cannot be read are skipped; a missing directory yields an empty list.
 */
export const listMediaFiles: ListMediaFiles = async (dir, extensions) => {
  const wanted = new Set(extensions.map(e => e.replace(/^\./, '').toLowerCase()));
  const files: ScannedFile[] = [];
  // Real paths of the directories currently being walked
  const ancestors = new Set<string>();

  async function walk(current: string): Promise<void> {
    let realDir: string;
    let entries: string[];
    try {
      realDir = await fs.realpath(current);
      entries = await fs.readdir(current);
    } catch (err) {
      logger.debug({ dir: current, err }, 'Skipping unreadable directory');
      return;
    }
    // A symlink back to an ancestor is a loop; one to a sibling is listed again
    if (ancestors.has(realDir)) return;
    ancestors.add(realDir);
    try {
      await walkEntries(current, entries);
    } finally {
      ancestors.delete(realDir);
    }
  }

  async function walkEntries(current: string, entries: string[]): Promise<void> {
    entries.sort();
    for (const name of entries) {
      const full = path.join(current, name);
      let stats: Stats;
      try {
        stats = await fs.stat(full);
      } catch {
        logger.debug({ path: full }, 'Skipping unreadable entry');
        continue;
      }

      if (stats.isDirectory()) {
        await walk(full);
      } else if (stats.isFile() && hasExtension(name, wanted)) {
        const mtime = Number.isFinite(stats.mtimeMs) ? stats.mtimeMs / 1000 : 0;
        files.push({ path: full, mtime });
      }
    }
  }

  await walk(path.resolve(dir));
  return files;
};

/**
 * Reconcile the files found on disk with the persisted catalog.
 *
 * Known paths keep their persisted item as-is. A new path scores the mean
 * of the persisted scores (or `base` when nothing was persisted) averaged
 * with its age-based score. Persisted paths no longer on disk are dropped.
 */
export function mergeCatalog(files: ScannedFile[], persisted: Item[], config: ScoreConfig): Catalog {
  if (files.length === 0) return [];

  const known = new Map<string, Item>();
  for (const item of persisted) {
    known.set(item.path, item);
  }

  let oldest = Infinity;
  let newest = -Infinity;
  for (const file of files) {
    oldest = Math.min(oldest, file.mtime);
    newest = Math.max(newest, file.mtime);
  }
  const timeRange = Math.max(newest - oldest, 1);

  const average = persisted.length === 0
    ? config.base
    : persisted.reduce((sum, item) => sum + item.score, 0) / persisted.length;

  const weights = new WeightEngine(config);
  const seen = new Set<string>();
  const catalog: Catalog = [];

  for (const file of files) {
    if (seen.has(file.path)) continue;
    seen.add(file.path);

    const existing = known.get(file.path);
    if (existing) {
      catalog.push(existing);
      continue;
    }

    const ageRatio = (newest - file.mtime) / timeRange;
    catalog.push({
      path: file.path,
      score: (average + weights.initialScore(ageRatio)) / 2,
      skipStreak: 0,
      lastSelectedAt: null,
    });
  }

  return catalog;
}

/** List `scanDir` and merge the result with `persisted`. */
export async function scanCatalog(
  scanDir: string,
  extensions: readonly string[],
  persisted: Item[],
  config: ScoreConfig,
  listFiles: ListMediaFiles = listMediaFiles,
): Promise<Catalog> {
  const files = await listFiles(scanDir, extensions);
  if (files.length === 0) {
    logger.warn(
      { dir: scanDir, extensions: extensions.join(', ') },
      'No supported wallpaper files found',
    );
    return [];
  }

  const catalog = mergeCatalog(files, persisted, config);
  const knownPaths = new Set(persisted.map(item => item.path));
  const kept = catalog.filter(item => knownPaths.has(item.path)).length;
  logger.debug(
    { dir: scanDir, files: files.length, added: catalog.length - kept, dropped: knownPaths.size - kept },
    'Catalog merged',
  );
  return catalog;
}
