import { mathRandom, randomIndex, uniform, type RandomSource } from './random.js';
import type { Catalog, PickStrategy } from './types.js';

/** Perturbed scores never drop below this floor. */
const PERTURBED_FLOOR = 1.0;

export interface RankedEntry {
  /** Position of the item in the catalog array. */
  index: number;
  value: number;
}

export interface SelectOptions {
  tolerance: number;
  perturbationRatio: number;
  strategy?: PickStrategy;
  random?: RandomSource;
}

export interface CatalogStats {
  count: number;
  minScore: number;
  maxScore: number;
  averageScore: number;
  totalSkips: number;
}

/**
 * Score every item, optionally jittered by ±`perturbationRatio` of its own
 * score, and order them highest first. Equal values keep catalog order.
 */
export function rankCatalog(
  catalog: Catalog,
  perturbationRatio: number,
  random: RandomSource = mathRandom,
): RankedEntry[] {
  const ranked = catalog.map((item, index) => {
    if (perturbationRatio <= 0) return { index, value: item.score };
    const u = uniform(random, -1, 1);
    return {
      index,
      value: Math.max(PERTURBED_FLOOR, item.score + item.score * perturbationRatio * u),
    };
  });
  return ranked.sort((a, b) => b.value - a.value);
}

/** Leading entries within `tolerance` of the top value. */
export function toleranceBand(ranked: RankedEntry[], tolerance: number): RankedEntry[] {
  if (ranked.length === 0) return [];
  const max = ranked[0].value;
  const band = ranked.filter(entry => Math.abs(max - entry.value) <= tolerance);
  return band.length > 0 ? band : [ranked[0]];
}

/** `midpoint` takes the middle entry of the band; `random` draws one uniformly. */
export function pickFromBand(
  band: RankedEntry[],
  strategy: PickStrategy,
  random: RandomSource = mathRandom,
): RankedEntry | null {
  if (band.length === 0) return null;
  if (strategy === 'random') return band[randomIndex(random, band.length)];
  return band[Math.floor(band.length / 2)];
}

/** Choose the next item; returns its catalog index, or null for an empty catalog. */
export function select(catalog: Catalog, options: SelectOptions): number | null {
  if (catalog.length === 0) return null;
  const random = options.random ?? mathRandom;
  const ranked = rankCatalog(catalog, options.perturbationRatio, random);
  const band = toleranceBand(ranked, options.tolerance);
  return pickFromBand(band, options.strategy ?? 'midpoint', random)?.index ?? null;
}

export function catalogStats(catalog: Catalog): CatalogStats {
  if (catalog.length === 0) {
    return { count: 0, minScore: 0, maxScore: 0, averageScore: 0, totalSkips: 0 };
  }
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  let skips = 0;
  for (const item of catalog) {
    min = Math.min(min, item.score);
    max = Math.max(max, item.score);
    sum += item.score;
    skips += item.skipStreak;
  }
  return {
    count: catalog.length,
    minScore: min,
    maxScore: max,
    averageScore: sum / catalog.length,
    totalSkips: skips,
  };
}
