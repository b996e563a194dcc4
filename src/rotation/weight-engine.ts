import { logger } from '../utils/logger.js';
import { mathRandom, randomIndex, uniform, type RandomSource } from './random.js';
import type { Catalog, ScoreConfig } from './types.js';

/** Reshuffled items land within ±20% of the base score. */
const RESHUFFLE_SPREAD = 0.2;
/** Spread of the time-based initial score around the base. */
const AGE_SPREAD = 20;

export interface NormalizeOutcome {
  average: number;
  factor: number;
}

/**
 * Closed-loop score update applied after every rotation.
 *
 * The chosen item pays `selectPenalty`, which is split evenly across every
 * other item, so the catalog total is unchanged. Every `shufflePeriod`
 * rotations a random slice of the catalog is reset near `base`, and whenever
 * the mean drifts above `normalizationThreshold` all scores are rescaled to
 * bring the mean back to `normalizationTarget`.
 */
export class WeightEngine {
  private rotationCount = 0;

  constructor(
    private readonly config: ScoreConfig,
    private readonly random: RandomSource = mathRandom,
  ) {}

  /** Rotations applied so far; the reshuffle period is counted against this. */
  get rotations(): number {
    return this.rotationCount;
  }

  /** Restore a persisted counter so the reshuffle period spans process restarts. */
  restoreRotations(count: number): void {
    this.rotationCount = Number.isInteger(count) && count >= 0 ? count : 0;
  }

  /** Initial score for a newly discovered file: newest near `base + 20`, oldest near `base - 20`. */
  initialScore(ageRatio: number): number {
    const max = this.config.base + AGE_SPREAD;
    return max - ageRatio * 2 * AGE_SPREAD;
  }

  applySelection(catalog: Catalog, selectedIndex: number, now: number): void {
    if (catalog.length === 0) return;
    if (!Number.isInteger(selectedIndex) || selectedIndex < 0 || selectedIndex >= catalog.length) {
      throw new RangeError(`Selected index ${selectedIndex} outside catalog of ${catalog.length}`);
    }

    const selected = catalog[selectedIndex];
    selected.skipStreak = 0;
    selected.lastSelectedAt = now;

    // Nothing to redistribute against
    if (catalog.length === 1) return;

    const penalty = this.config.selectPenalty;
    const reward = penalty / (catalog.length - 1);

    for (let i = 0; i < catalog.length; i++) {
      if (i === selectedIndex) {
        catalog[i].score -= penalty;
      } else {
        catalog[i].score += reward;
        catalog[i].skipStreak += 1;
      }
    }

    this.rotationCount++;

    const period = this.config.shufflePeriod;
    if (period > 0 && this.rotationCount % period === 0) {
      this.reshuffle(catalog);
    }

    this.normalize(catalog);
  }

  /**
   * Rescale every score by `normalizationTarget / mean` when the mean exceeds
   * `normalizationThreshold`. Returns the applied scaling, or null when the
   * catalog was left alone.
   */
  normalize(catalog: Catalog): NormalizeOutcome | null {
    if (catalog.length === 0) return null;

    const total = catalog.reduce((sum, item) => sum + item.score, 0);
    const average = total / catalog.length;
    if (!(average > this.config.normalizationThreshold)) return null;

    const factor = this.config.normalizationTarget / average;
    for (const item of catalog) {
      item.score *= factor;
    }

    logger.info(
      { average, target: average * factor, factor },
      'Scores normalized',
    );
    return { average, factor };
  }

  /**
   * Reset `ceil(n * shuffleIntensity)` distinct items, drawn without
   * replacement, to `base * (1 + u)` with `u` uniform in [-0.2, 0.2).
   * Returns the indices that were reset.
   */
  reshuffle(catalog: Catalog): number[] {
    const intensity = this.config.shuffleIntensity;
    if (catalog.length === 0 || intensity <= 0) return [];

    const count = Math.min(Math.ceil(catalog.length * intensity), catalog.length);
    const indices = catalog.map((_, i) => i);

    // Partial Fisher-Yates: the first `count` slots end up a uniform sample
    for (let i = 0; i < count; i++) {
      const j = i + randomIndex(this.random, indices.length - i);
      [indices[i], indices[j]] = [indices[j], indices[i]];
    }

    const chosen = indices.slice(0, count);
    for (const idx of chosen) {
      catalog[idx].score = this.config.base * (1 + uniform(this.random, -RESHUFFLE_SPREAD, RESHUFFLE_SPREAD));
      catalog[idx].skipStreak = 0;
    }

    logger.info(
      { reset: count, intensity, rotation: this.rotationCount },
      'Periodic reshuffle applied',
    );
    return chosen;
  }
}
