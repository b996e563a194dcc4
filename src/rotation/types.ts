import { z } from 'zod';

/** One tracked wallpaper file. `path` is the catalog key. */
export interface Item {
  path: string;
  score: number;
  skipStreak: number;
  /** Epoch seconds of the last rotation that chose this item. */
  lastSelectedAt: number | null;
}

/** Unordered set of items keyed by path; array order carries no meaning. */
export type Catalog = Item[];

export const scoreConfigSchema = z.object({
  base: z.number().finite(),
  selectPenalty: z.number().finite(),
  perturbationRatio: z.number().min(0).max(1),
  normalizationThreshold: z.number().positive(),
  normalizationTarget: z.number().positive(),
  shufflePeriod: z.number().int().nonnegative(),
  shuffleIntensity: z.number().min(0).max(1),
});

export type ScoreConfig = Readonly<z.infer<typeof scoreConfigSchema>>;

export const DEFAULT_SCORE_CONFIG: ScoreConfig = Object.freeze({
  base: 100,
  selectPenalty: 10,
  perturbationRatio: 0.03,
  normalizationThreshold: 500,
  normalizationTarget: 100,
  shufflePeriod: 100,
  shuffleIntensity: 0.1,
});

export function createScoreConfig(overrides: Partial<ScoreConfig> = {}): ScoreConfig {
  return Object.freeze(scoreConfigSchema.parse({ ...DEFAULT_SCORE_CONFIG, ...overrides }));
}

export type CatalogKind = 'video' | 'image';

export type PickStrategy = 'midpoint' | 'random';
