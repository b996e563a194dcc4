import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import { WeightEngine } from '../rotation/weight-engine.js';
import { mulberry32 } from '../rotation/random.js';
import { createScoreConfig } from '../rotation/types.js';
import { makeItem, totalScore } from './helpers.js';

const NOW = 1_700_000_000;

// Neither reshuffle nor normalization can fire with these settings
const conservingConfig = createScoreConfig({ shufflePeriod: 0, normalizationThreshold: 1e12 });

describe('WeightEngine.applySelection', () => {
  it('conserves the total score when no reshuffle or normalization fires', () => {
    fc.assert(
      fc.property(
        fc.array(fc.double({ min: 0, max: 1000, noNaN: true }), { minLength: 1, maxLength: 40 }),
        fc.nat(),
        (scores, pick) => {
          const catalog = scores.map((score, i) => makeItem(`w${i}.mp4`, score));
          const index = pick % catalog.length;
          const before = totalScore(catalog);
          new WeightEngine(conservingConfig).applySelection(catalog, index, NOW);
          expect(Math.abs(totalScore(catalog) - before)).toBeLessThan(1e-6);
        },
      ),
    );
  });

  it('moves the penalty from the selected item to the others', () => {
    const catalog = [makeItem('a', 100, 3), makeItem('b', 90, 0), makeItem('c', 80, 5)];
    new WeightEngine(conservingConfig).applySelection(catalog, 1, NOW);

    expect(catalog[1]).toEqual({ path: 'b', score: 80, skipStreak: 0, lastSelectedAt: NOW });
    expect(catalog[0]).toEqual({ path: 'a', score: 105, skipStreak: 4, lastSelectedAt: null });
    expect(catalog[2]).toEqual({ path: 'c', score: 85, skipStreak: 6, lastSelectedAt: null });
  });

  it('resets the streak of the selected item and bumps every other streak by one', () => {
    const catalog = [makeItem('a', 10, 7), makeItem('b', 10, 2), makeItem('c', 10, 0), makeItem('d', 10, 1)];
    const before = catalog.map(item => item.skipStreak);
    new WeightEngine(conservingConfig).applySelection(catalog, 0, NOW);

    expect(catalog[0].skipStreak).toBe(0);
    expect(catalog[0].lastSelectedAt).toBe(NOW);
    for (let j = 1; j < catalog.length; j++) {
      expect(catalog[j].skipStreak).toBe(before[j] + 1);
    }
  });

  it('leaves the score of a lone item alone but marks it selected', () => {
    const catalog = [makeItem('only', 100, 4)];
    const engine = new WeightEngine(conservingConfig);
    engine.applySelection(catalog, 0, NOW);

    expect(catalog[0]).toEqual({ path: 'only', score: 100, skipStreak: 0, lastSelectedAt: NOW });
    expect(engine.rotations).toBe(0);
  });

  it('does nothing for an empty catalog', () => {
    const engine = new WeightEngine(conservingConfig);
    engine.applySelection([], 0, NOW);
    expect(engine.rotations).toBe(0);
  });

  it('rejects an index outside the catalog', () => {
    const catalog = [makeItem('a', 1), makeItem('b', 2)];
    expect(() => new WeightEngine(conservingConfig).applySelection(catalog, 2, NOW)).toThrow(RangeError);
  });

  it('reshuffles on every Nth rotation, counting restored rotations', () => {
    const engine = new WeightEngine(createScoreConfig({ shufflePeriod: 3 }), mulberry32(7));
    const reshuffle = vi.spyOn(engine, 'reshuffle');
    const catalog = [makeItem('a', 100), makeItem('b', 100), makeItem('c', 100)];

    engine.applySelection(catalog, 0, NOW);
    engine.applySelection(catalog, 1, NOW);
    expect(reshuffle).not.toHaveBeenCalled();
    engine.applySelection(catalog, 2, NOW);
    expect(reshuffle).toHaveBeenCalledTimes(1);
    expect(engine.rotations).toBe(3);

    const resumed = new WeightEngine(createScoreConfig({ shufflePeriod: 3 }), mulberry32(7));
    const resumedReshuffle = vi.spyOn(resumed, 'reshuffle');
    resumed.restoreRotations(5);
    resumed.applySelection(catalog, 0, NOW);
    expect(resumedReshuffle).toHaveBeenCalledTimes(1);
  });

  it('normalizes after reshuffling within the same rotation', () => {
    const engine = new WeightEngine(
      createScoreConfig({ shufflePeriod: 1, shuffleIntensity: 0.5, normalizationThreshold: 50, normalizationTarget: 10 }),
      mulberry32(99),
    );
    const catalog = Array.from({ length: 6 }, (_, i) => makeItem(`w${i}`, 100));
    engine.applySelection(catalog, 0, NOW);

    expect(totalScore(catalog) / catalog.length).toBeCloseTo(10, 9);
  });
});

describe('WeightEngine.normalize', () => {
  it('scales every score so the mean lands on the target', () => {
    const engine = new WeightEngine(createScoreConfig({ normalizationThreshold: 500, normalizationTarget: 100 }));
    const catalog = [makeItem('a', 500), makeItem('b', 540), makeItem('c', 520)];
    const before = catalog.map(item => item.score);

    const outcome = engine.normalize(catalog);

    expect(outcome?.average).toBeCloseTo(520, 9);
    expect(outcome?.factor).toBeCloseTo(0.1923, 4);
    expect(totalScore(catalog) / catalog.length).toBeCloseTo(100, 9);
    catalog.forEach((item, i) => {
      expect(item.score / before[i]).toBeCloseTo(100 / 520, 12);
    });
  });

  it('leaves a catalog at or below the threshold alone', () => {
    const engine = new WeightEngine(createScoreConfig({ normalizationThreshold: 500 }));
    const catalog = [makeItem('a', 400), makeItem('b', 600)];
    expect(engine.normalize(catalog)).toBeNull();
    expect(catalog.map(item => item.score)).toEqual([400, 600]);
  });
});

describe('WeightEngine.reshuffle', () => {
  it('resets ceil(n * intensity) distinct items near the base score', () => {
    const engine = new WeightEngine(createScoreConfig({ base: 100, shuffleIntensity: 0.1 }), mulberry32(2024));
    const catalog = Array.from({ length: 20 }, (_, i) => makeItem(`w${i}`, 300, 5));

    const reset = engine.reshuffle(catalog);

    expect(reset).toHaveLength(2);
    expect(new Set(reset).size).toBe(2);
    for (const idx of reset) {
      expect(catalog[idx].score).toBeGreaterThanOrEqual(80);
      expect(catalog[idx].score).toBeLessThanOrEqual(120);
      expect(catalog[idx].skipStreak).toBe(0);
    }
    const untouched = catalog.filter((_, i) => !reset.includes(i));
    expect(untouched).toHaveLength(18);
    expect(untouched.every(item => item.score === 300 && item.skipStreak === 5)).toBe(true);
  });

  it('resets exactly two of twenty items when triggered by a rotation', () => {
    const engine = new WeightEngine(
      createScoreConfig({ base: 100, shufflePeriod: 1, shuffleIntensity: 0.1 }),
      mulberry32(5),
    );
    const catalog = Array.from({ length: 20 }, (_, i) => makeItem(`w${i}`, 300, 5));
    engine.applySelection(catalog, 0, NOW);

    const nearBase = catalog.filter(item => item.score >= 80 && item.score <= 120);
    expect(nearBase).toHaveLength(2);
    expect(nearBase.every(item => item.skipStreak === 0)).toBe(true);
  });

  it('resets nothing at zero intensity', () => {
    const engine = new WeightEngine(createScoreConfig({ shuffleIntensity: 0 }));
    const catalog = [makeItem('a', 1), makeItem('b', 2)];
    expect(engine.reshuffle(catalog)).toEqual([]);
    expect(catalog.map(item => item.score)).toEqual([1, 2]);
  });

  it('never resets more items than the catalog holds', () => {
    const engine = new WeightEngine(createScoreConfig({ shuffleIntensity: 1 }), mulberry32(1));
    const catalog = [makeItem('a', 1), makeItem('b', 2), makeItem('c', 3)];
    expect([...engine.reshuffle(catalog)].sort()).toEqual([0, 1, 2]);
  });
});

describe('WeightEngine.initialScore', () => {
  it('spans base ± 20 from newest to oldest', () => {
    const engine = new WeightEngine(createScoreConfig({ base: 100 }));
    expect(engine.initialScore(0)).toBe(120);
    expect(engine.initialScore(0.5)).toBe(100);
    expect(engine.initialScore(1)).toBe(80);
  });
});
