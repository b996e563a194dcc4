import { describe, it, expect } from 'vitest';
import os from 'os';
import path from 'path';
import { expandHome, parseConfig } from '../config.js';
import { createScoreConfig } from '../rotation/types.js';

describe('parseConfig', () => {
  it('fills every setting with its default', () => {
    const result = parseConfig({});
    if (!result.success) throw new Error(result.issues.join('; '));
    const { config } = result;

    expect(config.DATABASE_PATH).toBe(path.join(os.homedir(), '.cache/wallrotor/catalog.db'));
    expect(config.VIDEO_DIR).toBe(path.join(os.homedir(), 'Videos/background'));
    expect(config.IMAGE_DIR).toBe(path.join(os.homedir(), 'Pictures/wallpapers'));
    expect(config.VIDEO_INTERVAL).toBe(600);
    expect(config.IMAGE_INTERVAL).toBe(300);
    expect(config.CONTROL_PORT).toBe(3917);
    expect(config.SELECT_STRATEGY).toBe('midpoint');
    expect(config.ROTATION_UPDATE_ON_RENDER_FAILURE).toBe(true);
    expect({
      base: config.WEIGHT_BASE,
      penalty: config.WEIGHT_SELECT_PENALTY,
      ratio: config.WEIGHT_PERTURBATION_RATIO,
      threshold: config.WEIGHT_NORMALIZATION_THRESHOLD,
      target: config.WEIGHT_NORMALIZATION_TARGET,
      period: config.WEIGHT_SHUFFLE_PERIOD,
      intensity: config.WEIGHT_SHUFFLE_INTENSITY,
    }).toEqual({ base: 100, penalty: 10, ratio: 0.03, threshold: 500, target: 100, period: 100, intensity: 0.1 });
  });

  it('coerces numeric and boolean values from strings', () => {
    const result = parseConfig({
      VIDEO_INTERVAL: '45',
      WEIGHT_SHUFFLE_INTENSITY: '0.25',
      ROTATION_UPDATE_ON_RENDER_FAILURE: 'no',
      SELECT_STRATEGY: 'random',
      IMAGE_DIR: '/srv/walls',
    });
    if (!result.success) throw new Error(result.issues.join('; '));

    expect(result.config.VIDEO_INTERVAL).toBe(45);
    expect(result.config.WEIGHT_SHUFFLE_INTENSITY).toBe(0.25);
    expect(result.config.ROTATION_UPDATE_ON_RENDER_FAILURE).toBe(false);
    expect(result.config.SELECT_STRATEGY).toBe('random');
    expect(result.config.IMAGE_DIR).toBe('/srv/walls');
  });

  it('names every invalid setting', () => {
    const result = parseConfig({ VIDEO_INTERVAL: '0', WEIGHT_SHUFFLE_INTENSITY: '2', SELECT_STRATEGY: 'first' });
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(result.issues.map(issue => issue.split(':')[0]).sort()).toEqual([
      'SELECT_STRATEGY',
      'VIDEO_INTERVAL',
      'WEIGHT_SHUFFLE_INTENSITY',
    ]);
  });
});

describe('normalization threshold', () => {
  it('must be positive', () => {
    for (const value of ['0', '-5']) {
      const result = parseConfig({ WEIGHT_NORMALIZATION_THRESHOLD: value });
      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.issues.map(issue => issue.split(':')[0])).toEqual(['WEIGHT_NORMALIZATION_THRESHOLD']);
    }
    expect(() => createScoreConfig({ normalizationThreshold: 0 })).toThrow();
    expect(createScoreConfig({ normalizationThreshold: 0.5 }).normalizationThreshold).toBe(0.5);
  });
});

describe('expandHome', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~')).toBe(os.homedir());
    expect(expandHome('~/walls')).toBe(path.join(os.homedir(), 'walls'));
    expect(expandHome('/abs/~/walls')).toBe('/abs/~/walls');
    expect(expandHome('~other/walls')).toBe('~other/walls');
  });
});
