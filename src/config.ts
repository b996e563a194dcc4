import 'dotenv/config';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from './utils/errors.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(v => v === 'true' || v === '1' || v === 'yes');

const envSchema = z.object({
  DATABASE_PATH: z.string().default('~/.cache/wallrotor/catalog.db'),
  VIDEO_DIR: z.string().default('~/Videos/background'),
  IMAGE_DIR: z.string().default('~/Pictures/wallpapers'),
  VIDEO_ENGINE: z.string().default('mpvpaper'),
  IMAGE_ENGINE: z.string().default('swww'),
  VIDEO_INTERVAL: z.coerce.number().int().positive().default(600),
  IMAGE_INTERVAL: z.coerce.number().int().positive().default(300),
  MPVPAPER_OPTIONS: z.string().default('--loop --no-audio --hwdec=auto'),
  SWWW_TRANSITION: z.string().default('fade'),
  SWWW_TRANSITION_DURATION: z.coerce.number().nonnegative().default(2),
  CONTROL_PORT: z.coerce.number().int().min(1).max(65535).default(3917),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SELECT_TOLERANCE: z.coerce.number().nonnegative().default(5),
  SELECT_STRATEGY: z.enum(['midpoint', 'random']).default('midpoint'),
  ROTATION_UPDATE_ON_RENDER_FAILURE: booleanFlag.default('true'),
  WEIGHT_BASE: z.coerce.number().finite().default(100),
  WEIGHT_SELECT_PENALTY: z.coerce.number().finite().default(10),
  WEIGHT_PERTURBATION_RATIO: z.coerce.number().min(0).max(1).default(0.03),
  WEIGHT_NORMALIZATION_THRESHOLD: z.coerce.number().positive().default(500),
  WEIGHT_NORMALIZATION_TARGET: z.coerce.number().positive().default(100),
  WEIGHT_SHUFFLE_PERIOD: z.coerce.number().int().nonnegative().default(100),
  WEIGHT_SHUFFLE_INTENSITY: z.coerce.number().min(0).max(1).default(0.1),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type ConfigResult =
  | { success: true; config: EnvConfig }
  | { success: false; issues: string[] };

/** Expands a leading `~/` to the current user's home directory. */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function parseConfig(env: Record<string, string | undefined>): ConfigResult {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    };
  }
  const config = result.data;
  return {
    success: true,
    config: {
      ...config,
      DATABASE_PATH: expandHome(config.DATABASE_PATH),
      VIDEO_DIR: expandHome(config.VIDEO_DIR),
      IMAGE_DIR: expandHome(config.IMAGE_DIR),
    },
  };
}

let _config: EnvConfig | null = null;

export function getConfig(): EnvConfig {
  if (!_config) {
    const result = parseConfig(process.env);
    if (!result.success) {
      throw new ConfigError(result.issues);
    }
    _config = result.config;
  }
  return _config;
}
