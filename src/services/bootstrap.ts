import type { EnvConfig } from '../config.js';
import type { DbHandle } from '../db/client.js';
import { createRenderer, type Renderer } from '../renderers/renderer.js';
import { createScoreConfig, type CatalogKind, type ScoreConfig } from '../rotation/types.js';
import { SqliteCatalogStore } from './catalog-store.js';
import { RotationController } from './rotation-controller.js';

/** `picture`, `image` and `static` name the image catalog; anything else is video. */
export function parseMode(raw: string): CatalogKind {
  switch (raw.toLowerCase()) {
    case 'picture':
    case 'image':
    case 'static':
      return 'image';
    default:
      return 'video';
  }
}

export function scoreConfigFrom(config: EnvConfig): ScoreConfig {
  return createScoreConfig({
    base: config.WEIGHT_BASE,
    selectPenalty: config.WEIGHT_SELECT_PENALTY,
    perturbationRatio: config.WEIGHT_PERTURBATION_RATIO,
    normalizationThreshold: config.WEIGHT_NORMALIZATION_THRESHOLD,
    normalizationTarget: config.WEIGHT_NORMALIZATION_TARGET,
    shufflePeriod: config.WEIGHT_SHUFFLE_PERIOD,
    shuffleIntensity: config.WEIGHT_SHUFFLE_INTENSITY,
  });
}

export function rendererFor(config: EnvConfig, kind: CatalogKind): Renderer {
  return createRenderer(kind === 'video' ? config.VIDEO_ENGINE : config.IMAGE_ENGINE, {
    mpvpaper: { options: config.MPVPAPER_OPTIONS },
    swww: {
      transition: config.SWWW_TRANSITION,
      transitionDuration: config.SWWW_TRANSITION_DURATION,
    },
  });
}

export function intervalFor(config: EnvConfig, kind: CatalogKind): number {
  return kind === 'video' ? config.VIDEO_INTERVAL : config.IMAGE_INTERVAL;
}

/** Wire a controller for `kind` from the environment configuration. Not opened yet. */
export function createController(config: EnvConfig, handle: DbHandle, kind: CatalogKind): RotationController {
  return new RotationController({
    kind,
    scanDir: kind === 'video' ? config.VIDEO_DIR : config.IMAGE_DIR,
    store: new SqliteCatalogStore(handle, kind),
    renderer: rendererFor(config, kind),
    scoreConfig: scoreConfigFrom(config),
    tolerance: config.SELECT_TOLERANCE,
    strategy: config.SELECT_STRATEGY,
    updateOnRenderFailure: config.ROTATION_UPDATE_ON_RENDER_FAILURE,
  });
}
