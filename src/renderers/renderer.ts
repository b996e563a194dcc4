import { logger } from '../utils/logger.js';
import { MpvPaperRenderer, type MpvPaperOptions } from './mpvpaper.js';
import { SwwwRenderer, type SwwwOptions } from './swww.js';

/** Display adapter for one kind of wallpaper. */
export interface Renderer {
  readonly name: string;
  /** Lower-case file extensions, without the dot. */
  readonly extensions: readonly string[];
  /** Show `path`. Rejects with `RenderError`. */
  set(path: string): Promise<void>;
  stop(): Promise<void>;
  isAvailable(): Promise<boolean>;
}

export interface RendererOptions {
  mpvpaper?: MpvPaperOptions;
  swww?: SwwwOptions;
}

export function createRenderer(type: string, options: RendererOptions = {}): Renderer {
  switch (type) {
    case 'mpvpaper':
      return new MpvPaperRenderer(options.mpvpaper);
    case 'swww':
      return new SwwwRenderer(options.swww);
    default:
      logger.warn({ type }, 'Unknown renderer type, falling back to mpvpaper');
      return new MpvPaperRenderer(options.mpvpaper);
  }
}
