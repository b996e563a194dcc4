import { RenderError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { commandExists, runCommand, spawnDetached } from '../utils/process.js';
import type { Renderer } from './renderer.js';

export const MPVPAPER_EXTENSIONS = ['mp4', 'mkv', 'webm', 'avi', 'mov', 'flv', 'wmv', 'm4v', 'gif'] as const;

export interface MpvPaperOptions {
  /** Passed to mpv through `mpvpaper -o`. */
  options?: string;
  /** Output name; `*` covers every monitor. */
  output?: string;
}

/** Video wallpapers through mpvpaper. One instance runs at a time. */
export class MpvPaperRenderer implements Renderer {
  readonly name = 'mpvpaper';
  readonly extensions = MPVPAPER_EXTENSIONS;
  private readonly mpvOptions: string;
  private readonly output: string;

  constructor(options: MpvPaperOptions = {}) {
    this.mpvOptions = options.options ?? '--loop --no-audio --hwdec=auto';
    this.output = options.output ?? '*';
  }

  async set(path: string): Promise<void> {
    await this.stop();
    try {
      await spawnDetached('mpvpaper', ['-o', this.mpvOptions, this.output, path]);
    } catch (err) {
      throw new RenderError(this.name, `Failed to start mpvpaper: ${errorMessage(err)}`, { cause: err });
    }
    logger.info({ path }, 'mpvpaper started');
  }

  async stop(): Promise<void> {
    try {
      // pkill exits 1 when nothing was running
      await runCommand('pkill', ['mpvpaper']);
    } catch (err) {
      throw new RenderError(this.name, `Failed to stop mpvpaper: ${errorMessage(err)}`, { cause: err });
    }
  }

  isAvailable(): Promise<boolean> {
    return commandExists('mpvpaper');
  }
}
