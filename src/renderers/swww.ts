import { RenderError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { commandExists, runCommand, spawnDetached, type CommandResult } from '../utils/process.js';
import { sleep } from '../utils/sleep.js';
import type { Renderer } from './renderer.js';

export const SWWW_EXTENSIONS = ['jpg', 'jpeg', 'png', 'gif', 'pnm', 'tga', 'tiff', 'tif', 'webp', 'bmp', 'ff'] as const;

export const SWWW_TRANSITIONS = [
  'none', 'simple', 'fade', 'left', 'right', 'top', 'bottom',
  'wipe', 'wave', 'grow', 'center', 'any', 'outer', 'random',
] as const;

export type SwwwTransition = (typeof SWWW_TRANSITIONS)[number];

/** Time given to a freshly spawned swww-daemon before the first `swww img`. */
const DAEMON_STARTUP_MS = 500;

export interface SwwwOptions {
  transition?: string;
  /** Seconds. */
  transitionDuration?: number;
  transitionFps?: number;
  transitionStep?: number;
  fill?: 'fit' | 'fill' | 'center' | 'stretch';
}

export function parseTransition(name: string): SwwwTransition {
  const lower = name.toLowerCase();
  return SWWW_TRANSITIONS.find(t => t === lower) ?? 'fade';
}

/** Static wallpapers through swww, starting its daemon on demand. */
export class SwwwRenderer implements Renderer {
  readonly name = 'swww';
  readonly extensions = SWWW_EXTENSIONS;
  readonly transition: SwwwTransition;
  private readonly transitionDuration: number;
  private readonly transitionFps: number;
  private readonly transitionStep: number;
  private readonly fill: string;

  constructor(options: SwwwOptions = {}) {
    this.transition = parseTransition(options.transition ?? 'fade');
    this.transitionDuration = options.transitionDuration ?? 2;
    this.transitionFps = options.transitionFps ?? 60;
    this.transitionStep = options.transitionStep ?? 20;
    this.fill = options.fill ?? 'fill';
  }

  /** Argument list for `swww img`. */
  imgArgs(path: string): string[] {
    return [
      'img', path,
      '--transition-type', this.transition,
      '--transition-duration', String(this.transitionDuration),
      '--transition-fps', String(this.transitionFps),
      '--transition-step', String(this.transitionStep),
      '--fill', this.fill,
    ];
  }

  async set(path: string): Promise<void> {
    await this.ensureDaemon();

    let result: CommandResult;
    try {
      result = await runCommand('swww', this.imgArgs(path));
    } catch (err) {
      throw new RenderError(this.name, `Failed to run swww: ${errorMessage(err)}`, { cause: err });
    }
    if (result.code !== 0) {
      throw new RenderError(this.name, `swww exited with code ${result.code}: ${result.stderr.trim().slice(0, 300)}`);
    }
    logger.info({ path, transition: this.transition }, 'swww wallpaper set');
  }

  async stop(): Promise<void> {
    try {
      await runCommand('swww', ['kill']);
    } catch (err) {
      throw new RenderError(this.name, `Failed to stop swww: ${errorMessage(err)}`, { cause: err });
    }
  }

  isAvailable(): Promise<boolean> {
    return commandExists('swww');
  }

  private async ensureDaemon(): Promise<void> {
    try {
      const check = await runCommand('pgrep', ['-x', 'swww-daemon']);
      if (check.code === 0) return;
    } catch (err) {
      logger.debug({ err: errorMessage(err) }, 'pgrep unavailable, starting swww-daemon');
    }

    try {
      await spawnDetached('swww-daemon', []);
    } catch (err) {
      throw new RenderError(this.name, `Failed to start swww-daemon: ${errorMessage(err)}`, { cause: err });
    }
    await sleep(DAEMON_STARTUP_MS);
  }
}
