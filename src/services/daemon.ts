import { EventEmitter } from 'events';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { AdvanceResult, RotationController } from './rotation-controller.js';

export interface DaemonStatus {
  running: boolean;
  intervalSeconds: number;
  ticks: number;
  failures: number;
  startedAt: Date | null;
  lastRotationAt: Date | null;
}

/**
 * Advances one controller on a fixed interval. Ticks and requests coming in
 * through the control API share one queue, so only one rotation is ever in
 * flight.
 */
export class RotationDaemon extends EventEmitter {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private queue: Promise<unknown> = Promise.resolve();
  private ticks = 0;
  private failures = 0;
  private startedAt: Date | null = null;
  private lastRotationAt: Date | null = null;

  constructor(
    readonly controller: RotationController,
    private readonly intervalSeconds: number,
  ) {
    super();
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.startedAt = new Date();
    logger.info({ catalog: this.controller.kind, interval: this.intervalSeconds }, 'Rotation daemon started');
    void this.tick();
  }

  /** Stop ticking. Resolves once every rotation or reset already queued has finished. */
  stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    logger.info('Rotation daemon stopped');
    return this.queue.then(() => undefined);
  }

  /** Run `fn` after every rotation or reset already queued. */
  exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(fn);
    this.queue = next.catch(() => undefined);
    return next;
  }

  advance(): Promise<AdvanceResult> {
    return this.exclusive(async () => {
      const result = await this.controller.advance();
      this.lastRotationAt = new Date();
      this.emit('rotation', result);
      return result;
    });
  }

  reset(): Promise<number> {
    return this.exclusive(() => this.controller.reset());
  }

  getStatus(): DaemonStatus {
    return {
      running: this.running,
      intervalSeconds: this.intervalSeconds,
      ticks: this.ticks,
      failures: this.failures,
      startedAt: this.startedAt,
      lastRotationAt: this.lastRotationAt,
    };
  }

  private async tick(): Promise<void> {
    if (!this.running) return;
    this.ticks++;

    try {
      const result = await this.advance();
      if (result.status === 'render-failed') this.failures++;
    } catch (err) {
      this.failures++;
      logger.error({ err: errorMessage(err) }, 'Rotation failed');
    }

    if (this.running) {
      this.timer = setTimeout(() => void this.tick(), this.intervalSeconds * 1000);
    }
  }
}
