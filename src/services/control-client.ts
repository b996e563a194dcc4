import { z } from 'zod';
import type { CatalogKind } from '../rotation/types.js';
import type { AdvanceResult } from './rotation-controller.js';

const PROBE_TIMEOUT_MS = 1_000;
const REQUEST_TIMEOUT_MS = 60_000;

const itemSchema = z.object({
  path: z.string(),
  score: z.number(),
  skipStreak: z.number(),
  lastSelectedAt: z.number().nullable(),
});

const advanceSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('empty') }),
  z.object({ status: z.literal('ok'), item: itemSchema }),
  z.object({ status: z.literal('render-failed'), item: itemSchema, error: z.string(), updated: z.boolean() }),
]);

const statusSchema = z.object({
  kind: z.enum(['video', 'image']),
  renderer: z.string(),
  scanDir: z.string(),
  rotations: z.number(),
  stats: z.object({
    count: z.number(),
    minScore: z.number(),
    maxScore: z.number(),
    averageScore: z.number(),
    totalSkips: z.number(),
  }),
  items: z.array(itemSchema),
  history: z.array(z.object({
    path: z.string(),
    selectedAt: z.coerce.date(),
    outcome: z.enum(['ok', 'render_failed']),
    error: z.string().nullable(),
  })),
});

export type RemoteStatus = z.infer<typeof statusSchema>;

const healthSchema = z.object({ status: z.literal('ok'), catalog: z.enum(['video', 'image']) });
const resetSchema = z.object({ count: z.number() });
const errorSchema = z.object({ error: z.string() });

/** Talks to a running daemon over its loopback control API. */
export class ControlClient {
  private readonly baseUrl: string;

  constructor(port: number, host = '127.0.0.1') {
    this.baseUrl = `http://${host}:${port}/api/v1`;
  }

  /** Catalog owned by the daemon listening on this port, or null when none answers. */
  async probe(): Promise<CatalogKind | null> {
    try {
      const res = await fetch(`${this.baseUrl}/health`, { signal: AbortSignal.timeout(PROBE_TIMEOUT_MS) });
      if (!res.ok) return null;
      const parsed = healthSchema.safeParse(await res.json());
      return parsed.success ? parsed.data.catalog : null;
    } catch {
      return null;
    }
  }

  async status(): Promise<RemoteStatus> {
    const res = await fetch(`${this.baseUrl}/status`, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    if (!res.ok) throw new Error(`Daemon returned HTTP ${res.status}`);
    return statusSchema.parse(await res.json());
  }

  async next(): Promise<AdvanceResult> {
    return advanceSchema.parse(await this.post('/next'));
  }

  async reset(): Promise<number> {
    return resetSchema.parse(await this.post('/reset')).count;
  }

  private async post(route: string): Promise<unknown> {
    const res = await fetch(`${this.baseUrl}${route}`, {
      method: 'POST',
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    const body: unknown = await res.json();
    if (!res.ok) {
      const parsed = errorSchema.safeParse(body);
      throw new Error(parsed.success ? parsed.data.error : `Daemon returned HTTP ${res.status}`);
    }
    return body;
  }
}
