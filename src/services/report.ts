import path from 'path';
import type { CatalogStats } from '../rotation/selector.js';
import type { CatalogKind, Item } from '../rotation/types.js';
import type { AdvanceResult } from './rotation-controller.js';

/** Fields shared by a local controller status and one fetched from the daemon. */
export interface StatusView {
  kind: CatalogKind;
  renderer: string;
  scanDir: string;
  rotations: number;
  stats: CatalogStats;
  items: Item[];
  history: Array<{ path: string; selectedAt: Date; outcome: 'ok' | 'render_failed'; error: string | null }>;
}

const MODE_LABELS: Record<CatalogKind, string> = {
  video: 'Video (animated)',
  image: 'Image (static)',
};

export function formatStats(stats: CatalogStats): string {
  return [
    `Wallpapers: ${stats.count}`,
    `Score range: ${stats.minScore.toFixed(2)} ~ ${stats.maxScore.toFixed(2)}`,
    `Average score: ${stats.averageScore.toFixed(2)}`,
    `Total skips: ${stats.totalSkips}`,
  ].join('\n');
}

/** One line per item, highest score first: ` 1. [105.00] (skips:2) b.mp4` */
export function formatItems(items: Item[]): string {
  return [...items]
    .sort((a, b) => b.score - a.score)
    .map((item, i) => {
      const rank = String(i + 1).padStart(2);
      const score = item.score.toFixed(2).padStart(6);
      return `${rank}. [${score}] (skips:${item.skipStreak}) ${path.basename(item.path)}`;
    })
    .join('\n');
}

export function formatStatus(view: StatusView, intervalSeconds: number): string {
  const sections = [
    '=== wallrotor status ===',
    `Mode: ${MODE_LABELS[view.kind]}`,
    `Renderer: ${view.renderer}`,
    `Directory: ${view.scanDir}`,
    `Interval: ${intervalSeconds}s`,
    `Rotations: ${view.rotations}`,
    '',
    formatStats(view.stats),
    '',
    '--- Wallpapers ---',
    formatItems(view.items),
  ];

  if (view.history.length > 0) {
    sections.push('', '--- Recent rotations ---');
    for (const entry of view.history) {
      const suffix = entry.outcome === 'ok' ? '' : ` (failed: ${entry.error ?? 'unknown error'})`;
      sections.push(`${entry.selectedAt.toISOString()} ${path.basename(entry.path)}${suffix}`);
    }
  }

  return sections.join('\n');
}

/** One-line outcome of a rotation, for the CLI. */
export function formatAdvance(result: AdvanceResult): string {
  switch (result.status) {
    case 'empty':
      return 'No wallpapers found; nothing to rotate';
    case 'ok':
      return `Switched to ${result.item.path}`;
    case 'render-failed':
      return `Failed to display ${result.item.path}: ${result.error}`;
  }
}
