import type { SliceSummary, StatsSummary, SyncSummary } from '@klinevault/sync-core';
import { formatInstant, type KlineSyncError } from '@klinevault/utils';

export function formatSync(summary: SyncSummary): string {
  const missing = summary.missing === null ? 'n/a' : summary.missing.toString();
  const verb = summary.persisted ? 'Saved' : 'Would save';
  return `${verb} ${summary.rows} rows to ${summary.path} (fetched=${summary.fetched}, gaps=${summary.gaps.length}, missing=${missing})`;
}

/**
 * Two lines: the window, then rows / average / p95 with six decimals
 */
export function formatStats(
  summary: StatsSummary,
  timeZone: string | null
): [string, string] | null {
  const { stats } = summary;
  if (!stats) {
    return null;
  }
  const start = formatInstant(stats.window.start, timeZone);
  const end = formatInstant(stats.window.end, timeZone);
  return [
    `${stats.symbol} ${stats.interval} ${start} -> ${end}`,
    `rows=${stats.rows}, avg_volume=${stats.avgVolume.toFixed(6)}, p95_volume=${stats.p95Volume.toFixed(6)}`,
  ];
}

export function formatSlice(summary: SliceSummary): string {
  const verb = summary.sync.persisted ? 'Saved' : 'Would save';
  return `${verb} ${summary.rows} rows to ${summary.path}`;
}

export function formatError(error: KlineSyncError): string {
  return `Error [${error.code}]: ${error.message}`;
}
