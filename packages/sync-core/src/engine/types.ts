import type { GapRange, Interval, RawKline, TimeWindow } from '@klinevault/schemas';
import type { FetchRange } from '@klinevault/binance-client';
import type { VolumeStats } from '../stats/stats-aggregator';

/**
 * Source of raw klines for a whole range (PaginatedKlineFetcher in production)
 */
export interface KlineRangeFetcher {
  fetchRange(symbol: string, interval: Interval, range: FetchRange): Promise<RawKline[]>;
}

export interface SyncOptions {
  /** Fetch and normalize, but write nothing */
  dryRun?: boolean;
  /** Lookback used when the window input has none */
  defaultLookback?: string;
}

export interface SyncSummary {
  symbol: string;
  interval: Interval;
  window: TimeWindow;
  /** Rows in the store after the merge */
  rows: number;
  /** Estimated candles missing between first and last row (null for '1M') */
  missing: number | null;
  /** Records fetched from the upstream across all gaps */
  fetched: number;
  gaps: GapRange[];
  /** Store file (not written on a dry run) */
  path: string;
  persisted: boolean;
}

export interface StatsSummary {
  sync: SyncSummary;
  /** null when the window holds no usable volume */
  stats: VolumeStats | null;
}

export interface SliceSummary {
  sync: SyncSummary;
  /** Slice file (not written on a dry run) */
  path: string;
  rows: number;
}
