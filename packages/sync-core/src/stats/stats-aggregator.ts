import type { CandleRecord, TimeWindow } from '@klinevault/schemas';
import { mean, quantile } from '@klinevault/utils';

export interface VolumeStats {
  symbol: string;
  interval: string;
  window: TimeWindow;
  /** Candles in the window with a usable volume */
  rows: number;
  avgVolume: number;
  p95Volume: number;
}

/**
 * Volume statistics over [window.start, window.end]
 *
 * @returns null when no candle in the window has a finite volume
 */
export function aggregateVolumeStats(
  records: readonly CandleRecord[],
  symbol: string,
  interval: string,
  window: TimeWindow
): VolumeStats | null {
  const volumes: number[] = [];
  for (const record of records) {
    if (record.timestamp < window.start || record.timestamp > window.end) continue;
    if (record.volume !== null && Number.isFinite(record.volume)) {
      volumes.push(record.volume);
    }
  }

  if (volumes.length === 0) {
    return null;
  }

  return {
    symbol,
    interval,
    window,
    rows: volumes.length,
    avgVolume: mean(volumes),
    p95Volume: quantile(volumes, 0.95),
  };
}
