import { candleKey, type CandleRecord, type CoverageRange } from '@klinevault/schemas';
import { intervalToMs } from '@klinevault/utils';

/**
 * Merge incoming records into existing ones
 *
 * Duplicates by (timestamp, symbol, interval) keep the incoming record.
 * The result is sorted ascending by timestamp; the sort is stable, so records
 * sharing a timestamp (different symbol/interval) keep their relative order.
 */
export function mergeRecords(
  existing: readonly CandleRecord[],
  incoming: readonly CandleRecord[]
): CandleRecord[] {
  const byKey = new Map<string, CandleRecord>();
  for (const record of existing) {
    byKey.set(candleKey(record), record);
  }
  for (const record of incoming) {
    byKey.set(candleKey(record), record);
  }
  return [...byKey.values()].sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * [min, max] of stored timestamps, or null for an empty store
 */
export function coverageOf(records: readonly CandleRecord[]): CoverageRange | null {
  if (records.length === 0) {
    return null;
  }
  let min = Infinity;
  let max = -Infinity;
  for (const { timestamp } of records) {
    if (timestamp < min) min = timestamp;
    if (timestamp > max) max = timestamp;
  }
  return { min, max };
}

/**
 * Rough count of candles missing between the first and last stored record
 *
 * floor((last - first) / step) + 1 - n, never below 0. Informational only:
 * duplicates or misaligned timestamps skew it.
 *
 * @returns 0 for an empty store, null when the interval has no fixed length
 */
export function estimateMissing(records: readonly CandleRecord[], interval: string): number | null {
  const step = intervalToMs(interval);
  if (step === null) {
    return null;
  }
  const coverage = coverageOf(records);
  if (!coverage) {
    return 0;
  }
  const expected = Math.floor((coverage.max - coverage.min) / step) + 1;
  return Math.max(0, expected - records.length);
}

/**
 * Records whose timestamp lies in [start, end]
 */
export function filterWindow(
  records: readonly CandleRecord[],
  start: number,
  end: number
): CandleRecord[] {
  return records.filter((r) => r.timestamp >= start && r.timestamp <= end);
}
