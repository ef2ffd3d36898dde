import { describe, it, expect } from 'vitest';
import { candleKey } from '@klinevault/schemas';
import { coverageOf, estimateMissing, filterWindow, mergeRecords } from '../store/records';
import { candle, hourly, HOUR, JAN_1 } from './fixtures';

describe('mergeRecords()', () => {
  it('dedupes by natural key with incoming winning', () => {
    const existing = [candle(JAN_1, { volume: 1 }), candle(JAN_1 + HOUR, { volume: 1 })];
    const incoming = [candle(JAN_1 + HOUR, { volume: 2 }), candle(JAN_1 + 2 * HOUR, { volume: 2 })];

    const merged = mergeRecords(existing, incoming);

    expect(merged.map((r) => [r.timestamp, r.volume])).toEqual([
      [JAN_1, 1],
      [JAN_1 + HOUR, 2],
      [JAN_1 + 2 * HOUR, 2],
    ]);
  });

  it('is idempotent', () => {
    const existing = hourly(5);
    const incoming = hourly(5, JAN_1 + 3 * HOUR);
    const once = mergeRecords(existing, incoming);
    expect(mergeRecords(once, incoming)).toEqual(once);
  });

  it('yields sorted output with unique keys from unsorted input', () => {
    const incoming = [JAN_1 + 2 * HOUR, JAN_1, JAN_1 + HOUR, JAN_1].map((t) => candle(t));
    const merged = mergeRecords([], incoming);

    expect(merged.map((r) => r.timestamp)).toEqual([JAN_1, JAN_1 + HOUR, JAN_1 + 2 * HOUR]);
    expect(new Set(merged.map(candleKey)).size).toBe(merged.length);
  });

  it('keeps records that share a timestamp but differ in symbol', () => {
    const merged = mergeRecords([candle(JAN_1, { symbol: 'ETHUSDT' })], [candle(JAN_1)]);
    expect(merged.map((r) => r.symbol)).toEqual(['ETHUSDT', 'BTCUSDT']);
  });
});

describe('coverageOf()', () => {
  it('returns min and max timestamps', () => {
    expect(coverageOf([candle(JAN_1 + HOUR), candle(JAN_1)])).toEqual({
      min: JAN_1,
      max: JAN_1 + HOUR,
    });
  });

  it('returns null for an empty store', () => {
    expect(coverageOf([])).toBeNull();
  });
});

describe('estimateMissing()', () => {
  it('is 0 for a contiguous series', () => {
    expect(estimateMissing(hourly(24), '1h')).toBe(0);
  });

  it('counts interior holes', () => {
    const records = hourly(24).filter((_, i) => i !== 5 && i !== 10);
    expect(estimateMissing(records, '1h')).toBe(2);
  });

  it('is 0 for an empty store', () => {
    expect(estimateMissing([], '1h')).toBe(0);
  });

  it('never goes below 0', () => {
    // 1h candles checked against a 1d step: floor(23h / 24h) + 1 - 24
    expect(estimateMissing(hourly(24), '1d')).toBe(0);
  });

  it('is null for intervals without a fixed length', () => {
    expect(estimateMissing(hourly(3), '1M')).toBeNull();
  });
});

describe('filterWindow()', () => {
  it('keeps records inside the inclusive window', () => {
    const kept = filterWindow(hourly(5), JAN_1 + HOUR, JAN_1 + 3 * HOUR);
    expect(kept.map((r) => r.timestamp)).toEqual([JAN_1 + HOUR, JAN_1 + 2 * HOUR, JAN_1 + 3 * HOUR]);
  });
});
