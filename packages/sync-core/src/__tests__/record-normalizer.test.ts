import { describe, it, expect } from 'vitest';
import type { RawKline } from '@klinevault/schemas';
import { normalizeKlines } from '../normalize/record-normalizer';

const T = Date.UTC(2024, 0, 1);

describe('normalizeKlines()', () => {
  it('coerces every field of a full row', () => {
    const row: RawKline = [T, '1.5', '2.25', '1', '2', '10.5', T + 59_999, '21', 7, '4', '8.5', '0'];

    expect(normalizeKlines([row], 'BTCUSDT', '1m')).toEqual([
      {
        timestamp: T,
        symbol: 'BTCUSDT',
        interval: '1m',
        open: 1.5,
        high: 2.25,
        low: 1,
        close: 2,
        volume: 10.5,
        quoteVolume: 21,
        tradeCount: 7,
        takerBuyBase: 4,
        takerBuyQuote: 8.5,
      },
    ]);
  });

  it('turns unreadable and missing cells into null', () => {
    const row: RawKline = [T, 'abc', null, '', '2', 'Infinity', T + 59_999];
    const [record] = normalizeKlines([row], 'BTCUSDT', '1m');

    expect(record).toMatchObject({
      open: null,
      high: null,
      low: null,
      close: 2,
      volume: null,
      quoteVolume: null,
      tradeCount: null,
      takerBuyBase: null,
      takerBuyQuote: null,
    });
  });

  it('reads string open times and truncates fractional trade counts', () => {
    const row: RawKline = [String(T), '1', '1', '1', '1', '1', T + 59_999, '1', '12.0', '1', '1'];
    const [record] = normalizeKlines([row], 'BTCUSDT', '1m');

    expect(record?.timestamp).toBe(T);
    expect(record?.tradeCount).toBe(12);
  });

  it('skips rows without a readable open time and keeps input order', () => {
    const rows: RawKline[] = [
      [T + 120_000, '1', '1', '1', '1', '3', 0],
      ['not-a-time', '1', '1', '1', '1', '1', 0],
      [T, '1', '1', '1', '1', '1', 0],
      [T, '1', '1', '1', '1', '2', 0],
    ];

    const records = normalizeKlines(rows, 'BTCUSDT', '1m');

    expect(records.map((r) => [r.timestamp, r.volume])).toEqual([
      [T + 120_000, 3],
      [T, 1],
      [T, 2],
    ]);
  });
});
