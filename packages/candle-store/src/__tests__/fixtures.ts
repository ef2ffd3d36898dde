import type { CandleRecord } from '@klinevault/schemas';

export const HOUR = 60 * 60 * 1000;
export const JAN_1 = Date.UTC(2024, 0, 1);

export function candle(timestamp: number, overrides: Partial<CandleRecord> = {}): CandleRecord {
  return {
    timestamp,
    symbol: 'BTCUSDT',
    interval: '1h',
    open: 100,
    high: 110,
    low: 95,
    close: 105,
    volume: 10,
    quoteVolume: 1000,
    tradeCount: 42,
    takerBuyBase: 5,
    takerBuyQuote: 500,
    ...overrides,
  };
}

export function hourly(count: number, from = JAN_1): CandleRecord[] {
  return Array.from({ length: count }, (_, i) => candle(from + i * HOUR));
}
