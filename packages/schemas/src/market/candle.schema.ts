import { z } from 'zod';

/**
 * Interval enum - kline intervals accepted by the upstream klines endpoint
 *
 * Fixed-length intervals (minutes through weeks) can be converted to a
 * duration. '1M' (calendar month) cannot, so anything that needs a step
 * size (missing-row estimates) treats it as unknown.
 */
export const IntervalSchema = z.enum([
  '1s',
  '1m',
  '3m',
  '5m',
  '15m',
  '30m',
  '1h',
  '2h',
  '4h',
  '6h',
  '8h',
  '12h',
  '1d',
  '3d',
  '1w',
  '1M',
]);
export type Interval = z.infer<typeof IntervalSchema>;

/** Numeric candle field: null when the upstream value could not be coerced */
const NullableNumber = z.number().finite().nullable();

/**
 * Canonical candle record held in a store
 *
 * Natural key is (timestamp, symbol, interval).
 */
export const CandleRecordSchema = z.object({
  /** Open time as an absolute instant (Unix ms) */
  timestamp: z.number().int(),
  /** Trading pair symbol (e.g., 'BTCUSDT') */
  symbol: z.string().min(1),
  /** Kline interval */
  interval: IntervalSchema,
  open: NullableNumber,
  high: NullableNumber,
  low: NullableNumber,
  close: NullableNumber,
  /** Base asset volume */
  volume: NullableNumber,
  /** Quote asset volume */
  quoteVolume: NullableNumber,
  /** Number of trades in the bucket */
  tradeCount: z.number().int().nullable(),
  takerBuyBase: NullableNumber,
  takerBuyQuote: NullableNumber,
});

export type CandleRecord = z.infer<typeof CandleRecordSchema>;

/**
 * Key used for deduplication
 */
export function candleKey(record: Pick<CandleRecord, 'timestamp' | 'symbol' | 'interval'>): string {
  return `${record.timestamp}:${record.symbol}:${record.interval}`;
}
