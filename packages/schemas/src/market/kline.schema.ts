import { z } from 'zod';

/**
 * Raw kline cell as returned by the upstream API.
 * Prices and volumes arrive as decimal strings, times and trade counts as numbers.
 */
export const RawKlineCellSchema = z.union([z.number(), z.string(), z.null()]);

/**
 * Raw kline row
 *
 * [0] open time (ms), [1] open, [2] high, [3] low, [4] close, [5] volume,
 * [6] close time (ms), [7] quote volume, [8] trade count,
 * [9] taker buy base volume, [10] taker buy quote volume, [11] unused
 *
 * Only the first seven cells are required to page through results; the
 * normalizer treats any missing trailing cell as null.
 */
export const RawKlineSchema = z.array(RawKlineCellSchema).min(7);

export const RawKlinePageSchema = z.array(RawKlineSchema);

export type RawKlineCell = z.infer<typeof RawKlineCellSchema>;
export type RawKline = z.infer<typeof RawKlineSchema>;

/** Column positions within a raw kline row */
export const KLINE_FIELD = {
  openTime: 0,
  open: 1,
  high: 2,
  low: 3,
  close: 4,
  volume: 5,
  closeTime: 6,
  quoteVolume: 7,
  tradeCount: 8,
  takerBuyBase: 9,
  takerBuyQuote: 10,
} as const;
