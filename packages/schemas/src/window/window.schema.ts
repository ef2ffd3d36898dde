import { z } from 'zod';

/**
 * Concrete time window, both bounds as Unix ms (UTC instants)
 */
export const TimeWindowSchema = z
  .object({
    start: z.number().int(),
    end: z.number().int(),
  })
  .refine((w) => w.start <= w.end, { message: 'start must not be after end' });

export type TimeWindow = z.infer<typeof TimeWindowSchema>;

/**
 * Caller-facing window request. Every field is optional; the resolver decides
 * which combinations are valid.
 */
export const WindowInputSchema = z.object({
  /** ISO-8601 start (e.g., '2024-05-01T00:00:00Z' or '2024-05-01 09:30') */
  start: z.string().optional(),
  /** ISO-8601 end */
  end: z.string().optional(),
  /** Relative duration such as '30m', '12h', '7d' */
  lookback: z.string().optional(),
  /** IANA zone used to interpret start/end (overrides embedded offsets) */
  inputTimezone: z.string().optional(),
});

export type WindowInput = z.infer<typeof WindowInputSchema>;

/**
 * [min, max] of the timestamps already stored for one (symbol, interval)
 */
export interface CoverageRange {
  min: number;
  max: number;
}

/**
 * Sub-range of a requested window that must be fetched
 *
 * - full: nothing usable is stored, fetch [start, end]
 * - leading: [start, min) before the earliest stored candle
 * - trailing: (max, end] after the latest stored candle
 *
 * start/end carry the boundary instants themselves; the open side of a
 * leading/trailing range overlaps one stored candle, which merge dedupes.
 */
export interface GapRange extends TimeWindow {
  kind: 'full' | 'leading' | 'trailing';
}
