import { z } from 'zod';
import type { Interval } from '../market/candle.schema';
import type { WindowInput } from '../window/window.schema';

/**
 * Operation kinds that can be defined in an operations file
 */
export const OperationTypeSchema = z.enum(['fetch', 'volume_stats', 'generate_sliced_csv']);
export type OperationType = z.infer<typeof OperationTypeSchema>;

/**
 * Fields an operation may set or inherit from `defaults`
 */
export const OperationFieldsSchema = z.object({
  symbol: z.string().nullish(),
  interval: z.string().nullish(),
  lookback: z.string().nullish(),
  start_time: z.string().nullish(),
  end_time: z.string().nullish(),
  time_input_timezone: z.string().nullish(),
  slice_output_path: z.string().nullish(),
});

export const OperationEntrySchema = OperationFieldsSchema.extend({
  name: z.string().nullish(),
  type: z.string().nullish(),
});

/**
 * Operations file shape, e.g.
 *
 * ```json
 * {
 *   "defaults": { "symbol": "BTCUSDT", "interval": "1h" },
 *   "operations": [{ "name": "weekly-volume", "type": "volume_stats", "lookback": "7d" }]
 * }
 * ```
 */
export const OperationsFileSchema = z.object({
  defaults: OperationFieldsSchema.nullish(),
  operations: z.array(OperationEntrySchema).nullish(),
});

export type OperationFields = z.infer<typeof OperationFieldsSchema>;
export type OperationEntry = z.infer<typeof OperationEntrySchema>;
export type OperationsFile = z.infer<typeof OperationsFileSchema>;

/**
 * Fully resolved operation definition (defaults applied, validated)
 */
export interface OperationSpec {
  name: string;
  type: OperationType;
  symbol: string;
  interval: Interval;
  window: WindowInput;
  sliceOutputPath?: string;
}
