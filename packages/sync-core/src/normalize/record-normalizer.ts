import {
  KLINE_FIELD,
  type CandleRecord,
  type Interval,
  type RawKline,
  type RawKlineCell,
} from '@klinevault/schemas';
import { createLogger } from '@klinevault/utils';

const logger = createLogger('sync');

function toNumber(cell: RawKlineCell | undefined): number | null {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }
  if (typeof cell === 'string' && cell.trim() !== '') {
    const value = Number(cell);
    return Number.isFinite(value) ? value : null;
  }
  return null;
}

function toInteger(cell: RawKlineCell | undefined): number | null {
  const value = toNumber(cell);
  return value === null ? null : Math.trunc(value);
}

/**
 * Convert raw kline rows into candle records
 *
 * Numeric cells that cannot be read become null. Rows without a readable open
 * time are dropped, since the open time is part of the record's key. Output
 * order follows the input; no dedupe or sorting happens here.
 */
export function normalizeKlines(
  rows: readonly RawKline[],
  symbol: string,
  interval: Interval
): CandleRecord[] {
  const records: CandleRecord[] = [];
  let skipped = 0;

  for (const row of rows) {
    const timestamp = toInteger(row[KLINE_FIELD.openTime]);
    if (timestamp === null) {
      skipped++;
      continue;
    }

    records.push({
      timestamp,
      symbol,
      interval,
      open: toNumber(row[KLINE_FIELD.open]),
      high: toNumber(row[KLINE_FIELD.high]),
      low: toNumber(row[KLINE_FIELD.low]),
      close: toNumber(row[KLINE_FIELD.close]),
      volume: toNumber(row[KLINE_FIELD.volume]),
      quoteVolume: toNumber(row[KLINE_FIELD.quoteVolume]),
      tradeCount: toInteger(row[KLINE_FIELD.tradeCount]),
      takerBuyBase: toNumber(row[KLINE_FIELD.takerBuyBase]),
      takerBuyQuote: toNumber(row[KLINE_FIELD.takerBuyQuote]),
    });
  }

  if (skipped > 0) {
    logger.warn(
      { event: 'klines_skipped', symbol, interval, skipped },
      `Skipped ${skipped} kline row(s) without a valid open time`
    );
  }
  return records;
}
