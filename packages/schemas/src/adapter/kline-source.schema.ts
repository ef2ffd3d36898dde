import type { Interval } from '../market/candle.schema';
import type { RawKline } from '../market/kline.schema';

/**
 * Parameters of a single klines page request
 */
export interface KlinePageRequest {
  symbol: string;
  interval: Interval;
  /** Maximum rows to return */
  limit: number;
  /** Cursor, Unix ms */
  startTime: number;
  /** Optional inclusive upper bound, Unix ms */
  endTime?: number;
}

/**
 * Anything that can serve one page of raw klines.
 * Implemented by BinanceRestClient; tests provide in-process fakes.
 */
export interface IKlineSource {
  getKlinePage(request: KlinePageRequest): Promise<RawKline[]>;
}
