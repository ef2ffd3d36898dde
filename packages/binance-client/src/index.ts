/**
 * Binance klines client exports
 */

export {
  BinanceRestClient,
  DEFAULT_BINANCE_BASE_URL,
  DEFAULT_KLINES_PATH,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type BinanceRestClientOptions,
} from './rest/client';
export {
  PaginatedKlineFetcher,
  type FetchRange,
  type PaginationConfig,
  type SleepFn,
} from './pagination/paginated-fetcher';
