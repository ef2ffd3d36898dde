import type { AppConfig, IKlineSource, UpstreamEnv } from '@klinevault/schemas';
import { BinanceRestClient, PaginatedKlineFetcher, type SleepFn } from '@klinevault/binance-client';
import { CsvCandleStore } from '@klinevault/candle-store';
import { validateEnv } from '@klinevault/utils';
import { assertDisplayTimezone } from '../config/config-loader';
import { KlineSyncEngine } from './kline-sync-engine';

export interface CreateEngineOptions {
  /** Upstream page source; defaults to a BinanceRestClient built from env */
  source?: IKlineSource;
  /** Defaults to validateEnv() */
  env?: UpstreamEnv;
  now?: () => number;
  sleep?: SleepFn;
}

/**
 * Wire store, client and fetcher from the application config
 *
 * @throws InvalidConfigurationError for an unknown display timezone
 */
export function createSyncEngine(config: AppConfig, options: CreateEngineOptions = {}): KlineSyncEngine {
  assertDisplayTimezone(config);

  const source =
    options.source ??
    (() => {
      const env = options.env ?? validateEnv();
      return new BinanceRestClient({
        baseUrl: env.BINANCE_BASE_URL,
        klinesPath: env.BINANCE_KLINES_PATH,
        timeoutMs: config.request.timeoutMs,
      });
    })();

  const fetcher = new PaginatedKlineFetcher(
    source,
    { limit: config.request.limit, rateLimitSleepMs: config.request.rateLimitSleepMs },
    options.sleep
  );

  const store = new CsvCandleStore({ ...config.store, timezone: config.timezone });

  return new KlineSyncEngine({ store, fetcher, now: options.now });
}
