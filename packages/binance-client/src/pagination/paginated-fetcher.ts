import {
  KLINE_FIELD,
  type IKlineSource,
  type Interval,
  type RawKline,
} from '@klinevault/schemas';
import { createLogger, UpstreamFetchFailedError } from '@klinevault/utils';

const logger = createLogger('binance');

export interface PaginationConfig {
  /** Rows per page (1..1000) */
  limit: number;
  /** Delay between consecutive pages in ms */
  rateLimitSleepMs: number;
}

/**
 * Range to fetch; without `end` paging continues until the upstream runs dry
 */
export interface FetchRange {
  start: number;
  end?: number;
}

export type SleepFn = (ms: number) => Promise<void>;

const defaultSleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function closeTimeOf(row: RawKline): number | null {
  const cell = row[KLINE_FIELD.closeTime];
  const value = typeof cell === 'string' ? Number(cell) : cell;
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Walks the klines endpoint page by page with a close-time cursor
 *
 * Stops on an empty page, on a page shorter than the limit, or once the last
 * close time reaches the requested end. Pages are requested strictly one after
 * another with an awaited delay in between. Any page failure fails the whole
 * fetch; nothing is retried.
 */
export class PaginatedKlineFetcher {
  private readonly source: IKlineSource;
  private readonly config: PaginationConfig;
  private readonly sleep: SleepFn;

  constructor(source: IKlineSource, config: PaginationConfig, sleep: SleepFn = defaultSleep) {
    this.source = source;
    this.config = config;
    this.sleep = sleep;
  }

  async fetchRange(symbol: string, interval: Interval, range: FetchRange): Promise<RawKline[]> {
    const rows: RawKline[] = [];
    let cursor = range.start;
    let pages = 0;

    for (;;) {
      const page = await this.source.getKlinePage({
        symbol,
        interval,
        limit: this.config.limit,
        startTime: cursor,
        ...(range.end !== undefined && { endTime: range.end }),
      });
      pages++;

      if (page.length === 0) {
        break;
      }
      rows.push(...page);

      const last = page[page.length - 1];
      const lastClose = last ? closeTimeOf(last) : null;
      if (lastClose === null) {
        throw new UpstreamFetchFailedError('Kline row without a usable close time', {
          symbol,
          interval,
          retryable: false,
        });
      }

      if (range.end !== undefined && lastClose >= range.end) {
        break;
      }
      if (page.length < this.config.limit) {
        break;
      }

      const next = lastClose + 1;
      if (next <= cursor) {
        throw new UpstreamFetchFailedError('Kline cursor did not advance', {
          symbol,
          interval,
          retryable: false,
        });
      }
      cursor = next;

      logger.debug(
        { event: 'page_fetched', symbol, interval, page: pages, rows: rows.length, cursor },
        `Fetched page ${pages} for ${symbol} ${interval}`
      );

      await this.sleep(this.config.rateLimitSleepMs);
    }

    logger.info(
      { event: 'fetch_complete', symbol, interval, pages, rows: rows.length },
      `Fetched ${rows.length} klines for ${symbol} ${interval} in ${pages} page(s)`
    );
    return rows;
  }
}
