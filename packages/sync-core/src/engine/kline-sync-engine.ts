import {
  IntervalSchema,
  type CandleRecord,
  type Interval,
  type WindowInput,
} from '@klinevault/schemas';
import { CsvCandleStore, defaultSlicePath, filterWindow } from '@klinevault/candle-store';
import {
  InvalidConfigurationError,
  createLogger,
  fail,
  isKlineSyncError,
  ok,
  type OperationResult,
} from '@klinevault/utils';
import { detectGaps } from '../gaps/gap-detector';
import { normalizeKlines } from '../normalize/record-normalizer';
import { aggregateVolumeStats } from '../stats/stats-aggregator';
import { resolveWindow } from '../window/window-resolver';
import type {
  KlineRangeFetcher,
  SliceSummary,
  StatsSummary,
  SyncOptions,
  SyncSummary,
} from './types';

const logger = createLogger('sync');
const gapLogger = createLogger('sync:gaps');

export interface KlineSyncEngineDeps {
  store: CsvCandleStore;
  fetcher: KlineRangeFetcher;
  /** Clock for open-ended windows (default: Date.now) */
  now?: () => number;
}

interface SyncOutcome {
  records: CandleRecord[];
  summary: SyncSummary;
}

/**
 * Incremental candle sync for one store per (symbol, interval)
 *
 * Every operation runs the same pipeline: resolve the window, load the store,
 * fetch only the uncovered edges, merge and persist once. Fetch failures
 * abort before anything is written. Expected failures come back as
 * `{ ok: false, error }`; anything else is a bug and is rethrown.
 */
export class KlineSyncEngine {
  private readonly store: CsvCandleStore;
  private readonly fetcher: KlineRangeFetcher;
  private readonly now: () => number;

  constructor(deps: KlineSyncEngineDeps) {
    this.store = deps.store;
    this.fetcher = deps.fetcher;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Bring the store up to date for a window
   */
  async sync(
    symbol: string,
    interval: string,
    window: WindowInput,
    options: SyncOptions = {}
  ): Promise<OperationResult<SyncSummary>> {
    return this.guard('sync', symbol, interval, async () => {
      const outcome = await this.run(symbol, interval, window, options);
      return outcome.summary;
    });
  }

  /**
   * Sync, then compute volume statistics over the window
   */
  async stats(
    symbol: string,
    interval: string,
    window: WindowInput,
    options: SyncOptions = {}
  ): Promise<OperationResult<StatsSummary>> {
    return this.guard('stats', symbol, interval, async () => {
      const { records, summary } = await this.run(symbol, interval, window, options);
      const stats = aggregateVolumeStats(records, summary.symbol, summary.interval, summary.window);

      if (stats) {
        logger.info(
          {
            event: 'volume_stats',
            symbol: stats.symbol,
            interval: stats.interval,
            rows: stats.rows,
            avgVolume: stats.avgVolume,
            p95Volume: stats.p95Volume,
          },
          'Volume stats'
        );
      } else {
        logger.warn(
          { event: 'volume_stats_empty', symbol: summary.symbol, interval: summary.interval },
          'No volume data available for requested window'
        );
      }
      return { sync: summary, stats };
    });
  }

  /**
   * Sync, then write the window's records to a separate CSV
   *
   * @param outputTarget - Defaults to '<stem>_sliced<ext>' beside the store file
   */
  async slice(
    symbol: string,
    interval: string,
    window: WindowInput,
    outputTarget?: string,
    options: SyncOptions = {}
  ): Promise<OperationResult<SliceSummary>> {
    return this.guard('slice', symbol, interval, async () => {
      const { records, summary } = await this.run(symbol, interval, window, options);
      const sliced = filterWindow(records, summary.window.start, summary.window.end);
      const target = outputTarget?.trim() ? outputTarget : defaultSlicePath(summary.path);

      if (!options.dryRun) {
        await this.store.writeSlice(sliced, target, {
          symbol: summary.symbol,
          interval: summary.interval,
          window: summary.window,
        });
      }
      return { sync: summary, path: target, rows: sliced.length };
    });
  }

  private async guard<T>(
    operation: string,
    symbol: string,
    interval: string,
    body: () => Promise<T>
  ): Promise<OperationResult<T>> {
    try {
      return ok(await body());
    } catch (err) {
      if (isKlineSyncError(err)) {
        logger.error(
          { event: 'operation_failed', operation, symbol, interval, error: err.toJSON() },
          `${operation} failed: ${err.message}`
        );
        return fail(err);
      }
      throw err;
    }
  }

  private async run(
    symbolInput: string,
    intervalInput: string,
    windowInput: WindowInput,
    options: SyncOptions
  ): Promise<SyncOutcome> {
    const symbol = symbolInput.trim();
    if (!symbol) {
      throw new InvalidConfigurationError('Symbol is required');
    }
    const interval = this.parseInterval(intervalInput, symbol);
    const window = resolveWindow(windowInput, {
      now: this.now(),
      defaultLookback: options.defaultLookback,
    });

    logger.info(
      {
        event: 'sync_start',
        symbol,
        interval,
        start: new Date(window.start).toISOString(),
        end: new Date(window.end).toISOString(),
        dryRun: options.dryRun ?? false,
      },
      `Syncing ${symbol} ${interval}`
    );

    // append=false replaces the store with just this window's candles
    const existing = this.store.append ? await this.store.load(symbol, interval, window) : [];
    const coverage = this.store.coverage(existing);
    const gaps = detectGaps(window, coverage);

    if (gaps.length === 0) {
      gapLogger.info(
        { event: 'coverage_hit', symbol, interval, rows: existing.length },
        'Using existing coverage; skipping API fetch'
      );
    } else {
      gapLogger.info(
        { event: 'gaps_detected', symbol, interval, gaps, coverage },
        `Fetching ${gaps.length} gap(s) for ${symbol} ${interval}`
      );
    }

    const fetched: CandleRecord[] = [];
    for (const gap of gaps) {
      const rows = await this.fetcher.fetchRange(symbol, interval, { start: gap.start, end: gap.end });
      const records = normalizeKlines(rows, symbol, interval);
      gapLogger.debug(
        { event: 'gap_fetched', symbol, interval, kind: gap.kind, rows: records.length },
        `Fetched ${records.length} rows for ${gap.kind} gap`
      );
      fetched.push(...records);
    }

    const merged = this.store.merge(existing, fetched);
    const missing = this.store.estimateMissing(merged, interval);

    const path = options.dryRun
      ? this.store.pathFor(symbol, interval)
      : await this.store.persist(merged, symbol, interval, window);

    const summary: SyncSummary = {
      symbol,
      interval,
      window,
      rows: merged.length,
      missing,
      fetched: fetched.length,
      gaps,
      path,
      persisted: !options.dryRun,
    };

    logger.info(
      { event: 'sync_complete', symbol, interval, rows: summary.rows, missing, fetched: summary.fetched, path },
      `Synced ${symbol} ${interval}: ${summary.rows} rows (${summary.fetched} fetched)`
    );
    return { records: merged, summary };
  }

  private parseInterval(value: string, symbol: string): Interval {
    const parsed = IntervalSchema.safeParse(value.trim());
    if (!parsed.success) {
      throw new InvalidConfigurationError(`Unsupported interval '${value}'`, { symbol });
    }
    return parsed.data;
  }
}
