import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { CandleRecord, CoverageRange, StoreConfig, TimeWindow } from '@klinevault/schemas';
import {
  CorruptLocalStoreError,
  LocalStoreIoError,
  createLogger,
  type KlineSyncErrorContext,
} from '@klinevault/utils';
import { decodeCandles, encodeCandles } from '../csv/csv-codec';
import { coverageOf, estimateMissing, mergeRecords } from './records';

const logger = createLogger('store:csv');

export interface CsvCandleStoreOptions extends StoreConfig {
  /** Display zone of the timestamp column (null = UTC) */
  timezone: string | null;
}

/** Error context a caller adds to store failures */
export type StoreErrorScope = Pick<KlineSyncErrorContext, 'symbol' | 'interval' | 'window'>;

/**
 * Substitute {symbol} and {interval} in a path template
 */
export function resolveStorePath(template: string, symbol: string, interval: string): string {
  return template.replace(/\{symbol\}/g, symbol).replace(/\{interval\}/g, interval);
}

/**
 * Default slice target: '<stem>_sliced<ext>' next to the store file
 */
export function defaultSlicePath(storePath: string): string {
  const { dir, name, ext } = path.parse(storePath);
  return path.format({ dir, name: `${name}_sliced`, ext });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Whole-file CSV store, one file per (symbol, interval)
 *
 * Files are always rewritten in full through a temp file and a rename, so a
 * crash mid-write leaves the previous file in place. There is no locking:
 * concurrent writers to the same file race and the last rename wins.
 */
export class CsvCandleStore {
  private readonly options: CsvCandleStoreOptions;

  constructor(options: CsvCandleStoreOptions) {
    this.options = options;
  }

  get append(): boolean {
    return this.options.append;
  }

  pathFor(symbol: string, interval: string): string {
    return resolveStorePath(this.options.pathTemplate, symbol, interval);
  }

  /**
   * Read every record of a store
   *
   * A missing file is an empty store. Unparseable content raises
   * CorruptLocalStoreError unless `onCorrupt` is 'empty'. Any other read
   * failure raises LocalStoreIoError.
   */
  async load(symbol: string, interval: string, window?: TimeWindow): Promise<CandleRecord[]> {
    const filePath = this.pathFor(symbol, interval);

    let text: string;
    try {
      text = await readFile(filePath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) {
        logger.debug({ event: 'store_missing', symbol, interval, path: filePath }, 'No store yet');
        return [];
      }
      throw new LocalStoreIoError(`Store ${filePath} could not be read: ${errorMessage(err)}`, {
        symbol,
        interval,
        ...(window ? { window } : {}),
        target: filePath,
        cause: err,
      });
    }

    try {
      const records = decodeCandles(text, this.options.timezone);
      logger.debug(
        { event: 'store_loaded', symbol, interval, path: filePath, rows: records.length },
        `Loaded ${records.length} rows from ${filePath}`
      );
      return records;
    } catch (err) {
      const reason = errorMessage(err);
      if (this.options.onCorrupt === 'empty') {
        logger.warn(
          { event: 'store_corrupt_ignored', symbol, interval, path: filePath, reason },
          'Store could not be parsed, treating it as empty'
        );
        return [];
      }
      throw new CorruptLocalStoreError(`Store ${filePath} could not be parsed: ${reason}`, {
        symbol,
        interval,
        ...(window ? { window } : {}),
        target: filePath,
        cause: err,
      });
    }
  }

  merge(existing: readonly CandleRecord[], incoming: readonly CandleRecord[]): CandleRecord[] {
    return mergeRecords(existing, incoming);
  }

  coverage(records: readonly CandleRecord[]): CoverageRange | null {
    return coverageOf(records);
  }

  estimateMissing(records: readonly CandleRecord[], interval: string): number | null {
    return estimateMissing(records, interval);
  }

  /**
   * Overwrite the store with the given records
   *
   * @returns Path written
   */
  async persist(
    records: readonly CandleRecord[],
    symbol: string,
    interval: string,
    window?: TimeWindow
  ): Promise<string> {
    const filePath = this.pathFor(symbol, interval);
    await this.writeAtomic(filePath, records, { symbol, interval, ...(window ? { window } : {}) });
    logger.info(
      { event: 'store_persisted', symbol, interval, path: filePath, rows: records.length },
      `Saved ${records.length} rows to ${filePath}`
    );
    return filePath;
  }

  /**
   * Overwrite a secondary CSV target with a subset of records
   */
  async writeSlice(
    records: readonly CandleRecord[],
    target: string,
    scope: StoreErrorScope = {}
  ): Promise<string> {
    await this.writeAtomic(target, records, scope);
    logger.info(
      { event: 'slice_written', symbol: scope.symbol, interval: scope.interval, path: target, rows: records.length },
      `Saved ${records.length} rows to ${target}`
    );
    return target;
  }

  private async writeAtomic(
    filePath: string,
    records: readonly CandleRecord[],
    scope: StoreErrorScope
  ): Promise<void> {
    const dir = path.dirname(filePath);
    const tmpPath = path.join(
      dir,
      `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`
    );
    const content = encodeCandles(records, this.options.timezone);

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmpPath, content, 'utf8');
      await rename(tmpPath, filePath);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        logger.warn(
          { event: 'store_tmp_cleanup_failed', path: tmpPath, reason: errorMessage(cleanupErr) },
          'Could not remove temp file'
        );
      });
      logger.error(
        { event: 'store_write_failed', ...scope, path: filePath, reason: errorMessage(err) },
        `Could not write ${filePath}`
      );
      throw new LocalStoreIoError(`Store ${filePath} could not be written: ${errorMessage(err)}`, {
        ...scope,
        target: filePath,
        cause: err,
      });
    }
  }
}
