import {
  IntervalSchema,
  OperationTypeSchema,
  OperationsFileSchema,
  type OperationFields,
  type OperationSpec,
  type WindowInput,
} from '@klinevault/schemas';
import {
  InvalidOperationError,
  createLogger,
  fail,
  ok,
  type OperationResult,
} from '@klinevault/utils';
import { readJsonFile } from '../config/config-loader';
import type { KlineSyncEngine } from '../engine/kline-sync-engine';
import type { SliceSummary, StatsSummary, SyncOptions, SyncSummary } from '../engine/types';

const logger = createLogger('sync:operations');

export type OperationOutcome =
  | { name: string; type: 'fetch'; sync: SyncSummary }
  | { name: string; type: 'volume_stats'; result: StatsSummary }
  | { name: string; type: 'generate_sliced_csv'; slice: SliceSummary };

function pick(value: string | null | undefined): string | undefined {
  return value ?? undefined;
}

/**
 * Validate an operations file and resolve defaults
 *
 * Every entry is checked before anything runs: a missing name, symbol or
 * interval, an unknown type or interval, or a repeated name fails the whole file.
 *
 * @throws InvalidOperationError
 */
export function parseOperations(input: unknown): OperationSpec[] {
  const parsed = OperationsFileSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidOperationError(`Invalid operations file: ${details}`, { cause: parsed.error });
  }

  const defaults: OperationFields = parsed.data.defaults ?? {};
  const specs: OperationSpec[] = [];
  const seen = new Set<string>();

  (parsed.data.operations ?? []).forEach((item, index) => {
    const field = (key: keyof OperationFields): string | undefined =>
      pick(item[key]) ?? pick(defaults[key]);

    const name = item.name?.trim();
    if (!name) {
      throw new InvalidOperationError(`Operation #${index + 1} missing name`);
    }
    if (seen.has(name)) {
      throw new InvalidOperationError(`Duplicate operation name '${name}'`);
    }
    seen.add(name);

    const type = OperationTypeSchema.safeParse(item.type);
    if (!type.success) {
      throw new InvalidOperationError(
        `Operation '${name}' has unsupported type '${item.type ?? ''}'`
      );
    }

    const symbol = field('symbol');
    if (!symbol) {
      throw new InvalidOperationError(`Operation '${name}' missing symbol (and no default provided)`);
    }
    const intervalText = field('interval');
    if (!intervalText) {
      throw new InvalidOperationError(
        `Operation '${name}' missing interval (and no default provided)`
      );
    }
    const interval = IntervalSchema.safeParse(intervalText);
    if (!interval.success) {
      throw new InvalidOperationError(`Operation '${name}' has unsupported interval '${intervalText}'`);
    }

    const window: WindowInput = {};
    const start = field('start_time');
    const end = field('end_time');
    const lookback = field('lookback');
    const inputTimezone = field('time_input_timezone');
    if (start) window.start = start;
    if (end) window.end = end;
    if (lookback) window.lookback = lookback;
    if (inputTimezone) window.inputTimezone = inputTimezone;

    const sliceOutputPath = field('slice_output_path');
    specs.push({
      name,
      type: type.data,
      symbol,
      interval: interval.data,
      window,
      ...(sliceOutputPath ? { sliceOutputPath } : {}),
    });
  });

  return specs;
}

/**
 * Read and validate a JSON operations file
 */
export async function loadOperations(filePath: string): Promise<OperationSpec[]> {
  const raw = await readJsonFile(
    filePath,
    (message, cause) => new InvalidOperationError(message, { target: filePath, cause })
  );
  return parseOperations(raw);
}

/**
 * Runs named operations against an engine
 */
export class OperationRunner {
  private readonly engine: KlineSyncEngine;
  private readonly operations: Map<string, OperationSpec>;

  constructor(engine: KlineSyncEngine, operations: readonly OperationSpec[]) {
    this.engine = engine;
    this.operations = new Map(operations.map((op) => [op.name, op]));
  }

  list(): OperationSpec[] {
    return [...this.operations.values()];
  }

  async run(name: string, options: SyncOptions = {}): Promise<OperationResult<OperationOutcome>> {
    const op = this.operations.get(name);
    if (!op) {
      const available = this.operations.size > 0 ? [...this.operations.keys()].join(', ') : 'none';
      const error = new InvalidOperationError(
        `Operation '${name}' not found (available: ${available})`
      );
      logger.error({ event: 'operation_not_found', operation: name }, error.message);
      return fail(error);
    }

    logger.info(
      { event: 'operation_start', operation: op.name, type: op.type, symbol: op.symbol, interval: op.interval },
      `Running operation '${op.name}'`
    );

    switch (op.type) {
      case 'fetch': {
        const result = await this.engine.sync(op.symbol, op.interval, op.window, options);
        return result.ok ? ok({ name: op.name, type: op.type, sync: result.value }) : result;
      }
      case 'volume_stats': {
        const result = await this.engine.stats(op.symbol, op.interval, op.window, options);
        return result.ok ? ok({ name: op.name, type: op.type, result: result.value }) : result;
      }
      case 'generate_sliced_csv': {
        const result = await this.engine.slice(
          op.symbol,
          op.interval,
          op.window,
          op.sliceOutputPath,
          options
        );
        return result.ok ? ok({ name: op.name, type: op.type, slice: result.value }) : result;
      }
    }
  }
}
