import { Command } from 'commander';
import type { AppConfig, WindowInput } from '@klinevault/schemas';
import {
  createSyncEngine,
  loadAppConfig,
  loadOperations,
  OperationRunner,
  type KlineSyncEngine,
  type OperationOutcome,
} from '@klinevault/sync-core';
import {
  configureLogging,
  createLogger,
  getEnvVar,
  isKlineSyncError,
  type OperationResult,
} from '@klinevault/utils';
import { formatError, formatSlice, formatStats, formatSync } from './format';

const logger = createLogger('cli');

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface ProgramDeps {
  io?: CliIO;
  /** Engine factory (tests inject an in-process upstream) */
  createEngine?: (config: AppConfig) => KlineSyncEngine;
}

interface GlobalOptions {
  config?: string;
}

interface WindowOptions {
  start?: string;
  end?: string;
  lookback?: string;
  tz?: string;
  dryRun?: boolean;
}

interface SymbolOptions extends WindowOptions {
  symbol: string;
  interval: string;
}

interface SliceOptions extends SymbolOptions {
  output?: string;
}

interface RunOpOptions {
  operation: string;
  ops: string;
  dryRun?: boolean;
}

interface ListOpsOptions {
  ops: string;
}

const defaultIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

function toWindowInput(options: WindowOptions): WindowInput {
  const window: WindowInput = {};
  if (options.start) window.start = options.start;
  if (options.end) window.end = options.end;
  if (options.lookback) window.lookback = options.lookback;
  if (options.tz) window.inputTimezone = options.tz;
  return window;
}

function withWindowOptions(command: Command): Command {
  return command
    .option('-s, --start <time>', 'Window start (ISO-8601, e.g. 2024-05-01T00:00:00Z)')
    .option('-e, --end <time>', 'Window end (ISO-8601)')
    .option('-l, --lookback <duration>', 'Lookback window (e.g., 7d, 12h, 30m)')
    .option('--tz <zone>', 'Interpret start/end in this IANA timezone')
    .option('--dry-run', 'Fetch and report without writing files');
}

/**
 * Build the klinevault command tree
 *
 * Commands never call process.exit; a failed command sets process.exitCode.
 */
export function buildProgram(deps: ProgramDeps = {}): Command {
  const io = deps.io ?? defaultIO;
  const createEngine = deps.createEngine ?? ((config: AppConfig) => createSyncEngine(config));
  const program = new Command();

  program
    .name('klinevault')
    .description('Incremental OHLCV candle store synced from the Binance klines API')
    .version('0.1.0')
    .option('-c, --config <path>', 'JSON config file (env: KLINEVAULT_CONFIG)');

  async function setup(): Promise<{ config: AppConfig; engine: KlineSyncEngine }> {
    const { config: configPath } = program.opts<GlobalOptions>();
    const config = await loadAppConfig(configPath ?? (getEnvVar('KLINEVAULT_CONFIG', '') || undefined));
    configureLogging(config.logLevel);
    return { config, engine: createEngine(config) };
  }

  function fail(error: unknown): void {
    process.exitCode = 1;
    if (isKlineSyncError(error)) {
      io.err(formatError(error));
      return;
    }
    logger.error({ event: 'cli_crash', err: error instanceof Error ? error.stack : String(error) }, 'Unexpected failure');
    io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }

  function report<T>(result: OperationResult<T>, render: (value: T) => boolean): void {
    if (!result.ok) {
      fail(result.error);
      return;
    }
    if (!render(result.value)) {
      process.exitCode = 1;
    }
  }

  withWindowOptions(
    program
      .command('ingest')
      .description('Sync the local store for a symbol and interval')
      .requiredOption('-p, --symbol <symbol>', 'Trading pair (e.g., BTCUSDT)')
      .requiredOption('-i, --interval <interval>', 'Kline interval (e.g., 1m, 1h, 1d)')
  ).action(async (options: SymbolOptions) => {
    try {
      const { engine } = await setup();
      const result = await engine.sync(options.symbol, options.interval, toWindowInput(options), {
        dryRun: options.dryRun,
      });
      report(result, (summary) => {
        io.out(formatSync(summary));
        return true;
      });
    } catch (error) {
      fail(error);
    }
  });

  withWindowOptions(
    program
      .command('stats')
      .description('Sync, then print row count, average and p95 volume for the window')
      .requiredOption('-p, --symbol <symbol>', 'Trading pair (e.g., BTCUSDT)')
      .requiredOption('-i, --interval <interval>', 'Kline interval (e.g., 1m, 1h, 1d)')
  ).action(async (options: SymbolOptions) => {
    try {
      const { config, engine } = await setup();
      const result = await engine.stats(options.symbol, options.interval, toWindowInput(options), {
        dryRun: options.dryRun,
      });
      report(result, (summary) => {
        const lines = formatStats(summary, config.timezone);
        if (!lines) {
          io.err('No volume data available for requested window');
          return false;
        }
        lines.forEach((line) => io.out(line));
        return true;
      });
    } catch (error) {
      fail(error);
    }
  });

  withWindowOptions(
    program
      .command('slice')
      .description('Sync, then write the window to a separate CSV')
      .requiredOption('-p, --symbol <symbol>', 'Trading pair (e.g., BTCUSDT)')
      .requiredOption('-i, --interval <interval>', 'Kline interval (e.g., 1m, 1h, 1d)')
      .option('-o, --output <path>', 'Slice file (default: <store>_sliced.csv)')
  ).action(async (options: SliceOptions) => {
    try {
      const { engine } = await setup();
      const result = await engine.slice(
        options.symbol,
        options.interval,
        toWindowInput(options),
        options.output,
        { dryRun: options.dryRun }
      );
      report(result, (summary) => {
        io.out(formatSlice(summary));
        return true;
      });
    } catch (error) {
      fail(error);
    }
  });

  program
    .command('run-op')
    .description('Run a named operation from the operations file')
    .requiredOption('-n, --operation <name>', 'Operation name')
    .option('--ops <path>', 'Operations file', getEnvVar('KLINEVAULT_OPERATIONS', 'operations.json'))
    .option('--dry-run', 'Fetch and report without writing files')
    .action(async (options: RunOpOptions) => {
      try {
        const operations = await loadOperations(options.ops);
        const { config, engine } = await setup();
        const runner = new OperationRunner(engine, operations);
        const result: OperationResult<OperationOutcome> = await runner.run(options.operation, {
          dryRun: options.dryRun,
        });
        report(result, (outcome) => {
          switch (outcome.type) {
            case 'fetch':
              io.out(`${outcome.name} -> ${formatSync(outcome.sync)}`);
              return true;
            case 'volume_stats': {
              const lines = formatStats(outcome.result, config.timezone);
              if (!lines) {
                io.err(`${outcome.name}: no volume data available`);
                return false;
              }
              io.out(`${outcome.name} -> ${lines[0]}`);
              io.out(lines[1]);
              return true;
            }
            case 'generate_sliced_csv':
              io.out(`${outcome.name} -> ${formatSlice(outcome.slice)}`);
              return true;
          }
        });
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('list-ops')
    .description('List the operations defined in the operations file')
    .option('--ops <path>', 'Operations file', getEnvVar('KLINEVAULT_OPERATIONS', 'operations.json'))
    .action(async (options: ListOpsOptions) => {
      try {
        const operations = await loadOperations(options.ops);
        if (operations.length === 0) {
          io.out('No operations defined');
          return;
        }
        for (const op of operations) {
          io.out(`${op.name}\t${op.type}\t${op.symbol}\t${op.interval}`);
        }
      } catch (error) {
        fail(error);
      }
    });

  return program;
}
