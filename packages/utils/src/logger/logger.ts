import pino from 'pino';
import {
  type LogLevel,
  type LogConfig,
  getLogLevel,
  buildRuntimeConfig,
} from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'sync:gaps') */
  name: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Custom log config (default: runtime config) */
  config?: LogConfig;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

/**
 * Structured logger used across packages
 */
export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
}

interface RegisteredLogger {
  name: string;
  pinned: boolean;
  pino: pino.Logger;
}

// Every pino instance handed out, so a later configureLogging() reaches
// loggers that modules created at import time
const registry = new Set<RegisteredLogger>();

let runtimeConfig: LogConfig = buildRuntimeConfig();

function wrap(pinoLogger: pino.Logger, name: string, pinned: boolean): Logger {
  registry.add({ name, pinned, pino: pinoLogger });

  function method(level: LogLevel): LogMethod {
    return (obj, msg) => {
      if (typeof obj === 'string') {
        pinoLogger[level](obj);
      } else {
        pinoLogger[level](obj, msg);
      }
    };
  }

  return {
    trace: method('trace'),
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    fatal: method('fatal'),
    child: (bindings) => wrap(pinoLogger.child(bindings), name, pinned),
  };
}

/**
 * Create a structured logger instance
 *
 * Console output is JSON; NODE_ENV=development switches to pino-pretty.
 *
 * @param options - Logger configuration options (or just a name string)
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions =
    typeof options === 'string' ? { name: options } : options;

  const config = opts.config ?? runtimeConfig;
  const level = opts.level ?? getLogLevel(opts.name, config);
  const isDevelopment = process.env.NODE_ENV === 'development';

  const pinoLogger = pino({
    name: opts.name,
    level,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  return wrap(pinoLogger, opts.name, opts.level !== undefined);
}

/**
 * Apply an application-wide default level (config `logging_level`).
 * Environment overrides (LOG_LEVEL, LOG_LEVEL_<SERVICE>) still win.
 */
export function configureLogging(defaultLevel: LogLevel): void {
  runtimeConfig = buildRuntimeConfig(defaultLevel);
  for (const entry of registry) {
    if (!entry.pinned) {
      entry.pino.level = getLogLevel(entry.name, runtimeConfig);
    }
  }
}

/**
 * Global logger instance for general use
 */
export const logger = createLogger('klinevault');
