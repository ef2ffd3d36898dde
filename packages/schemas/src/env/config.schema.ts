import { z } from 'zod';

/**
 * Log levels accepted by the logger (most verbose first)
 */
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/** Default store location; {symbol} and {interval} are substituted per store */
export const DEFAULT_STORE_PATH = './data/{symbol}_{interval}.csv';

/**
 * Configuration file schema
 *
 * Mirrors the keys users write in their config file (snake_case, seconds for
 * durations). Unknown keys are ignored so older files keep loading.
 *
 * | key                      | default                          |
 * |--------------------------|----------------------------------|
 * | excel.path               | ./data/{symbol}_{interval}.csv   |
 * | excel.append             | true                             |
 * | excel.on_corrupt         | 'error'                          |
 * | request.limit            | 1000                             |
 * | request.rate_limit_sleep | 0.2 (seconds)                    |
 * | request.timeout          | 30 (seconds)                     |
 * | timezone                 | null (UTC)                       |
 * | logging_level            | 'info'                           |
 */
export const ConfigFileSchema = z.object({
  excel: z
    .object({
      path: z.string().min(1).default(DEFAULT_STORE_PATH),
      append: z.boolean().default(true),
      on_corrupt: z.enum(['error', 'empty']).default('error'),
    })
    .default({}),
  request: z
    .object({
      limit: z.number().int().positive().max(1000).default(1000),
      rate_limit_sleep: z.number().nonnegative().default(0.2),
      timeout: z.number().positive().default(30),
    })
    .default({}),
  timezone: z
    .string()
    .nullish()
    .transform((value) => (value ? value : null)),
  logging_level: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(LogLevelSchema),
});

export type ConfigFile = z.input<typeof ConfigFileSchema>;

/**
 * Store settings
 */
export interface StoreConfig {
  /** Path template with {symbol}/{interval} placeholders */
  pathTemplate: string;
  /** Merge fetched rows into the existing store (true) or replace it (false) */
  append: boolean;
  /** What to do when the persisted store cannot be parsed */
  onCorrupt: 'error' | 'empty';
}

/**
 * Upstream request settings (all durations in ms)
 */
export interface RequestConfig {
  limit: number;
  rateLimitSleepMs: number;
  timeoutMs: number;
}

/**
 * Typed application configuration
 */
export interface AppConfig {
  store: StoreConfig;
  request: RequestConfig;
  /** Display timezone for persisted timestamps (null = UTC) */
  timezone: string | null;
  logLevel: LogLevel;
}

export const AppConfigSchema = ConfigFileSchema.transform(
  (file): AppConfig => ({
    store: {
      pathTemplate: file.excel.path,
      append: file.excel.append,
      onCorrupt: file.excel.on_corrupt,
    },
    request: {
      limit: file.request.limit,
      rateLimitSleepMs: Math.round(file.request.rate_limit_sleep * 1000),
      timeoutMs: Math.round(file.request.timeout * 1000),
    },
    timezone: file.timezone,
    logLevel: file.logging_level,
  })
);

/**
 * Parse a config file object into the typed configuration
 *
 * @throws ZodError when a recognized key has the wrong type
 */
export function parseAppConfig(input: unknown): AppConfig {
  return AppConfigSchema.parse(input ?? {});
}

/**
 * Defaults for every recognized key
 */
export const DEFAULT_APP_CONFIG: AppConfig = parseAppConfig({});
