import { LogLevelSchema, type LogLevel } from '@klinevault/schemas';

export type { LogLevel };

/**
 * Per-service log level configuration
 *
 * Service names follow the pattern: category:subcategory
 * e.g., 'sync:gaps', 'binance:fetch'
 */
export interface LogConfig {
  /** Default log level for all services */
  defaultLevel: LogLevel;
  /** Per-service level overrides */
  services: Record<string, LogLevel>;
}

/**
 * Default log configuration
 *
 * Page-level fetch logging is debug-only; set LOG_LEVEL_BINANCE_FETCH=debug
 * to see every request.
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  defaultLevel: 'info',
  services: {
    sync: 'info',
    'sync:gaps': 'info',
    'sync:operations': 'info',

    binance: 'info',
    'binance:fetch': 'info',

    store: 'info',
    'store:csv': 'info',

    cli: 'info',
  },
};

function parseLevel(value: string | undefined): LogLevel | undefined {
  const result = LogLevelSchema.safeParse(value?.toLowerCase());
  return result.success ? result.data : undefined;
}

/**
 * Get the effective log level for a service
 *
 * Checks in order:
 * 1. Environment variable: LOG_LEVEL_{SERVICE} (e.g., LOG_LEVEL_SYNC_GAPS=debug)
 * 2. Global LOG_LEVEL environment variable
 * 3. Per-service config
 * 4. Parent service config (e.g., 'sync' for 'sync:gaps')
 * 5. Default level
 */
export function getLogLevel(
  serviceName: string,
  config: LogConfig = DEFAULT_LOG_CONFIG
): LogLevel {
  const envKey = `LOG_LEVEL_${serviceName.replace(/:/g, '_').toUpperCase()}`;
  const envLevel = parseLevel(process.env[envKey]);
  if (envLevel) {
    return envLevel;
  }

  const globalEnvLevel = parseLevel(process.env.LOG_LEVEL);
  if (globalEnvLevel) {
    return globalEnvLevel;
  }

  const exact = config.services[serviceName];
  if (exact) {
    return exact;
  }

  const parentService = getServiceFromName(serviceName);
  const parent = config.services[parentService];
  if (parentService !== serviceName && parent) {
    return parent;
  }

  return config.defaultLevel;
}

/**
 * Get the service name from a logger name (first segment before ':')
 */
export function getServiceFromName(name: string): string {
  return name.split(':')[0] ?? name;
}

/**
 * Build a config whose default level comes from the application config
 * (`logging_level`) instead of the built-in default.
 */
export function buildRuntimeConfig(defaultLevel?: LogLevel): LogConfig {
  if (!defaultLevel) {
    return DEFAULT_LOG_CONFIG;
  }
  const services: Record<string, LogLevel> = {};
  for (const name of Object.keys(DEFAULT_LOG_CONFIG.services)) {
    services[name] = defaultLevel;
  }
  return { defaultLevel, services };
}
