import { readFile } from 'node:fs/promises';
import {
  DEFAULT_APP_CONFIG,
  AppConfigSchema,
  type AppConfig,
} from '@klinevault/schemas';
import { InvalidConfigurationError, isValidTimeZone } from '@klinevault/utils';

/**
 * Read a JSON file, mapping I/O and syntax failures to a caller-chosen error
 */
export async function readJsonFile(
  filePath: string,
  toError: (message: string, cause: unknown) => Error
): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    throw toError(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`, err);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw toError(`${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, err);
  }
}

/**
 * Validate a config object and check its display timezone
 *
 * @throws InvalidConfigurationError listing every bad key
 */
export function toAppConfig(input: unknown, source = 'config'): AppConfig {
  const result = AppConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigurationError(`Invalid ${source}: ${details}`, { cause: result.error });
  }
  assertDisplayTimezone(result.data);
  return result.data;
}

export function assertDisplayTimezone(config: AppConfig): void {
  if (config.timezone !== null && !isValidTimeZone(config.timezone)) {
    throw new InvalidConfigurationError(`Unknown timezone '${config.timezone}'`);
  }
}

/**
 * Load the application config from a JSON file, or the defaults without one
 */
export async function loadAppConfig(filePath?: string): Promise<AppConfig> {
  if (!filePath) {
    return DEFAULT_APP_CONFIG;
  }
  const raw = await readJsonFile(
    filePath,
    (message, cause) => new InvalidConfigurationError(message, { target: filePath, cause })
  );
  return toAppConfig(raw, filePath);
}
