import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_APP_CONFIG } from '@klinevault/schemas';
import { InvalidConfigurationError } from '@klinevault/utils';
import { loadAppConfig, toAppConfig } from '../config/config-loader';

describe('toAppConfig()', () => {
  it('fills defaults and converts seconds to milliseconds', () => {
    expect(toAppConfig({ request: { rate_limit_sleep: 0.5, timeout: 10 } })).toEqual({
      store: { pathTemplate: './data/{symbol}_{interval}.csv', append: true, onCorrupt: 'error' },
      request: { limit: 1000, rateLimitSleepMs: 500, timeoutMs: 10_000 },
      timezone: null,
      logLevel: 'info',
    });
  });

  it('accepts upper-case log levels and a display timezone', () => {
    const config = toAppConfig({ logging_level: 'DEBUG', timezone: 'Europe/Berlin' });
    expect(config.logLevel).toBe('debug');
    expect(config.timezone).toBe('Europe/Berlin');
  });

  it('rejects out-of-range and mistyped keys', () => {
    expect(() => toAppConfig({ request: { limit: 5000 } })).toThrow(InvalidConfigurationError);
    expect(() => toAppConfig({ excel: { append: 'yes' } })).toThrow(/excel\.append/);
  });

  it('rejects an unknown display timezone', () => {
    expect(() => toAppConfig({ timezone: 'Atlantis/Capital' })).toThrow(
      "Unknown timezone 'Atlantis/Capital'"
    );
  });
});

describe('loadAppConfig()', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'klinevault-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns defaults without a path', async () => {
    expect(await loadAppConfig()).toEqual(DEFAULT_APP_CONFIG);
  });

  it('reads a JSON file', async () => {
    const file = path.join(dir, 'config.json');
    await writeFile(file, JSON.stringify({ excel: { append: false, on_corrupt: 'empty' } }));

    const config = await loadAppConfig(file);

    expect(config.store).toEqual({
      pathTemplate: './data/{symbol}_{interval}.csv',
      append: false,
      onCorrupt: 'empty',
    });
  });

  it('maps a missing file to InvalidConfigurationError', async () => {
    await expect(loadAppConfig(path.join(dir, 'nope.json'))).rejects.toBeInstanceOf(
      InvalidConfigurationError
    );
  });
});
