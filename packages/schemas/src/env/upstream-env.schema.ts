import { z } from 'zod';

/**
 * Environment variables read at startup
 *
 * BINANCE_KLINES_PATH gets a leading '/' when written without one.
 */
export const UpstreamEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  BINANCE_BASE_URL: z
    .string()
    .url('BINANCE_BASE_URL must be a valid URL')
    .default('https://api.binance.com')
    .transform((url) => url.replace(/\/+$/, '')),
  BINANCE_KLINES_PATH: z
    .string()
    .min(1)
    .default('/api/v3/klines')
    .transform((path) => (path.startsWith('/') ? path : `/${path}`)),
});

export type UpstreamEnv = z.infer<typeof UpstreamEnvSchema>;
