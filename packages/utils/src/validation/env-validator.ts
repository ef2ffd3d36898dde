import { UpstreamEnvSchema, type UpstreamEnv } from '@klinevault/schemas';
import { logger } from '../logger/logger';

/**
 * Validate environment variables on startup.
 *
 * @param env - Source of variables (defaults to process.env)
 * @returns Validated environment configuration
 * @throws Error listing every invalid variable
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): UpstreamEnv {
  const result = UpstreamEnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    logger.error({ err: details }, 'Invalid environment variables');
    throw new Error(`Invalid environment variables: ${details}`);
  }
  logger.debug({ baseUrl: result.data.BINANCE_BASE_URL }, 'Environment variables validated');
  return result.data;
}

/**
 * Get an environment variable with a default value
 */
export function getEnvVar(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}
