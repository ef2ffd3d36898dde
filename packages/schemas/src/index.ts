/**
 * @klinevault/schemas
 *
 * Single source of truth for Zod schemas and TypeScript types
 * shared by every package
 */

// Market data schemas
export * from './market/candle.schema';
export * from './market/kline.schema';

// Windows, coverage and gaps
export * from './window/window.schema';

// Upstream source contract
export * from './adapter/kline-source.schema';

// Configuration
export * from './env/config.schema';
export * from './env/upstream-env.schema';

// Named operations
export * from './operations/operation.schema';
