/**
 * @klinevault/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';

// Time utilities
export * from './time/interval';
export * from './time/timezone';
export * from './time/iso';

// Math utilities
export * from './math/calculations';

// Validation utilities
export * from './validation/env-validator';

// Error taxonomy
export * from './errors/kline-sync-error';
