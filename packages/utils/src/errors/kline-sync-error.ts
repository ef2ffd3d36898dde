import type { TimeWindow } from '@klinevault/schemas';

export type KlineSyncErrorCode =
  | 'INVALID_DURATION'
  | 'MISSING_WINDOW_INPUT'
  | 'INVALID_WINDOW'
  | 'INVALID_CONFIGURATION'
  | 'INVALID_OPERATION'
  | 'UPSTREAM_FETCH_FAILED'
  | 'CORRUPT_LOCAL_STORE'
  | 'LOCAL_STORE_IO';

/**
 * Context attached to every sync error
 */
export interface KlineSyncErrorContext {
  symbol?: string;
  interval?: string;
  window?: TimeWindow;
  /** Store path or upstream URL involved */
  target?: string;
  cause?: unknown;
}

/**
 * Base class for all expected failures of the sync engine
 *
 * `retryable` classifies the failure only; nothing in the engine retries.
 */
export abstract class KlineSyncError extends Error {
  abstract readonly code: KlineSyncErrorCode;
  readonly retryable: boolean;
  readonly context: KlineSyncErrorContext;

  constructor(message: string, context: KlineSyncErrorContext = {}, retryable = false) {
    super(message, context.cause !== undefined ? { cause: context.cause } : undefined);
    this.name = new.target.name;
    this.context = context;
    this.retryable = retryable;
  }

  /**
   * Plain object for structured logs
   */
  toJSON(): Record<string, unknown> {
    const { cause, ...rest } = this.context;
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      ...rest,
      ...(cause !== undefined && {
        cause: cause instanceof Error ? cause.message : String(cause),
      }),
    };
  }
}

export class InvalidDurationError extends KlineSyncError {
  readonly code = 'INVALID_DURATION';
}

export class MissingWindowInputError extends KlineSyncError {
  readonly code = 'MISSING_WINDOW_INPUT';
}

export class InvalidWindowError extends KlineSyncError {
  readonly code = 'INVALID_WINDOW';
}

export class InvalidConfigurationError extends KlineSyncError {
  readonly code = 'INVALID_CONFIGURATION';
}

export class InvalidOperationError extends KlineSyncError {
  readonly code = 'INVALID_OPERATION';
}

export class UpstreamFetchFailedError extends KlineSyncError {
  readonly code = 'UPSTREAM_FETCH_FAILED';
  /** HTTP status when the upstream answered */
  readonly status: number | null;

  constructor(
    message: string,
    context: KlineSyncErrorContext & { status?: number; retryable?: boolean } = {}
  ) {
    const { status, retryable, ...rest } = context;
    // Timeouts, transport failures, 429 and 5xx may succeed later
    super(message, rest, retryable ?? (status === undefined || status === 429 || status >= 500));
    this.status = status ?? null;
  }
}

export class CorruptLocalStoreError extends KlineSyncError {
  readonly code = 'CORRUPT_LOCAL_STORE';
}

/**
 * Store file could not be read or written (permissions, a directory in the
 * way, disk full)
 */
export class LocalStoreIoError extends KlineSyncError {
  readonly code = 'LOCAL_STORE_IO';
}

export function isKlineSyncError(err: unknown): err is KlineSyncError {
  return err instanceof KlineSyncError;
}

/**
 * Explicit result value returned by the engine's public operations
 */
export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: KlineSyncError };

export function ok<T>(value: T): OperationResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: KlineSyncError): OperationResult<T> {
  return { ok: false, error };
}
