import type { TimeWindow, WindowInput } from '@klinevault/schemas';
import {
  InvalidConfigurationError,
  InvalidDurationError,
  InvalidWindowError,
  MissingWindowInputError,
  isValidTimeZone,
  parseIsoTimestamp,
  wallClockToUtc,
  zonedWallClockToUtc,
} from '@klinevault/utils';

const LOOKBACK_PATTERN = /^(\d+)([mhd])$/i;

const LOOKBACK_UNIT_MS: Record<string, number> = {
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
};

export interface ResolveWindowOptions {
  /** Clock reading used for open-ended windows (default: Date.now()) */
  now?: number;
  /** Used when the input carries no lookback of its own */
  defaultLookback?: string;
}

function present(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Parse a relative duration such as '30m', '12h' or '7D' into milliseconds
 *
 * @throws InvalidDurationError for anything outside <digits><m|h|d>
 */
export function parseLookback(expr: string): number {
  const match = LOOKBACK_PATTERN.exec(expr.trim());
  const value = match?.[1];
  const unit = match?.[2]?.toLowerCase();
  const unitMs = unit === undefined ? undefined : LOOKBACK_UNIT_MS[unit];
  if (value === undefined || unitMs === undefined) {
    throw new InvalidDurationError(
      `Unsupported duration '${expr}'. Use formats like 30m, 12h, 3d.`
    );
  }
  return parseInt(value, 10) * unitMs;
}

/**
 * Parse a caller-supplied timestamp into a UTC instant
 *
 * With an input timezone the wall-clock fields are read in that zone and any
 * embedded offset is ignored. Without one an embedded offset is honoured and
 * naive values are UTC.
 *
 * @throws InvalidWindowError when the text is not an ISO-8601 date or date-time
 */
export function parseWindowTimestamp(text: string, inputTimezone?: string): number {
  const parsed = parseIsoTimestamp(text);
  if (!parsed) {
    throw new InvalidWindowError(`Cannot parse timestamp '${text}'`);
  }
  if (inputTimezone) {
    return zonedWallClockToUtc(parsed.wallClock, inputTimezone);
  }
  const asUtc = wallClockToUtc(parsed.wallClock);
  return parsed.offsetMinutes === null ? asUtc : asUtc - parsed.offsetMinutes * 60_000;
}

/**
 * Turn optional start / end / lookback inputs into a concrete window
 *
 * 1. neither start nor end: [now - lookback, now]
 * 2. start only: [start, now]
 * 3. end only: [end - lookback, end]
 * 4. both: as given
 *
 * Empty strings count as absent.
 */
export function resolveWindow(input: WindowInput, options: ResolveWindowOptions = {}): TimeWindow {
  const inputTimezone = present(input.inputTimezone);
  if (inputTimezone && !isValidTimeZone(inputTimezone)) {
    throw new InvalidConfigurationError(`Unknown timezone '${inputTimezone}'`);
  }

  const startText = present(input.start);
  const endText = present(input.end);
  const lookback = present(input.lookback) ?? present(options.defaultLookback);
  const now = options.now ?? Date.now();

  const startParsed = startText ? parseWindowTimestamp(startText, inputTimezone) : undefined;
  const endParsed = endText ? parseWindowTimestamp(endText, inputTimezone) : undefined;

  let start: number;
  let end: number;

  if (startParsed !== undefined && endParsed !== undefined) {
    start = startParsed;
    end = endParsed;
  } else if (startParsed !== undefined) {
    start = startParsed;
    end = now;
  } else if (endParsed !== undefined) {
    if (!lookback) {
      throw new MissingWindowInputError('Provide start or lookback with end');
    }
    end = endParsed;
    start = endParsed - parseLookback(lookback);
  } else {
    if (!lookback) {
      throw new MissingWindowInputError('Provide either start/end or lookback');
    }
    end = now;
    start = now - parseLookback(lookback);
  }

  if (start > end) {
    throw new InvalidWindowError('start_time must be before end_time', {
      window: { start, end },
    });
  }
  return { start, end };
}
