import type { WallClock } from './timezone';

/**
 * Result of parsing an ISO-8601 timestamp
 */
export interface ParsedTimestamp {
  wallClock: WallClock;
  /** Embedded UTC offset in minutes, or null when the text carries none */
  offsetMinutes: number | null;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function parseOffset(text: string): number {
  if (text.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = text.startsWith('-') ? -1 : 1;
  const digits = text.slice(1).replace(':', '');
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = parseInt(digits.slice(2, 4), 10);
  return sign * (hours * 60 + minutes);
}

/**
 * Parse an ISO-8601 date or date-time
 *
 * Accepts 'YYYY-MM-DD', 'YYYY-MM-DDTHH:MM', seconds and fractional seconds,
 * a space instead of 'T', and an optional 'Z' / '+HH:MM' / '-HHMM' suffix.
 *
 * @returns Parsed fields, or null when the text is not a valid timestamp
 */
export function parseIsoTimestamp(text: string): ParsedTimestamp | null {
  const match = ISO_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, y, mo, d, h, mi, s, frac, offset] = match;
  const wallClock: WallClock = {
    year: parseInt(y ?? '', 10),
    month: parseInt(mo ?? '', 10),
    day: parseInt(d ?? '', 10),
    hour: h ? parseInt(h, 10) : 0,
    minute: mi ? parseInt(mi, 10) : 0,
    second: s ? parseInt(s, 10) : 0,
    millisecond: frac ? parseInt(frac.slice(0, 3).padEnd(3, '0'), 10) : 0,
  };

  if (
    wallClock.month < 1 ||
    wallClock.month > 12 ||
    wallClock.day < 1 ||
    wallClock.day > daysInMonth(wallClock.year, wallClock.month) ||
    wallClock.hour > 23 ||
    wallClock.minute > 59 ||
    wallClock.second > 59
  ) {
    return null;
  }

  return {
    wallClock,
    offsetMinutes: offset ? parseOffset(offset) : null,
  };
}
