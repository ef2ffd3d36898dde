import type { Interval } from '@klinevault/schemas';

const UNIT_MS: Record<string, number> = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

/**
 * Convert an interval string to milliseconds
 *
 * Unit letters are case-sensitive because '1M' (month) and '1m' (minute)
 * differ. Months have no fixed length, so '1M' yields null, as does any
 * string that is not <digits><unit>.
 *
 * @param interval - Interval string (e.g., '1m', '4h', '1w')
 * @returns Duration in milliseconds, or null when the interval has no fixed length
 */
export function intervalToMs(interval: Interval | string): number | null {
  const match = /^(\d+)([smhdw])$/.exec(interval.trim());
  if (!match) {
    return null;
  }
  const value = parseInt(match[1] ?? '', 10);
  const unit = UNIT_MS[match[2] ?? ''];
  if (!unit || !Number.isFinite(value) || value <= 0) {
    return null;
  }
  return value * unit;
}
