/**
 * Timezone helpers built on Intl (IANA zone names, DST-aware).
 */

/**
 * Calendar + clock fields without any zone attached
 */
export interface WallClock {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    // Throws RangeError for unknown zones
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

/**
 * Check whether a name is a timezone the runtime knows
 */
export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) return false;
  try {
    getFormatter(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Offset of a zone from UTC at the given instant, in ms (east of UTC is positive)
 */
export function getTimeZoneOffsetMs(instant: number, timeZone: string): number {
  const parts = getFormatter(timeZone).formatToParts(new Date(instant));
  const field = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? parseInt(part.value, 10) : 0;
  };

  const asUtc = Date.UTC(
    field('year'),
    field('month') - 1,
    field('day'),
    field('hour'),
    field('minute'),
    field('second')
  );
  const wholeSeconds = instant - (((instant % 1000) + 1000) % 1000);
  return asUtc - wholeSeconds;
}

/**
 * Interpret wall-clock fields as UTC
 */
export function wallClockToUtc(wall: WallClock): number {
  return Date.UTC(
    wall.year,
    wall.month - 1,
    wall.day,
    wall.hour,
    wall.minute,
    wall.second,
    wall.millisecond
  );
}

/**
 * Interpret wall-clock fields in a timezone and return the UTC instant
 *
 * Ambiguous local times (fall-back) resolve to the first occurrence;
 * non-existent ones (spring-forward gap) are pushed forward by the gap.
 */
export function zonedWallClockToUtc(wall: WallClock, timeZone: string): number {
  const wallAsUtc = wallClockToUtc(wall);
  const firstOffset = getTimeZoneOffsetMs(wallAsUtc, timeZone);
  const candidate = wallAsUtc - firstOffset;
  const secondOffset = getTimeZoneOffsetMs(candidate, timeZone);
  if (secondOffset === firstOffset) {
    return candidate;
  }

  const adjusted = wallAsUtc - secondOffset;
  if (getTimeZoneOffsetMs(adjusted, timeZone) === secondOffset) {
    return adjusted;
  }
  return candidate;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function formatOffset(offsetMs: number): string {
  const sign = offsetMs < 0 ? '-' : '+';
  const totalMinutes = Math.round(Math.abs(offsetMs) / 60000);
  return `${sign}${pad(Math.floor(totalMinutes / 60))}:${pad(totalMinutes % 60)}`;
}

function formatWallClock(shiftedInstant: number): string {
  const iso = new Date(shiftedInstant).toISOString();
  const seconds = iso.slice(0, 19);
  const fraction = iso.slice(19, 23);
  return fraction === '.000' ? seconds : `${seconds}${fraction}`;
}

/**
 * Format an instant as ISO-8601 in a display timezone
 *
 * - no zone: '2024-01-01T00:00:00Z'
 * - with zone: '2024-01-01T05:30:00+05:30'
 *
 * Milliseconds are included only when non-zero.
 */
export function formatInstant(instant: number, timeZone: string | null): string {
  if (!timeZone) {
    return `${formatWallClock(instant)}Z`;
  }
  const offset = getTimeZoneOffsetMs(instant, timeZone);
  return `${formatWallClock(instant + offset)}${formatOffset(offset)}`;
}
