import { describe, it, expect } from 'vitest';
import { parseIsoTimestamp } from './iso';

describe('parseIsoTimestamp()', () => {
  it('parses a date-only value as midnight without offset', () => {
    expect(parseIsoTimestamp('2024-05-01')).toEqual({
      wallClock: { year: 2024, month: 5, day: 1, hour: 0, minute: 0, second: 0, millisecond: 0 },
      offsetMinutes: null,
    });
  });

  it('parses Z and numeric offsets', () => {
    expect(parseIsoTimestamp('2024-05-01T10:15:30Z')?.offsetMinutes).toBe(0);
    expect(parseIsoTimestamp('2024-05-01T10:15:30+05:30')?.offsetMinutes).toBe(330);
    expect(parseIsoTimestamp('2024-05-01T10:15:30-0400')?.offsetMinutes).toBe(-240);
  });

  it('accepts a space separator and fractional seconds', () => {
    const parsed = parseIsoTimestamp('2024-05-01 10:15:30.5');
    expect(parsed?.wallClock).toEqual({
      year: 2024,
      month: 5,
      day: 1,
      hour: 10,
      minute: 15,
      second: 30,
      millisecond: 500,
    });
    expect(parsed?.offsetMinutes).toBeNull();
  });

  it('rejects malformed or out-of-range values', () => {
    expect(parseIsoTimestamp('yesterday')).toBeNull();
    expect(parseIsoTimestamp('2024-02-30')).toBeNull();
    expect(parseIsoTimestamp('2024-13-01')).toBeNull();
    expect(parseIsoTimestamp('2024-01-01T24:00')).toBeNull();
  });
});
