import { describe, it, expect } from 'vitest';
import {
  InvalidConfigurationError,
  InvalidDurationError,
  InvalidWindowError,
  MissingWindowInputError,
} from '@klinevault/utils';
import { parseLookback, parseWindowTimestamp, resolveWindow } from '../window/window-resolver';

const HOUR = 60 * 60 * 1000;
const JAN_1 = Date.UTC(2024, 0, 1);
const NOW = Date.UTC(2024, 0, 3, 12);

describe('parseLookback()', () => {
  it('accepts minutes, hours and days in any case', () => {
    expect(parseLookback('30m')).toBe(30 * 60 * 1000);
    expect(parseLookback(' 12H ')).toBe(12 * HOUR);
    expect(parseLookback('7d')).toBe(7 * 24 * HOUR);
  });

  it.each(['7w', 'd', '1.5h', '', '-2h', '2 h'])('rejects %j', (expr) => {
    expect(() => parseLookback(expr)).toThrow(InvalidDurationError);
  });
});

describe('parseWindowTimestamp()', () => {
  it('honours an embedded offset without an input timezone', () => {
    expect(parseWindowTimestamp('2024-01-01T05:30:00+05:30')).toBe(JAN_1);
  });

  it('treats naive values as UTC', () => {
    expect(parseWindowTimestamp('2024-01-01 01:00')).toBe(JAN_1 + HOUR);
  });

  it('reinterprets wall-clock fields in the input timezone, ignoring offsets', () => {
    expect(parseWindowTimestamp('2024-01-01T05:30:00Z', 'Asia/Kolkata')).toBe(JAN_1);
  });

  it('rejects unparseable text', () => {
    expect(() => parseWindowTimestamp('next tuesday')).toThrow(InvalidWindowError);
  });
});

describe('resolveWindow()', () => {
  it('uses [now - lookback, now] without start or end', () => {
    expect(resolveWindow({ lookback: '1h' }, { now: NOW })).toEqual({ start: NOW - HOUR, end: NOW });
  });

  it('requires a lookback when neither start nor end is given', () => {
    expect(() => resolveWindow({}, { now: NOW })).toThrow(MissingWindowInputError);
  });

  it('ends at now when only start is given', () => {
    expect(resolveWindow({ start: '2024-01-01' }, { now: NOW })).toEqual({ start: JAN_1, end: NOW });
  });

  it('walks back from end by the lookback when only end is given', () => {
    expect(resolveWindow({ end: '2024-01-02', lookback: '1d' }, { now: NOW })).toEqual({
      start: JAN_1,
      end: JAN_1 + 24 * HOUR,
    });
    expect(() => resolveWindow({ end: '2024-01-02' }, { now: NOW })).toThrow(
      'Provide start or lookback with end'
    );
  });

  it('uses start and end as given when both are present', () => {
    expect(
      resolveWindow({ start: '2024-01-01T00:00:00Z', end: '2024-01-01T23:00:00Z', lookback: '1h' })
    ).toEqual({ start: JAN_1, end: JAN_1 + 23 * HOUR });
  });

  it('treats empty strings as absent', () => {
    expect(resolveWindow({ start: '', end: ' ', lookback: '2h' }, { now: NOW })).toEqual({
      start: NOW - 2 * HOUR,
      end: NOW,
    });
  });

  it('falls back to the default lookback', () => {
    expect(resolveWindow({}, { now: NOW, defaultLookback: '1d' })).toEqual({
      start: NOW - 24 * HOUR,
      end: NOW,
    });
    expect(resolveWindow({ lookback: '1h' }, { now: NOW, defaultLookback: '1d' }).start).toBe(
      NOW - HOUR
    );
  });

  it('applies the input timezone to both bounds', () => {
    expect(
      resolveWindow({
        start: '2024-01-01 05:30',
        end: '2024-01-01 06:30',
        inputTimezone: 'Asia/Kolkata',
      })
    ).toEqual({ start: JAN_1, end: JAN_1 + HOUR });
  });

  it('rejects start after end', () => {
    expect(() => resolveWindow({ start: '2024-01-02', end: '2024-01-01' })).toThrow(
      InvalidWindowError
    );
  });

  it('rejects an invalid lookback', () => {
    expect(() => resolveWindow({ lookback: '3 weeks' }, { now: NOW })).toThrow(InvalidDurationError);
  });

  it('rejects an unknown input timezone', () => {
    expect(() =>
      resolveWindow({ start: '2024-01-01', inputTimezone: 'Nowhere/Special' }, { now: NOW })
    ).toThrow(InvalidConfigurationError);
  });
});
