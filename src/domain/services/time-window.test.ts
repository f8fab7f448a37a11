import { describe, test, expect } from 'vitest';
import { resolveTimeWindow, toEpochSeconds } from './time-window.js';
import { InvalidInputError } from '../errors.js';

const now = new Date('2025-03-10T12:00:00.000Z');

describe('resolveTimeWindow', () => {
  test('defaults to the last window ending now', () => {
    const window = resolveTimeWindow({ defaultWindowMinutes: 15, now });

    expect(window.start.toISOString()).toBe('2025-03-10T11:45:00.000Z');
    expect(window.end).toEqual(now);
  });

  test('uses explicit bounds', () => {
    const window = resolveTimeWindow({
      startTime: '2025-03-09T08:00:00Z',
      endTime: '2025-03-09T09:30:00Z',
      defaultWindowMinutes: 15,
      now,
    });

    expect(window.start.toISOString()).toBe('2025-03-09T08:00:00.000Z');
    expect(window.end.toISOString()).toBe('2025-03-09T09:30:00.000Z');
  });

  test('treats blank values as missing', () => {
    const window = resolveTimeWindow({ startTime: '  ', endTime: '', defaultWindowMinutes: 5, now });

    expect(window.start.toISOString()).toBe('2025-03-10T11:55:00.000Z');
  });

  test('rejects an unparseable start time', () => {
    expect(() => resolveTimeWindow({ startTime: 'yesterday-ish', defaultWindowMinutes: 15, now }))
      .toThrow(new InvalidInputError('Invalid StartTime format: yesterday-ish'));
  });

  test('rejects a start that is not before the end', () => {
    expect(() =>
      resolveTimeWindow({
        startTime: '2025-03-09T09:30:00Z',
        endTime: '2025-03-09T09:30:00Z',
        defaultWindowMinutes: 15,
        now,
      })
    ).toThrow('StartTime must be before EndTime');
  });

  test('rejects a start time after the default end', () => {
    expect(() => resolveTimeWindow({ startTime: '2025-03-10T13:00:00Z', defaultWindowMinutes: 15, now }))
      .toThrow(InvalidInputError);
  });
});

describe('toEpochSeconds', () => {
  test('drops milliseconds', () => {
    expect(toEpochSeconds(new Date('2025-03-10T12:00:00.999Z'))).toBe(1741608000);
  });
});
