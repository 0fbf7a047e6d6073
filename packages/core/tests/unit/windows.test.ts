import { describe, it, expect } from 'vitest';
import { DateTime, Duration } from 'luxon';
import { chunkSizeFor, formatWindowBoundary, planWindows } from '../../src/time/windows.js';

const now = DateTime.fromISO('2024-05-01T12:00:00Z', { zone: 'utc' });

describe('planWindows', () => {
  it('uses 15 minute windows up to two hours', () => {
    expect(chunkSizeFor(Duration.fromObject({ hours: 2 })).as('minutes')).toBe(15);
    expect(chunkSizeFor(Duration.fromObject({ minutes: 121 })).as('minutes')).toBe(60);
  });

  it('splits a one hour lookback into four windows', () => {
    const windows = planWindows(Duration.fromObject({ hours: 1 }), now);

    expect(windows.map((w) => formatWindowBoundary(w.start))).toEqual([
      '2024-05-01T11:00:00Z',
      '2024-05-01T11:15:00Z',
      '2024-05-01T11:30:00Z',
      '2024-05-01T11:45:00Z',
    ]);
    expect(windows.map((w) => formatWindowBoundary(w.end)).at(-1)).toBe('2024-05-01T12:00:00Z');
  });

  it('clips the last window to now', () => {
    const windows = planWindows(Duration.fromObject({ hours: 2, minutes: 30 }), now);

    expect(windows.map((w) => [formatWindowBoundary(w.start), formatWindowBoundary(w.end)])).toEqual([
      ['2024-05-01T09:30:00Z', '2024-05-01T10:30:00Z'],
      ['2024-05-01T10:30:00Z', '2024-05-01T11:30:00Z'],
      ['2024-05-01T11:30:00Z', '2024-05-01T12:00:00Z'],
    ]);
  });

  it('plans eight windows for a zero lookback', () => {
    const windows = planWindows(Duration.fromMillis(0), now);
    expect(windows).toHaveLength(8);
    expect(formatWindowBoundary(windows[0]?.start ?? now)).toBe('2024-05-01T10:00:00Z');
  });
});
