/**
 * Window planning
 *
 * A lookback is split into contiguous half-open windows so that no single
 * query has to scan the whole range. Short lookbacks use 15 minute windows,
 * anything over two hours uses one hour windows.
 */

import { DateTime, Duration } from 'luxon';
import type { Window } from '../domain/export.js';

export const SHORT_CHUNK = Duration.fromObject({ minutes: 15 });
export const LONG_CHUNK = Duration.fromObject({ hours: 1 });
export const LONG_CHUNK_THRESHOLD = Duration.fromObject({ hours: 2 });
export const DEFAULT_LOOKBACK = Duration.fromObject({ hours: 2 });

/**
 * Lookback actually planned: zero or negative falls back to the default
 */
export function effectiveLookback(total: Duration): Duration {
  return total.toMillis() > 0 ? total : DEFAULT_LOOKBACK;
}

export function chunkSizeFor(total: Duration): Duration {
  return effectiveLookback(total).toMillis() > LONG_CHUNK_THRESHOLD.toMillis()
    ? LONG_CHUNK
    : SHORT_CHUNK;
}

/**
 * Windows covering [now - total, now), the last one clipped to now
 */
export function planWindows(total: Duration, now: DateTime): Window[] {
  const lookbackMs = effectiveLookback(total).toMillis();
  const chunkMs = chunkSizeFor(total).toMillis();
  const endMs = now.toMillis();

  const windows: Window[] = [];
  for (let cursor = endMs - lookbackMs; cursor < endMs; cursor += chunkMs) {
    windows.push({
      index: windows.length,
      start: DateTime.fromMillis(cursor, { zone: 'utc' }),
      end: DateTime.fromMillis(Math.min(cursor + chunkMs, endMs), { zone: 'utc' }),
    });
  }
  return windows;
}

/**
 * Second-precision UTC label used in part names
 */
export function formatWindowBoundary(instant: DateTime): string {
  return instant.toUTC().toFormat("yyyy-MM-dd'T'HH:mm:ss'Z'");
}
