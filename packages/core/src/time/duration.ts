/**
 * Timespan input handling
 *
 * Accepts either an ISO-8601 time duration (`PT2H`, `PT1H30M`) or the short
 * form (`2h30m45s`). Only the time designator is supported: the log source
 * takes hour/minute/second lookbacks.
 */

import { Duration } from 'luxon';
import { ConfigurationError } from '@loggather/utils';
import type { Timespan } from '../domain/export.js';

export const DEFAULT_TIMESPAN_ISO = 'PT2H';

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  µs: 1e-3,
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SIMPLE_SEGMENT = /^(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|ms|h|m|s)/;
const ISO_TIME = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/;

/**
 * Parse the short form (`1h`, `90m`, `2h30m45s`, `1.5h`) into milliseconds
 */
export function parseSimpleDuration(input: string): number {
  let rest = input.trim();
  let sign = 1;
  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === '0') {
    return 0;
  }
  if (rest === '') {
    throw new ConfigurationError(`Invalid duration: "${input}"`, 'timespan');
  }

  let totalMs = 0;
  while (rest.length > 0) {
    const match = SIMPLE_SEGMENT.exec(rest);
    if (!match) {
      throw new ConfigurationError(`Invalid duration: "${input}"`, 'timespan');
    }
    const [segment, amount, unit] = match;
    totalMs += Number(amount) * (UNIT_MS[unit ?? ''] ?? 0);
    rest = rest.slice(segment.length);
  }

  return sign * totalMs;
}

/**
 * Convert user input to the ISO form sent to the log source.
 * ISO input is returned upper-cased; the short form becomes `PT<h>H<m>M<s>S`
 * with whole seconds.
 */
export function toIsoTimespan(input: string): string {
  const trimmed = input.trim();
  if (/^p/i.test(trimmed)) {
    const iso = trimmed.toUpperCase();
    parseIsoTimespan(iso);
    return iso;
  }

  const totalSeconds = Math.trunc(Math.abs(parseSimpleDuration(trimmed)) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `PT${hours}H${minutes}M${seconds}S`;
}

/**
 * Parse `PT[nH][nM][nS]` into a duration
 */
export function parseIsoTimespan(iso: string): Duration {
  const normalized = iso.trim().toUpperCase();
  if (!normalized.startsWith('PT')) {
    throw new ConfigurationError(
      `Unsupported timespan "${iso}": only time-based ISO 8601 durations (PT...) are supported`,
      'timespan'
    );
  }

  const match = ISO_TIME.exec(normalized);
  if (!match || normalized === 'PT') {
    throw new ConfigurationError(`Invalid ISO 8601 timespan: "${iso}"`, 'timespan');
  }

  const [, hours, minutes, seconds] = match;
  return Duration.fromObject({
    hours: Number(hours ?? 0),
    minutes: Number(minutes ?? 0),
    seconds: Number(seconds ?? 0),
  });
}

/**
 * Resolve timespan input (either form, empty for the default)
 */
export function parseTimespan(input: string | undefined): Timespan {
  const raw = input?.trim() || DEFAULT_TIMESPAN_ISO;
  const iso = toIsoTimespan(raw);
  return { iso, duration: parseIsoTimespan(iso) };
}
