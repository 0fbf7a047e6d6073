/**
 * RFC 3339 timestamps as found in log rows
 *
 * Sources emit up to nanosecond precision, which luxon and Date cannot hold,
 * so the fractional part is carried separately from the epoch seconds.
 */

import { DateTime } from 'luxon';

export interface ParsedTimestamp {
  epochSeconds: number;
  nanos: number;
}

const RFC3339 =
  /^(\d{4}-\d{2}-\d{2})[Tt](\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?([Zz]|[+-]\d{2}:\d{2})$/;

export function parseTimestamp(raw: string): ParsedTimestamp | undefined {
  const match = RFC3339.exec(raw.trim());
  if (!match) {
    return undefined;
  }

  const [, date, time, fraction, offset] = match;
  const zone = offset === undefined || offset.toUpperCase() === 'Z' ? 'Z' : offset;
  const instant = DateTime.fromISO(`${date}T${time}${zone}`, { setZone: true });
  if (!instant.isValid) {
    return undefined;
  }

  return {
    epochSeconds: Math.floor(instant.toSeconds()),
    nanos: fraction ? Number(fraction.padEnd(9, '0')) : 0,
  };
}

export function compareParsed(a: ParsedTimestamp, b: ParsedTimestamp): number {
  return a.epochSeconds - b.epochSeconds || a.nanos - b.nanos;
}

/**
 * UTC rendering with up to nine fractional digits, trailing zeros trimmed
 */
export function formatTimestamp(timestamp: ParsedTimestamp): string {
  const base = DateTime.fromSeconds(timestamp.epochSeconds, { zone: 'utc' }).toFormat(
    "yyyy-MM-dd'T'HH:mm:ss"
  );
  const fraction = timestamp.nanos > 0 ? '.' + String(timestamp.nanos).padStart(9, '0').replace(/0+$/, '') : '';
  return `${base}${fraction}Z`;
}

/**
 * Canonical form of a parseable timestamp, the raw text otherwise
 */
export function canonicalTimestamp(raw: string): string {
  const parsed = parseTimestamp(raw);
  return parsed ? formatTimestamp(parsed) : raw;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order by parsed instant; when either side does not parse, fall back to
 * comparing the raw strings
 */
export function compareTimestampText(a: string, b: string): number {
  const left = parseTimestamp(a);
  const right = parseTimestamp(b);
  if (left && right) {
    return compareParsed(left, right);
  }
  return compareText(a, b);
}
