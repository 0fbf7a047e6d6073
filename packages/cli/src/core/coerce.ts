/**
 * Value Coercion Helpers
 *
 * These functions coerce values but NEVER rename keys.
 * Use these in defineCommand's coerce() function.
 */

import { ValidationError } from '@loggather/utils';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Coerce a value to a number
 * Accepts:
 * - Number: returns as-is
 * - String number: '123' -> 123
 * - undefined/null returns undefined
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && v.trim() !== '') {
    const n = Number(v);
    if (!Number.isFinite(n))
      throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
    return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
}
