/**
 * Unified Validation and Coercion Pipeline
 *
 * Single path for CLI argument validation:
 * 1. Normalize options (Commander.js → flat object)
 * 2. Validate with the command's Zod schema
 */

import type { z } from 'zod';
import { normalizeOptions, parseArguments } from './argument-parser.js';

/**
 * @throws ValidationError if validation fails
 */
export function validateAndCoerceArgs<T extends z.ZodTypeAny>(
  schema: T,
  rawOptions: Record<string, unknown>
): z.infer<T> {
  return parseArguments(schema, normalizeOptions(rawOptions));
}
