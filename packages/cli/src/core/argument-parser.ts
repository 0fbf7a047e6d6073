/**
 * Argument Parser - Zod-based validation and parsing
 */

import { z } from 'zod';
import { ValidationError } from '@loggather/utils';

/**
 * Parse and validate arguments using Zod schema
 */
export function parseArguments<T extends z.ZodTypeAny>(
  schema: T,
  rawArgs: Record<string, unknown>
): z.infer<T> {
  const result = schema.safeParse(rawArgs);
  if (result.success) {
    return result.data;
  }

  const messages = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `  ${path}: ${issue.message}`;
  });

  throw new ValidationError(`Invalid arguments:\n${messages.join('\n')}`, {
    issues: result.error.issues,
    formattedMessages: messages,
  });
}

/**
 * Normalize Commander.js options to a flat object.
 *
 * Keys are never renamed: Commander already turns `--workspace-id` into
 * `workspaceId`. Unset options are dropped so schema defaults apply, and
 * string values are kept as strings (questions, GUIDs and timespans may look
 * numeric).
 */
export function normalizeOptions(options: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(options)) {
    if (value === undefined || value === null) {
      continue;
    }
    normalized[key] = typeof value === 'string' ? value.trim() : value;
  }

  return normalized;
}
