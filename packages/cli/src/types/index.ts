/**
 * CLI-specific type definitions
 */

import type { z } from 'zod';
import type { CommandContext } from '../core/command-context.js';

export type OutputFormat = 'json' | 'table';

/**
 * Command definition structure
 */
export interface CommandDefinition<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  /**
   * Command name (e.g., 'export', 'list')
   */
  name: string;

  description: string;

  /**
   * Zod schema for argument validation; the handler receives its output
   */
  schema: TSchema;

  handler(args: z.infer<TSchema>, ctx: CommandContext): Promise<unknown>;

  examples?: string[];
}

/**
 * Package command module structure
 */
export interface PackageCommandModule {
  /**
   * Package name (e.g., 'workspace', 'profiles')
   */
  packageName: string;

  description: string;

  commands: CommandDefinition[];
}

/**
 * Keeps the handler's argument type tied to its schema
 */
export function commandDefinition<TSchema extends z.ZodTypeAny>(
  definition: CommandDefinition<TSchema>
): CommandDefinition {
  return definition;
}
