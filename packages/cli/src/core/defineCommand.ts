/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing
 * - Wrapper owns: canonical option shape (camelCase), value coercion, schema
 *   validation, error formatting, handler invocation
 *
 * Validation always uses commandDef.schema from the registry.
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import { NotFoundError } from '@loggather/utils';
import { executeValidated } from './execute.js';
import { commandRegistry } from './command-registry.js';
import { validateAndCoerceArgs } from './validation-pipeline.js';

type CoerceFn = (raw: Record<string, unknown>) => Record<string, unknown>;

export type DefineCommandArgs = {
  name: string;
  packageName: string;
  // Merge Commander positional arguments into options before coercion
  argsToOpts?: (args: unknown[], rawOpts: Record<string, unknown>) => Record<string, unknown>;
  // Value coercion only (numbers), NOT key renaming
  coerce?: CoerceFn;
  onError?: (e: unknown) => never;
};

export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  const examplesHelp = commandRegistry.generateExamplesHelp(args.packageName, args.name);
  if (examplesHelp) {
    cmd.addHelpText('after', examplesHelp);
  }

  cmd.action(async (...commanderArgs: unknown[]) => {
    try {
      const commandDef = commandRegistry.getCommand(args.packageName, args.name);
      if (!commandDef) {
        throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
      }

      // Commander gives camelCase keys already
      const rawOpts: Record<string, unknown> = cmd.opts();
      const merged = args.argsToOpts ? args.argsToOpts(commanderArgs, rawOpts) : rawOpts;
      const coerced = args.coerce ? args.coerce(merged) : merged;

      const validated: Record<string, unknown> = validateAndCoerceArgs(commandDef.schema, coerced);
      await executeValidated(commandDef, validated);
    } catch (e) {
      if (args.onError) {
        args.onError(e);
      }
      throw e;
    }
  });

  return cmd;
}
