/**
 * Universal Command Executor
 *
 * Handles the shared steps around every handler:
 * - Build the command context
 * - Split the output format from the handler arguments
 * - Call the handler and format its result
 * - Error reporting and exit codes
 */

import { logger } from '@loggather/utils';
import type { CommandDefinition, OutputFormat } from '../types/index.js';
import { commandRegistry } from './command-registry.js';
import { CommandContext } from './command-context.js';
import { die } from './cliErrors.js';
import { getCliAbortSignal } from './interrupts.js';
import { formatOutput } from './output-formatter.js';
import { formatElapsedTime, getProgressIndicator, resetProgressIndicator } from './progress-indicator.js';

function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'table';
}

/**
 * Run a handler with validated arguments and return the formatted output
 */
export async function runCommand(
  commandDef: CommandDefinition,
  validatedArgs: Record<string, unknown>,
  ctx: CommandContext
): Promise<string> {
  // Format is a CLI concern, not a handler concern
  const { format, ...handlerArgs } = validatedArgs;
  const result = await commandDef.handler(handlerArgs, ctx);
  return formatOutput(result, isOutputFormat(format) ? format : 'table');
}

/**
 * Execute a command definition with pre-validated arguments
 *
 * Prints the output on success; on failure prints a sanitized message and
 * exits 1 (130 when cancelled).
 */
export async function executeValidated(
  commandDef: CommandDefinition,
  validatedArgs: Record<string, unknown>
): Promise<void> {
  const packageName = commandRegistry.findPackageName(commandDef.name);
  const fullCommandName = packageName ? `${packageName}.${commandDef.name}` : commandDef.name;
  const progress = getProgressIndicator();
  const startedAt = Date.now();

  try {
    progress.start(`Running ${fullCommandName}...`);
    const ctx = new CommandContext({ signal: getCliAbortSignal() });
    const output = await runCommand(commandDef, validatedArgs, ctx);
    progress.stop();
    logger.debug('Command finished', {
      command: fullCommandName,
      elapsed: formatElapsedTime(Date.now() - startedAt),
    });
    console.log(output);
  } catch (error) {
    progress.fail('Error occurred');
    die(error);
  } finally {
    resetProgressIndicator();
  }
}
