/**
 * Workspace Commands - log export and assisted queries
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { commandDefinition } from '../types/index.js';
import { commandRegistry } from '../core/command-registry.js';
import { defineCommand } from '../core/defineCommand.js';
import { die } from '../core/cliErrors.js';
import { coerceNumber } from '../core/coerce.js';
import { askWorkspaceSchema, exportWorkspaceSchema } from '../command-defs/workspace.js';
import { exportWorkspaceHandler } from '../handlers/workspace/export-workspace.js';
import { askWorkspaceHandler } from '../handlers/workspace/ask-workspace.js';

function coerceTimeout(raw: Record<string, unknown>): Record<string, unknown> {
  return {
    ...raw,
    queryTimeoutSeconds: coerceNumber(raw.queryTimeoutSeconds, 'queryTimeoutSeconds'),
  };
}

function addWorkspaceOptions(cmd: Command): Command {
  return cmd
    .option('--workspace-id <id>', 'Workspace ARM resource ID (or GUID)')
    .option('--workspace-guid <guid>', 'Workspace GUID; skips the management-plane lookup')
    .option('--timespan <timespan>', 'Lookback, ISO 8601 (PT2H) or short form (2h30m)')
    .option('--query-timeout-seconds <seconds>', 'Server wait budget per query');
}

/**
 * Register workspace commands
 */
export function registerWorkspaceCommands(program: Command): void {
  const workspaceCmd = program
    .command('workspace')
    .description('Export logs from a Log Analytics workspace');

  const exportCmd = addWorkspaceOptions(
    workspaceCmd.command('export').description('Export tables window by window into an archive')
  )
    .option('--out <path>', 'Output .tar.gz/.tgz archive or directory')
    .option('--tables <tables>', 'Comma-separated tables (overrides profiles)')
    .option('--profiles <profiles>', 'Comma-separated table profiles')
    .option('--all-tables', 'Export every table in the workspace')
    .option('--no-stitch-logs', 'Skip stitched container and event logs')
    .option('--no-stitch-include-events', 'Leave Kubernetes events out of the stitched logs')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(exportCmd, {
    name: 'export',
    packageName: 'workspace',
    coerce: coerceTimeout,
    onError: die,
  });

  const askCmd = addWorkspaceOptions(
    workspaceCmd
      .command('ask')
      .description('Answer a question with a generated, validated query')
      .argument('<question>', 'Question about the workspace logs')
  ).option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(askCmd, {
    name: 'ask',
    packageName: 'workspace',
    argsToOpts: (args, rawOpts) => ({ ...rawOpts, question: args[0] }),
    coerce: coerceTimeout,
    onError: die,
  });
}

const workspaceModule: PackageCommandModule = {
  packageName: 'workspace',
  description: 'Export logs from a Log Analytics workspace',
  commands: [
    commandDefinition({
      name: 'export',
      description: 'Export tables window by window into an archive',
      schema: exportWorkspaceSchema,
      handler: exportWorkspaceHandler,
      examples: [
        'loggather workspace export --workspace-id /subscriptions/<sub>/resourceGroups/<rg>/providers/Microsoft.OperationalInsights/workspaces/<ws>',
        'loggather workspace export --workspace-guid <guid> --tables ContainerLogV2,KubeEvents --timespan 30m',
        'loggather workspace export --workspace-guid <guid> --profiles podLogs,metrics --out ./export',
      ],
    }),
    commandDefinition({
      name: 'ask',
      description: 'Answer a question with a generated, validated query',
      schema: askWorkspaceSchema,
      handler: askWorkspaceHandler,
      examples: ['loggather workspace ask "why are pods restarting?" --workspace-guid <guid>'],
    }),
  ],
};

commandRegistry.registerPackage(workspaceModule);
