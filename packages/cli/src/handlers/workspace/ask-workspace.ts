import * as path from 'path';
import { runAssistedQuery } from '@loggather/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { AskWorkspaceArgs } from '../../command-defs/workspace.js';
import { resolveWorkspaceFlags } from './workspace-flags.js';

export interface AskReport {
  question: string;
  query: string;
  resultsDir: string;
  tableCount: number;
  rowCount: number;
  analyzed: boolean;
  report: string;
}

export async function askWorkspaceHandler(
  args: AskWorkspaceArgs,
  ctx: CommandContext
): Promise<AskReport> {
  const result = await runAssistedQuery(
    {
      ...resolveWorkspaceFlags(args, ctx.config),
      question: args.question,
      timespan: args.timespan ?? ctx.config.timespan,
      queryTimeoutSeconds: args.queryTimeoutSeconds ?? ctx.config.queryTimeoutSeconds,
      validationTimeoutSeconds: ctx.config.validationTimeoutSeconds,
    },
    {
      logs: ctx.services.logs(),
      catalog: ctx.services.catalog(),
      generator: ctx.services.queryGenerator(),
      createResultsSink: (name) => ctx.services.createSink(path.resolve(name)),
      clock: ctx.services.clock(),
      signal: ctx.signal,
    }
  );

  return {
    question: args.question,
    query: result.query,
    resultsDir: result.resultsDir,
    tableCount: result.tables.length,
    rowCount: result.tables.reduce((sum, table) => sum + table.rows.length, 0),
    analyzed: result.analysis !== undefined,
    report: result.report,
  };
}
