import { DateTime } from 'luxon';
import { defaultArchiveName, type ExportTarget, type TargetSource } from '@loggather/core';
import { exportWorkspace } from '@loggather/workflows';
import type { CommandContext } from '../../core/command-context.js';
import type { ExportWorkspaceArgs } from '../../command-defs/workspace.js';
import { resolveWorkspaceFlags } from './workspace-flags.js';

export interface ExportReport {
  location: string;
  workspaceGuid: string;
  timespan: string;
  targetSource: TargetSource;
  targetCount: number;
  tables: Array<{ table: ExportTarget; rows: number; duration: string }>;
  failedTargets: Array<{ target: ExportTarget; error: string }>;
  warnings: string[];
  containerStreams: number;
  eventStreams: number;
}

export async function exportWorkspaceHandler(
  args: ExportWorkspaceArgs,
  ctx: CommandContext
): Promise<ExportReport> {
  const clock = ctx.services.clock();
  const out =
    args.out ?? defaultArchiveName(DateTime.fromMillis(clock.nowMs(), { zone: 'utc' }));

  const result = await exportWorkspace(
    {
      ...resolveWorkspaceFlags(args, ctx.config),
      timespan: args.timespan ?? ctx.config.timespan,
      tables: args.tables,
      profiles: args.profiles,
      allTables: args.allTables,
      stitchLogs: args.stitchLogs,
      stitchIncludeEvents: args.stitchIncludeEvents,
      queryTimeoutSeconds: args.queryTimeoutSeconds ?? ctx.config.queryTimeoutSeconds,
    },
    {
      logs: ctx.services.logs(),
      catalog: ctx.services.catalog(),
      createSink: () => ctx.services.createSink(out),
      clock,
      signal: ctx.signal,
    }
  );

  return {
    location: result.location,
    workspaceGuid: result.workspaceGuid,
    timespan: result.timespan,
    targetSource: result.targetSource,
    targetCount: result.targets.length,
    tables: result.summaries.map((summary) => ({
      table: summary.target,
      rows: summary.totalRowCount,
      duration: summary.requestedDuration,
    })),
    failedTargets: result.failedTargets,
    warnings: result.warnings,
    containerStreams: result.containerStreams,
    eventStreams: result.eventStreams,
  };
}
