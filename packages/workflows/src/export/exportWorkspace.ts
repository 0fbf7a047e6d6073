/**
 * Export Workspace Workflow
 *
 * Resolves the workspace and target list, exports every target window by
 * window into the artifact sink, then writes the stitched log streams and
 * the index. Window and target failures are isolated; configuration, sink
 * and cancellation errors end the run.
 */

import { z } from 'zod';
import { DateTime } from 'luxon';
import {
  AZURE_METADATA_PATH,
  INDEX_PATH,
  WORKSPACE_METADATA_PATH,
  containerLogPath,
  eventLogPath,
  parseTimespan,
  planWindows,
  resolveTargets,
  type ArtifactSinkFactory,
  type ArtifactSinkPort,
  type ClockPort,
  type ExportSummary,
  type ExportTarget,
  type LogQueryPort,
  type TargetSource,
  type Timespan,
  type WorkspaceCatalogPort,
} from '@loggather/core';
import {
  ConfigurationError,
  TargetExportError,
  ValidationError,
  isFatalError,
  logger,
} from '@loggather/utils';
import { throwIfCancelled } from './cancellation.js';
import { exportTable } from './exportTable.js';
import { resolveExtraction } from './extraction.js';
import { RowClassifier } from './rowClassifier.js';
import { StitchAccumulator } from './stitchAccumulator.js';
import { resolveWorkspace, type ResolvedWorkspace } from '../workspace/resolveWorkspace.js';

export const ExportWorkspaceSpecSchema = z.object({
  /** ARM resource ID of the workspace, or its GUID */
  workspaceId: z.string().trim().min(1).optional(),
  /** Workspace GUID; skips the management-plane lookup */
  workspaceGuid: z.string().trim().min(1).optional(),
  /** ISO 8601 (PT2H) or short form (2h30m) */
  timespan: z.string().optional(),
  /** Comma-separated tables, overrides profiles */
  tables: z.string().optional(),
  /** Comma-separated profile names */
  profiles: z.string().optional(),
  allTables: z.boolean().default(false),
  stitchLogs: z.boolean().default(true),
  stitchIncludeEvents: z.boolean().default(true),
  queryTimeoutSeconds: z.number().int().positive().default(180),
});

export type ExportWorkspaceSpec = z.input<typeof ExportWorkspaceSpecSchema>;

export interface ExportWorkspaceContext {
  logs: LogQueryPort;
  /** Management plane; required for resource IDs and --all-tables */
  catalog?: WorkspaceCatalogPort;
  createSink: ArtifactSinkFactory;
  clock: ClockPort;
  signal?: AbortSignal;
}

export interface ExportWorkspaceResult {
  location: string;
  workspaceGuid: string;
  workspaceId?: string;
  timespan: string;
  targets: ExportTarget[];
  targetSource: TargetSource;
  warnings: string[];
  summaries: ExportSummary[];
  failedTargets: Array<{ target: ExportTarget; error: string }>;
  containerStreams: number;
  eventStreams: number;
}

export async function exportWorkspace(
  spec: ExportWorkspaceSpec,
  ctx: ExportWorkspaceContext
): Promise<ExportWorkspaceResult> {
  const parsed = ExportWorkspaceSpecSchema.safeParse(spec);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid export spec: ${msg}`, { issues: parsed.error.issues });
  }
  const validated = parsed.data;

  const timespan = parseTimespan(validated.timespan);
  const workspace = await resolveWorkspace(
    { workspaceId: validated.workspaceId, workspaceGuid: validated.workspaceGuid },
    ctx.catalog
  );

  let catalogTables: string[] | undefined;
  if (validated.allTables) {
    catalogTables = await listCatalogTables(workspace, ctx);
  }

  const resolved = resolveTargets({
    tables: validated.tables,
    profiles: validated.profiles,
    allTables: validated.allTables,
    catalogTables,
  });
  for (const warning of resolved.warnings) {
    logger.warn(`[exportWorkspace] ${warning}`);
  }

  logger.info('[exportWorkspace] Starting export', {
    workspaceGuid: workspace.guid,
    timespan: timespan.iso,
    targets: resolved.targets.length,
    targetSource: resolved.source,
  });

  const sink = await ctx.createSink();
  let failure: unknown;
  try {
    return await runExport(sink, workspace, timespan, resolved.targets, validated, ctx, {
      workspaceId: validated.workspaceId,
      targetSource: resolved.source,
      warnings: resolved.warnings,
    });
  } catch (error) {
    failure = error;
    throw error;
  } finally {
    try {
      await sink.close();
    } catch (closeError) {
      if (failure === undefined) {
        throw closeError;
      }
      logger.error('[exportWorkspace] Unable to close artifact sink', closeError, {
        location: sink.location,
      });
    }
  }
}

async function runExport(
  sink: ArtifactSinkPort,
  workspace: ResolvedWorkspace,
  timespan: Timespan,
  targets: ExportTarget[],
  options: z.output<typeof ExportWorkspaceSpecSchema>,
  ctx: ExportWorkspaceContext,
  extra: { workspaceId?: string; targetSource: TargetSource; warnings: string[] }
): Promise<ExportWorkspaceResult> {
  await sink.write(
    WORKSPACE_METADATA_PATH,
    JSON.stringify(
      {
        generatedAt: new Date(ctx.clock.nowMs()).toISOString(),
        workspaceGUID: workspace.guid,
        workspaceID: extra.workspaceId ?? '',
        timespan: timespan.iso,
        tablesCount: targets.length,
      },
      null,
      2
    )
  );
  if (workspace.ref) {
    await sink.write(AZURE_METADATA_PATH, JSON.stringify(workspace.ref, null, 2));
  }

  const accumulator = new StitchAccumulator();
  const stitchOptions = { stitchLogs: options.stitchLogs, includeEvents: options.stitchIncludeEvents };
  const summaries: ExportSummary[] = [];
  const failedTargets: ExportWorkspaceResult['failedTargets'] = [];
  const { catalog } = ctx;
  const ref = workspace.ref;
  const fetchSchema =
    catalog && ref ? (target: ExportTarget) => catalog.getTableSchema(ref, target) : undefined;

  for (const target of targets) {
    throwIfCancelled(ctx.signal, { target });
    logger.info(`[exportWorkspace] Exporting ${target}`);

    try {
      const windows = planWindows(timespan.duration, DateTime.fromMillis(ctx.clock.nowMs(), { zone: 'utc' }));
      const result = await exportTable(
        {
          workspaceGuid: workspace.guid,
          target,
          timespan,
          windows,
          serverTimeoutSeconds: options.queryTimeoutSeconds,
        },
        {
          logs: ctx.logs,
          sink,
          accumulator,
          classifier: new RowClassifier(resolveExtraction(target, stitchOptions)),
          fetchSchema,
          signal: ctx.signal,
        }
      );
      summaries.push(result.summary);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      const failure = new TargetExportError(
        error instanceof Error ? error.message : String(error),
        target
      );
      logger.error('[exportWorkspace] Target export failed, skipping', failure, { target });
      failedTargets.push({ target, error: failure.message });
    }
  }

  throwIfCancelled(ctx.signal);
  await assembleArtifacts(sink, accumulator, targets, options.stitchIncludeEvents);

  logger.info('[exportWorkspace] Export complete', {
    location: sink.location,
    targets: targets.length,
    failedTargets: failedTargets.length,
    containerStreams: accumulator.containerStreamCount,
    eventStreams: accumulator.eventStreamCount,
  });

  return {
    location: sink.location,
    workspaceGuid: workspace.guid,
    workspaceId: extra.workspaceId,
    timespan: timespan.iso,
    targets,
    targetSource: extra.targetSource,
    warnings: extra.warnings,
    summaries,
    failedTargets,
    containerStreams: accumulator.containerStreamCount,
    eventStreams: options.stitchIncludeEvents ? accumulator.eventStreamCount : 0,
  };
}

/**
 * Flush stitched buffers, then the index
 */
export async function assembleArtifacts(
  sink: ArtifactSinkPort,
  accumulator: StitchAccumulator,
  targets: readonly ExportTarget[],
  includeEvents: boolean
): Promise<void> {
  const written = new Set<string>();
  const noteCollision = (artifactPath: string, source: Record<string, string>) => {
    if (written.has(artifactPath)) {
      logger.debug('[assembleArtifacts] Stitched stream path already written, overwriting', {
        path: artifactPath,
        ...source,
      });
    }
    written.add(artifactPath);
  };

  for (const stream of accumulator.containerStreams()) {
    if (stream.content.length > 0) {
      const artifactPath = containerLogPath(stream.key);
      noteCollision(artifactPath, { ...stream.key });
      await sink.write(artifactPath, stream.content);
    }
  }

  if (includeEvents) {
    for (const stream of accumulator.eventStreams()) {
      if (stream.content.length > 0) {
        const artifactPath = eventLogPath(stream.namespace);
        noteCollision(artifactPath, { namespace: stream.namespace });
        await sink.write(artifactPath, stream.content);
      }
    }
  }

  await sink.write(INDEX_PATH, JSON.stringify({ tables: targets }, null, 2));
}

async function listCatalogTables(
  workspace: ResolvedWorkspace,
  ctx: ExportWorkspaceContext
): Promise<string[]> {
  if (!workspace.ref || !ctx.catalog) {
    throw new ConfigurationError(
      'Exporting all tables requires a workspace resource ID and management-plane access',
      'allTables'
    );
  }
  try {
    return await ctx.catalog.listTables(workspace.ref);
  } catch (error) {
    throw new ConfigurationError(
      `Unable to list workspace tables: ${error instanceof Error ? error.message : String(error)}`,
      'allTables',
      { ...workspace.ref }
    );
  }
}
