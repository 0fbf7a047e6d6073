/**
 * Assisted Query Workflow
 *
 * Question → generated query → client and server validation (with repair)
 * → execution over the requested timespan → results directory → analysis.
 */

import { z } from 'zod';
import { DateTime } from 'luxon';
import {
  AZURE_METADATA_PATH,
  WORKSPACE_METADATA_PATH,
  cellToJson,
  parseTimespan,
  runStamp,
  type ArtifactSinkPort,
  type ClockPort,
  type LogQueryPort,
  type QueryGeneratorPort,
  type ResultTable,
  type WorkspaceCatalogPort,
} from '@loggather/core';
import {
  AppError,
  QueryError,
  QueryGenerationError,
  ValidationError,
  logger,
} from '@loggather/utils';
import { throwIfCancelled } from '../export/cancellation.js';
import { resolveWorkspace } from '../workspace/resolveWorkspace.js';
import { basicQueryValidation } from './basicValidation.js';
import { ASSISTED_QUERY_TABLES } from './knownTables.js';
import { renderResultTables } from './renderResults.js';
import { validateAndFixQuery } from './validateQuery.js';

export const RESULTS_DIR = 'ai-query-results';

export const AssistedQuerySpecSchema = z.object({
  question: z.string().trim().min(1, 'question is required'),
  workspaceId: z.string().trim().min(1).optional(),
  workspaceGuid: z.string().trim().min(1).optional(),
  timespan: z.string().optional(),
  queryTimeoutSeconds: z.number().int().positive().default(180),
  validationTimeoutSeconds: z.number().int().positive().default(30),
});

export type AssistedQuerySpec = z.input<typeof AssistedQuerySpecSchema>;

export interface AssistedQueryContext {
  logs: LogQueryPort;
  catalog?: WorkspaceCatalogPort;
  generator: QueryGeneratorPort;
  /** Opens the results location for a run directory name */
  createResultsSink: (name: string) => Promise<ArtifactSinkPort>;
  clock: ClockPort;
  signal?: AbortSignal;
}

export interface AssistedQueryResult {
  query: string;
  resultsDir: string;
  tables: ResultTable[];
  analysis?: string;
  /** Analysis when available, otherwise the raw rendering */
  report: string;
}

export async function runAssistedQuery(
  spec: AssistedQuerySpec,
  ctx: AssistedQueryContext
): Promise<AssistedQueryResult> {
  const parsed = AssistedQuerySpecSchema.safeParse(spec);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid assisted query spec: ${msg}`, { issues: parsed.error.issues });
  }
  const validated = parsed.data;

  const timespan = parseTimespan(validated.timespan);
  const workspace = await resolveWorkspace(
    { workspaceId: validated.workspaceId, workspaceGuid: validated.workspaceGuid },
    ctx.catalog
  );
  const knownTargets = ASSISTED_QUERY_TABLES;

  logger.info('[runAssistedQuery] Generating query', { question: validated.question });
  const generated = await generateQuery(validated.question, knownTargets, ctx);
  logger.info('[runAssistedQuery] Generated query', { query: generated });

  basicQueryValidation(generated, knownTargets);
  const query = await validateAndFixQuery(validated.question, generated, knownTargets, {
    logs: ctx.logs,
    generator: ctx.generator,
    workspaceGuid: workspace.guid,
    clock: ctx.clock,
    timeoutSeconds: validated.validationTimeoutSeconds,
    signal: ctx.signal,
  });

  const now = DateTime.fromMillis(ctx.clock.nowMs(), { zone: 'utc' });
  let tables: ResultTable[];
  try {
    const result = await ctx.logs.query({
      workspaceId: workspace.guid,
      query,
      start: now.minus(timespan.duration),
      end: now,
      serverTimeoutSeconds: validated.queryTimeoutSeconds,
      signal: ctx.signal,
    });
    if (result.status === 'partial') {
      logger.warn('[runAssistedQuery] Partial query result', { error: result.error });
    }
    tables = result.tables;
  } catch (error) {
    throwIfCancelled(ctx.signal);
    throw new QueryError(
      `failed to execute query: ${error instanceof Error ? error.message : String(error)}`,
      'assisted-query',
      { query }
    );
  }

  const sink = await ctx.createResultsSink(`ai-results-${runStamp(now)}`);
  try {
    await sink.write(
      WORKSPACE_METADATA_PATH,
      JSON.stringify(
        {
          generatedAt: now.toISO(),
          workspaceGUID: workspace.guid,
          workspaceID: validated.workspaceId ?? '',
          timespan: timespan.iso,
          assistedQuery: true,
          question: validated.question,
          query,
        },
        null,
        2
      )
    );
    if (workspace.ref) {
      await sink.write(AZURE_METADATA_PATH, JSON.stringify(workspace.ref, null, 2));
    }
    if (tables.length > 0) {
      await writeResultTables(sink, query, tables, now);
    }
  } finally {
    await sink.close();
  }
  logger.info('[runAssistedQuery] Results written', { location: sink.location, tables: tables.length });

  const analysis = await analyzeResults(validated.question, query, sink.location, ctx);
  return {
    query,
    resultsDir: sink.location,
    tables,
    analysis,
    report: analysis ?? renderResultTables(tables),
  };
}

async function generateQuery(
  question: string,
  knownTargets: readonly string[],
  ctx: AssistedQueryContext
): Promise<string> {
  try {
    return await ctx.generator.generate(question, knownTargets, ctx.signal);
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new QueryGenerationError(
      `failed to generate query: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

async function writeResultTables(
  sink: ArtifactSinkPort,
  query: string,
  tables: readonly ResultTable[],
  now: DateTime
): Promise<void> {
  await sink.write(`${RESULTS_DIR}/query.kql`, query);
  for (const [i, table] of tables.entries()) {
    await sink.write(
      `${RESULTS_DIR}/table_${i}.json`,
      JSON.stringify(
        {
          name: table.name,
          columns: table.columns,
          rows: table.rows.map((row) => row.map(cellToJson)),
        },
        null,
        2
      )
    );
  }
  await sink.write(
    `${RESULTS_DIR}/summary.json`,
    JSON.stringify({ tableCount: tables.length, timestamp: now.toISO() }, null, 2)
  );
}

/**
 * Generator analysis of the written results; undefined when it fails or says nothing
 */
async function analyzeResults(
  question: string,
  query: string,
  resultsDir: string,
  ctx: AssistedQueryContext
): Promise<string | undefined> {
  if (!ctx.generator.analyze) {
    return undefined;
  }

  let analysis: string;
  try {
    analysis = await ctx.generator.analyze({ intent: question, query, resultsDir }, ctx.signal);
  } catch (error) {
    throwIfCancelled(ctx.signal);
    logger.warn('[runAssistedQuery] Analysis failed, falling back to raw results', {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }

  if (analysis.trim() === '') {
    logger.warn('[runAssistedQuery] Analysis was empty, falling back to raw results');
    return undefined;
  }
  return analysis.trim();
}
