/**
 * Table Exporter
 *
 * Queries one target window by window, writes each non-empty window as an
 * NDJSON part and feeds recognized rows to the stitcher. Failed windows are
 * logged and count as empty; a summary is always written at the end.
 */

import {
  indexColumns,
  partPath,
  rowToRecord,
  schemaPath,
  summaryPath,
  type ArtifactSinkPort,
  type ExportSummary,
  type ExportTarget,
  type LogQueryPort,
  type LogQueryResult,
  type ResultTable,
  type Timespan,
  type Window,
} from '@loggather/core';
import {
  PartialResultError,
  QueryError,
  SchemaFetchError,
  logger,
} from '@loggather/utils';
import { throwIfCancelled } from './cancellation.js';
import type { RowClassifier } from './rowClassifier.js';
import type { StitchAccumulator } from './stitchAccumulator.js';

export interface ExportTableSpec {
  /** Workspace GUID the queries run against */
  workspaceGuid: string;
  target: ExportTarget;
  timespan: Timespan;
  windows: readonly Window[];
  serverTimeoutSeconds: number;
}

export interface ExportTableContext {
  logs: LogQueryPort;
  sink: ArtifactSinkPort;
  accumulator: StitchAccumulator;
  classifier: RowClassifier;
  /** Management-plane schema lookup, when the workspace was resolved there */
  fetchSchema?: (target: ExportTarget) => Promise<unknown>;
  signal?: AbortSignal;
}

/**
 * Mutable per-target progress
 */
export interface TableExportState {
  target: ExportTarget;
  schemaFetched: boolean;
  windowsRemaining: number;
  rowsTotal: number;
  partIndex: number;
  failedWindows: number;
}

export interface ExportTableResult {
  summary: ExportSummary;
  partsWritten: number;
  failedWindows: number;
  schemaFetched: boolean;
}

export async function exportTable(
  spec: ExportTableSpec,
  ctx: ExportTableContext
): Promise<ExportTableResult> {
  const state: TableExportState = {
    target: spec.target,
    schemaFetched: false,
    windowsRemaining: spec.windows.length,
    rowsTotal: 0,
    partIndex: 0,
    failedWindows: 0,
  };

  throwIfCancelled(ctx.signal, { target: spec.target });

  if (ctx.fetchSchema) {
    state.schemaFetched = await fetchSchema(spec.target, ctx);
  }

  for (const window of spec.windows) {
    throwIfCancelled(ctx.signal, { target: spec.target, window: window.index });
    await exportWindow(spec, window, state, ctx);
    state.windowsRemaining--;
  }

  const summary: ExportSummary = {
    target: spec.target,
    totalRowCount: state.rowsTotal,
    requestedDuration: spec.timespan.iso,
  };
  await ctx.sink.write(
    summaryPath(spec.target),
    JSON.stringify(
      { table: summary.target, rows: summary.totalRowCount, duration: summary.requestedDuration },
      null,
      2
    )
  );

  logger.info('[exportTable] Target exported', {
    target: spec.target,
    rows: state.rowsTotal,
    parts: state.partIndex,
    failedWindows: state.failedWindows,
  });

  return {
    summary,
    partsWritten: state.partIndex,
    failedWindows: state.failedWindows,
    schemaFetched: state.schemaFetched,
  };
}

/**
 * Best effort: a missing schema never blocks the data export
 */
async function fetchSchema(target: ExportTarget, ctx: ExportTableContext): Promise<boolean> {
  if (!ctx.fetchSchema) {
    return false;
  }

  let schema: unknown;
  try {
    schema = await ctx.fetchSchema(target);
  } catch (error) {
    throwIfCancelled(ctx.signal, { target });
    const failure = new SchemaFetchError(
      `Unable to fetch schema: ${error instanceof Error ? error.message : String(error)}`,
      target
    );
    logger.warn('[exportTable] Schema fetch failed', { target, code: failure.code, error: failure.message });
    return false;
  }

  if (schema === undefined || schema === null) {
    return false;
  }
  await ctx.sink.write(schemaPath(target), JSON.stringify(schema, null, 2));
  return true;
}

/**
 * Query, serialize and classify one window. Returns the number of rows written.
 */
export async function exportWindow(
  spec: ExportTableSpec,
  window: Window,
  state: TableExportState,
  ctx: ExportTableContext
): Promise<number> {
  const result = await queryWindow(spec, window, state, ctx);
  const table = result?.tables[0];
  if (!table || table.rows.length === 0) {
    return 0;
  }

  const shapeError = findShapeError(table);
  if (shapeError) {
    const failure = new QueryError(shapeError, spec.target, { window: window.index });
    state.failedWindows++;
    logger.warn('[exportTable] Malformed query chunk, treating as empty', {
      target: spec.target,
      window: window.index,
      code: failure.code,
      error: failure.message,
    });
    return 0;
  }

  const ndjson = table.rows.map((row) => JSON.stringify(rowToRecord(table.columns, row))).join('\n') + '\n';
  await ctx.sink.write(partPath(spec.target, state.partIndex, window), ndjson);
  state.partIndex++;
  state.rowsTotal += table.rows.length;

  if (ctx.classifier.isActive) {
    const windowClassifier = ctx.classifier.forWindow(indexColumns(table.columns));
    if (windowClassifier.isActive) {
      for (const row of table.rows) {
        windowClassifier.accept(row);
      }
      const classified = windowClassifier.flushInto(ctx.accumulator);
      logger.debug('[exportTable] Window stitched', {
        target: spec.target,
        window: window.index,
        ...classified,
      });
    }
  }

  return table.rows.length;
}

async function queryWindow(
  spec: ExportTableSpec,
  window: Window,
  state: TableExportState,
  ctx: ExportTableContext
): Promise<LogQueryResult | undefined> {
  let result: LogQueryResult;
  try {
    result = await ctx.logs.query({
      workspaceId: spec.workspaceGuid,
      query: spec.target,
      start: window.start,
      end: window.end,
      serverTimeoutSeconds: spec.serverTimeoutSeconds,
      signal: ctx.signal,
    });
  } catch (error) {
    throwIfCancelled(ctx.signal, { target: spec.target, window: window.index });
    const failure =
      error instanceof QueryError
        ? error
        : new QueryError(error instanceof Error ? error.message : String(error), spec.target);
    state.failedWindows++;
    logger.warn('[exportTable] Query chunk failed', {
      target: spec.target,
      window: window.index,
      start: window.start.toISO(),
      end: window.end.toISO(),
      code: failure.code,
      error: failure.message,
    });
    return undefined;
  }

  if (result.status === 'partial') {
    const partial = new PartialResultError(result.error, spec.target);
    logger.warn('[exportTable] Partial query result', {
      target: spec.target,
      window: window.index,
      code: partial.code,
      error: partial.message,
    });
  }
  return result;
}

function findShapeError(table: ResultTable): string | undefined {
  const width = table.columns.length;
  const malformed = table.rows.findIndex((row) => row.length !== width);
  if (malformed < 0) {
    return undefined;
  }
  return `Result row ${malformed} has ${table.rows[malformed]?.length ?? 0} cells, expected ${width}`;
}
