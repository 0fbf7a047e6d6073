/**
 * LogQueryPort Azure Monitor Adapter
 *
 * Runs queries through the Log Analytics query endpoint and converts the
 * returned tables into the columnar result model.
 */

import {
  LogsQueryClient,
  LogsQueryResultStatus,
  type LogsQueryResult as AzureLogsQueryResult,
  type LogsTable,
} from '@azure/monitor-query';
import type { TokenCredential } from '@azure/identity';
import {
  toCell,
  type LogQueryPort,
  type LogQueryRequest,
  type LogQueryResult,
  type ResultTable,
} from '@loggather/core';
import { CancellationError, QueryError } from '@loggather/utils';

export type LogsQueryClientLike = Pick<LogsQueryClient, 'queryWorkspace'>;

export function toResultTable(table: LogsTable): ResultTable {
  return {
    name: table.name,
    columns: table.columnDescriptors.map((column) => column.name ?? ''),
    rows: table.rows.map((row) => row.map((value) => toCell(value))),
  };
}

function describeQueryFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return code && !error.message.includes(code) ? `${code}: ${error.message}` : error.message;
}

/**
 * Creates a LogQueryPort backed by LogsQueryClient
 */
export function createAzureLogsQueryAdapter(
  credential: TokenCredential,
  client: LogsQueryClientLike = new LogsQueryClient(credential)
): LogQueryPort {
  return {
    async query(request: LogQueryRequest): Promise<LogQueryResult> {
      let result: AzureLogsQueryResult;
      try {
        result = await client.queryWorkspace(
          request.workspaceId,
          request.query,
          { startTime: request.start.toJSDate(), endTime: request.end.toJSDate() },
          { serverTimeoutInSeconds: request.serverTimeoutSeconds, abortSignal: request.signal }
        );
      } catch (error) {
        if (request.signal?.aborted) {
          throw new CancellationError('Query cancelled', { query: request.query });
        }
        throw new QueryError(describeQueryFailure(error), request.query, {
          start: request.start.toISO(),
          end: request.end.toISO(),
        });
      }

      if (result.status === LogsQueryResultStatus.PartialFailure) {
        return {
          status: 'partial',
          tables: result.partialTables.map(toResultTable),
          error: describeQueryFailure(result.partialError),
        };
      }
      return { status: 'success', tables: result.tables.map(toResultTable) };
    },
  };
}
