/**
 * LogQuery Port
 *
 * Runs one query against the workspace over one time interval.
 */

import type { DateTime } from 'luxon';
import type { ResultTable } from '../domain/cells.js';

export interface LogQueryRequest {
  /** Workspace GUID (customer ID) */
  workspaceId: string;
  query: string;
  start: DateTime;
  end: DateTime;
  /** Server-side wait budget */
  serverTimeoutSeconds: number;
  signal?: AbortSignal;
}

export type LogQueryResult =
  | { status: 'success'; tables: ResultTable[] }
  | { status: 'partial'; tables: ResultTable[]; error: string };

export interface LogQueryPort {
  /**
   * Resolves with all returned tables; rejects when the query failed as a whole.
   */
  query(request: LogQueryRequest): Promise<LogQueryResult>;
}
