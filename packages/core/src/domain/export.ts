import type { DateTime, Duration } from 'luxon';

/**
 * Name of a queryable table in the workspace
 */
export type ExportTarget = string;

/**
 * Half-open query interval [start, end)
 */
export interface Window {
  index: number;
  start: DateTime;
  end: DateTime;
}

/**
 * Requested lookback, as entered (ISO form) and as a duration
 */
export interface Timespan {
  iso: string;
  duration: Duration;
}

export interface StitchKey {
  namespace: string;
  pod: string;
  container: string;
}

/**
 * Per-target totals, finalized after every window was attempted
 */
export interface ExportSummary {
  target: ExportTarget;
  totalRowCount: number;
  requestedDuration: string;
}

/**
 * Workspace coordinates on the management plane
 */
export interface WorkspaceResourceRef {
  subscriptionId: string;
  resourceGroup: string;
  workspaceName: string;
}
