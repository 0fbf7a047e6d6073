/**
 * Artifact layout
 *
 * ```
 * metadata/workspace.json
 * metadata/azure.json
 * tables/<target>/schema.json
 * tables/<target>/parts/NNNN-<start>_<end>.ndjson
 * tables/<target>/summary.json
 * namespaces/<ns>/pods/<pod>/<container>.log
 * namespaces/<ns>/events/events.log
 * index.json
 * ```
 */

import type { DateTime } from 'luxon';
import type { StitchKey, Window } from '../domain/export.js';
import { formatWindowBoundary } from '../time/windows.js';
import { sanitizeName } from './sanitize.js';

export const WORKSPACE_METADATA_PATH = 'metadata/workspace.json';
export const AZURE_METADATA_PATH = 'metadata/azure.json';
export const INDEX_PATH = 'index.json';

export function tableDir(target: string): string {
  return `tables/${sanitizeName(target)}`;
}

export function schemaPath(target: string): string {
  return `${tableDir(target)}/schema.json`;
}

export function summaryPath(target: string): string {
  return `${tableDir(target)}/summary.json`;
}

export function partPath(target: string, sequence: number, window: Window): string {
  const seq = String(sequence).padStart(4, '0');
  const range = `${formatWindowBoundary(window.start)}_${formatWindowBoundary(window.end)}`;
  return `${tableDir(target)}/parts/${seq}-${range}.ndjson`;
}

export function containerLogPath(key: StitchKey): string {
  return `namespaces/${sanitizeName(key.namespace)}/pods/${sanitizeName(key.pod)}/${sanitizeName(key.container)}.log`;
}

export function eventLogPath(namespace: string): string {
  return `namespaces/${sanitizeName(namespace)}/events/events.log`;
}

/**
 * UTC stamp used in default output names
 */
export function runStamp(now: DateTime): string {
  return now.toUTC().toFormat('yyyyMMdd-HHmmss');
}

export function defaultArchiveName(now: DateTime): string {
  return `loggather-${runStamp(now)}.tar.gz`;
}
