/**
 * Extraction descriptors
 *
 * A target opts into stitching by declaring which columns carry each
 * semantic field. Descriptors are resolved once per target and bound to
 * column positions once per window; a window missing any column leaves the
 * descriptor inactive for that window.
 */

import type { Cell, ColumnIndex, ExportTarget, Row } from '@loggather/core';

export const CONTAINER_LOG_FIELDS = [
  'timestamp',
  'namespace',
  'pod',
  'container',
  'source',
  'message',
] as const;
export type ContainerLogField = (typeof CONTAINER_LOG_FIELDS)[number];

export const CLUSTER_EVENT_FIELDS = ['timestamp', 'namespace', 'name', 'reason', 'message'] as const;
export type ClusterEventField = (typeof CLUSTER_EVENT_FIELDS)[number];

export interface ExtractionDescriptor<F extends string> {
  target: ExportTarget;
  /** Semantic field to column name, in extraction order */
  fields: ReadonlyArray<readonly [F, string]>;
}

export const CONTAINER_LOG_DESCRIPTOR: ExtractionDescriptor<ContainerLogField> = {
  target: 'ContainerLogV2',
  fields: [
    ['timestamp', 'TimeGenerated'],
    ['namespace', 'PodNamespace'],
    ['pod', 'PodName'],
    ['container', 'ContainerName'],
    ['source', 'LogSource'],
    ['message', 'LogMessage'],
  ],
};

export const CLUSTER_EVENT_DESCRIPTOR: ExtractionDescriptor<ClusterEventField> = {
  target: 'KubeEvents',
  fields: [
    ['timestamp', 'TimeGenerated'],
    ['namespace', 'Namespace'],
    ['name', 'Name'],
    ['reason', 'Reason'],
    ['message', 'Message'],
  ],
};

export interface StitchOptions {
  stitchLogs: boolean;
  includeEvents: boolean;
}

/**
 * Capabilities a target has under the given options
 */
export interface TargetExtraction {
  containerLog?: ExtractionDescriptor<ContainerLogField>;
  clusterEvent?: ExtractionDescriptor<ClusterEventField>;
}

export function resolveExtraction(target: ExportTarget, options: StitchOptions): TargetExtraction {
  if (!options.stitchLogs) {
    return {};
  }
  return {
    containerLog: CONTAINER_LOG_DESCRIPTOR.target === target ? CONTAINER_LOG_DESCRIPTOR : undefined,
    clusterEvent:
      options.includeEvents && CLUSTER_EVENT_DESCRIPTOR.target === target
        ? CLUSTER_EVENT_DESCRIPTOR
        : undefined,
  };
}

/**
 * Descriptor bound to the column positions of one window
 */
export interface BoundDescriptor<F extends string> {
  cell(row: Row, field: F): Cell | undefined;
}

export function bindDescriptor<F extends string>(
  descriptor: ExtractionDescriptor<F>,
  columns: ColumnIndex
): BoundDescriptor<F> | undefined {
  const positions = new Map<F, number>();
  for (const [field, column] of descriptor.fields) {
    const position = columns.get(column);
    if (position === undefined) {
      return undefined;
    }
    positions.set(field, position);
  }

  return {
    cell(row, field) {
      const position = positions.get(field);
      return position === undefined ? undefined : row[position];
    },
  };
}
