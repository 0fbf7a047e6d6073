/**
 * Row classification for stitching
 *
 * Each window collects the rows its bound descriptors recognize, orders them
 * by event time (stable, so ties keep arrival order) and appends the
 * formatted lines to the run's accumulator. Windows arrive in time order,
 * so per-window ordering is enough to keep every buffer non-decreasing.
 */

import { cellText, compareTimestampText, type Cell, type ColumnIndex, type Row, type StitchKey } from '@loggather/core';
import {
  bindDescriptor,
  type BoundDescriptor,
  type ClusterEventField,
  type ContainerLogField,
  type TargetExtraction,
} from './extraction.js';
import { formatContainerLogLine, formatEventLine } from './lineFormat.js';
import type { StitchAccumulator } from './stitchAccumulator.js';

interface PendingLogLine {
  key: StitchKey;
  timestamp: string;
  source: string;
  message: Cell | undefined;
}

interface PendingEventLine {
  namespace: string;
  timestamp: string;
  name: string;
  reason: string;
  message: string;
}

export interface WindowClassification {
  logLines: number;
  eventLines: number;
  /** Container rows without namespace, pod and container */
  skippedRows: number;
}

export class RowClassifier {
  constructor(private readonly extraction: TargetExtraction) {}

  get isActive(): boolean {
    return this.extraction.containerLog !== undefined || this.extraction.clusterEvent !== undefined;
  }

  /**
   * Bind to one window's columns
   */
  forWindow(columns: ColumnIndex): WindowClassifier {
    const { containerLog, clusterEvent } = this.extraction;
    return new WindowClassifier(
      containerLog ? bindDescriptor(containerLog, columns) : undefined,
      clusterEvent ? bindDescriptor(clusterEvent, columns) : undefined
    );
  }
}

export class WindowClassifier {
  private readonly logLines: PendingLogLine[] = [];
  private readonly eventLines: PendingEventLine[] = [];
  private skippedRows = 0;

  constructor(
    private readonly containerLog: BoundDescriptor<ContainerLogField> | undefined,
    private readonly clusterEvent: BoundDescriptor<ClusterEventField> | undefined
  ) {}

  get isActive(): boolean {
    return this.containerLog !== undefined || this.clusterEvent !== undefined;
  }

  accept(row: Row): void {
    if (this.containerLog) {
      this.acceptContainerLog(this.containerLog, row);
    }
    if (this.clusterEvent) {
      this.acceptClusterEvent(this.clusterEvent, row);
    }
  }

  /**
   * Sort this window's lines and append them to the run buffers
   */
  flushInto(accumulator: StitchAccumulator): WindowClassification {
    const logs = [...this.logLines].sort((a, b) => compareTimestampText(a.timestamp, b.timestamp));
    for (const line of logs) {
      accumulator.appendContainerLine(line.key, formatContainerLogLine(line.timestamp, line.source, line.message));
    }

    const events = [...this.eventLines].sort((a, b) => compareTimestampText(a.timestamp, b.timestamp));
    for (const line of events) {
      accumulator.appendEventLine(
        line.namespace,
        formatEventLine(line.timestamp, line.namespace, line.name, line.reason, line.message)
      );
    }

    return { logLines: logs.length, eventLines: events.length, skippedRows: this.skippedRows };
  }

  private acceptContainerLog(bound: BoundDescriptor<ContainerLogField>, row: Row): void {
    const key: StitchKey = {
      namespace: cellText(bound.cell(row, 'namespace')),
      pod: cellText(bound.cell(row, 'pod')),
      container: cellText(bound.cell(row, 'container')),
    };
    if (key.namespace === '' && key.pod === '' && key.container === '') {
      this.skippedRows++;
      return;
    }

    this.logLines.push({
      key,
      timestamp: cellText(bound.cell(row, 'timestamp')),
      source: cellText(bound.cell(row, 'source')),
      message: bound.cell(row, 'message'),
    });
  }

  private acceptClusterEvent(bound: BoundDescriptor<ClusterEventField>, row: Row): void {
    this.eventLines.push({
      namespace: cellText(bound.cell(row, 'namespace')) || 'default',
      timestamp: cellText(bound.cell(row, 'timestamp')),
      name: cellText(bound.cell(row, 'name')),
      reason: cellText(bound.cell(row, 'reason')),
      message: cellText(bound.cell(row, 'message')),
    });
  }
}
