/**
 * In-process stand-ins for the services behind CommandContext
 */

import { DateTime } from 'luxon';
import {
  toCell,
  type ClockPort,
  type LogQueryPort,
  type LogQueryRequest,
  type LogQueryResult,
  type QueryGeneratorPort,
  type ResultTable,
  type WorkspaceCatalogPort,
} from '@loggather/core';
import type { GatherConfig } from '@loggather/utils';

export const NOW = DateTime.fromISO('2024-05-01T12:00:00Z', { zone: 'utc' });

export const TEST_CONFIG: GatherConfig = {
  timespan: 'PT30M',
  queryTimeoutSeconds: 60,
  validationTimeoutSeconds: 15,
  generatorCommand: 'test-generator',
  generatorTimeoutMs: 1000,
};

export function fixedClock(now: DateTime = NOW): ClockPort {
  return { nowMs: () => now.toMillis() };
}

export function table(columns: string[], rows: unknown[][], name = 'PrimaryResult'): ResultTable {
  return { name, columns, rows: rows.map((row) => row.map(toCell)) };
}

export class FakeLogQuery implements LogQueryPort {
  readonly requests: LogQueryRequest[] = [];

  constructor(
    private readonly handler: (request: LogQueryRequest) => LogQueryResult
  ) {}

  async query(request: LogQueryRequest): Promise<LogQueryResult> {
    this.requests.push(request);
    return this.handler(request);
  }
}

export function fixedGenerator(query: string, analysis: string): QueryGeneratorPort {
  return {
    generate: async () => query,
    fix: async () => {
      throw new Error('no fix available');
    },
    analyze: async () => analysis,
  };
}

/**
 * Catalog for runs that address the workspace by GUID only
 */
export const unusedCatalog: WorkspaceCatalogPort = {
  resolveWorkspaceGuid: async () => {
    throw new Error('catalog not expected');
  },
  listTables: async () => {
    throw new Error('catalog not expected');
  },
  getTableSchema: async () => {
    throw new Error('catalog not expected');
  },
};
