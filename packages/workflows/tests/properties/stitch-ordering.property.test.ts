/**
 * Property Tests for Log Stitching
 * ================================
 *
 * Critical Invariants:
 * 1. Every stitched stream is non-decreasing in time, whatever order rows arrive in
 * 2. Every identified container row appears exactly once in its stream
 * 3. Rows without pod identity reach the raw parts but never a stitched stream
 * 4. A target whose queries fail still gets a summary and never blocks the others
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { compareTimestampText, containerLogPath, summaryPath } from '@loggather/core';
import { InMemoryArtifactSink } from '@loggather/storage';
import { exportWorkspace } from '../../src/export/exportWorkspace.js';
import { FakeLogQuery, NOW, fixedClock, success, table } from '../support/fakes.js';
import { CONTAINER_COLUMNS } from '../support/containerFixtures.js';

const LOOKBACK_SECONDS = 30 * 60;
const lookbackStart = NOW.minus({ seconds: LOOKBACK_SECONDS });

interface GeneratedRow {
  offsetSeconds: number;
  nanos: number;
  pod: 'api' | 'worker';
  message: string;
}

function timestampOf(row: GeneratedRow): string {
  const base = lookbackStart.plus({ seconds: row.offsetSeconds }).toFormat("yyyy-MM-dd'T'HH:mm:ss");
  return `${base}.${String(row.nanos).padStart(9, '0')}Z`;
}

const rowArb: fc.Arbitrary<GeneratedRow> = fc.record({
  offsetSeconds: fc.integer({ min: 0, max: LOOKBACK_SECONDS - 1 }),
  nanos: fc.integer({ min: 0, max: 999_999_999 }),
  pod: fc.constantFrom('api' as const, 'worker' as const),
  message: fc.string({ maxLength: 20 }),
});

describe('Log stitching - Property Tests', () => {
  it('keeps every container stream non-decreasing and complete', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(rowArb, { maxLength: 60 }), async (rows) => {
        const sink = new InMemoryArtifactSink();
        const logs = new FakeLogQuery((request) => {
          // Source order within a window is whatever the generator produced
          const inWindow = rows.filter((row) => {
            const at = lookbackStart.plus({ seconds: row.offsetSeconds }).toMillis();
            return at >= request.start.toMillis() && at < request.end.toMillis();
          });
          return success(
            table(
              CONTAINER_COLUMNS,
              inWindow.map((row) => [timestampOf(row), 'default', row.pod, 'app', 'stdout', row.message])
            )
          );
        });

        await exportWorkspace(
          { workspaceGuid: 'guid-1', tables: 'ContainerLogV2', timespan: 'PT30M' },
          { logs, createSink: async () => sink, clock: fixedClock() }
        );

        for (const pod of ['api', 'worker'] as const) {
          const content = sink.read(containerLogPath({ namespace: 'default', pod, container: 'app' })) ?? '';
          const stamps = content
            .split('\n')
            .filter((line) => line !== '')
            .map((line) => line.slice(0, line.indexOf(' ')));

          if (stamps.length !== rows.filter((row) => row.pod === pod).length) {
            return false;
          }
          for (let i = 1; i < stamps.length; i++) {
            if (compareTimestampText(stamps[i - 1], stamps[i]) > 0) {
              return false;
            }
          }
        }
        return true;
      }),
      { numRuns: 30 }
    );
  });

  it('keeps noise rows out of stitched streams but in the raw parts', async () => {
    const noisyRowArb = fc.record({ offsetSeconds: rowArb.map((row) => row.offsetSeconds), noise: fc.boolean() });

    await fc.assert(
      fc.asyncProperty(fc.array(noisyRowArb, { maxLength: 40 }), async (rows) => {
        const sink = new InMemoryArtifactSink();
        const logs = new FakeLogQuery((request) => {
          const inWindow = rows.filter((row) => {
            const at = lookbackStart.plus({ seconds: row.offsetSeconds }).toMillis();
            return at >= request.start.toMillis() && at < request.end.toMillis();
          });
          return success(
            table(
              CONTAINER_COLUMNS,
              inWindow.map((row) => {
                const at = lookbackStart.plus({ seconds: row.offsetSeconds }).toISO() ?? '';
                return row.noise
                  ? [at, '', '', '', 'stdout', 'noise']
                  : [at, 'default', 'api', 'app', 'stdout', 'kept'];
              })
            )
          );
        });

        await exportWorkspace(
          { workspaceGuid: 'guid-1', tables: 'ContainerLogV2', timespan: 'PT30M' },
          { logs, createSink: async () => sink, clock: fixedClock() }
        );

        const rawLines = sink
          .paths()
          .filter((artifact) => artifact.startsWith('tables/ContainerLogV2/parts/'))
          .flatMap((artifact) => (sink.read(artifact) ?? '').split('\n').filter((line) => line !== ''));
        const stitched = (sink.read(containerLogPath({ namespace: 'default', pod: 'api', container: 'app' })) ?? '')
          .split('\n')
          .filter((line) => line !== '');
        const streams = sink.paths().filter((artifact) => artifact.startsWith('namespaces/'));
        const identified = rows.filter((row) => !row.noise).length;

        expect(rawLines).toHaveLength(rows.length);
        expect(sink.readJson(summaryPath('ContainerLogV2'))).toMatchObject({ rows: rows.length });
        expect(stitched).toHaveLength(identified);
        expect(stitched.every((line) => line.endsWith(' [stdout] kept'))).toBe(true);
        expect(streams).toHaveLength(identified > 0 ? 1 : 0);
      }),
      { numRuns: 30 }
    );
  });

  it('writes a summary for every target regardless of which targets fail', async () => {
    const targetsArb = fc.uniqueArray(fc.constantFrom('Perf', 'Heartbeat', 'Syslog', 'KubeHealth', 'AKSAudit'), {
      minLength: 1,
    });

    await fc.assert(
      fc.asyncProperty(targetsArb, fc.func(fc.boolean()), async (targets, isBroken) => {
        const broken = new Set(targets.filter((target) => isBroken(target)));
        const sink = new InMemoryArtifactSink();
        const logs = new FakeLogQuery((request) => {
          if (broken.has(request.query)) {
            throw new Error('query rejected');
          }
          return success(table(['TimeGenerated'], [['2024-05-01T11:40:00Z']]));
        });

        const result = await exportWorkspace(
          { workspaceGuid: 'guid-1', tables: targets.join(','), timespan: 'PT30M' },
          { logs, createSink: async () => sink, clock: fixedClock() }
        );

        expect(result.summaries.map((s) => [s.target, s.totalRowCount])).toEqual(
          targets.map((target) => [target, broken.has(target) ? 0 : 2])
        );
        expect(result.failedTargets).toEqual([]);
        for (const target of targets) {
          expect(sink.readJson(summaryPath(target))).toEqual({
            table: target,
            rows: broken.has(target) ? 0 : 2,
            duration: 'PT30M',
          });
        }
        expect(sink.readJson('index.json')).toEqual({ tables: targets });
      }),
      { numRuns: 30 }
    );
  });
});
