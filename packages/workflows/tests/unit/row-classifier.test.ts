import { describe, it, expect } from 'vitest';
import { indexColumns, stringCell } from '@loggather/core';
import { resolveExtraction, bindDescriptor, CONTAINER_LOG_DESCRIPTOR } from '../../src/export/extraction.js';
import { formatContainerLogLine, formatEventLine } from '../../src/export/lineFormat.js';
import { RowClassifier } from '../../src/export/rowClassifier.js';
import { StitchAccumulator } from '../../src/export/stitchAccumulator.js';
import { table } from '../support/fakes.js';
import { CONTAINER_COLUMNS, EVENT_COLUMNS } from '../support/containerFixtures.js';

const STITCH_ALL = { stitchLogs: true, includeEvents: true };

describe('resolveExtraction', () => {
  it('assigns container log extraction to ContainerLogV2 only', () => {
    expect(resolveExtraction('ContainerLogV2', STITCH_ALL).containerLog).toBe(CONTAINER_LOG_DESCRIPTOR);
    expect(resolveExtraction('ContainerLog', STITCH_ALL)).toEqual({
      containerLog: undefined,
      clusterEvent: undefined,
    });
  });

  it('drops event extraction when events are excluded', () => {
    expect(resolveExtraction('KubeEvents', { stitchLogs: true, includeEvents: false }).clusterEvent).toBeUndefined();
  });

  it('disables everything when stitching is off', () => {
    expect(resolveExtraction('ContainerLogV2', { stitchLogs: false, includeEvents: true })).toEqual({});
  });
});

describe('bindDescriptor', () => {
  it('binds by column name regardless of column order', () => {
    const columns = indexColumns([...CONTAINER_COLUMNS].reverse());
    const bound = bindDescriptor(CONTAINER_LOG_DESCRIPTOR, columns);

    expect(bound?.cell([stringCell('msg'), stringCell('stdout')], 'message')).toEqual(stringCell('msg'));
  });

  it('stays inactive when a column is missing', () => {
    const columns = indexColumns(CONTAINER_COLUMNS.filter((name) => name !== 'LogSource'));
    expect(bindDescriptor(CONTAINER_LOG_DESCRIPTOR, columns)).toBeUndefined();
  });
});

describe('line formatting', () => {
  it('escapes newlines and drops carriage returns in container messages', () => {
    expect(formatContainerLogLine('2024-05-01T11:31:00.000Z', 'stderr', stringCell('a\r\nb'))).toBe(
      '2024-05-01T11:31:00Z [stderr] a\\nb\n'
    );
  });

  it('renders an absent message as empty text', () => {
    expect(formatContainerLogLine('2024-05-01T11:31:00Z', 'stdout', undefined)).toBe(
      '2024-05-01T11:31:00Z [stdout] \n'
    );
  });

  it('keeps unparseable timestamps as they are', () => {
    expect(formatEventLine('yesterday', 'ns', 'pod', 'Killing', 'stop\nnow')).toBe(
      'yesterday ns/pod Killing stop now\n'
    );
  });
});

describe('RowClassifier', () => {
  it('is inactive for targets without extraction', () => {
    expect(new RowClassifier(resolveExtraction('Perf', STITCH_ALL)).isActive).toBe(false);
  });

  it('leaves the window inactive when its columns do not match', () => {
    const classifier = new RowClassifier(resolveExtraction('ContainerLogV2', STITCH_ALL));
    expect(classifier.forWindow(indexColumns(['TimeGenerated', 'Computer'])).isActive).toBe(false);
  });

  it('sorts a window by time with ties in arrival order', () => {
    const rows = table(CONTAINER_COLUMNS, [
      ['2024-05-01T11:32:00Z', 'ns', 'pod', 'c', 'stdout', 'late'],
      ['2024-05-01T11:31:00Z', 'ns', 'pod', 'c', 'stdout', 'tie-a'],
      ['2024-05-01T11:31:00.000Z', 'ns', 'pod', 'c', 'stdout', 'tie-b'],
    ]);
    const accumulator = new StitchAccumulator();
    const window = new RowClassifier(resolveExtraction('ContainerLogV2', STITCH_ALL)).forWindow(
      indexColumns(rows.columns)
    );

    rows.rows.forEach((row) => window.accept(row));
    const counts = window.flushInto(accumulator);

    expect(counts).toEqual({ logLines: 3, eventLines: 0, skippedRows: 0 });
    expect(accumulator.containerStreams()).toEqual([
      {
        key: { namespace: 'ns', pod: 'pod', container: 'c' },
        content:
          '2024-05-01T11:31:00Z [stdout] tie-a\n' +
          '2024-05-01T11:31:00Z [stdout] tie-b\n' +
          '2024-05-01T11:32:00Z [stdout] late\n',
      },
    ]);
  });

  it('counts container rows without identity as skipped', () => {
    const rows = table(CONTAINER_COLUMNS, [['2024-05-01T11:32:00Z', '', null, '', 'stdout', 'orphan']]);
    const accumulator = new StitchAccumulator();
    const window = new RowClassifier(resolveExtraction('ContainerLogV2', STITCH_ALL)).forWindow(
      indexColumns(rows.columns)
    );

    rows.rows.forEach((row) => window.accept(row));

    expect(window.flushInto(accumulator)).toEqual({ logLines: 0, eventLines: 0, skippedRows: 1 });
    expect(accumulator.containerStreamCount).toBe(0);
  });

  it('routes events by namespace', () => {
    const rows = table(EVENT_COLUMNS, [
      ['2024-05-01T11:40:00Z', 'apps', 'web-1', 'Pulled', 'image pulled'],
      ['2024-05-01T11:41:00Z', null, 'node-1', 'NodeReady', 'ready'],
    ]);
    const accumulator = new StitchAccumulator();
    const window = new RowClassifier(resolveExtraction('KubeEvents', STITCH_ALL)).forWindow(
      indexColumns(rows.columns)
    );

    rows.rows.forEach((row) => window.accept(row));
    window.flushInto(accumulator);

    expect(accumulator.eventStreams()).toEqual([
      { namespace: 'apps', content: '2024-05-01T11:40:00Z apps/web-1 Pulled image pulled\n' },
      { namespace: 'default', content: '2024-05-01T11:41:00Z default/node-1 NodeReady ready\n' },
    ]);
  });
});
