import { describe, it, expect } from 'vitest';
import { getDefaultProfiles, listProfiles } from '../../src/profiles/registry.js';
import { resolveTargets, splitCsv } from '../../src/profiles/resolveTargets.js';

describe('resolveTargets', () => {
  it('defaults to the aks-debug profile', () => {
    const resolved = resolveTargets({});

    expect(resolved.source).toBe('default');
    expect(resolved.targets).toEqual(getDefaultProfiles());
    expect(resolved.targets).toHaveLength(16);
    expect(resolved.targets[0]).toBe('ContainerLogV2');
  });

  it('lets explicit tables override profiles and the catalog', () => {
    const resolved = resolveTargets({
      tables: ' Perf, KubeEvents ,,Perf',
      profiles: 'audit',
      allTables: true,
      catalogTables: ['Heartbeat'],
    });

    expect(resolved).toEqual({ targets: ['Perf', 'KubeEvents'], source: 'explicit', warnings: [] });
  });

  it('uses the catalog verbatim when exporting everything', () => {
    const resolved = resolveTargets({
      profiles: 'audit',
      allTables: true,
      catalogTables: ['Usage', 'Heartbeat'],
    });

    expect(resolved.targets).toEqual(['Usage', 'Heartbeat']);
    expect(resolved.source).toBe('catalog');
  });

  it('unions profiles and warns about unknown names', () => {
    const resolved = resolveTargets({ profiles: 'metrics,bogus,audit,metrics' });

    expect(resolved.targets).toEqual([
      'InsightsMetrics',
      'Perf',
      'Heartbeat',
      'AKSControlPlane',
      'AKSAudit',
      'AKSAuditAdmin',
    ]);
    expect(resolved.warnings).toEqual(["unknown profile 'bogus'"]);
  });

  it('falls back to the default when every profile is unknown', () => {
    const resolved = resolveTargets({ profiles: 'nope' });

    expect(resolved.source).toBe('default');
    expect(resolved.warnings).toEqual(["unknown profile 'nope'"]);
  });

  it('splits comma separated values', () => {
    expect(splitCsv(undefined)).toEqual([]);
    expect(splitCsv(' a ,b,, c')).toEqual(['a', 'b', 'c']);
  });

  it('lists aks-debug after the base profiles', () => {
    expect(listProfiles().map((p) => p.name)).toEqual([
      'podLogs',
      'inventory',
      'metrics',
      'audit',
      'aks-debug',
    ]);
  });
});
