import { describe, it, expect } from 'vitest';
import { ASSISTED_QUERY_TABLES } from '../../src/query/knownTables.js';
import { loadTableHints, suggestRelevantTables } from '../../src/query/suggestTables.js';
import { buildGeneratePrompt } from '../../src/query/prompts.js';

describe('suggestRelevantTables', () => {
  it('ranks logs first for a pod crash question', () => {
    expect(suggestRelevantTables('Why did my pod crash', ASSISTED_QUERY_TABLES)).toEqual([
      'ContainerLogV2',
      'KubePodInventory',
      'KubeEvents',
    ]);
  });

  it('suggests metric and node tables for resource questions', () => {
    expect(suggestRelevantTables('show cpu usage per node', ASSISTED_QUERY_TABLES)).toEqual([
      'InsightsMetrics',
      'Perf',
      'KubeNodeInventory',
    ]);
  });

  it('only suggests available tables', () => {
    expect(suggestRelevantTables('show cpu usage per node', ['Perf'])).toEqual(['Perf']);
  });

  it('suggests nothing without keywords', () => {
    expect(suggestRelevantTables('hello', ASSISTED_QUERY_TABLES)).toEqual([]);
  });

  it('loads the keyword table from disk', () => {
    const hints = loadTableHints();
    expect(hints.categories.map((c) => c.name)).toEqual([
      'troubleshooting',
      'logs',
      'events',
      'inventory',
      'metrics',
      'nodes',
    ]);
  });
});

describe('buildGeneratePrompt', () => {
  it('names the question, the tables and the recommendations', () => {
    const prompt = buildGeneratePrompt('Why did my pod crash', ['KubeEvents', 'Perf']);

    expect(prompt).toContain('Question: "Why did my pod crash"');
    expect(prompt).toContain('Available tables: KubeEvents, Perf');
    expect(prompt).toContain('RECOMMENDED TABLES for this question: KubeEvents');
  });
});
