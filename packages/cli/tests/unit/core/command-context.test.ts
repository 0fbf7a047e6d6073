/**
 * Command Context Wiring Tests
 */

import { describe, it, expect } from 'vitest';
import { InMemoryArtifactSink } from '@loggather/storage';
import { CommandContext } from '../../../src/core/command-context.js';
import {
  FakeLogQuery,
  TEST_CONFIG,
  fixedClock,
  fixedGenerator,
  unusedCatalog,
} from '../../support/fakes.js';

describe('CommandContext', () => {
  it('uses the configuration it was given', () => {
    const ctx = new CommandContext({ config: TEST_CONFIG });
    expect(ctx.config.timespan).toBe('PT30M');
  });

  it('reads the configuration from the environment by default', () => {
    const previous = process.env.LOGGATHER_TIMESPAN;
    process.env.LOGGATHER_TIMESPAN = 'PT45M';
    try {
      expect(new CommandContext().config.timespan).toBe('PT45M');
    } finally {
      if (previous === undefined) {
        delete process.env.LOGGATHER_TIMESPAN;
      } else {
        process.env.LOGGATHER_TIMESPAN = previous;
      }
    }
  });

  it('creates services once and reuses them', () => {
    const logs = new FakeLogQuery(() => ({ status: 'success', tables: [] }));
    const ctx = new CommandContext({
      logsOverride: logs,
      catalogOverride: unusedCatalog,
      queryGeneratorOverride: fixedGenerator('Heartbeat', ''),
    });

    expect(ctx.services).toBe(ctx.services);
    expect(ctx.services.logs()).toBe(logs);
    expect(ctx.services.catalog()).toBe(unusedCatalog);
    expect(ctx.services.queryGenerator()).toBe(ctx.services.queryGenerator());
  });

  it('routes sink creation and the clock through overrides', async () => {
    const ctx = new CommandContext({
      clockOverride: fixedClock(),
      sinkFactoryOverride: async (location) => new InMemoryArtifactSink(location),
    });

    const sink = await ctx.services.createSink('out.tar.gz');
    expect(sink.location).toBe('out.tar.gz');
    expect(ctx.services.clock().nowMs()).toBe(Date.parse('2024-05-01T12:00:00Z'));
  });

  it('carries the abort signal', () => {
    const controller = new AbortController();
    expect(new CommandContext({ signal: controller.signal }).signal).toBe(controller.signal);
  });
});
