/**
 * Command Context - Lazy service creation
 *
 * Knows how to build the Azure adapters, the artifact sink and the query
 * generator so command handlers never construct services themselves.
 */

import type { TokenCredential } from '@azure/identity';
import {
  createSystemClock,
  type ArtifactSinkPort,
  type ClockPort,
  type LogQueryPort,
  type QueryGeneratorPort,
  type WorkspaceCatalogPort,
} from '@loggather/core';
import { createArtifactSink } from '@loggather/storage';
import { getGatherConfig, type GatherConfig } from '@loggather/utils';
import {
  createAzureCredential,
  createAzureLogsQueryAdapter,
  createAzureWorkspaceCatalogAdapter,
  createCommandQueryGenerator,
} from '@loggather/workflows';

/**
 * Services available in command context
 */
export interface CommandServices {
  logs(): LogQueryPort;
  catalog(): WorkspaceCatalogPort;
  queryGenerator(): QueryGeneratorPort;
  clock(): ClockPort;
  createSink(location: string): Promise<ArtifactSinkPort>;
}

/**
 * Options for creating a CommandContext with service overrides
 */
export interface CommandContextOptions {
  config?: GatherConfig;
  signal?: AbortSignal;
  logsOverride?: LogQueryPort;
  catalogOverride?: WorkspaceCatalogPort;
  queryGeneratorOverride?: QueryGeneratorPort;
  clockOverride?: ClockPort;
  sinkFactoryOverride?: (location: string) => Promise<ArtifactSinkPort>;
}

export class CommandContext {
  private _services: CommandServices | null = null;
  private _config: GatherConfig | null = null;
  private _credential: TokenCredential | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  /**
   * Environment configuration (read on first use)
   */
  get config(): GatherConfig {
    if (!this._config) {
      this._config = this._options.config ?? getGatherConfig();
    }
    return this._config;
  }

  get signal(): AbortSignal | undefined {
    return this._options.signal;
  }

  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  private credential(): TokenCredential {
    if (!this._credential) {
      this._credential = createAzureCredential();
    }
    return this._credential;
  }

  private _createServices(): CommandServices {
    let logs: LogQueryPort | null = null;
    let catalog: WorkspaceCatalogPort | null = null;
    let generator: QueryGeneratorPort | null = null;
    const clock = this._options.clockOverride ?? createSystemClock();

    return {
      logs: () => {
        if (!logs) {
          logs = this._options.logsOverride ?? createAzureLogsQueryAdapter(this.credential());
        }
        return logs;
      },
      catalog: () => {
        if (!catalog) {
          catalog =
            this._options.catalogOverride ?? createAzureWorkspaceCatalogAdapter(this.credential());
        }
        return catalog;
      },
      queryGenerator: () => {
        if (!generator) {
          generator =
            this._options.queryGeneratorOverride ??
            createCommandQueryGenerator({
              command: this.config.generatorCommand,
              timeoutMs: this.config.generatorTimeoutMs,
            });
        }
        return generator;
      },
      clock: () => clock,
      createSink: (location) =>
        (this._options.sinkFactoryOverride ?? createArtifactSink)(location),
    };
  }
}
