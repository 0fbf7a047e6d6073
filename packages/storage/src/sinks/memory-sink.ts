import { SinkError } from '@loggather/utils';
import type { ArtifactSinkPort } from '@loggather/core';
import { assertRelativeArtifactPath } from './paths.js';

/**
 * Keeps artifacts in memory, in write order
 */
export class InMemoryArtifactSink implements ArtifactSinkPort {
  readonly location: string;
  private readonly files = new Map<string, string>();
  private closed = false;

  constructor(location: string = 'memory://artifacts') {
    this.location = location;
  }

  async write(artifactPath: string, content: string | Uint8Array): Promise<void> {
    if (this.closed) {
      throw new SinkError(`Sink already closed, cannot write ${artifactPath}`, this.location);
    }
    assertRelativeArtifactPath(artifactPath, this.location);
    this.files.set(
      artifactPath,
      typeof content === 'string' ? content : new TextDecoder().decode(content)
    );
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  paths(): string[] {
    return [...this.files.keys()];
  }

  read(artifactPath: string): string | undefined {
    return this.files.get(artifactPath);
  }

  readJson(artifactPath: string): unknown {
    const content = this.files.get(artifactPath);
    return content === undefined ? undefined : JSON.parse(content);
  }
}
