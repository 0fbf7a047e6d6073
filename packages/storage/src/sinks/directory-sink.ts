/**
 * Directory artifact sink - one file per artifact under a root directory
 */

import { mkdir, writeFile } from 'fs/promises';
import * as path from 'path';
import { SinkError } from '@loggather/utils';
import type { ArtifactSinkPort } from '@loggather/core';
import { assertRelativeArtifactPath, describeError } from './paths.js';

export class DirectoryArtifactSink implements ArtifactSinkPort {
  private closed = false;

  private constructor(readonly location: string) {}

  static async create(root: string): Promise<DirectoryArtifactSink> {
    const location = path.resolve(root);
    try {
      await mkdir(location, { recursive: true });
    } catch (error) {
      throw new SinkError(`Unable to create output directory ${location}: ${describeError(error)}`, location);
    }
    return new DirectoryArtifactSink(location);
  }

  async write(artifactPath: string, content: string | Uint8Array): Promise<void> {
    if (this.closed) {
      throw new SinkError(`Output directory already closed, cannot write ${artifactPath}`, this.location);
    }
    assertRelativeArtifactPath(artifactPath, this.location);

    const target = path.join(this.location, ...artifactPath.split('/'));
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content);
    } catch (error) {
      throw new SinkError(`Unable to write ${artifactPath}: ${describeError(error)}`, this.location);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
