/**
 * tar.gz artifact sink
 *
 * Entries are appended to an archiver stream piped into the output file;
 * nothing is readable until close() finalizes the archive.
 */

import archiver from 'archiver';
import { createWriteStream, type WriteStream } from 'fs';
import { mkdir } from 'fs/promises';
import { once } from 'events';
import * as path from 'path';
import { SinkError, createPackageLogger } from '@loggather/utils';
import type { ArtifactSinkPort } from '@loggather/core';
import { assertRelativeArtifactPath, describeError } from './paths.js';

const logger = createPackageLogger('@loggather/storage');

export class TarGzArtifactSink implements ArtifactSinkPort {
  private archiveError: Error | null = null;
  private closed = false;
  private entries = 0;

  private constructor(
    readonly location: string,
    private readonly archive: archiver.Archiver,
    private readonly output: WriteStream
  ) {}

  static async create(location: string): Promise<TarGzArtifactSink> {
    const output = await openOutput(location);
    const archive = archiver('tar', { gzip: true, gzipOptions: { level: 6 } });
    const sink = new TarGzArtifactSink(location, archive, output);

    archive.on('warning', (warning) => {
      logger.warn('Archive warning', { location, warning: warning.message });
    });
    archive.on('error', (error) => {
      logger.error('Archive error', error, { location });
      sink.archiveError = error;
    });
    archive.pipe(output);

    return sink;
  }

  async write(artifactPath: string, content: string | Uint8Array): Promise<void> {
    if (this.closed) {
      throw new SinkError(`Archive already closed, cannot write ${artifactPath}`, this.location);
    }
    if (this.archiveError) {
      throw new SinkError(`Archive failed: ${this.archiveError.message}`, this.location);
    }
    assertRelativeArtifactPath(artifactPath, this.location);

    this.archive.append(typeof content === 'string' ? content : Buffer.from(content), {
      name: artifactPath,
      mode: 0o644,
      date: new Date(),
    });
    this.entries++;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const flushed = once(this.output, 'close');
    try {
      await this.archive.finalize();
      await flushed;
    } catch (error) {
      throw new SinkError(`Unable to finalize archive: ${describeError(error)}`, this.location);
    }
    if (this.archiveError) {
      throw new SinkError(`Archive failed: ${this.archiveError.message}`, this.location);
    }

    logger.debug('Archive finalized', { location: this.location, entries: this.entries });
  }
}

async function openOutput(location: string): Promise<WriteStream> {
  try {
    await mkdir(path.dirname(path.resolve(location)), { recursive: true });
    const output = createWriteStream(location);
    await once(output, 'open');
    return output;
  } catch (error) {
    throw new SinkError(`Unable to create archive ${location}: ${describeError(error)}`, location);
  }
}
