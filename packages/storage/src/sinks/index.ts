import type { ArtifactSinkPort } from '@loggather/core';
import { DirectoryArtifactSink } from './directory-sink.js';
import { TarGzArtifactSink } from './tar-gz-sink.js';

export { TarGzArtifactSink } from './tar-gz-sink.js';
export { DirectoryArtifactSink } from './directory-sink.js';
export { InMemoryArtifactSink } from './memory-sink.js';

export function isArchivePath(location: string): boolean {
  return /\.(tar\.gz|tgz)$/i.test(location);
}

/**
 * Archive for `.tar.gz` / `.tgz` locations, plain directory otherwise
 */
export async function createArtifactSink(location: string): Promise<ArtifactSinkPort> {
  return isArchivePath(location)
    ? TarGzArtifactSink.create(location)
    : DirectoryArtifactSink.create(location);
}
