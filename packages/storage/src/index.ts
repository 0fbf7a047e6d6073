/**
 * @loggather/storage - artifact sinks
 */

export {
  TarGzArtifactSink,
  DirectoryArtifactSink,
  InMemoryArtifactSink,
  createArtifactSink,
  isArchivePath,
} from './sinks/index.js';
