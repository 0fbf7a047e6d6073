/**
 * ArtifactSink Port
 *
 * Write-once store for export artifacts, addressed by relative slash paths.
 * Implementations wrap their failures in SinkError.
 */
export interface ArtifactSinkPort {
  /** Where the artifacts end up (archive file or directory) */
  readonly location: string;

  write(path: string, content: string | Uint8Array): Promise<void>;

  /**
   * Flush and release the store. Safe to call more than once.
   */
  close(): Promise<void>;
}

export type ArtifactSinkFactory = () => Promise<ArtifactSinkPort>;
