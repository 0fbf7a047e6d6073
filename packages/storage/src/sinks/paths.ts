import { SinkError } from '@loggather/utils';

/**
 * Artifact paths are relative, slash separated and never climb out of the store
 */
export function assertRelativeArtifactPath(artifactPath: string, location: string): void {
  const segments = artifactPath.split('/');
  if (
    artifactPath === '' ||
    artifactPath.startsWith('/') ||
    artifactPath.includes('\\') ||
    segments.some((segment) => segment === '' || segment === '.' || segment === '..')
  ) {
    throw new SinkError(`Invalid artifact path: ${artifactPath}`, location);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
