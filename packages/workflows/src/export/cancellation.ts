import { CancellationError } from '@loggather/utils';

export function throwIfCancelled(signal: AbortSignal | undefined, context?: Record<string, unknown>): void {
  if (signal?.aborted) {
    throw new CancellationError('Operation cancelled', context);
  }
}
