/**
 * Package-aware logging
 *
 * ```typescript
 * import { createPackageLogger } from '@loggather/utils';
 *
 * const logger = createPackageLogger('@loggather/workflows');
 * logger.info('Export started', { workspaceId });
 * ```
 */

import { Logger, createLogger } from '../logger.js';

const packageLoggers = new Map<string, Logger>();

/**
 * Create or retrieve a package-specific logger
 */
export function createPackageLogger(packageName: string): Logger {
  const existing = packageLoggers.get(packageName);
  if (existing) {
    return existing;
  }

  const packageLogger = createLogger(packageName);
  packageLoggers.set(packageName, packageLogger);
  return packageLogger;
}

export function getPackageLoggers(): Map<string, Logger> {
  return new Map(packageLoggers);
}
