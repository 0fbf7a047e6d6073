/**
 * Terminal error path for command actions
 */

import { exitCodeFor, handleError } from './error-handler.js';

export function die(error: unknown): never {
  const message = handleError(error);
  console.error(`Error: ${message}`);
  process.exit(exitCodeFor(error));
}
