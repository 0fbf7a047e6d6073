/**
 * SIGINT → AbortSignal wiring for the running command
 *
 * The first interrupt aborts the in-flight query and lets the command close
 * its artifact sink; a second one gets Node's default handling.
 */

import { createPackageLogger } from '@loggather/utils';

const logger = createPackageLogger('@loggather/cli');

const controller = new AbortController();
let installed = false;

export function getCliAbortSignal(): AbortSignal {
  return controller.signal;
}

export function installInterruptHandler(): void {
  if (installed) {
    return;
  }
  installed = true;
  process.once('SIGINT', () => {
    logger.warn('Interrupt received, cancelling (press Ctrl+C again to force quit)');
    controller.abort();
  });
}
