#!/usr/bin/env node

/**
 * loggather CLI entry point
 *
 * `.env` is loaded before any command module reads the environment.
 */

import 'dotenv/config';
import { buildProgram } from '../program.js';
import { die } from '../core/cliErrors.js';
import { installInterruptHandler } from '../core/interrupts.js';

async function main(): Promise<void> {
  installInterruptHandler();
  await buildProgram().parseAsync();
}

main().catch((error: unknown) => die(error));
