/**
 * @loggather/cli - command line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export { runCommand, executeValidated } from './core/execute.js';
export * from './types/index.js';
export { buildProgram } from './program.js';
