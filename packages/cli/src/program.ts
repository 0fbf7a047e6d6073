/**
 * commander program with every command group attached
 *
 * Command modules register themselves in commandRegistry when imported;
 * the register functions add the Commander flags and wire them to the
 * registry handlers.
 */

import { Command } from 'commander';
import { registerWorkspaceCommands } from './commands/workspace.js';
import { registerProfilesCommands } from './commands/profiles.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('loggather')
    .description('Export and stitch logs from Azure Log Analytics workspaces')
    .version('1.0.0');

  registerWorkspaceCommands(program);
  registerProfilesCommands(program);

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });

  return program;
}
