/**
 * Profile Commands
 */

import type { Command } from 'commander';
import type { PackageCommandModule } from '../types/index.js';
import { commandDefinition } from '../types/index.js';
import { commandRegistry } from '../core/command-registry.js';
import { defineCommand } from '../core/defineCommand.js';
import { die } from '../core/cliErrors.js';
import { listProfilesSchema } from '../command-defs/profiles.js';
import { listProfilesHandler } from '../handlers/profiles/list-profiles.js';

export function registerProfilesCommands(program: Command): void {
  const profilesCmd = program.command('profiles').description('Named table groups');

  const listCmd = profilesCmd
    .command('list')
    .description('List profiles with their tables')
    .option('--format <format>', 'Output format (json, table)', 'table');

  defineCommand(listCmd, {
    name: 'list',
    packageName: 'profiles',
    onError: die,
  });
}

const profilesModule: PackageCommandModule = {
  packageName: 'profiles',
  description: 'Named table groups',
  commands: [
    commandDefinition({
      name: 'list',
      description: 'List profiles with their tables',
      schema: listProfilesSchema,
      handler: listProfilesHandler,
      examples: ['loggather profiles list --format json'],
    }),
  ],
};

commandRegistry.registerPackage(profilesModule);
