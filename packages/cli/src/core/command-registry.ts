/**
 * Command Registry - command lookup and help text
 */

import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { ConfigurationError, ValidationError } from '@loggather/utils';

/**
 * Command registry for managing CLI commands
 */
export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, CommandDefinition> = new Map();

  /**
   * Register a package command module
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(
        `Package ${module.packageName} is already registered`,
        'packageName',
        { packageName: module.packageName }
      );
    }

    for (const command of module.commands) {
      this.validateCommand(command);
      const fullName = `${module.packageName}.${command.name}`;
      if (this.commands.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
      this.commands.set(fullName, command);
    }

    this.packages.set(module.packageName, module);
  }

  /**
   * Get a command by full name (package.command)
   */
  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

  /**
   * Package name a command was registered under, if any
   */
  findPackageName(commandName: string): string | undefined {
    for (const pkg of this.packages.values()) {
      if (pkg.commands.some((command) => command.name === commandName)) {
        return pkg.packageName;
      }
    }
    return undefined;
  }

  /**
   * Examples section appended to a command's --help, empty when it has none
   */
  generateExamplesHelp(packageName: string, commandName: string): string {
    const examples = this.getCommand(packageName, commandName)?.examples ?? [];
    if (examples.length === 0) {
      return '';
    }
    return ['', 'Examples:', ...examples.map((example) => `  $ ${example}`)].join('\n');
  }

  /**
   * Validate command structure
   */
  validateCommand(command: CommandDefinition): void {
    if (command.name.trim() === '') {
      throw new ValidationError('Command name must be a non-empty string', {
        command: command.name,
      });
    }

    if (command.description.trim() === '') {
      throw new ValidationError('Command description must be a non-empty string', {
        command: command.name,
      });
    }
  }
}

/**
 * Global command registry instance
 */
export const commandRegistry = new CommandRegistry();
