/**
 * Unit tests for Command Registry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { CommandRegistry } from '../../src/core/command-registry.js';
import { commandDefinition, type PackageCommandModule } from '../../src/types/index.js';

function module(packageName: string, commandNames: string[]): PackageCommandModule {
  return {
    packageName,
    description: `${packageName} commands`,
    commands: commandNames.map((name) =>
      commandDefinition({
        name,
        description: `${name} command`,
        schema: z.object({}),
        handler: async () => ({ success: true }),
        examples: [`loggather ${packageName} ${name}`],
      })
    ),
  };
}

describe('CommandRegistry', () => {
  let registry: CommandRegistry;

  beforeEach(() => {
    registry = new CommandRegistry();
  });

  describe('Package Registration', () => {
    it('should register a package and its commands', () => {
      registry.registerPackage(module('workspace', ['export', 'ask']));

      expect(registry.getCommand('workspace', 'export')?.description).toBe('export command');
      expect(registry.getCommand('workspace', 'ask')?.description).toBe('ask command');
    });

    it('should throw error on duplicate package registration', () => {
      registry.registerPackage(module('workspace', []));
      expect(() => registry.registerPackage(module('workspace', []))).toThrow(
        'Package workspace is already registered'
      );
    });

    it('should allow the same command name in different packages', () => {
      registry.registerPackage(module('workspace', ['list']));
      registry.registerPackage(module('profiles', ['list']));

      expect(registry.getCommand('workspace', 'list')?.examples).toEqual(['loggather workspace list']);
      expect(registry.getCommand('profiles', 'list')?.examples).toEqual(['loggather profiles list']);
    });

    it('should throw error on duplicate command within a package', () => {
      expect(() => registry.registerPackage(module('workspace', ['export', 'export']))).toThrow(
        'Command workspace.export is already registered'
      );
    });

    it('should reject commands without a description', () => {
      const invalid: PackageCommandModule = {
        packageName: 'broken',
        description: 'Broken',
        commands: [
          commandDefinition({
            name: 'run',
            description: ' ',
            schema: z.object({}),
            handler: async () => undefined,
          }),
        ],
      };

      expect(() => registry.registerPackage(invalid)).toThrow(
        'Command description must be a non-empty string'
      );
      expect(registry.getCommand('broken', 'run')).toBeUndefined();
    });
  });

  describe('Lookup', () => {
    it('should return undefined for unknown commands', () => {
      expect(registry.getCommand('workspace', 'missing')).toBeUndefined();
    });

    it('should find the package a command belongs to', () => {
      registry.registerPackage(module('profiles', ['list']));
      expect(registry.findPackageName('list')).toBe('profiles');
      expect(registry.findPackageName('export')).toBeUndefined();
    });
  });

  describe('Examples help', () => {
    it('should render command examples', () => {
      registry.registerPackage(module('profiles', ['list']));
      expect(registry.generateExamplesHelp('profiles', 'list').split('\n')).toEqual([
        '',
        'Examples:',
        '  $ loggather profiles list',
      ]);
    });

    it('should be empty for unknown commands or commands without examples', () => {
      registry.registerPackage({
        packageName: 'plain',
        description: 'Plain',
        commands: [
          commandDefinition({
            name: 'run',
            description: 'Run',
            schema: z.object({}),
            handler: async () => undefined,
          }),
        ],
      });
      expect(registry.generateExamplesHelp('plain', 'run')).toBe('');
      expect(registry.generateExamplesHelp('nope', 'run')).toBe('');
    });
  });
});
