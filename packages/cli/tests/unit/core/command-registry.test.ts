import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ConfigurationError, ValidationError } from '@cae/utils';
import { CommandRegistry } from '../../../src/core/command-registry.js';
import type { CommandDefinition, PackageCommandModule } from '../../../src/types/index.js';

function command(name: string, overrides: Partial<CommandDefinition> = {}): CommandDefinition {
  return {
    name,
    description: `${name} things`,
    schema: z.object({}),
    handler: async () => ({ ok: true }),
    ...overrides,
  };
}

function sweepModule(commands: CommandDefinition[] = [command('run'), command('show')]): PackageCommandModule {
  return { packageName: 'sweep', description: 'Parameter sweeps', commands };
}

describe('CommandRegistry', () => {
  it('looks commands up by package and name', () => {
    const registry = new CommandRegistry();
    const module = sweepModule();
    registry.registerPackage(module);

    expect(registry.getCommand('sweep', 'show')).toBe(module.commands[1]);
    expect(registry.getCommand('sweep', 'missing')).toBeUndefined();
    expect(registry.getCommand('other', 'run')).toBeUndefined();
  });

  it('rejects a package registered twice', () => {
    const registry = new CommandRegistry();
    registry.registerPackage(sweepModule());

    expect(() => registry.registerPackage(sweepModule())).toThrow(ConfigurationError);
    expect(() => registry.registerPackage(sweepModule())).toThrow('Package sweep is already registered');
  });

  it('rejects duplicate command names inside one package', () => {
    const registry = new CommandRegistry();
    expect(() => registry.registerPackage(sweepModule([command('run'), command('run')]))).toThrow(
      'Command sweep.run is already registered'
    );
    expect(registry.getCommand('sweep', 'run')).toBeUndefined();
    expect(registry.generateHelp()).toBe('Available packages:\n');
  });

  it('validates command structure before registering', () => {
    const registry = new CommandRegistry();

    expect(() => registry.registerPackage(sweepModule([command('run', { description: '' })]))).toThrow(
      'Command description must be a non-empty string'
    );
    expect(() => registry.registerPackage(sweepModule([command('')]))).toThrow(ValidationError);
    expect(registry.generatePackageHelp('sweep')).toBe('Package sweep not found');
  });

  it('finds the package a definition belongs to', () => {
    const registry = new CommandRegistry();
    const module = sweepModule();
    registry.registerPackage(module);

    expect(registry.findPackageName(module.commands[0] ?? command('x'))).toBe('sweep');
    expect(registry.findPackageName(command('run'))).toBeUndefined();
  });

  it('generates help text', () => {
    const registry = new CommandRegistry();
    registry.registerPackage(
      sweepModule([command('run', { examples: ['cae sweep run part.FCStd'] })])
    );

    expect(registry.generateHelp()).toBe(
      ['Available packages:', '', `  ${'sweep'.padEnd(20)} Parameter sweeps`].join('\n')
    );
    expect(registry.generatePackageHelp('sweep')).toBe(
      [
        'Parameter sweeps',
        '',
        'Commands:',
        `  ${'run'.padEnd(20)} run things`,
        '    Example: cae sweep run part.FCStd',
      ].join('\n')
    );
    expect(registry.generatePackageHelp('nope')).toBe('Package nope not found');
  });
});
