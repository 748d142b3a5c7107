/**
 * Command registry: package modules in registration order, plus an index from
 * `package.command` to its definition and from each definition back to its package.
 */

import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { ConfigurationError, ValidationError } from '@cae/utils';

const NAME_COLUMN = 20;

function assertCommandShape(command: CommandDefinition): void {
  const problem =
    !command.name ? 'Command name must be a non-empty string'
    : !command.description ? 'Command description must be a non-empty string'
    : typeof command.handler !== 'function' ? 'Command must have a handler function'
    : undefined;
  if (problem) {
    throw new ValidationError(problem, { command: command.name });
  }
}

function qualifiedName(packageName: string, commandName: string): string {
  return `${packageName}.${commandName}`;
}

export class CommandRegistry {
  private readonly modules: PackageCommandModule[] = [];
  private readonly byName = new Map<string, CommandDefinition>();
  private readonly owners = new Map<CommandDefinition, string>();

  /**
   * Add a package's commands. Nothing is registered if any command is malformed
   * or its name repeats within the package.
   */
  registerPackage(module: PackageCommandModule): void {
    const { packageName } = module;
    if (this.modules.some((existing) => existing.packageName === packageName)) {
      throw new ConfigurationError(`Package ${packageName} is already registered`, 'packageName', {
        packageName,
      });
    }

    const staged = new Map<string, CommandDefinition>();
    for (const command of module.commands) {
      assertCommandShape(command);
      const key = qualifiedName(packageName, command.name);
      if (staged.has(key)) {
        throw new ConfigurationError(`Command ${key} is already registered`, 'commandName', {
          packageName,
          commandName: command.name,
        });
      }
      staged.set(key, command);
    }

    this.modules.push(module);
    for (const [key, command] of staged) {
      this.byName.set(key, command);
      this.owners.set(command, packageName);
    }
  }

  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.byName.get(qualifiedName(packageName, commandName));
  }

  /** Package a definition was registered under */
  findPackageName(command: CommandDefinition): string | undefined {
    return this.owners.get(command);
  }

  generatePackageHelp(packageName: string): string {
    const module = this.modules.find((candidate) => candidate.packageName === packageName);
    if (!module) {
      return `Package ${packageName} not found`;
    }
    const commandLines = module.commands.flatMap((command) => [
      `  ${command.name.padEnd(NAME_COLUMN)} ${command.description}`,
      ...(command.examples ?? []).map((example) => `    Example: ${example}`),
    ]);
    return [module.description, '', 'Commands:', ...commandLines].join('\n');
  }

  generateHelp(): string {
    const packageLines = this.modules.map(
      (module) => `  ${module.packageName.padEnd(NAME_COLUMN)} ${module.description}`
    );
    return ['Available packages:', '', ...packageLines].join('\n');
  }
}

export const commandRegistry = new CommandRegistry();
