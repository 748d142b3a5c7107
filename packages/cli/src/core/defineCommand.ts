/**
 * Standard Command Wrapper
 *
 * Provides a mechanical pattern for CLI commands that makes it hard to screw up:
 * - Commander owns flags & parsing
 * - Wrapper owns: canonical option shape (camelCase), value coercion, schema validation,
 *   error formatting, handler invocation
 *
 * Uses commandDef.schema from the registry as the single source of truth for
 * validation, so the schema a command is registered with is the one it runs with.
 *
 * Invariant: Normalization never renames keys. Ever.
 */

import type { Command } from 'commander';
import { NotFoundError } from '@cae/utils';
import { executeValidated } from './execute.js';
import { commandRegistry } from './command-registry.js';
import { validateAndCoerceArgs } from './validation-pipeline.js';

type CoerceFn = (raw: Record<string, unknown>) => Record<string, unknown>;

export type DefineCommandArgs = {
  name: string;
  packageName: string;
  // Merge Commander positional arguments into options before coercion
  argsToOpts?: (args: unknown[], rawOpts: Record<string, unknown>) => Record<string, unknown>;
  // Value coercion only (numbers/arrays), NOT key renaming.
  coerce?: CoerceFn;
  onError?: (e: unknown) => never;
};

/**
 * Standard command wiring:
 * - Commander parses flags -> camelCase properties
 * - Optional argsToOpts() folds positional arguments in
 * - Optional coerce() for value parsing only
 * - Validates using commandDef.schema from registry
 * - Runs through executeValidated()
 */
export function defineCommand(cmd: Command, args: DefineCommandArgs): Command {
  cmd.name(args.name);

  cmd.action(async (...commanderArgs: unknown[]) => {
    try {
      const commandDef = commandRegistry.getCommand(args.packageName, args.name);
      if (!commandDef) {
        throw new NotFoundError('Command', `${args.packageName}.${args.name}`);
      }

      // Commander gives camelCase keys already
      const rawOpts: Record<string, unknown> = cmd.opts();

      // Commander passes (...positionals, options, command); keep the positionals only
      const positionals = commanderArgs.slice(0, cmd.registeredArguments.length);
      const merged = args.argsToOpts ? args.argsToOpts(positionals, rawOpts) : rawOpts;

      const coerced = args.coerce ? args.coerce(merged) : merged;

      const validated: Record<string, unknown> = validateAndCoerceArgs(commandDef.schema, coerced);

      await executeValidated(commandDef, validated);
    } catch (e) {
      if (args.onError) {
        args.onError(e);
      }
      throw e;
    }
  });

  return cmd;
}
