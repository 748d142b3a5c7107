/**
 * Runs a validated command: loads config.yaml, calls the handler with
 * everything but `format`, and prints the formatted result.
 */

import { formatOutput } from './output-formatter.js';
import { handleError } from './error-handler.js';
import { CommandContext } from './command-context.js';
import { commandRegistry } from './command-registry.js';
import { getProgressIndicator, resetProgressIndicator } from './progress-indicator.js';
import type { CommandDefinition, OutputFormat } from '../types/index.js';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'csv'];

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Execute a command definition with pre-validated arguments
 *
 * Prints the formatted result on stdout. On failure prints a sanitized
 * one-line message on stderr and exits with status 1.
 */
export async function executeValidated(
  commandDef: CommandDefinition,
  validatedArgs: Record<string, unknown>,
  ctx: CommandContext = new CommandContext()
): Promise<void> {
  const packageName = commandRegistry.findPackageName(commandDef);
  const fullCommandName = packageName ? `${packageName}.${commandDef.name}` : commandDef.name;

  const progress = getProgressIndicator();

  try {
    progress.start('Initializing...');
    await ctx.ensureInitialized();

    // Format is CLI concern, not handler concern
    const { format: rawFormat, ...handlerArgs } = validatedArgs;
    const format = isOutputFormat(rawFormat) ? rawFormat : 'table';

    progress.updateMessage(`Running ${fullCommandName}...`);
    const result = await commandDef.handler(handlerArgs, ctx);

    progress.updateMessage('Formatting output...');
    const output = formatOutput(result, format);
    progress.stop();
    console.log(output);
  } catch (error) {
    progress.fail('Error occurred');
    const message = handleError(error, { command: fullCommandName });
    console.error(`Error: ${message}`);
    process.exit(1);
  } finally {
    resetProgressIndicator();
  }
}
