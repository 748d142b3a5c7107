#!/usr/bin/env node

/**
 * cae CLI Entry Point
 *
 * Command modules register themselves in commandRegistry when imported.
 * registerXCommands adds the Commander options and wires them to the handlers.
 */

import { program } from 'commander';
import { logger } from '@cae/utils';
import { handleError } from '../core/error-handler.js';
import { commandRegistry } from '../core/command-registry.js';
import { registerOptimizeCommands } from '../commands/optimize.js';

program
  .name('cae')
  .description('CAE CLI - parameter optimization for parametric CAD models')
  .version('0.1.0')
  .addHelpText('after', `\n${commandRegistry.generateHelp()}`);

registerOptimizeCommands(program);

program.configureOutput({
  writeErr: (str) => {
    process.stderr.write(str);
  },
});

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (error) {
    const message = handleError(error);
    console.error(`Error: ${message}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in CLI', error);
  process.exit(1);
});

export { program };
