/**
 * Optimize commands - single-parameter CAD sweeps
 */

import type { Command } from 'commander';
import { defineCommand } from '../core/defineCommand.js';
import { coerceNumber, coerceNumberArray } from '../core/coerce.js';
import { die } from '../core/error-handler.js';
import { commandRegistry } from '../core/command-registry.js';
import { optimizeRunSchema, optimizeShowSchema } from '../command-defs/optimize.js';
import { runOptimizeHandler } from '../handlers/optimize/run-optimize.js';
import { showOptimizeHandler } from '../handlers/optimize/show-optimize.js';
import type { PackageCommandModule } from '../types/index.js';

/**
 * Register optimize commands
 */
export function registerOptimizeCommands(program: Command): void {
  const optimizeCmd = program
    .command('optimize')
    .description('Sweep one CAD parameter and pick the best-scoring value')
    .addHelpText('after', `\n${commandRegistry.generatePackageHelp('optimize')}`);

  const runCmd = optimizeCmd
    .command('run')
    .argument('<file>', 'CAD document (.FCStd)')
    .description('Run a parameter sweep')
    .option('-p, --parameter <name>', 'Parameter to sweep')
    .option('-r, --range <bounds...>', 'Range as <min> <max> (or "min,max")')
    .option('-s, --steps <n>', 'Number of trial values (default 5)')
    .option('-m, --step-mode <mode>', 'Spacing (linear|geometric)')
    .option('--cad <kind>', 'CAD backend (freecad|mock)')
    .option('-d, --output-dir <dir>', 'Directory for artifacts and the result file')
    .option('--export-format <format>', 'Artifact format (step|stl|iges)')
    .option('--timeout-ms <ms>', 'Per-trial timeout in milliseconds')
    .option('--report', 'Also write optimization_report.md')
    .option('--config <path>', 'Sweep file (YAML or JSON); flags override its keys')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');

  defineCommand(runCmd, {
    name: 'run',
    packageName: 'optimize',
    argsToOpts: (args, rawOpts) => ({ ...rawOpts, file: args[0] }),
    coerce: (raw) => ({
      ...raw,
      range: coerceNumberArray(raw.range, 'range'),
      steps: coerceNumber(raw.steps, 'steps'),
      timeoutMs: coerceNumber(raw.timeoutMs, 'timeout-ms'),
    }),
    onError: die,
  });

  const showCmd = optimizeCmd
    .command('show')
    .argument('<path>', 'optimization_result.json to display')
    .description('Display a saved optimization result')
    .option('--format <format>', 'Output format (json|table|csv)', 'table');

  defineCommand(showCmd, {
    name: 'show',
    packageName: 'optimize',
    argsToOpts: (args, rawOpts) => ({ ...rawOpts, path: args[0] }),
    onError: die,
  });
}

/**
 * Register as package command module
 */
const optimizeModule: PackageCommandModule = {
  packageName: 'optimize',
  description: 'Single-parameter CAD optimization',
  commands: [
    {
      name: 'run',
      description: 'Sweep a parameter over a range and score each rebuilt part',
      schema: optimizeRunSchema,
      handler: async (args, ctx) => runOptimizeHandler(optimizeRunSchema.parse(args), ctx),
      examples: [
        'cae optimize run bracket.FCStd -p Fillet_Radius -r 2 15 -s 5',
        'cae optimize run bracket.FCStd --config sweep.yaml --report',
        'cae optimize run part.FCStd -p Length -r 50 200 -m geometric --cad mock',
      ],
    },
    {
      name: 'show',
      description: 'Display a saved optimization result',
      schema: optimizeShowSchema,
      handler: async (args, ctx) => showOptimizeHandler(optimizeShowSchema.parse(args), ctx),
      examples: ['cae optimize show optimization_results/optimization_result.json --format csv'],
    },
  ],
};

commandRegistry.registerPackage(optimizeModule);

export default optimizeModule;
