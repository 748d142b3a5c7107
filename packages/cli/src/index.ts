/**
 * @cae/cli - command line interface
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export * from './types/index.js';
export { registerOptimizeCommands } from './commands/optimize.js';
export { runOptimizeHandler, resolveSweepSettings } from './handlers/optimize/run-optimize.js';
export { showOptimizeHandler } from './handlers/optimize/show-optimize.js';
export { toOptimizeOutput, type OptimizeOutput, type TrialRow } from './handlers/optimize/optimize-output.js';
