/**
 * Show Optimize Handler
 *
 * Re-renders a saved optimization_result.json.
 */

import { readResultJson } from '@cae/optimizer';
import type { CommandContext } from '../../core/command-context.js';
import type { OptimizeShowArgs } from '../../command-defs/optimize.js';
import { toOptimizeOutput, type OptimizeOutput } from './optimize-output.js';

export async function showOptimizeHandler(
  args: OptimizeShowArgs,
  _ctx: CommandContext
): Promise<OptimizeOutput> {
  const result = await readResultJson(args.path);
  return toOptimizeOutput(result, { result: args.path });
}
