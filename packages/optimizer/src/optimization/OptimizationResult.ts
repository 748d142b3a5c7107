/**
 * OptimizationResult helpers
 *
 * Best-trial selection and summary statistics over a finished history.
 */

import type {
  OptimizationResult,
  ParameterSpec,
  SuccessfulTrial,
  TrialRecord,
} from './types.js';

/**
 * Highest-scoring successful trial; ties go to the earliest index.
 * Undefined when no trial succeeded.
 */
export function selectBest(history: readonly TrialRecord[]): SuccessfulTrial | undefined {
  let best: SuccessfulTrial | undefined;
  for (const record of history) {
    if (!record.ok) {
      continue;
    }
    // strict > keeps the first occurrence of the max
    if (best === undefined || record.qualityScore > best.qualityScore) {
      best = record;
    }
  }
  return best;
}

export function buildOptimizationResult(args: {
  parameterSpec: ParameterSpec;
  history: readonly TrialRecord[];
  outputDir: string;
  startedAt: string;
  finishedAt: string;
}): OptimizationResult {
  const history = Object.freeze([...args.history]);
  const best = selectBest(history);

  return Object.freeze({
    parameterSpec: args.parameterSpec,
    history,
    outputDir: args.outputDir,
    startedAt: args.startedAt,
    finishedAt: args.finishedAt,
    ...(best !== undefined ? { bestIndex: best.index, bestRecord: best } : {}),
  });
}

export interface ResultSummary {
  parameter: string;
  trials: number;
  succeeded: number;
  failed: number;
  bestIndex: number | null;
  bestValue: number | null;
  bestScore: number | null;
  meanScore: number | null;
  minScore: number | null;
  maxScore: number | null;
  totalSeconds: number;
  meanSeconds: number;
}

/**
 * Counts and score statistics (statistics cover successful trials only)
 */
export function summarizeResult(result: OptimizationResult): ResultSummary {
  const scores = result.history.flatMap((r) => (r.ok ? [r.qualityScore] : []));
  const totalSeconds = result.history.reduce((sum, r) => sum + r.elapsedSeconds, 0);
  const trials = result.history.length;

  return {
    parameter: result.parameterSpec.name,
    trials,
    succeeded: scores.length,
    failed: trials - scores.length,
    bestIndex: result.bestIndex ?? null,
    bestValue: result.bestRecord?.parameterValue ?? null,
    bestScore: result.bestRecord?.qualityScore ?? null,
    meanScore: scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : null,
    minScore: scores.length > 0 ? Math.min(...scores) : null,
    maxScore: scores.length > 0 ? Math.max(...scores) : null,
    totalSeconds,
    meanSeconds: trials > 0 ? totalSeconds / trials : 0,
  };
}
