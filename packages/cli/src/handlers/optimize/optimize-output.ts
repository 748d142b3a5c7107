/**
 * Shape returned by the optimize handlers and rendered by the output formatter
 */

import { summarizeResult, type OptimizationResult, type ResultSummary } from '@cae/optimizer';

export interface TrialRow {
  trial: number;
  value: number;
  score: number | null;
  seconds: number;
  status: 'ok' | 'failed';
  best: boolean;
  /** Error message for failures, scorer notes otherwise */
  detail: string;
  artifact: string;
}

export interface OptimizeOutput {
  summary: ResultSummary;
  trials: TrialRow[];
  files: {
    result?: string;
    report?: string;
  };
}

export function toOptimizeOutput(
  result: OptimizationResult,
  files: OptimizeOutput['files'] = {}
): OptimizeOutput {
  return {
    summary: summarizeResult(result),
    trials: result.history.map((record) => ({
      trial: record.index,
      value: record.parameterValue,
      score: record.qualityScore,
      seconds: Math.round(record.elapsedSeconds * 1000) / 1000,
      status: record.ok ? 'ok' : 'failed',
      best: record.index === result.bestIndex,
      detail: record.ok ? (record.metrics?.notes ?? '') : record.error,
      artifact: record.artifactPath ?? '',
    })),
    files,
  };
}

export function isOptimizeOutput(data: unknown): data is OptimizeOutput {
  return (
    typeof data === 'object' &&
    data !== null &&
    'summary' in data &&
    'trials' in data &&
    'files' in data &&
    Array.isArray(data.trials)
  );
}
