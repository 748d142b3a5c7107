/**
 * Optimization Types
 *
 * Types for the single-parameter sweep: what is swept, what one trial
 * produced, and what the whole run returns.
 */

import type { ExportFormat } from '@cae/utils';

export type StepMode = 'linear' | 'geometric';

/**
 * The parameter under optimization. Immutable once built.
 */
export interface ParameterSpec {
  readonly name: string;
  readonly range: readonly [min: number, max: number];
  readonly stepCount: number;
  readonly stepMode: StepMode;
}

/**
 * Pipeline step that failed inside a trial
 */
export type TrialStage = 'set_parameter' | 'rebuild' | 'export' | 'score' | 'timeout';

/**
 * Extra scorer output kept alongside the score
 */
export interface TrialMetrics {
  allowableStress?: number;
  safetyFactor?: number;
  notes?: string;
}

interface TrialRecordBase {
  /** 1-based position in the sweep */
  readonly index: number;
  readonly parameterValue: number;
  readonly elapsedSeconds: number;
}

export interface SuccessfulTrial extends TrialRecordBase {
  readonly ok: true;
  readonly qualityScore: number;
  readonly artifactPath?: string;
  readonly metrics?: TrialMetrics;
}

export interface FailedTrial extends TrialRecordBase {
  readonly ok: false;
  /** Failure sentinel */
  readonly qualityScore: null;
  readonly error: string;
  readonly failedStage: TrialStage;
  /** Set only when export succeeded and scoring failed */
  readonly artifactPath?: string;
}

export type TrialRecord = SuccessfulTrial | FailedTrial;

export interface OptimizationResult {
  readonly parameterSpec: ParameterSpec;
  readonly history: readonly TrialRecord[];
  readonly bestIndex?: number;
  readonly bestRecord?: SuccessfulTrial;
  readonly outputDir: string;
  readonly startedAt: string;
  readonly finishedAt: string;
}

export interface OptimizationOptions {
  /** Artifact extension and export format passed to the CAD session (default: step) */
  exportFormat?: ExportFormat;
  /** Per-trial deadline; an expired trial becomes a `timeout` failure */
  trialTimeoutMs?: number;
  /** Write optimization_result.json into the output directory (default: true) */
  writeSummary?: boolean;
  /** Called after every trial, in trial order */
  onTrialComplete?: (record: TrialRecord, total: number) => void;
}
