/**
 * TrialEvaluator
 *
 * Applies one sampled value end-to-end:
 *   set parameter → rebuild → export → score
 *
 * Every step failure becomes a FailedTrial; evaluate() always resolves with
 * exactly one TrialRecord so a bad trial never aborts the sweep.
 *
 * An aborted signal is checked before each session call and before scoring;
 * once it fires the trial makes no further calls and resolves as a timeout.
 */

import type { ExportFormat } from '@cae/utils';
import { logger } from '@cae/utils';
import type { CadSessionPort } from '../ports/CadSessionPort.js';
import type { QualityAssessment, QualityScorerPort } from '../ports/QualityScorerPort.js';
import { trialArtifactPath } from './artifacts.js';
import type { FailedTrial, ParameterSpec, SuccessfulTrial, TrialRecord, TrialStage } from './types.js';

export interface Clock {
  nowMs(): number;
}

export const systemClock: Clock = {
  nowMs: () => performance.now(),
};

const STAGE_LABELS: Record<TrialStage, string> = {
  set_parameter: 'parameter rejected',
  rebuild: 'rebuild failed',
  export: 'export failed',
  score: 'scoring failed',
  timeout: 'timeout',
};

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}

/**
 * Build a failure record for a stage
 */
export function failedTrial(args: {
  index: number;
  parameterValue: number;
  elapsedSeconds: number;
  stage: TrialStage;
  cause?: unknown;
  artifactPath?: string;
}): FailedTrial {
  const label = STAGE_LABELS[args.stage];
  const error =
    args.stage === 'timeout' || args.cause === undefined
      ? label
      : `${label}: ${describeError(args.cause)}`;

  return Object.freeze({
    ok: false as const,
    index: args.index,
    parameterValue: args.parameterValue,
    qualityScore: null,
    elapsedSeconds: args.elapsedSeconds,
    error,
    failedStage: args.stage,
    ...(args.artifactPath !== undefined ? { artifactPath: args.artifactPath } : {}),
  });
}

/**
 * Accept a bare score or an assessment; reject anything outside [0, 100]
 */
export function normalizeAssessment(raw: number | QualityAssessment): QualityAssessment {
  const assessment = typeof raw === 'number' ? { score: raw } : raw;
  if (!Number.isFinite(assessment.score) || assessment.score < 0 || assessment.score > 100) {
    throw new Error(`score ${String(assessment.score)} is outside [0, 100]`);
  }
  return assessment;
}

/**
 * TrialEvaluator
 */
export class TrialEvaluator {
  constructor(private readonly clock: Clock = systemClock) {}

  async evaluate(
    index: number,
    value: number,
    spec: ParameterSpec,
    session: CadSessionPort,
    scorer: QualityScorerPort,
    outputDir: string,
    format: ExportFormat = 'step',
    signal?: AbortSignal
  ): Promise<TrialRecord> {
    const startMs = this.clock.nowMs();
    const elapsed = (): number => Math.max(0, (this.clock.nowMs() - startMs) / 1000);
    const trialLogger = logger.child({ parameter: spec.name, trialIndex: index });

    const fail = (stage: TrialStage, cause: unknown, artifactPath?: string): FailedTrial => {
      const record = failedTrial({
        index,
        parameterValue: value,
        elapsedSeconds: elapsed(),
        stage,
        cause,
        artifactPath,
      });
      trialLogger.warn('Trial failed', { stage, error: record.error, parameterValue: value });
      return record;
    };

    const abandoned = (): FailedTrial | undefined => {
      if (!signal?.aborted) {
        return undefined;
      }
      trialLogger.debug('Trial abandoned after deadline', { parameterValue: value });
      return failedTrial({
        index,
        parameterValue: value,
        elapsedSeconds: elapsed(),
        stage: 'timeout',
      });
    };

    trialLogger.debug('Setting parameter', { parameterValue: value });
    const beforeSet = abandoned();
    if (beforeSet) return beforeSet;
    try {
      await session.setParameter(spec.name, value);
    } catch (error) {
      return fail('set_parameter', error);
    }

    const beforeRebuild = abandoned();
    if (beforeRebuild) return beforeRebuild;
    try {
      await session.rebuild();
    } catch (error) {
      return fail('rebuild', error);
    }

    const beforeExport = abandoned();
    if (beforeExport) return beforeExport;
    const artifactPath = trialArtifactPath(outputDir, index, spec.name, value, format);
    try {
      await session.export(artifactPath, format);
    } catch (error) {
      return fail('export', error);
    }

    const beforeScore = abandoned();
    if (beforeScore) return beforeScore;
    let assessment: QualityAssessment;
    try {
      assessment = normalizeAssessment(
        await scorer.score(artifactPath, {
          parameterName: spec.name,
          parameterValue: value,
          range: spec.range,
        })
      );
    } catch (error) {
      return fail('score', error, artifactPath);
    }

    const { score, ...metrics } = assessment;
    const record: SuccessfulTrial = Object.freeze({
      ok: true as const,
      index,
      parameterValue: value,
      qualityScore: score,
      elapsedSeconds: elapsed(),
      artifactPath,
      ...(Object.keys(metrics).length > 0 ? { metrics } : {}),
    });

    trialLogger.debug('Trial completed', {
      qualityScore: score,
      elapsedSeconds: record.elapsedSeconds,
    });

    return record;
  }
}
