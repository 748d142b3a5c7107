import type { TrialMetrics } from '../optimization/types.js';

export interface ScoreContext {
  parameterName: string;
  parameterValue: number;
  range: readonly [number, number];
}

export interface QualityAssessment extends TrialMetrics {
  /** 0..100 */
  score: number;
}

/**
 * Scores an exported artifact. A bare number is accepted as the score.
 */
export interface QualityScorerPort {
  score(artifactPath: string, context: ScoreContext): Promise<number | QualityAssessment>;
}
