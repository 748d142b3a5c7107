/**
 * GeometryQualityScorer
 *
 * Rule-based 0..100 quality score for an exported part, with an allowable
 * stress / safety factor estimate for Q235 steel.
 *
 * Score = 50
 *   + volume band        (0.0001 < V < 0.01 m³: 15, V < 0.0001: 5, V < 0.1: 10, else 5)
 *   + vertex band        (100 < n < 50000: 10, n < 100: 5, else 7)
 *   + face band          (100 < n < 10000: 10, n < 100: 5, else 7)
 *   + parameter window   (5 < p < 15: 20, p <= 5: 10, else 15)
 *   + allowable stress   (> 140 MPa: 10, > 120: 5, else 2)
 *   + safety factor      (> 2.0: 10, > 1.5: 5, else 2)
 * clamped to [0, 100].
 */

import { createLogger } from '@cae/utils';
import type { QualityAssessment, QualityScorerPort, ScoreContext } from '@cae/optimizer';
import { readGeometryStats, type GeometryStats } from './geometry-stats.js';

const logger = createLogger('cad:scorer');

export const Q235_YIELD_STRENGTH_MPA = 235;
const BASE_SAFETY_FACTOR = 1.5;
const PARAMETER_WINDOW: readonly [number, number] = [5, 15];

export interface MechanicalEstimate {
  allowableStress: number;
  safetyFactor: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(value, max));
}

/**
 * Allowable stress (MPa) and safety factor from geometry and parameter value
 */
export function estimateMechanicalProperties(
  stats: Pick<GeometryStats, 'volume' | 'vertices' | 'faces'>,
  parameterValue: number
): MechanicalEstimate {
  const [low, high] = PARAMETER_WINDOW;

  let paramFactor: number;
  let safetyFactor: number;
  if (parameterValue < low) {
    paramFactor = 0.8;
    safetyFactor = BASE_SAFETY_FACTOR * 1.2;
  } else if (parameterValue < high) {
    paramFactor = 1.0;
    safetyFactor = BASE_SAFETY_FACTOR;
  } else {
    paramFactor = 0.9;
    safetyFactor = BASE_SAFETY_FACTOR * 1.1;
  }

  const volumeFactor = stats.volume < 0.0001 ? 0.7 : stats.volume < 0.01 ? 1.0 : 0.8;

  const complexity = stats.vertices + stats.faces;
  const complexityFactor = complexity < 1000 ? 1.1 : complexity < 10000 ? 1.0 : 0.9;

  const allowableStress =
    Q235_YIELD_STRENGTH_MPA * paramFactor * volumeFactor * complexityFactor;

  return {
    allowableStress: clamp(allowableStress, 50, Q235_YIELD_STRENGTH_MPA * 0.7),
    safetyFactor: clamp(safetyFactor, 1.2, 3.0),
  };
}

/**
 * Apply the scoring rules to known statistics
 */
export function scoreGeometry(stats: GeometryStats, parameterValue: number): QualityAssessment {
  let score = 50;

  const { volume, vertices, faces } = stats;
  if (volume > 0.0001 && volume < 0.01) {
    score += 15;
  } else if (volume < 0.0001) {
    score += 5;
  } else if (volume < 0.1) {
    score += 10;
  } else {
    score += 5;
  }

  if (vertices > 100 && vertices < 50000) {
    score += 10;
  } else if (vertices < 100) {
    score += 5;
  } else {
    score += 7;
  }

  if (faces > 100 && faces < 10000) {
    score += 10;
  } else if (faces < 100) {
    score += 5;
  } else {
    score += 7;
  }

  const [low, high] = PARAMETER_WINDOW;
  if (parameterValue > low && parameterValue < high) {
    score += 20;
  } else if (parameterValue <= low) {
    score += 10;
  } else {
    score += 15;
  }

  const mechanical = estimateMechanicalProperties(stats, parameterValue);
  if (mechanical.allowableStress > 140) {
    score += 10;
  } else if (mechanical.allowableStress > 120) {
    score += 5;
  } else {
    score += 2;
  }

  if (mechanical.safetyFactor > 2.0) {
    score += 10;
  } else if (mechanical.safetyFactor > 1.5) {
    score += 5;
  } else {
    score += 2;
  }

  return {
    score: clamp(score, 0, 100),
    allowableStress: mechanical.allowableStress,
    safetyFactor: mechanical.safetyFactor,
    notes: `Volume: ${volume.toExponential(2)} m³`,
  };
}

/**
 * GeometryQualityScorer
 */
export class GeometryQualityScorer implements QualityScorerPort {
  async score(artifactPath: string, context: ScoreContext): Promise<QualityAssessment> {
    const stats = await readGeometryStats(artifactPath);
    const assessment = scoreGeometry(stats, context.parameterValue);

    logger.debug('Scored artifact', {
      artifactPath,
      parameter: context.parameterName,
      parameterValue: context.parameterValue,
      vertices: stats.vertices,
      faces: stats.faces,
      volume: stats.volume,
      score: assessment.score,
    });

    return assessment;
  }
}
