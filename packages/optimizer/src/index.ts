/**
 * @cae/optimizer - single-parameter CAD optimization loop
 */

export * from './optimization/types.js';
export * from './optimization/ParameterSampler.js';
export * from './optimization/TrialEvaluator.js';
export * from './optimization/OptimizationEngine.js';
export * from './optimization/OptimizationResult.js';
export * from './optimization/artifacts.js';

export type { CadParameter, CadSessionPort } from './ports/CadSessionPort.js';
export type { QualityAssessment, QualityScorerPort, ScoreContext } from './ports/QualityScorerPort.js';

export * from './reporting/result-store.js';
export * from './reporting/markdown-report.js';
