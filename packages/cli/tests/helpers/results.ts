/**
 * Small optimization result shared by formatter and handler tests
 */

import { buildOptimizationResult, type OptimizationResult } from '@cae/optimizer';

export function threeTrialResult(): OptimizationResult {
  return buildOptimizationResult({
    parameterSpec: { name: 'Fillet_Radius', range: [2, 6], stepCount: 3, stepMode: 'linear' },
    history: [
      {
        ok: true,
        index: 1,
        parameterValue: 2,
        qualityScore: 70,
        elapsedSeconds: 1.25,
        artifactPath: '/out/trial_01_Fillet_Radius_2.step',
        metrics: { notes: 'Volume: 1.50e-4 m³' },
      },
      {
        ok: false,
        index: 2,
        parameterValue: 4,
        qualityScore: null,
        elapsedSeconds: 0.5,
        error: 'rebuild failed: sketch is over-constrained',
        failedStage: 'rebuild',
      },
      {
        ok: true,
        index: 3,
        parameterValue: 6,
        qualityScore: 88.5,
        elapsedSeconds: 1,
        artifactPath: '/out/trial_03_Fillet_Radius_6.step',
      },
    ],
    outputDir: '/out',
    startedAt: '2026-03-02T09:00:00.000Z',
    finishedAt: '2026-03-02T09:00:03.000Z',
  });
}
