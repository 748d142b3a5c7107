/**
 * Property tests for TrialEvaluator
 *
 * Critical invariants:
 * - evaluate() resolves for every mix of step failures, never rejects
 * - exactly one of qualityScore / error is set
 * - the failing stage is the first step that failed
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { TrialEvaluator } from '../../src/optimization/TrialEvaluator.js';
import type { ParameterSpec, TrialStage } from '../../src/optimization/types.js';
import { FakeCadSession } from '../helpers/fakes.js';

const spec: ParameterSpec = { name: 'Width', range: [10, 60], stepCount: 6, stepMode: 'linear' };

describe('TrialEvaluator - Property Tests', () => {
  it('always resolves with a single consistent record', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.record({
          setParameter: fc.boolean(),
          rebuild: fc.boolean(),
          export: fc.boolean(),
          score: fc.boolean(),
        }),
        fc.double({ min: 10, max: 60, noNaN: true }),
        async (failAt, value) => {
          const session = new FakeCadSession({
            setParameter: () => failAt.setParameter,
            rebuild: () => failAt.rebuild,
            export: () => failAt.export,
          });
          const scorer = {
            score: async (): Promise<number> => {
              if (failAt.score) {
                throw new Error('scorer crashed');
              }
              return 70;
            },
          };

          const record = await new TrialEvaluator().evaluate(1, value, spec, session, scorer, '/tmp/out');

          const expectedStage: TrialStage | undefined = failAt.setParameter
            ? 'set_parameter'
            : failAt.rebuild
              ? 'rebuild'
              : failAt.export
                ? 'export'
                : failAt.score
                  ? 'score'
                  : undefined;

          expect(record.index).toBe(1);
          expect(record.parameterValue).toBe(value);
          if (expectedStage === undefined) {
            expect(record.ok).toBe(true);
            expect(record.qualityScore).toBe(70);
          } else {
            expect(record.ok).toBe(false);
            expect(record.qualityScore).toBeNull();
            expect(!record.ok && record.failedStage).toBe(expectedStage);
          }
        }
      )
    );
  });
});
