import { describe, it, expect } from 'vitest';
import { logger } from '@cae/utils';
import {
  TrialEvaluator,
  failedTrial,
  normalizeAssessment,
} from '../../../src/optimization/TrialEvaluator.js';
import type { ParameterSpec } from '../../../src/optimization/types.js';
import { FakeCadSession, TableScorer, constantScorer, steppingClock } from '../../helpers/fakes.js';

const spec: ParameterSpec = {
  name: 'Fillet_Radius',
  range: [2, 15],
  stepCount: 5,
  stepMode: 'linear',
};

const always = () => true;

describe('TrialEvaluator', () => {
  const evaluator = () => new TrialEvaluator(steppingClock(250));

  it('runs set, rebuild, export and score in order', async () => {
    const session = new FakeCadSession();
    const record = await evaluator().evaluate(3, 8.5, spec, session, constantScorer(92), '/out');

    expect(session.calls).toEqual([
      'set:Fillet_Radius=8.5',
      'rebuild',
      'export:trial_03_Fillet_Radius_8.5.step:step',
    ]);
    expect(record).toEqual({
      ok: true,
      index: 3,
      parameterValue: 8.5,
      qualityScore: 92,
      elapsedSeconds: 0.25,
      artifactPath: '/out/trial_03_Fillet_Radius_8.5.step',
    });
  });

  it('exports in the requested format', async () => {
    const session = new FakeCadSession();
    const record = await evaluator().evaluate(1, 2, spec, session, constantScorer(50), '/out', 'stl');

    expect(session.calls[2]).toBe('export:trial_01_Fillet_Radius_2.stl:stl');
    expect(record.artifactPath).toBe('/out/trial_01_Fillet_Radius_2.stl');
  });

  it('keeps scorer metrics next to the score', async () => {
    const scorer = new TableScorer(
      new Map([[5.25, { score: 78, allowableStress: 164.5, safetyFactor: 1.5, notes: 'ok' }]])
    );
    const record = await evaluator().evaluate(2, 5.25, spec, new FakeCadSession(), scorer, '/out');

    expect(record.ok).toBe(true);
    expect(record.ok && record.metrics).toEqual({
      allowableStress: 164.5,
      safetyFactor: 1.5,
      notes: 'ok',
    });
    expect(scorer.contexts).toEqual([
      { parameterName: 'Fillet_Radius', parameterValue: 5.25, range: [2, 15] },
    ]);
  });

  it('records a rejected parameter and skips the remaining steps', async () => {
    const session = new FakeCadSession({ setParameter: always });
    const record = await evaluator().evaluate(1, 2, spec, session, constantScorer(50), '/out');

    expect(session.calls).toEqual(['set:Fillet_Radius=2']);
    expect(record).toEqual({
      ok: false,
      index: 1,
      parameterValue: 2,
      qualityScore: null,
      elapsedSeconds: 0.25,
      error: 'parameter rejected: value outside constraint limits',
      failedStage: 'set_parameter',
    });
  });

  it('records a rebuild failure', async () => {
    const session = new FakeCadSession({ rebuild: always });
    const record = await evaluator().evaluate(3, 8.5, spec, session, constantScorer(50), '/out');

    expect(session.calls).toEqual(['set:Fillet_Radius=8.5', 'rebuild']);
    expect(record.ok).toBe(false);
    expect(!record.ok && record.error).toBe('rebuild failed: sketch is over-constrained');
    expect(!record.ok && record.failedStage).toBe('rebuild');
    expect(record.artifactPath).toBeUndefined();
  });

  it('records an export failure', async () => {
    const session = new FakeCadSession({ export: always });
    const record = await evaluator().evaluate(4, 11.75, spec, session, constantScorer(50), '/out');

    expect(!record.ok && record.error).toBe('export failed: disk full');
    expect(!record.ok && record.failedStage).toBe('export');
  });

  it('records a scorer failure and keeps the artifact path', async () => {
    const record = await evaluator().evaluate(
      5,
      15,
      spec,
      new FakeCadSession(),
      new TableScorer(new Map()),
      '/out'
    );

    expect(record).toEqual({
      ok: false,
      index: 5,
      parameterValue: 15,
      qualityScore: null,
      elapsedSeconds: 0.25,
      error: 'scoring failed: no score for 15',
      failedStage: 'score',
      artifactPath: '/out/trial_05_Fillet_Radius_15.step',
    });
  });

  it('treats an out-of-range score as a scoring failure', async () => {
    const record = await evaluator().evaluate(1, 2, spec, new FakeCadSession(), constantScorer(120), '/out');

    expect(!record.ok && record.error).toBe('scoring failed: score 120 is outside [0, 100]');
  });

  it('logs a warning for failed trials', async () => {
    await evaluator().evaluate(1, 2, spec, new FakeCadSession({ rebuild: always }), constantScorer(1), '/out');

    expect(logger.warn).toHaveBeenCalledWith('Trial failed', {
      stage: 'rebuild',
      error: 'rebuild failed: sketch is over-constrained',
      parameterValue: 2,
    });
  });

  it('describes non-Error rejections', async () => {
    const scorer = {
      score: async (): Promise<number> => {
        throw 'scorer offline';
      },
    };
    const record = await evaluator().evaluate(1, 2, spec, new FakeCadSession(), scorer, '/out');

    expect(!record.ok && record.error).toBe('scoring failed: scorer offline');
  });
});

describe('failedTrial', () => {
  it('uses the bare label for timeouts', () => {
    const record = failedTrial({
      index: 2,
      parameterValue: 5.25,
      elapsedSeconds: 30,
      stage: 'timeout',
      cause: new Error('ignored'),
    });

    expect(record.error).toBe('timeout');
    expect(record.failedStage).toBe('timeout');
    expect(record.qualityScore).toBeNull();
  });

  it('falls back to the error name for empty messages', () => {
    expect(
      failedTrial({ index: 1, parameterValue: 1, elapsedSeconds: 0, stage: 'export', cause: new TypeError('') })
        .error
    ).toBe('export failed: TypeError');
  });
});

describe('TrialEvaluator with an abort signal', () => {
  it('makes no session call after the signal fires', async () => {
    const base = new FakeCadSession();
    const controller = new AbortController();
    const scorer = new TableScorer(new Map([[8.5, 90]]));
    const session = {
      load: (p: string) => base.load(p),
      setParameter: (n: string, v: number) => base.setParameter(n, v),
      rebuild: async () => {
        await base.rebuild();
        controller.abort();
      },
      export: base.export.bind(base),
    };

    const record = await new TrialEvaluator(steppingClock(250)).evaluate(
      3,
      8.5,
      spec,
      session,
      scorer,
      '/out',
      'step',
      controller.signal
    );

    expect(base.calls).toEqual(['set:Fillet_Radius=8.5', 'rebuild']);
    expect(scorer.contexts).toEqual([]);
    expect(record).toMatchObject({ ok: false, error: 'timeout', failedStage: 'timeout' });
  });

  it('runs normally while the signal is untouched', async () => {
    const session = new FakeCadSession();
    const record = await new TrialEvaluator(steppingClock(250)).evaluate(
      1,
      2,
      spec,
      session,
      constantScorer(70),
      '/out',
      'step',
      new AbortController().signal
    );

    expect(record.ok).toBe(true);
    expect(session.calls).toHaveLength(3);
  });
});

describe('normalizeAssessment', () => {
  it('wraps a bare score', () => {
    expect(normalizeAssessment(64)).toEqual({ score: 64 });
  });

  it('accepts the bounds', () => {
    expect(normalizeAssessment(0).score).toBe(0);
    expect(normalizeAssessment({ score: 100, notes: 'max' })).toEqual({ score: 100, notes: 'max' });
  });

  it('rejects NaN and out-of-range scores', () => {
    expect(() => normalizeAssessment(Number.NaN)).toThrow('score NaN is outside [0, 100]');
    expect(() => normalizeAssessment(-0.5)).toThrow('score -0.5 is outside [0, 100]');
  });
});
