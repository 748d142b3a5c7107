/**
 * OptimizationEngine
 *
 * Drives the single-parameter sweep:
 *   validate spec → prepare output dir → sample values → evaluate each value
 *   in order → select best → write summary
 *
 * Trials run strictly one after another against the one CAD session the
 * caller passed in. Trial failures are recorded and the sweep continues;
 * only specification and output-directory errors abort a run.
 *
 * A trial past its deadline is recorded as `timeout`; the engine still waits
 * for the session call in flight to return before the next trial starts, so
 * adapters are expected to bound their own calls (FreeCadBridge does).
 */

import { constants } from 'fs';
import { access, mkdir } from 'fs/promises';
import { DateTime } from 'luxon';
import { OutputDirectoryError, logger } from '@cae/utils';
import type { CadSessionPort } from '../ports/CadSessionPort.js';
import type { QualityScorerPort } from '../ports/QualityScorerPort.js';
import { writeResultJson } from '../reporting/result-store.js';
import { buildOptimizationResult } from './OptimizationResult.js';
import { ParameterSampler } from './ParameterSampler.js';
import { TrialEvaluator, failedTrial, systemClock, type Clock } from './TrialEvaluator.js';
import type {
  OptimizationOptions,
  OptimizationResult,
  ParameterSpec,
  TrialRecord,
} from './types.js';

function isoNow(): string {
  return DateTime.utc().toISO() ?? new Date().toISOString();
}

/**
 * Create the output directory (recursively) and make sure it is writable
 */
export async function ensureOutputDir(outputDir: string): Promise<void> {
  try {
    await mkdir(outputDir, { recursive: true });
    await access(outputDir, constants.W_OK);
  } catch (error) {
    throw new OutputDirectoryError(outputDir, error);
  }
}

export interface OptimizationEngineDeps {
  sampler?: ParameterSampler;
  evaluator?: TrialEvaluator;
  clock?: Clock;
}

/**
 * OptimizationEngine
 */
export class OptimizationEngine {
  private readonly sampler: ParameterSampler;
  private readonly evaluator: TrialEvaluator;
  private readonly clock: Clock;

  constructor(deps: OptimizationEngineDeps = {}) {
    this.clock = deps.clock ?? systemClock;
    this.sampler = deps.sampler ?? new ParameterSampler();
    this.evaluator = deps.evaluator ?? new TrialEvaluator(this.clock);
  }

  /**
   * Run the sweep. Rejects only with InvalidRangeError / InvalidArgumentError
   * (bad spec) or OutputDirectoryError; everything else ends up in history.
   */
  async run(
    spec: ParameterSpec,
    session: CadSessionPort,
    scorer: QualityScorerPort,
    outputDir: string,
    options: OptimizationOptions = {}
  ): Promise<OptimizationResult> {
    this.sampler.validate(spec);
    await ensureOutputDir(outputDir);

    const values = this.sampler.generate(spec);
    const format = options.exportFormat ?? 'step';
    const startedAt = isoNow();
    const runLogger = logger.child({ parameter: spec.name });

    runLogger.info('Starting optimization', {
      range: spec.range,
      stepCount: spec.stepCount,
      stepMode: spec.stepMode,
      outputDir,
      exportFormat: format,
    });

    const history: TrialRecord[] = [];
    for (const [offset, value] of values.entries()) {
      const index = offset + 1;
      const record = await this.runTrial(index, value, spec, session, scorer, outputDir, options);
      history.push(record);
      this.notify(options, record, values.length);
    }

    const result = buildOptimizationResult({
      parameterSpec: spec,
      history,
      outputDir,
      startedAt,
      finishedAt: isoNow(),
    });

    runLogger.info('Optimization completed', {
      trials: history.length,
      failed: history.filter((r) => !r.ok).length,
      bestIndex: result.bestIndex,
      bestValue: result.bestRecord?.parameterValue,
      bestScore: result.bestRecord?.qualityScore,
    });

    if (options.writeSummary !== false) {
      // the sweep is done; a failed summary write must not discard its history
      try {
        await writeResultJson(result, outputDir);
      } catch (error) {
        logger.error('Failed to write optimization summary', error, { outputDir });
      }
    }

    return result;
  }

  private async runTrial(
    index: number,
    value: number,
    spec: ParameterSpec,
    session: CadSessionPort,
    scorer: QualityScorerPort,
    outputDir: string,
    options: OptimizationOptions
  ): Promise<TrialRecord> {
    const timeoutMs = options.trialTimeoutMs;
    const format = options.exportFormat ?? 'step';
    if (timeoutMs === undefined || timeoutMs <= 0) {
      return this.evaluator.evaluate(index, value, spec, session, scorer, outputDir, format);
    }

    const controller = new AbortController();
    const startMs = this.clock.nowMs();
    const evaluation = this.evaluator.evaluate(
      index,
      value,
      spec,
      session,
      scorer,
      outputDir,
      format,
      controller.signal
    );

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    let outcome: TrialRecord | 'timeout';
    try {
      outcome = await Promise.race([evaluation, deadline]);
    } finally {
      clearTimeout(timer);
    }
    if (outcome !== 'timeout') {
      return outcome;
    }

    logger.warn('Trial timed out', { parameter: spec.name, trialIndex: index, timeoutMs });
    const elapsedSeconds = Math.max(0, (this.clock.nowMs() - startMs) / 1000);

    // The session has one writer: let the in-flight call return before the
    // next trial touches it. The aborted evaluation makes no further calls.
    controller.abort();
    await evaluation;

    return failedTrial({ index, parameterValue: value, elapsedSeconds, stage: 'timeout' });
  }

  private notify(options: OptimizationOptions, record: TrialRecord, total: number): void {
    if (!options.onTrialComplete) {
      return;
    }
    try {
      options.onTrialComplete(record, total);
    } catch (error) {
      logger.warn('Trial progress callback threw, ignoring', {
        trialIndex: record.index,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
