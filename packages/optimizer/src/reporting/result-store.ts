/**
 * Result Store
 *
 * Persists an OptimizationResult as optimization_result.json and reads it back.
 * The file mirrors the data model with snake_case keys:
 *
 *   {
 *     "parameter_spec": { "name", "range": [min, max], "step_count", "step_mode" },
 *     "history": [{ "index", "parameter_value", "quality_score" | null, ... }],
 *     "best_index": 3 | null,
 *     "started_at", "finished_at"
 *   }
 */

import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { ValidationError, logger } from '@cae/utils';
import { RESULT_FILE_NAME } from '../optimization/artifacts.js';
import { buildOptimizationResult } from '../optimization/OptimizationResult.js';
import type {
  OptimizationResult,
  TrialMetrics,
  TrialRecord,
} from '../optimization/types.js';

const TrialStageSchema = z.enum(['set_parameter', 'rebuild', 'export', 'score', 'timeout']);

const TrialMetricsSchema = z.object({
  allowable_stress: z.number().optional(),
  safety_factor: z.number().optional(),
  notes: z.string().optional(),
});

const TrialRecordJsonSchema = z
  .object({
    index: z.number().int().min(1),
    parameter_value: z.number(),
    quality_score: z.number().min(0).max(100).nullable(),
    elapsed_seconds: z.number().min(0),
    artifact_path: z.string().nullable(),
    error: z.string().nullable(),
    failed_stage: TrialStageSchema.nullable(),
    metrics: TrialMetricsSchema.optional(),
  })
  .refine((r) => (r.quality_score === null) === (r.error !== null), {
    message: 'a trial has either a quality_score or an error, never both or neither',
  });

export const OptimizationResultJsonSchema = z.object({
  parameter_spec: z.object({
    name: z.string().min(1),
    range: z.tuple([z.number(), z.number()]),
    step_count: z.number().int().min(1),
    step_mode: z.enum(['linear', 'geometric']),
  }),
  history: z.array(TrialRecordJsonSchema),
  best_index: z.number().int().min(1).nullable(),
  started_at: z.string(),
  finished_at: z.string(),
  output_dir: z.string(),
});

export type OptimizationResultJson = z.infer<typeof OptimizationResultJsonSchema>;
type TrialRecordJson = z.infer<typeof TrialRecordJsonSchema>;

function metricsToJson(metrics: TrialMetrics): z.infer<typeof TrialMetricsSchema> {
  return {
    ...(metrics.allowableStress !== undefined ? { allowable_stress: metrics.allowableStress } : {}),
    ...(metrics.safetyFactor !== undefined ? { safety_factor: metrics.safetyFactor } : {}),
    ...(metrics.notes !== undefined ? { notes: metrics.notes } : {}),
  };
}

function trialToJson(record: TrialRecord): TrialRecordJson {
  return {
    index: record.index,
    parameter_value: record.parameterValue,
    quality_score: record.qualityScore,
    elapsed_seconds: record.elapsedSeconds,
    artifact_path: record.artifactPath ?? null,
    error: record.ok ? null : record.error,
    failed_stage: record.ok ? null : record.failedStage,
    ...(record.ok && record.metrics ? { metrics: metricsToJson(record.metrics) } : {}),
  };
}

function trialFromJson(row: TrialRecordJson): TrialRecord {
  const base = {
    index: row.index,
    parameterValue: row.parameter_value,
    elapsedSeconds: row.elapsed_seconds,
    ...(row.artifact_path !== null ? { artifactPath: row.artifact_path } : {}),
  };

  if (row.quality_score !== null) {
    const metrics: TrialMetrics = {
      ...(row.metrics?.allowable_stress !== undefined
        ? { allowableStress: row.metrics.allowable_stress }
        : {}),
      ...(row.metrics?.safety_factor !== undefined
        ? { safetyFactor: row.metrics.safety_factor }
        : {}),
      ...(row.metrics?.notes !== undefined ? { notes: row.metrics.notes } : {}),
    };
    return {
      ...base,
      ok: true,
      qualityScore: row.quality_score,
      ...(Object.keys(metrics).length > 0 ? { metrics } : {}),
    };
  }

  return {
    ...base,
    ok: false,
    qualityScore: null,
    error: row.error ?? 'unknown error',
    failedStage: row.failed_stage ?? 'score',
  };
}

export function toResultJson(result: OptimizationResult): OptimizationResultJson {
  const spec = result.parameterSpec;
  return {
    parameter_spec: {
      name: spec.name,
      range: [spec.range[0], spec.range[1]],
      step_count: spec.stepCount,
      step_mode: spec.stepMode,
    },
    history: result.history.map(trialToJson),
    best_index: result.bestIndex ?? null,
    started_at: result.startedAt,
    finished_at: result.finishedAt,
    output_dir: result.outputDir,
  };
}

export function fromResultJson(json: OptimizationResultJson): OptimizationResult {
  const spec = json.parameter_spec;
  return buildOptimizationResult({
    parameterSpec: Object.freeze({
      name: spec.name,
      range: Object.freeze([spec.range[0], spec.range[1]] as const),
      stepCount: spec.step_count,
      stepMode: spec.step_mode,
    }),
    history: json.history.map(trialFromJson),
    outputDir: json.output_dir,
    startedAt: json.started_at,
    finishedAt: json.finished_at,
  });
}

/**
 * Write optimization_result.json into outputDir; returns the file path
 */
export async function writeResultJson(result: OptimizationResult, outputDir: string): Promise<string> {
  const path = join(outputDir, RESULT_FILE_NAME);
  await writeFile(path, JSON.stringify(toResultJson(result), null, 2) + '\n', 'utf-8');
  logger.debug('Wrote optimization summary', { path });
  return path;
}

/**
 * Read and validate a previously written optimization_result.json
 */
export async function readResultJson(path: string): Promise<OptimizationResult> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new ValidationError(
      `Failed to read optimization result from ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path }
    );
  }

  const parsed = OptimizationResultJsonSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid optimization result in ${path}: ${issues}`, {
      path,
      issues: parsed.error.issues,
    });
  }

  const result = fromResultJson(parsed.data);
  if ((result.bestIndex ?? null) !== parsed.data.best_index) {
    logger.warn('Stored best_index disagrees with history, using recomputed value', {
      path,
      stored: parsed.data.best_index,
      recomputed: result.bestIndex,
    });
  }
  return result;
}
