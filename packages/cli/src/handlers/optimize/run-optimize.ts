/**
 * Run Optimize Handler
 *
 * Resolves the sweep settings (defaults < sweep file < flags), opens the CAD
 * document, checks the parameter exists, runs the engine and optionally
 * writes the markdown report.
 */

import { join } from 'path';
import {
  RESULT_FILE_NAME,
  createParameterSpec,
  writeMarkdownReport,
  type CadSessionPort,
} from '@cae/optimizer';
import { findParameter } from '@cae/cad';
import { ParameterNotFoundError, createLogger, getOptimizationDefaults } from '@cae/utils';
import type { CommandContext } from '../../core/command-context.js';
import { loadConfig } from '../../core/config-loader.js';
import { parseArguments } from '../../core/argument-parser.js';
import { createProgressBar, getProgressIndicator } from '../../core/progress-indicator.js';
import {
  sweepFileSchema,
  sweepSettingsSchema,
  type OptimizeRunArgs,
  type SweepFile,
} from '../../command-defs/optimize.js';
import { toOptimizeOutput, type OptimizeOutput } from './optimize-output.js';

const logger = createLogger('cli:optimize');

export type SweepSettings = ReturnType<typeof sweepSettingsSchema.parse>;

/**
 * Merge configured defaults, the optional sweep file and CLI flags
 */
export async function resolveSweepSettings(args: OptimizeRunArgs): Promise<SweepSettings> {
  const overrides: SweepFile = {
    parameter: args.parameter,
    range: args.range,
    steps: args.steps,
    stepMode: args.stepMode,
    outputDir: args.outputDir,
    exportFormat: args.exportFormat,
    timeoutMs: args.timeoutMs,
    // a bare --report can only switch the report on
    report: args.report ? true : undefined,
  };

  const fromFile: SweepFile = args.config
    ? await loadConfig(args.config, sweepFileSchema, { ...overrides })
    : overrides;

  const defaults = getOptimizationDefaults();
  return parseArguments(sweepSettingsSchema, {
    steps: 5,
    stepMode: defaults.stepMode,
    outputDir: defaults.outputDir,
    exportFormat: defaults.exportFormat,
    timeoutMs: defaults.trialTimeoutMs,
    report: false,
    ...Object.fromEntries(Object.entries(fromFile).filter(([, v]) => v !== undefined)),
  });
}

/**
 * Resolve the user's parameter name against the model; returns the model's spelling
 */
async function resolveParameterName(session: CadSessionPort, name: string): Promise<string> {
  if (!session.listParameters) {
    return name;
  }
  const parameters = await session.listParameters();
  const found = findParameter(parameters, name);
  if (!found) {
    throw new ParameterNotFoundError(
      name,
      parameters.map((p) => p.name)
    );
  }
  return found.name;
}

export async function runOptimizeHandler(
  args: OptimizeRunArgs,
  ctx: CommandContext
): Promise<OptimizeOutput> {
  const settings = await resolveSweepSettings(args);

  // validate the spec before touching the CAD side
  createParameterSpec({
    name: settings.parameter,
    range: settings.range,
    stepCount: settings.steps,
    stepMode: settings.stepMode,
  });

  const session = ctx.services.cadSession(args.cad);
  const progress = getProgressIndicator();

  try {
    progress.updateMessage(`Opening ${args.file}...`);
    await session.load(args.file);

    const parameterName = await resolveParameterName(session, settings.parameter);
    const spec = createParameterSpec({
      name: parameterName,
      range: settings.range,
      stepCount: settings.steps,
      stepMode: settings.stepMode,
    });

    logger.info('Running optimization', {
      file: args.file,
      cad: args.cad,
      parameter: spec.name,
      outputDir: settings.outputDir,
    });

    const result = await ctx.services
      .optimizationEngine()
      .run(spec, session, ctx.services.qualityScorer(), settings.outputDir, {
        exportFormat: settings.exportFormat,
        trialTimeoutMs: settings.timeoutMs,
        onTrialComplete: (record, total) => {
          const outcome = record.ok ? `score ${record.qualityScore.toFixed(1)}` : record.error;
          progress.updateMessage(`${createProgressBar(record.index, total)} ${outcome}`);
        },
      });

    const reportPath = settings.report
      ? await writeMarkdownReport(result, settings.outputDir)
      : undefined;

    return toOptimizeOutput(result, {
      result: join(settings.outputDir, RESULT_FILE_NAME),
      ...(reportPath !== undefined ? { report: reportPath } : {}),
    });
  } finally {
    await session.close?.();
  }
}
