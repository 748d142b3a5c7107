/**
 * Markdown report for a finished sweep (optimization_report.md)
 */

import { writeFile } from 'fs/promises';
import { join } from 'path';
import { logger } from '@cae/utils';
import { REPORT_FILE_NAME } from '../optimization/artifacts.js';
import { summarizeResult } from '../optimization/OptimizationResult.js';
import type { OptimizationResult, TrialRecord } from '../optimization/types.js';

function fixed(value: number | undefined, digits: number): string {
  return value === undefined ? '-' : value.toFixed(digits);
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function trialRow(record: TrialRecord, bestIndex: number | undefined): string {
  if (!record.ok) {
    return (
      `| ${record.index} | ${record.parameterValue.toFixed(2)} | FAILED | - | - | ` +
      `${record.elapsedSeconds.toFixed(2)} | ${escapeCell(record.error)} |`
    );
  }
  const marker = record.index === bestIndex ? ' (best)' : '';
  return (
    `| ${record.index} | ${record.parameterValue.toFixed(2)} | ${record.qualityScore.toFixed(1)}${marker} | ` +
    `${fixed(record.metrics?.allowableStress, 1)} | ${fixed(record.metrics?.safetyFactor, 2)} | ` +
    `${record.elapsedSeconds.toFixed(2)} | ${escapeCell(record.metrics?.notes ?? '')} |`
  );
}

/**
 * Render the report. Deterministic for a given result (timestamps come from
 * the result itself).
 */
export function renderMarkdownReport(result: OptimizationResult): string {
  const spec = result.parameterSpec;
  const summary = summarizeResult(result);
  const lines: string[] = [];

  lines.push('# Parameter Optimization Report', '');
  lines.push('## Overview', '');
  lines.push(`- **Parameter**: ${spec.name}`);
  lines.push(`- **Range**: ${spec.range[0]} .. ${spec.range[1]} (${spec.stepMode}, ${spec.stepCount} steps)`);
  lines.push(`- **Trials**: ${summary.trials} (${summary.succeeded} succeeded, ${summary.failed} failed)`);
  lines.push(`- **Started**: ${result.startedAt}`);
  lines.push(`- **Finished**: ${result.finishedAt}`);
  lines.push(`- **Output directory**: \`${result.outputDir}\``, '');

  const best = result.bestRecord;
  if (best === undefined) {
    lines.push('## No viable trial found', '');
    lines.push('Every trial failed; see the table below for the failing step of each trial.', '');
  } else {
    lines.push('## Best Result', '');
    lines.push(`- **Trial**: ${best.index}`);
    lines.push(`- **${spec.name}**: ${best.parameterValue.toFixed(2)}`);
    lines.push(`- **Quality score**: ${best.qualityScore.toFixed(1)}/100`);
    if (best.metrics?.allowableStress !== undefined) {
      lines.push(`- **Allowable stress**: ${best.metrics.allowableStress.toFixed(1)} MPa`);
    }
    if (best.metrics?.safetyFactor !== undefined) {
      lines.push(`- **Safety factor**: ${best.metrics.safetyFactor.toFixed(2)}`);
    }
    lines.push(`- **Elapsed**: ${best.elapsedSeconds.toFixed(2)}s`);
    if (best.artifactPath !== undefined) {
      lines.push(`- **Artifact**: \`${best.artifactPath}\``);
    }
    lines.push('');
  }

  lines.push('## Trials', '');
  lines.push('| Trial | Value | Score | Allowable stress (MPa) | Safety factor | Time (s) | Notes |');
  lines.push('|-------|-------|-------|------------------------|---------------|----------|-------|');
  for (const record of result.history) {
    lines.push(trialRow(record, result.bestIndex));
  }
  lines.push('');

  lines.push('## Statistics', '');
  if (summary.meanScore !== null && summary.minScore !== null && summary.maxScore !== null) {
    lines.push(`- **Mean score**: ${summary.meanScore.toFixed(1)}`);
    lines.push(`- **Score range**: ${summary.minScore.toFixed(1)} ~ ${summary.maxScore.toFixed(1)}`);
  } else {
    lines.push('- **Mean score**: -');
  }
  lines.push(`- **Total time**: ${summary.totalSeconds.toFixed(2)}s`);
  lines.push(`- **Mean trial time**: ${summary.meanSeconds.toFixed(2)}s`);
  lines.push('');

  return lines.join('\n');
}

/**
 * Write optimization_report.md into outputDir; returns the file path
 */
export async function writeMarkdownReport(result: OptimizationResult, outputDir: string): Promise<string> {
  const path = join(outputDir, REPORT_FILE_NAME);
  await writeFile(path, renderMarkdownReport(result), 'utf-8');
  logger.info('Report generated', { path });
  return path;
}
