/**
 * Trial artifact naming
 *
 * {outputDir}/trial_{index:02d}_{name}_{value}.{ext}
 */

import { join } from 'path';
import type { ExportFormat } from '@cae/utils';

export const RESULT_FILE_NAME = 'optimization_result.json';
export const REPORT_FILE_NAME = 'optimization_report.md';

/**
 * Render a trial value for a file name: at most 6 decimals, no trailing zeros
 */
export function formatTrialValue(value: number): string {
  const fixed = value.toFixed(6);
  const trimmed = fixed.includes('.') ? fixed.replace(/0+$/, '').replace(/\.$/, '') : fixed;
  return trimmed === '-0' ? '0' : trimmed;
}

/**
 * Replace characters that are unsafe in file names
 */
export function sanitizeParameterName(name: string): string {
  return name.replace(/[^A-Za-z0-9._-]/g, '_');
}

export function trialArtifactName(
  index: number,
  parameterName: string,
  value: number,
  format: ExportFormat
): string {
  const paddedIndex = String(index).padStart(2, '0');
  return `trial_${paddedIndex}_${sanitizeParameterName(parameterName)}_${formatTrialValue(value)}.${format}`;
}

export function trialArtifactPath(
  outputDir: string,
  index: number,
  parameterName: string,
  value: number,
  format: ExportFormat
): string {
  return join(outputDir, trialArtifactName(index, parameterName, value, format));
}
