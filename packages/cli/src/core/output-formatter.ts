/**
 * Output Formatter - JSON, table, CSV formats
 */

import { formatTrialValue } from '@cae/optimizer';
import type { OutputFormat } from '../types/index.js';
import { isOptimizeOutput, type OptimizeOutput } from '../handlers/optimize/optimize-output.js';

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function toRecord(row: unknown): Record<string, unknown> {
  return typeof row === 'object' && row !== null ? Object.fromEntries(Object.entries(row)) : {};
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

function detectColumns(data: unknown[], columns?: string[]): string[] {
  return columns ?? Object.keys(toRecord(data[0]));
}

/**
 * Format output as a simple table
 */
export function formatTable(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const rows = data.map(toRecord);
  const widths = detectedColumns.map((col) =>
    Math.max(col.length, ...rows.map((row) => valueToString(row[col]).length))
  );

  const lines: string[] = [];
  lines.push(detectedColumns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-|-'));
  for (const row of rows) {
    lines.push(
      detectedColumns.map((col, i) => valueToString(row[col]).padEnd(widths[i] ?? 0)).join(' | ')
    );
  }

  return lines.join('\n');
}

/**
 * Format output as CSV
 */
export function formatCSV(data: unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return '';
  }

  const detectedColumns = detectColumns(data, columns);
  if (detectedColumns.length === 0) {
    return '';
  }

  const lines: string[] = [detectedColumns.join(',')];
  for (const row of data.map(toRecord)) {
    const values = detectedColumns.map((col) => {
      const str = valueToString(row[col]);
      if (str.includes(',') || str.includes('"') || str.includes('\n')) {
        return `"${str.replace(/"/g, '""')}"`;
      }
      return str;
    });
    lines.push(values.join(','));
  }

  return lines.join('\n');
}

/**
 * Summary block plus the full trial table (failures included)
 */
function formatOptimizeTable(output: OptimizeOutput): string {
  const { summary } = output;
  const lines: string[] = [];
  lines.push('=== Optimization Summary ===');
  lines.push('');
  lines.push(`Parameter: ${summary.parameter}`);
  lines.push(`Trials: ${summary.trials} (${summary.succeeded} succeeded, ${summary.failed} failed)`);
  if (summary.bestIndex === null || summary.bestValue === null || summary.bestScore === null) {
    lines.push('Best: No viable trial found');
  } else {
    lines.push(
      `Best: trial ${summary.bestIndex}, ${summary.parameter} = ${formatTrialValue(summary.bestValue)}, score ${summary.bestScore.toFixed(1)}`
    );
  }
  if (summary.meanScore !== null && summary.minScore !== null && summary.maxScore !== null) {
    lines.push(
      `Mean score: ${summary.meanScore.toFixed(1)} (min ${summary.minScore.toFixed(1)}, max ${summary.maxScore.toFixed(1)})`
    );
  }
  lines.push(`Total time: ${summary.totalSeconds.toFixed(2)}s`);
  lines.push('');

  const rows = output.trials.map((t) => ({
    trial: t.trial,
    value: formatTrialValue(t.value),
    score: t.score === null ? '-' : t.score.toFixed(1),
    time_s: t.seconds.toFixed(2),
    status: t.best ? 'best' : t.status,
    detail: t.detail,
  }));
  lines.push(formatTable(rows));

  if (output.files.result !== undefined) {
    lines.push('');
    lines.push(`Result file: ${output.files.result}`);
  }
  if (output.files.report !== undefined) {
    lines.push(`Report: ${output.files.report}`);
  }

  return lines.join('\n');
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  if (isOptimizeOutput(data)) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV(data.trials);
      case 'table':
        return formatOptimizeTable(data);
    }
  }

  if (Array.isArray(data)) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV(data);
      case 'table':
        return formatTable(data);
    }
  }

  if (typeof data === 'object' && data !== null) {
    switch (format) {
      case 'json':
        return formatJSON(data);
      case 'csv':
        return formatCSV([data]);
      case 'table':
        return formatTable([data]);
    }
  }

  return String(data);
}
