/**
 * Configuration loading
 *
 * Typed configuration for the optimization loop and the FreeCAD bridge.
 * Priority: config.yaml > environment variables > defaults.
 */

import { ConfigurationError } from '../errors.js';
import { loadConfigFromYaml } from './yaml-config.js';

export { loadConfigFromYaml, clearConfigCache, AppConfigSchema, type AppConfig } from './yaml-config.js';

export type ExportFormat = 'step' | 'stl' | 'iges';

export interface OptimizationDefaults {
  outputDir: string;
  exportFormat: ExportFormat;
  trialTimeoutMs?: number;
  stepMode: 'linear' | 'geometric';
}

export interface FreeCadConfig {
  /** Python interpreter able to `import FreeCAD` */
  python: string;
  /** FreeCAD lib directory, prepended to PYTHONPATH for the bridge */
  libPath?: string;
  timeoutMs: number;
}

function parsePositiveInt(value: string | undefined, key: string): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got '${value}'`, key);
  }
  return n;
}

/** Unset and blank variables read as undefined */
function env(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Load optimization defaults
 */
export function getOptimizationDefaults(): OptimizationDefaults {
  const config = loadConfigFromYaml().optimization ?? {};

  return {
    outputDir: config.outputDir ?? env('CAE_OUTPUT_DIR') ?? './optimization_results',
    exportFormat: config.exportFormat ?? 'step',
    trialTimeoutMs:
      config.trialTimeoutMs ?? parsePositiveInt(env('CAE_TRIAL_TIMEOUT_MS'), 'CAE_TRIAL_TIMEOUT_MS'),
    stepMode: config.stepMode ?? 'linear',
  };
}

/**
 * Load FreeCAD bridge configuration
 */
export function getFreeCadConfig(): FreeCadConfig {
  const config = loadConfigFromYaml().freecad ?? {};

  return {
    python: config.python ?? env('FREECAD_PYTHON') ?? 'python3',
    libPath: config.libPath ?? env('FREECAD_LIB'),
    timeoutMs:
      config.timeoutMs ??
      parsePositiveInt(env('FREECAD_TIMEOUT_MS'), 'FREECAD_TIMEOUT_MS') ??
      5 * 60 * 1000,
  };
}
