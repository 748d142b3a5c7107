/**
 * Config Loader - Load YAML/JSON sweep files with CLI override merging
 *
 * - Auto-detect config format (YAML/JSON) by extension
 * - Deep merge CLI overrides into config
 * - Validate with Zod schema
 *
 * A sweep file keeps long option lists out of the command line and makes a
 * run reproducible:
 *
 *   parameter: Fillet_Radius
 *   range: [2, 15]
 *   steps: 5
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';
import * as yaml from 'js-yaml';
import type { z } from 'zod';
import { ValidationError } from '@cae/utils';

/**
 * Detect config format by file extension (unknown extensions read as JSON)
 */
export function detectConfigFormat(path: string): 'yaml' | 'json' {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    return 'yaml';
  }
  return 'json';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects (CLI overrides win)
 *
 * Rules:
 * - Primitives: override value wins
 * - Arrays: override value replaces base value
 * - Objects: recursively merge (deep merge)
 * - undefined in the override never clears a base value
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) {
      continue;
    }

    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? deepMerge(baseValue, value) : value;
  }

  return result;
}

/**
 * Load config from YAML or JSON file, merge CLI overrides, validate
 *
 * @throws ValidationError if the file cannot be read or the merged config is invalid
 */
export async function loadConfig<T extends z.ZodTypeAny>(
  configPath: string,
  schema: T,
  overrides?: Record<string, unknown>
): Promise<z.infer<T>> {
  let configData: Record<string, unknown>;

  try {
    const fileContent = await readFile(configPath, 'utf-8');
    const format = detectConfigFormat(configPath);
    const parsed: unknown = format === 'yaml' ? yaml.load(fileContent) : JSON.parse(fileContent);
    if (!isPlainObject(parsed)) {
      throw new ValidationError(`${format.toUpperCase()} config must be an object`, {
        configPath,
        format,
      });
    }
    configData = parsed;
  } catch (error) {
    throw new ValidationError(
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      { configPath }
    );
  }

  if (overrides && Object.keys(overrides).length > 0) {
    configData = deepMerge(configData, overrides);
  }

  const parsed = schema.safeParse(configData);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Config validation failed: ${issues}`, {
      configPath,
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}
