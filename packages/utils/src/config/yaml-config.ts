/**
 * YAML Configuration Loader
 * ==========================
 * Loads configuration from config.yaml file with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { logger } from '../logger.js';
import { ConfigurationError } from '../errors.js';

export const AppConfigSchema = z
  .object({
    optimization: z
      .object({
        outputDir: z.string().min(1).optional(),
        exportFormat: z.enum(['step', 'stl', 'iges']).optional(),
        trialTimeoutMs: z.number().int().positive().optional(),
        stepMode: z.enum(['linear', 'geometric']).optional(),
      })
      .optional(),
    freecad: z
      .object({
        python: z.string().min(1).optional(),
        libPath: z.string().min(1).optional(),
        timeoutMs: z.number().int().positive().optional(),
      })
      .optional(),
  })
  .passthrough();

export type AppConfig = z.infer<typeof AppConfigSchema>;

let cachedConfig: AppConfig | null = null;

/**
 * Load configuration from config.yaml file
 *
 * A missing file yields an empty config. A file that parses but does not match
 * the schema is a ConfigurationError; silently ignoring it would hide typos.
 */
export function loadConfigFromYaml(configPath?: string): AppConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const defaultPath = configPath || process.env.CAE_CONFIG || join(process.cwd(), 'config.yaml');

  if (!existsSync(defaultPath)) {
    logger.debug('config.yaml not found, using environment variables only', { path: defaultPath });
    cachedConfig = {};
    return cachedConfig;
  }

  let raw: unknown;
  try {
    raw = load(readFileSync(defaultPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse ${defaultPath}: ${error instanceof Error ? error.message : String(error)}`,
      'config.yaml',
      { path: defaultPath }
    );
  }

  const parsed = AppConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration in ${defaultPath}: ${issues}`, 'config.yaml', {
      path: defaultPath,
      issues: parsed.error.issues,
    });
  }

  logger.info('Loaded configuration from config.yaml', { path: defaultPath });
  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
