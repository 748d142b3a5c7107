import { z } from 'zod';

const stepModeSchema = z.enum(['linear', 'geometric']);
const exportFormatSchema = z.enum(['step', 'stl', 'iges']);
const rangeSchema = z.tuple([z.number(), z.number()]);

/**
 * optimize run - command line arguments
 *
 * parameter/range may instead come from the --config sweep file, so they are
 * optional here and required after merging (see sweepSettingsSchema).
 */
export const optimizeRunSchema = z.object({
  file: z.string().min(1, 'CAD file path is required'),
  parameter: z.string().min(1).optional(),
  range: rangeSchema.optional(),
  // checked by ParameterSampler (integer >= 1)
  steps: z.number().optional(),
  stepMode: stepModeSchema.optional(),
  cad: z.enum(['freecad', 'mock']).default('freecad'),
  outputDir: z.string().min(1).optional(),
  exportFormat: exportFormatSchema.optional(),
  timeoutMs: z.number().int().positive().optional(),
  report: z.boolean().default(false),
  config: z.string().optional(),
  format: z.enum(['json', 'table', 'csv']).default('table'),
});

export type OptimizeRunArgs = z.infer<typeof optimizeRunSchema>;

/**
 * Sweep file (YAML/JSON) loaded with --config; CLI flags override its keys
 */
export const sweepFileSchema = z
  .object({
    parameter: z.string().min(1).optional(),
    range: rangeSchema.optional(),
    steps: z.number().optional(),
    stepMode: stepModeSchema.optional(),
    outputDir: z.string().min(1).optional(),
    exportFormat: exportFormatSchema.optional(),
    timeoutMs: z.number().int().positive().optional(),
    report: z.boolean().optional(),
  })
  .strict();

export type SweepFile = z.infer<typeof sweepFileSchema>;

/**
 * Fully resolved sweep settings
 */
export const sweepSettingsSchema = z.object({
  parameter: z.string({ required_error: 'parameter is required (-p or sweep file)' }).min(1),
  range: z.tuple([z.number(), z.number()], {
    required_error: 'range is required (-r <min> <max> or sweep file)',
  }),
  steps: z.number(),
  stepMode: stepModeSchema,
  outputDir: z.string().min(1),
  exportFormat: exportFormatSchema,
  timeoutMs: z.number().int().positive().optional(),
  report: z.boolean(),
});

/**
 * optimize show - re-render a saved optimization_result.json
 */
export const optimizeShowSchema = z.object({
  path: z.string().min(1, 'Result file path is required'),
  format: z.enum(['json', 'table', 'csv']).default('table'),
});

export type OptimizeShowArgs = z.infer<typeof optimizeShowSchema>;
