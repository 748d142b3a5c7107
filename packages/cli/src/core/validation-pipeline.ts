/**
 * Unified Validation and Coercion Pipeline
 *
 * Single source of truth for all CLI argument validation and coercion.
 *
 * Flow:
 * 1. Normalize options (Commander.js → flat object), leaving string-typed keys alone
 * 2. Validate with Zod schema
 * 3. Return typed, validated arguments
 */

import { z } from 'zod';
import { normalizeOptions, parseArguments } from './argument-parser.js';

function acceptsOnlyText(type: z.ZodTypeAny): boolean {
  if (type instanceof z.ZodOptional || type instanceof z.ZodNullable) {
    return acceptsOnlyText(type.unwrap());
  }
  if (type instanceof z.ZodDefault) {
    return acceptsOnlyText(type.removeDefault());
  }
  return type instanceof z.ZodString;
}

/**
 * Keys of an object schema whose value is a plain string
 */
export function stringKeysOf(schema: z.ZodTypeAny): Set<string> {
  if (!(schema instanceof z.ZodObject)) {
    return new Set();
  }
  const shape: z.ZodRawShape = schema.shape;
  return new Set(Object.keys(shape).filter((key) => {
    const field = shape[key];
    return field !== undefined && acceptsOnlyText(field);
  }));
}

/**
 * This is the ONLY path for CLI argument validation.
 *
 * @throws ValidationError if validation fails
 */
export function validateAndCoerceArgs<T extends z.ZodTypeAny>(
  schema: T,
  rawOptions: Record<string, unknown>
): z.infer<T> {
  return parseArguments(schema, normalizeOptions(rawOptions, stringKeysOf(schema)));
}
