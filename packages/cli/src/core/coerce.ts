/**
 * Value Coercion Helpers
 *
 * These functions coerce values (numbers/arrays/booleans) but NEVER rename keys.
 * Use these in defineCommand's coerce() function.
 */

import { ValidationError } from '@cae/utils';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Coerce a value to a number
 * Accepts:
 * - Number: returns as-is
 * - String number: '123' -> 123
 * - undefined/null returns undefined
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && v.trim() !== '') {
    const n = Number(v);
    if (!Number.isFinite(n))
      throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
    return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
}

/**
 * Coerce a value to a number array
 * Accepts:
 * - Variadic option values: ['2', '15']
 * - JSON string: "[2,15]"
 * - Comma-separated string: "2,15"
 * - undefined/null returns undefined
 */
export function coerceNumberArray(v: unknown, name: string): number[] | undefined {
  if (v === null || v === undefined) return undefined;

  const toNumber = (x: unknown): number => {
    const num = coerceNumber(x, name);
    if (num === undefined)
      throw new ValidationError(`Invalid number in array for ${name}`, { name, value: x });
    return num;
  };

  if (Array.isArray(v)) {
    // a single variadic value may itself be "2,15"
    if (v.length === 1 && isString(v[0]) && v[0].includes(',')) {
      return coerceNumberArray(v[0], name);
    }
    return v.map(toNumber);
  }
  if (isString(v)) {
    const trimmed = v.trim();
    if (trimmed.startsWith('[')) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch (e) {
        throw new ValidationError(
          `Invalid JSON for ${name}: ${e instanceof Error ? e.message : String(e)}`,
          { name, input: trimmed.length > 80 ? `${trimmed.substring(0, 80)}...` : trimmed }
        );
      }
      if (!Array.isArray(parsed))
        throw new ValidationError(`Invalid JSON array for ${name}`, { name, value: v });
      return parsed.map(toNumber);
    }
    return trimmed
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean)
      .map(toNumber);
  }
  throw new ValidationError(`Invalid array for ${name}`, { name, value: v });
}
