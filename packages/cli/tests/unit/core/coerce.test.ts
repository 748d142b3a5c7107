/**
 * Coercion helper tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@cae/utils';
import { coerceNumber, coerceNumberArray } from '../../../src/core/coerce.js';

describe('coerceNumber', () => {
  it('handles null and undefined', () => {
    expect(coerceNumber(null, 'steps')).toBeUndefined();
    expect(coerceNumber(undefined, 'steps')).toBeUndefined();
  });

  it('passes numbers through', () => {
    expect(coerceNumber(5, 'steps')).toBe(5);
  });

  it('parses number strings', () => {
    expect(coerceNumber('5', 'steps')).toBe(5);
    expect(coerceNumber(' -2.5 ', 'steps')).toBe(-2.5);
  });

  it('rejects non-numeric input', () => {
    expect(() => coerceNumber('five', 'steps')).toThrow('Invalid number for steps');
    expect(() => coerceNumber('', 'steps')).toThrow(ValidationError);
    expect(() => coerceNumber(true, 'steps')).toThrow(ValidationError);
  });
});

describe('coerceNumberArray', () => {
  it('handles null and undefined', () => {
    expect(coerceNumberArray(undefined, 'range')).toBeUndefined();
  });

  it('reads variadic option values', () => {
    expect(coerceNumberArray(['2', '15'], 'range')).toEqual([2, 15]);
  });

  it('splits a single comma-separated variadic value', () => {
    expect(coerceNumberArray(['2,15'], 'range')).toEqual([2, 15]);
  });

  it('reads JSON and comma-separated strings', () => {
    expect(coerceNumberArray('[2, 15]', 'range')).toEqual([2, 15]);
    expect(coerceNumberArray(' 2 , 15 ', 'range')).toEqual([2, 15]);
  });

  it('reports the bad element', () => {
    expect(() => coerceNumberArray(['2', 'x'], 'range')).toThrow('Invalid number for range');
  });

  it('rejects malformed JSON and non-array JSON', () => {
    expect(() => coerceNumberArray('[2, ', 'range')).toThrow(/^Invalid JSON for range: /);
    expect(() => coerceNumberArray('[', 'range')).toThrow(ValidationError);
  });

  it('rejects other types', () => {
    expect(() => coerceNumberArray(7, 'range')).toThrow('Invalid array for range');
  });
});
