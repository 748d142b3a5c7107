/**
 * ParameterSampler
 *
 * Turns a ParameterSpec into the ordered list of trial values.
 *
 * Input:
 *   { name: 'Fillet_Radius', range: [2, 15], stepCount: 5, stepMode: 'linear' }
 *
 * Output:
 *   [2, 5.25, 8.5, 11.75, 15]
 */

import { InvalidArgumentError, InvalidRangeError, logger } from '@cae/utils';
import type { ParameterSpec, StepMode } from './types.js';

const STEP_MODES: readonly StepMode[] = ['linear', 'geometric'];

export interface ParameterSpecInput {
  name: string;
  range: readonly [number, number];
  stepCount: number;
  stepMode?: StepMode;
}

/**
 * Build a frozen ParameterSpec (validated)
 */
export function createParameterSpec(input: ParameterSpecInput): ParameterSpec {
  const spec: ParameterSpec = Object.freeze({
    name: input.name,
    range: Object.freeze([input.range[0], input.range[1]] as const),
    stepCount: input.stepCount,
    stepMode: input.stepMode ?? 'linear',
  });
  new ParameterSampler().validate(spec);
  return spec;
}

/**
 * ParameterSampler
 */
export class ParameterSampler {
  /**
   * Generate the trial values (materialized, ascending, length === stepCount)
   */
  generate(spec: ParameterSpec): number[] {
    this.validate(spec);

    const [min, max] = spec.range;
    const n = spec.stepCount;

    if (n === 1) {
      return [min];
    }

    const values: number[] = [];
    if (spec.stepMode === 'linear') {
      const stepSize = (max - min) / (n - 1);
      for (let i = 0; i < n; i++) {
        values.push(min + i * stepSize);
      }
    } else {
      const ratio = Math.exp(Math.log(max / min) / (n - 1));
      for (let i = 0; i < n - 1; i++) {
        values.push(min * Math.pow(ratio, i));
      }
      // ratio^(n-1) drifts by an ulp or two
      values.push(max);
    }

    logger.debug('Generated parameter values', {
      parameter: spec.name,
      stepMode: spec.stepMode,
      totalValues: values.length,
    });

    return values;
  }

  /**
   * Validate a spec; throws InvalidRangeError / InvalidArgumentError
   */
  validate(spec: ParameterSpec): void {
    if (typeof spec.name !== 'string' || spec.name.trim() === '') {
      throw new InvalidArgumentError('Parameter name must be a non-empty string', {
        name: spec.name,
      });
    }

    if (!Number.isInteger(spec.stepCount) || spec.stepCount < 1) {
      throw new InvalidArgumentError(
        `Step count must be an integer >= 1, got ${spec.stepCount}`,
        { stepCount: spec.stepCount }
      );
    }

    if (!STEP_MODES.includes(spec.stepMode)) {
      throw new InvalidArgumentError(`Unknown step mode '${String(spec.stepMode)}'`, {
        stepMode: spec.stepMode,
        allowed: STEP_MODES,
      });
    }

    const [min, max] = spec.range;
    if (!Number.isFinite(min) || !Number.isFinite(max)) {
      throw new InvalidRangeError(`Range bounds must be finite numbers, got [${min}, ${max}]`, {
        min,
        max,
      });
    }

    if (min >= max) {
      throw new InvalidRangeError(`Range minimum must be below maximum, got [${min}, ${max}]`, {
        min,
        max,
      });
    }

    if (spec.stepMode === 'geometric' && min <= 0) {
      throw new InvalidRangeError(`Geometric spacing needs a positive minimum, got ${min}`, {
        min,
        max,
        stepMode: spec.stepMode,
      });
    }
  }
}
