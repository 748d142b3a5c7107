import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ValidationError, logger } from '@cae/utils';
import {
  readResultJson,
  toResultJson,
  writeResultJson,
} from '../../../src/reporting/result-store.js';
import { failedOnly, mixedResult } from '../../helpers/results.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'cae-store-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('toResultJson', () => {
  it('maps a failed trial to null score with its error and stage', () => {
    const json = toResultJson(mixedResult());

    expect(json.history[2]).toEqual({
      index: 3,
      parameter_value: 8.5,
      quality_score: null,
      elapsed_seconds: 0.4,
      artifact_path: null,
      error: 'rebuild failed: sketch is over-constrained',
      failed_stage: 'rebuild',
    });
  });

  it('maps metrics to snake_case', () => {
    const json = toResultJson(mixedResult());

    expect(json.history[0].metrics).toEqual({
      allowable_stress: 164.5,
      safety_factor: 1.8,
      notes: 'Volume: 1.50e-4 m³',
    });
    expect(json.history[1].metrics).toBeUndefined();
  });

  it('records the output directory beside the timestamps', () => {
    const result = mixedResult();

    expect(toResultJson(result).output_dir).toBe(result.outputDir);
  });

  it('writes best_index as null when nothing succeeded', () => {
    expect(toResultJson(mixedResult(failedOnly(2))).best_index).toBeNull();
  });
});

describe('writeResultJson / readResultJson', () => {
  it('reads back what it wrote', async () => {
    const original = mixedResult();
    const path = await writeResultJson(original, dir);

    expect(path).toBe(join(dir, 'optimization_result.json'));
    const restored = await readResultJson(path);
    expect(restored).toEqual(original);
  });

  it('writes indented JSON ending in a newline', async () => {
    const path = await writeResultJson(mixedResult(), dir);
    const text = await readFile(path, 'utf-8');

    expect(text.startsWith('{\n  "parameter_spec": {')).toBe(true);
    expect(text.endsWith('}\n')).toBe(true);
  });

  it('rejects a missing file', async () => {
    await expect(readResultJson(join(dir, 'absent.json'))).rejects.toThrow(
      /^Failed to read optimization result from .*absent\.json: /
    );
  });

  it('rejects malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{"parameter_spec": ');

    await expect(readResultJson(path)).rejects.toThrow(ValidationError);
  });

  it('rejects a record with both a score and an error', async () => {
    const json = toResultJson(mixedResult());
    const path = join(dir, 'bad.json');
    await writeFile(
      path,
      JSON.stringify({ ...json, history: [{ ...json.history[0], error: 'also failed' }] })
    );

    await expect(readResultJson(path)).rejects.toThrow(
      `Invalid optimization result in ${path}: history.0: a trial has either a quality_score or an error, never both or neither`
    );
  });

  it('recomputes best_index and warns when the stored one disagrees', async () => {
    const path = join(dir, 'tampered.json');
    await writeFile(path, JSON.stringify({ ...toResultJson(mixedResult()), best_index: 1 }));

    const result = await readResultJson(path);

    expect(result.bestIndex).toBe(4);
    expect(logger.warn).toHaveBeenCalledWith(
      'Stored best_index disagrees with history, using recomputed value',
      { path, stored: 1, recomputed: 4 }
    );
  });
});
