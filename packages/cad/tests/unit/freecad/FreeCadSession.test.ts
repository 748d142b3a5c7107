import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CadSessionError } from '@cae/utils';

const execaMock = vi.hoisted(() =>
  vi.fn<(file: string, args: string[], options: object) => Promise<{ stdout: string }>>()
);

vi.mock('execa', () => ({ execa: execaMock }));

import { FreeCadBridge } from '../../../src/freecad/FreeCadBridge.js';
import { FreeCadSession, findParameter } from '../../../src/freecad/FreeCadSession.js';

const LIST_REPLY = JSON.stringify({
  ok: true,
  parameters: [
    { name: 'Fillet_Radius', value: 5, unit: 'mm' },
    { name: 'Length', value: 100, unit: 'mm' },
  ],
});

let dir: string;
let document: string;

const newSession = () =>
  new FreeCadSession(new FreeCadBridge({ python: 'python3', timeoutMs: 1000 }, '/bridge.py'));

/** Bridge arguments of the n-th call */
const argsOf = (n: number): string[] => execaMock.mock.calls[n]?.[1] ?? [];

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'cae-freecad-'));
  document = join(dir, 'bracket.FCStd');
  await writeFile(document, 'fcstd');
  execaMock.mockReset();
  execaMock.mockImplementation(async (_file, args) => {
    const command = args[1];
    if (command === 'list') {
      return { stdout: LIST_REPLY };
    }
    if (command === 'export') {
      const output = args[args.indexOf('--output') + 1];
      if (output !== undefined) {
        await writeFile(output, 'ISO-10303-21;');
      }
      return { stdout: JSON.stringify({ ok: true, output }) };
    }
    return { stdout: '{"ok": true}' };
  });
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('findParameter', () => {
  const parameters = [
    { name: 'length', value: 1 },
    { name: 'Length', value: 2 },
  ];

  it('prefers an exact match', () => {
    expect(findParameter(parameters, 'Length')?.value).toBe(2);
  });

  it('falls back to a case-insensitive match', () => {
    expect(findParameter(parameters, 'LENGTH')?.value).toBe(1);
  });

  it('returns undefined when nothing matches', () => {
    expect(findParameter(parameters, 'Width')).toBeUndefined();
  });
});

describe('FreeCadSession', () => {
  it('lists parameters when a document is loaded', async () => {
    const session = newSession();
    await session.load(document);

    expect(argsOf(0)).toEqual(['/bridge.py', 'list', '--document', document]);
    expect(await session.listParameters()).toEqual([
      { name: 'Fillet_Radius', value: 5, unit: 'mm' },
      { name: 'Length', value: 100, unit: 'mm' },
    ]);
  });

  it('rejects a missing document without starting FreeCAD', async () => {
    const missing = join(dir, 'missing.FCStd');

    await expect(newSession().load(missing)).rejects.toThrow(`Document not found: ${missing}`);
    expect(execaMock).not.toHaveBeenCalled();
  });

  it('requires a loaded document', async () => {
    await expect(newSession().rebuild()).rejects.toThrow('No document loaded');
    await expect(newSession().setParameter('Length', 1)).rejects.toThrow(CadSessionError);
  });

  it('rejects unknown parameters', async () => {
    const session = newSession();
    await session.load(document);

    await expect(session.setParameter('Depth', 3)).rejects.toThrow("Parameter 'Depth' not found");
  });

  it('replays assignments under the model spelling on rebuild', async () => {
    const session = newSession();
    await session.load(document);
    await session.setParameter('fillet_radius', 8.5);
    await session.rebuild();

    expect(argsOf(1)).toEqual([
      '/bridge.py',
      'rebuild',
      '--document',
      document,
      '--set',
      'Fillet_Radius=8.5',
    ]);
    expect((await session.listParameters())[0]).toEqual({ name: 'Fillet_Radius', value: 8.5, unit: 'mm' });
  });

  it('exports with assignments, output and format', async () => {
    const session = newSession();
    await session.load(document);
    await session.setParameter('Length', 120);
    const output = join(dir, 'trial_01_Length_120.stl');
    await session.export(output, 'stl');

    expect(argsOf(1)).toEqual([
      '/bridge.py',
      'export',
      '--document',
      document,
      '--set',
      'Length=120',
      '--output',
      output,
      '--format',
      'stl',
    ]);
  });

  it('fails an export that produced no file', async () => {
    const session = newSession();
    await session.load(document);
    execaMock.mockResolvedValueOnce({ stdout: '{"ok": true}' });
    const output = join(dir, 'never-written.step');

    await expect(session.export(output, 'step')).rejects.toThrow(
      `FreeCAD reported success but wrote no file at ${output}`
    );
  });

  it('forgets document and assignments on close', async () => {
    const session = newSession();
    await session.load(document);
    await session.setParameter('Length', 120);
    await session.close();

    await expect(session.listParameters()).rejects.toThrow('No document loaded');
  });
});
