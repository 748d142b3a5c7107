/**
 * MockCadSession
 *
 * In-memory CAD session for running sweeps without a CAD install.
 * Exports a box-shaped STEP (or ASCII STL) sized from Length/Width/Height so
 * the geometry scorer has something real to read.
 *
 * Failures can be injected per operation:
 *
 *   new MockCadSession({ failWhen: { rebuild: (value) => value > 10 } })
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { CadSessionError, createLogger, type ExportFormat } from '@cae/utils';
import type { CadParameter, CadSessionPort } from '@cae/optimizer';

const logger = createLogger('cad:mock');

export const MOCK_DEFAULT_PARAMETERS: Readonly<Record<string, number>> = Object.freeze({
  Fillet_Radius: 5,
  Length: 100,
  Width: 50,
  Height: 30,
});

export type MockOperation = 'load' | 'setParameter' | 'rebuild' | 'export';

export interface MockCadSessionOptions {
  /** Initial parameter table (default: MOCK_DEFAULT_PARAMETERS) */
  parameters?: Record<string, number>;
  /**
   * Reject an operation when the predicate returns true. The predicate gets
   * the value most recently set through setParameter (NaN before any set).
   */
  failWhen?: Partial<Record<MockOperation, (value: number) => boolean>>;
}

interface BoxDimensions {
  length: number;
  width: number;
  height: number;
}

function renderStep(box: BoxDimensions, name: string): string {
  const { length: x, width: y, height: z } = box;
  const corners: Array<[number, number, number]> = [
    [0, 0, 0],
    [x, 0, 0],
    [x, y, 0],
    [0, y, 0],
    [0, 0, z],
    [x, 0, z],
    [x, y, z],
    [0, y, z],
  ];

  const data: string[] = [];
  let id = 1;
  for (const [cx, cy, cz] of corners) {
    data.push(`#${id++}=CARTESIAN_POINT('',(${cx.toFixed(3)},${cy.toFixed(3)},${cz.toFixed(3)}));`);
  }
  for (let face = 0; face < 6; face++) {
    data.push(`#${id++}=ADVANCED_FACE('',(),#${face + 1},.T.);`);
  }

  return [
    'ISO-10303-21;',
    'HEADER;',
    "FILE_DESCRIPTION(('mock export'),'2;1');",
    `FILE_NAME('${name}','',(''),(''),'','','');`,
    "FILE_SCHEMA(('AUTOMOTIVE_DESIGN'));",
    'ENDSEC;',
    'DATA;',
    ...data,
    'ENDSEC;',
    'END-ISO-10303-21;',
    '',
  ].join('\n');
}

function renderStl(box: BoxDimensions, name: string): string {
  const { length: x, width: y, height: z } = box;
  const v = (a: number, b: number, c: number): string => `      vertex ${a} ${b} ${c}`;
  // two triangles per side
  const quads: Array<[string, string, string, string]> = [
    [v(0, 0, 0), v(x, 0, 0), v(x, y, 0), v(0, y, 0)],
    [v(0, 0, z), v(x, 0, z), v(x, y, z), v(0, y, z)],
    [v(0, 0, 0), v(x, 0, 0), v(x, 0, z), v(0, 0, z)],
    [v(0, y, 0), v(x, y, 0), v(x, y, z), v(0, y, z)],
    [v(0, 0, 0), v(0, y, 0), v(0, y, z), v(0, 0, z)],
    [v(x, 0, 0), v(x, y, 0), v(x, y, z), v(x, 0, z)],
  ];

  const lines = [`solid ${name}`];
  for (const [a, b, c, d] of quads) {
    for (const tri of [
      [a, b, c],
      [a, c, d],
    ]) {
      lines.push('  facet normal 0 0 0', '    outer loop', ...tri, '    endloop', '  endfacet');
    }
  }
  lines.push(`endsolid ${name}`, '');
  return lines.join('\n');
}

/**
 * MockCadSession
 */
export class MockCadSession implements CadSessionPort {
  private readonly parameters: Map<string, number>;
  private readonly failWhen: MockCadSessionOptions['failWhen'];
  private documentPath: string | undefined;
  private lastValue = Number.NaN;

  /** Operations in call order, e.g. `setParameter:Fillet_Radius=2` */
  readonly calls: string[] = [];

  constructor(options: MockCadSessionOptions = {}) {
    this.parameters = new Map(Object.entries(options.parameters ?? MOCK_DEFAULT_PARAMETERS));
    this.failWhen = options.failWhen;
  }

  get loadedDocument(): string | undefined {
    return this.documentPath;
  }

  getParameter(name: string): number | undefined {
    return this.parameters.get(name);
  }

  private check(operation: MockOperation): void {
    const predicate = this.failWhen?.[operation];
    if (predicate && predicate(this.lastValue)) {
      throw new CadSessionError(`mock ${operation} failure`, operation, { value: this.lastValue });
    }
  }

  async load(documentPath: string): Promise<void> {
    this.calls.push(`load:${documentPath}`);
    this.check('load');
    this.documentPath = documentPath;
    logger.debug('Opened document', { documentPath });
  }

  async setParameter(name: string, value: number): Promise<void> {
    this.calls.push(`setParameter:${name}=${value}`);
    this.lastValue = value;
    if (!this.parameters.has(name)) {
      throw new CadSessionError(`Parameter '${name}' not found`, 'setParameter', { name });
    }
    this.check('setParameter');
    this.parameters.set(name, value);
  }

  async rebuild(): Promise<void> {
    this.calls.push('rebuild');
    this.check('rebuild');
  }

  async export(outputPath: string, format: ExportFormat): Promise<void> {
    this.calls.push(`export:${outputPath}`);
    this.check('export');

    const box: BoxDimensions = {
      length: this.parameters.get('Length') ?? 100,
      width: this.parameters.get('Width') ?? 50,
      height: this.parameters.get('Height') ?? 30,
    };
    const name = this.documentPath ?? 'mock';

    const content =
      format === 'stl'
        ? renderStl(box, 'mock')
        : format === 'step'
          ? renderStep(box, name)
          : `mock IGES export of ${name}\n`;

    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, content, 'utf-8');
  }

  async listParameters(): Promise<CadParameter[]> {
    return [...this.parameters.entries()].map(([name, value]) => ({ name, value, unit: 'mm' }));
  }

  async close(): Promise<void> {
    this.calls.push('close');
    this.documentPath = undefined;
  }
}
