/**
 * FreeCadSession
 *
 * CadSessionPort backed by FreeCAD. FreeCAD runs out of process, so the
 * session keeps the document path and the pending parameter assignments and
 * replays them on every rebuild/export through the bridge script.
 */

import { access } from 'fs/promises';
import { resolve } from 'path';
import { CadSessionError, createLogger, type ExportFormat } from '@cae/utils';
import type { CadParameter, CadSessionPort } from '@cae/optimizer';
import { FreeCadBridge } from './FreeCadBridge.js';

const logger = createLogger('cad:freecad');

/**
 * Exact name first, then case-insensitive
 */
export function findParameter(
  parameters: readonly CadParameter[],
  name: string
): CadParameter | undefined {
  return (
    parameters.find((p) => p.name === name) ??
    parameters.find((p) => p.name.toLowerCase() === name.toLowerCase())
  );
}

/**
 * FreeCadSession
 */
export class FreeCadSession implements CadSessionPort {
  private documentPath: string | undefined;
  private parameters: CadParameter[] = [];
  private readonly assignments = new Map<string, number>();

  constructor(private readonly bridge: FreeCadBridge = new FreeCadBridge()) {}

  private requireDocument(operation: string): string {
    if (this.documentPath === undefined) {
      throw new CadSessionError('No document loaded', operation);
    }
    return this.documentPath;
  }

  async load(documentPath: string): Promise<void> {
    const absolute = resolve(documentPath);
    try {
      await access(absolute);
    } catch (error) {
      throw new CadSessionError(`Document not found: ${absolute}`, 'load', {
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const reply = await this.bridge.run({ command: 'list', document: absolute });
    this.documentPath = absolute;
    this.parameters = reply.parameters ?? [];
    this.assignments.clear();

    logger.info('Opened FreeCAD document', {
      document: absolute,
      parameters: this.parameters.length,
    });
  }

  async setParameter(name: string, value: number): Promise<void> {
    this.requireDocument('setParameter');
    const parameter = findParameter(this.parameters, name);
    if (!parameter) {
      throw new CadSessionError(`Parameter '${name}' not found`, 'setParameter', {
        available: this.parameters.map((p) => p.name),
      });
    }
    this.assignments.set(parameter.name, value);
  }

  async rebuild(): Promise<void> {
    const document = this.requireDocument('rebuild');
    await this.bridge.run({ command: 'rebuild', document, assignments: this.assignments });
  }

  async export(outputPath: string, format: ExportFormat): Promise<void> {
    const document = this.requireDocument('export');
    const output = resolve(outputPath);
    await this.bridge.run({
      command: 'export',
      document,
      assignments: this.assignments,
      output,
      format,
    });

    try {
      await access(output);
    } catch {
      throw new CadSessionError(`FreeCAD reported success but wrote no file at ${output}`, 'export');
    }
  }

  async listParameters(): Promise<CadParameter[]> {
    this.requireDocument('listParameters');
    return this.parameters.map((p) => ({ ...p, value: this.assignments.get(p.name) ?? p.value }));
  }

  async close(): Promise<void> {
    this.documentPath = undefined;
    this.parameters = [];
    this.assignments.clear();
  }
}
