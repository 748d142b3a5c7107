import type { ExportFormat } from '@cae/utils';

export interface CadParameter {
  name: string;
  value: number;
  unit?: string;
}

/**
 * One open CAD document. Every method rejects when the CAD side refuses the
 * operation. A session holds mutable model state and must only be driven by a
 * single caller at a time.
 */
export interface CadSessionPort {
  load(documentPath: string): Promise<void>;
  setParameter(name: string, value: number): Promise<void>;
  rebuild(): Promise<void>;
  export(outputPath: string, format: ExportFormat): Promise<void>;
  listParameters?(): Promise<CadParameter[]>;
  close?(): Promise<void>;
}
