/**
 * Geometry statistics from exported artifacts
 *
 * STEP: counts CARTESIAN_POINT / ADVANCED_FACE entities, bounding box from the
 * point coordinates. STL: ASCII vertex/facet lines or the binary triangle
 * table. Coordinates are taken as millimetres; volume is the bounding-box
 * volume in m³.
 */

import { readFile } from 'fs/promises';
import { extname } from 'path';

export interface GeometryStats {
  format: 'step' | 'stl' | 'iges';
  vertices: number;
  faces: number;
  /** Bounding-box volume, m³ */
  volume: number;
}

const MM3_PER_M3 = 1e9;
const STL_HEADER_BYTES = 80;
const STL_TRIANGLE_BYTES = 50;

class BoundingBox {
  private min = [Infinity, Infinity, Infinity];
  private max = [-Infinity, -Infinity, -Infinity];

  add(x: number, y: number, z: number): void {
    const point = [x, y, z];
    for (let axis = 0; axis < 3; axis++) {
      const v = point[axis] ?? 0;
      this.min[axis] = Math.min(this.min[axis] ?? v, v);
      this.max[axis] = Math.max(this.max[axis] ?? v, v);
    }
  }

  /** mm³ → m³; 0 when empty */
  volumeM3(): number {
    let volume = 1;
    for (let axis = 0; axis < 3; axis++) {
      const span = (this.max[axis] ?? 0) - (this.min[axis] ?? 0);
      if (!Number.isFinite(span)) {
        return 0;
      }
      volume *= span;
    }
    return volume / MM3_PER_M3;
  }
}

function parseTriple(text: string): [number, number, number] | undefined {
  const parts = text.split(',').map((p) => Number(p.trim()));
  const [x, y, z] = parts;
  if (parts.length !== 3 || x === undefined || y === undefined || z === undefined) {
    return undefined;
  }
  if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
    return undefined;
  }
  return [x, y, z];
}

export function parseStepStats(text: string): GeometryStats {
  if (!text.includes('ISO-10303-21')) {
    throw new Error('not a STEP file (missing ISO-10303-21 header)');
  }

  const box = new BoundingBox();
  let vertices = 0;
  for (const match of text.matchAll(/CARTESIAN_POINT\s*\(\s*'[^']*'\s*,\s*\(([^)]*)\)/g)) {
    vertices++;
    const point = parseTriple(match[1] ?? '');
    if (point) {
      box.add(...point);
    }
  }
  const faces = (text.match(/ADVANCED_FACE\s*\(/g) ?? []).length;

  return { format: 'step', vertices, faces, volume: box.volumeM3() };
}

function parseAsciiStl(text: string): GeometryStats {
  const box = new BoundingBox();
  let vertices = 0;
  let faces = 0;
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith('facet')) {
      faces++;
    } else if (trimmed.startsWith('vertex')) {
      vertices++;
      const point = parseTriple(trimmed.slice('vertex'.length).trim().split(/\s+/).join(','));
      if (point) {
        box.add(...point);
      }
    }
  }
  return { format: 'stl', vertices, faces, volume: box.volumeM3() };
}

function parseBinaryStl(buffer: Buffer): GeometryStats {
  if (buffer.length < STL_HEADER_BYTES + 4) {
    throw new Error('truncated binary STL');
  }
  const triangles = buffer.readUInt32LE(STL_HEADER_BYTES);
  const expected = STL_HEADER_BYTES + 4 + triangles * STL_TRIANGLE_BYTES;
  if (buffer.length < expected) {
    throw new Error(`truncated binary STL: ${triangles} triangles need ${expected} bytes, got ${buffer.length}`);
  }

  const box = new BoundingBox();
  for (let t = 0; t < triangles; t++) {
    // skip the 12-byte normal
    const base = STL_HEADER_BYTES + 4 + t * STL_TRIANGLE_BYTES + 12;
    for (let corner = 0; corner < 3; corner++) {
      const offset = base + corner * 12;
      box.add(buffer.readFloatLE(offset), buffer.readFloatLE(offset + 4), buffer.readFloatLE(offset + 8));
    }
  }
  return { format: 'stl', vertices: triangles * 3, faces: triangles, volume: box.volumeM3() };
}

export function parseStlStats(buffer: Buffer): GeometryStats {
  const head = buffer.subarray(0, Math.min(buffer.length, 512)).toString('latin1');
  // binary files may also start with "solid"; only trust it when facets follow
  if (head.trimStart().startsWith('solid') && head.includes('facet')) {
    return parseAsciiStl(buffer.toString('utf-8'));
  }
  return parseBinaryStl(buffer);
}

/**
 * Read an artifact and derive its statistics. IGES is accepted but carries
 * no counts.
 */
export async function readGeometryStats(artifactPath: string): Promise<GeometryStats> {
  const ext = extname(artifactPath).toLowerCase();
  const buffer = await readFile(artifactPath);
  if (buffer.length === 0) {
    throw new Error(`artifact is empty: ${artifactPath}`);
  }

  switch (ext) {
    case '.step':
    case '.stp':
      return parseStepStats(buffer.toString('utf-8'));
    case '.stl':
      return parseStlStats(buffer);
    case '.iges':
    case '.igs':
      return { format: 'iges', vertices: 0, faces: 0, volume: 0 };
    default:
      throw new Error(`unsupported artifact format '${ext}'`);
  }
}
