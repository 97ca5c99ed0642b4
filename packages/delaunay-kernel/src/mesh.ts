/**
 * Triangle mesh: a point set plus validated index triples.
 *
 * Binary format (little-endian): the point-set encoding, then
 * uint32 triangleCount + triangleCount × (uint32 i, uint32 j, uint32 k).
 * Triangle order and winding are kept exactly as supplied.
 */

import type { Vec2, BoundingBox2D } from './vec2.js';
import { boundsOf } from './vec2.js';
import { KernelError } from './errors.js';
import type { BinaryInput, PointCollection } from './point-set.js';
import { asDataView, pointSetByteLength, readPointSet, writePointSet } from './point-set.js';

/** Three vertex indices. Order sets the winding. */
export type Triangle = readonly [number, number, number];

export interface TriangleMesh {
  readonly points: PointCollection;
  readonly triangles: readonly Triangle[];
  readonly pointCount: number;
  readonly triangleCount: number;
}

export interface MeshReadback {
  point_count: number;
  triangle_count: number;
  edge_count: number;
  bounds: BoundingBox2D;
}

// ─── Validation ────────────────────────────────────────────────

/** Order-independent key of a triangle's vertex set. */
function triangleKey(a: number, b: number, c: number): string {
  const [i, j, k] = [a, b, c].sort((x, y) => x - y);
  return `${i},${j},${k}`;
}

/**
 * Build a mesh, checking each triangle in order: index count, index range,
 * distinct vertices, then duplicates of an earlier triangle.
 * Throws on the first violation.
 */
export function createMesh(points: PointCollection, triangles: readonly (readonly number[])[]): TriangleMesh {
  const pointCount = points.length;
  const seen = new Map<string, number>();
  const accepted: Triangle[] = [];

  triangles.forEach((indices, t) => {
    if (indices.length !== 3) {
      throw new KernelError({ kind: 'InvalidTriangleIndexCount', triangle: t, indices });
    }
    for (const index of indices) {
      if (!Number.isInteger(index) || index < 0 || index >= pointCount) {
        throw new KernelError({ kind: 'TriangleIndexOutOfRange', triangle: t, indices, index, pointCount });
      }
    }
    const [a, b, c] = indices;
    if (a === b || b === c || a === c) {
      throw new KernelError({ kind: 'TriangleNonDistinctVertices', triangle: t, indices });
    }
    const key = triangleKey(a, b, c);
    const original = seen.get(key);
    if (original !== undefined) {
      throw new KernelError({ kind: 'DuplicateTriangle', triangle: t, indices, original });
    }
    seen.set(key, t);
    accepted.push(Object.freeze<Triangle>([a, b, c]));
  });

  return Object.freeze({
    points: Object.freeze(points.map((p) => Object.freeze<Vec2>([p[0], p[1]]))),
    triangles: Object.freeze(accepted),
    pointCount,
    triangleCount: accepted.length,
  });
}

// ─── Binary codec ──────────────────────────────────────────────

export function meshByteLength(pointCount: number, triangleCount: number): number {
  return pointSetByteLength(pointCount) + 4 + triangleCount * 12;
}

export function encodeMesh(mesh: TriangleMesh): ArrayBuffer {
  const buffer = new ArrayBuffer(meshByteLength(mesh.pointCount, mesh.triangleCount));
  const view = new DataView(buffer);

  let offset = writePointSet(view, mesh.points);
  view.setUint32(offset, mesh.triangleCount, true); offset += 4;
  for (const [i, j, k] of mesh.triangles) {
    view.setUint32(offset, i, true); offset += 4;
    view.setUint32(offset, j, true); offset += 4;
    view.setUint32(offset, k, true); offset += 4;
  }
  return buffer;
}

export function decodeMesh(bytes: BinaryInput): TriangleMesh {
  const view = asDataView(bytes);
  const { points, offset: start } = readPointSet(view);

  if (view.byteLength < start + 4) {
    throw new KernelError({ kind: 'MalformedBuffer', byteLength: view.byteLength, required: start + 4, section: 'triangle_count' });
  }
  const triangleCount = view.getUint32(start, true);
  const required = start + 4 + triangleCount * 12;
  if (view.byteLength < required) {
    throw new KernelError({ kind: 'MalformedBuffer', byteLength: view.byteLength, required, section: 'triangles' });
  }

  const triangles: Triangle[] = [];
  let offset = start + 4;
  for (let t = 0; t < triangleCount; t++) {
    const i = view.getUint32(offset, true);
    const j = view.getUint32(offset + 4, true);
    const k = view.getUint32(offset + 8, true);
    triangles.push([i, j, k]);
    offset += 12;
  }
  return createMesh(points, triangles);
}

// ─── Readback ──────────────────────────────────────────────────

/** Summary for callers that should not receive the full index list. */
export function meshReadback(mesh: TriangleMesh): MeshReadback {
  const n = mesh.pointCount;
  const edges = new Set<number>();
  for (const [a, b, c] of mesh.triangles) {
    for (const [u, v] of [[a, b], [b, c], [c, a]]) {
      edges.add(u < v ? u * n + v : v * n + u);
    }
  }
  return {
    point_count: mesh.pointCount,
    triangle_count: mesh.triangleCount,
    edge_count: edges.size,
    bounds: boundsOf(mesh.points),
  };
}
