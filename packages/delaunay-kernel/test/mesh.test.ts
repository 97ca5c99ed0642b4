import { describe, it, expect } from 'vitest';
import { createMesh, encodeMesh, decodeMesh, meshByteLength, meshReadback } from '../src/mesh.js';
import { KernelError } from '../src/errors.js';
import type { KernelErrorDetail } from '../src/errors.js';
import type { Vec2 } from '../src/vec2.js';

// ─── Helpers ──────────────────────────────────────────────────

const POINTS: Vec2[] = [[0, 0], [1, 0], [0, 1]];
const SQUARE: Vec2[] = [[0, 0], [1, 0], [1, 1], [0, 1]];

/** Hand-built mesh buffer, independent of the codec under test. */
function meshBytes(points: Vec2[], triangles: number[][]): Uint8Array {
  const pointBytes = 4 + points.length * 8;
  const bytes = new Uint8Array(pointBytes + 4 + triangles.length * 12);
  const view = new DataView(bytes.buffer);
  view.setUint32(0, points.length, true);
  points.forEach(([x, y], i) => {
    view.setFloat32(4 + i * 8, x, true);
    view.setFloat32(8 + i * 8, y, true);
  });
  view.setUint32(pointBytes, triangles.length, true);
  triangles.forEach((tri, t) => {
    tri.forEach((index, k) => view.setUint32(pointBytes + 4 + t * 12 + k * 4, index, true));
  });
  return bytes;
}

function failure(fn: () => unknown): KernelErrorDetail {
  try {
    fn();
  } catch (err) {
    if (err instanceof KernelError) return err.detail;
    throw err;
  }
  throw new Error('expected a KernelError');
}

// ─── Construction ─────────────────────────────────────────────

describe('createMesh', () => {
  it('accepts a single valid triangle', () => {
    const mesh = createMesh(POINTS, [[0, 1, 2]]);
    expect(mesh.triangleCount).toBe(1);
    expect(mesh.pointCount).toBe(3);
    expect(mesh.triangles).toEqual([[0, 1, 2]]);
    expect(mesh.points).toEqual(POINTS);
  });

  it('accepts an empty triangle list', () => {
    expect(createMesh(POINTS, []).triangleCount).toBe(0);
  });

  it('keeps supplied order and winding', () => {
    const mesh = createMesh(SQUARE, [[2, 1, 0], [0, 3, 2]]);
    expect(mesh.triangles).toEqual([[2, 1, 0], [0, 3, 2]]);
  });

  it('is frozen', () => {
    const mesh = createMesh(POINTS, [[0, 1, 2]]);
    expect(Object.isFrozen(mesh)).toBe(true);
    expect(Object.isFrozen(mesh.triangles)).toBe(true);
    expect(Object.isFrozen(mesh.triangles[0])).toBe(true);
    expect(Object.isFrozen(mesh.points)).toBe(true);
    expect(Object.isFrozen(mesh.points[0])).toBe(true);
  });

  it('copies the points it is given', () => {
    const points: Vec2[] = [[0, 0], [1, 0], [0, 1]];
    const mesh = createMesh(points, [[0, 1, 2]]);
    points[0][0] = 99;
    expect(mesh.points[0]).toEqual([0, 0]);
  });

  it('rejects a triangle with two indices', () => {
    expect(failure(() => createMesh(POINTS, [[0, 1]]))).toEqual({
      kind: 'InvalidTriangleIndexCount', triangle: 0, indices: [0, 1],
    });
  });

  it('rejects a triangle with four indices', () => {
    expect(failure(() => createMesh(SQUARE, [[0, 1, 2], [0, 1, 2, 3]]))).toEqual({
      kind: 'InvalidTriangleIndexCount', triangle: 1, indices: [0, 1, 2, 3],
    });
  });

  it('rejects an index equal to the point count', () => {
    expect(failure(() => createMesh(POINTS, [[0, 1, 3]]))).toEqual({
      kind: 'TriangleIndexOutOfRange', triangle: 0, indices: [0, 1, 3], index: 3, pointCount: 3,
    });
  });

  it('rejects a negative index', () => {
    const detail = failure(() => createMesh(POINTS, [[-1, 1, 2]]));
    expect(detail.kind).toBe('TriangleIndexOutOfRange');
  });

  it('rejects a non-integer index', () => {
    const detail = failure(() => createMesh(POINTS, [[0, 1.5, 2]]));
    expect(detail.kind).toBe('TriangleIndexOutOfRange');
  });

  it('rejects a repeated vertex', () => {
    expect(failure(() => createMesh(POINTS, [[0, 0, 1]]))).toEqual({
      kind: 'TriangleNonDistinctVertices', triangle: 0, indices: [0, 0, 1],
    });
  });

  it('rejects a permutation of an earlier triangle', () => {
    expect(failure(() => createMesh(POINTS, [[0, 1, 2], [0, 2, 1]]))).toEqual({
      kind: 'DuplicateTriangle', triangle: 1, indices: [0, 2, 1], original: 0,
    });
  });

  it('reports the first violation in check order', () => {
    // Out of range and repeated: the range check runs first.
    expect(failure(() => createMesh(POINTS, [[5, 5, 1]])).kind).toBe('TriangleIndexOutOfRange');
    // A bad count on the second triangle beats a duplicate on the third.
    expect(failure(() => createMesh(SQUARE, [[0, 1, 2], [1, 2], [2, 1, 0]])).kind)
      .toBe('InvalidTriangleIndexCount');
  });

  it('names the offending triangle in the message', () => {
    expect(() => createMesh(POINTS, [[0, 1, 2], [2, 0, 1]])).toThrow(
      'Triangle #1 (2, 0, 1) duplicates triangle #0',
    );
  });
});

// ─── Binary codec ─────────────────────────────────────────────

describe('encodeMesh', () => {
  it('matches the hand-built layout byte for byte', () => {
    const mesh = createMesh(POINTS, [[1, 0, 2]]);
    expect(new Uint8Array(encodeMesh(mesh))).toEqual(meshBytes(POINTS, [[1, 0, 2]]));
  });

  it('sizes the buffer as points + 4 + 12 per triangle', () => {
    const mesh = createMesh(SQUARE, [[0, 1, 2], [0, 2, 3]]);
    expect(encodeMesh(mesh).byteLength).toBe(meshByteLength(4, 2));
    expect(meshByteLength(4, 2)).toBe(36 + 4 + 24);
  });

  it('writes a zero triangle count for an empty mesh', () => {
    const bytes = new Uint8Array(encodeMesh(createMesh(POINTS, [])));
    expect(bytes.length).toBe(32);
    expect(new DataView(bytes.buffer).getUint32(28, true)).toBe(0);
  });
});

describe('decodeMesh', () => {
  it('decodes points and triangles', () => {
    const mesh = decodeMesh(meshBytes(SQUARE, [[0, 1, 2], [2, 3, 0]]));
    expect(mesh.points).toEqual(SQUARE);
    expect(mesh.triangles).toEqual([[0, 1, 2], [2, 3, 0]]);
  });

  it('round-trips an encoded mesh', () => {
    const mesh = createMesh(SQUARE, [[3, 0, 1], [1, 2, 3]]);
    const again = decodeMesh(encodeMesh(mesh));
    expect(again.points).toEqual(mesh.points);
    expect(again.triangles).toEqual(mesh.triangles);
  });

  it('rejects a buffer that ends before the triangle count', () => {
    const bytes = meshBytes(POINTS, []).subarray(0, 30);
    expect(failure(() => decodeMesh(bytes))).toEqual({
      kind: 'MalformedBuffer', byteLength: 30, required: 32, section: 'triangle_count',
    });
  });

  it('rejects a truncated index triple', () => {
    const full = meshBytes(POINTS, [[0, 1, 2]]);
    expect(failure(() => decodeMesh(full.subarray(0, full.length - 4)))).toEqual({
      kind: 'MalformedBuffer', byteLength: 40, required: 44, section: 'triangles',
    });
  });

  it('rejects a truncated point section before reading triangles', () => {
    expect(failure(() => decodeMesh(new Uint8Array([9, 0, 0, 0, 1]))).kind).toBe('MalformedBuffer');
  });

  it('validates decoded triangles', () => {
    expect(failure(() => decodeMesh(meshBytes(POINTS, [[0, 1, 7]]))).kind).toBe('TriangleIndexOutOfRange');
    expect(failure(() => decodeMesh(meshBytes(POINTS, [[0, 1, 2], [1, 2, 0]]))).kind).toBe('DuplicateTriangle');
  });
});

// ─── Readback ─────────────────────────────────────────────────

describe('meshReadback', () => {
  it('counts shared edges once', () => {
    const mesh = createMesh(SQUARE, [[0, 1, 2], [0, 2, 3]]);
    expect(meshReadback(mesh)).toEqual({
      point_count: 4,
      triangle_count: 2,
      edge_count: 5,
      bounds: { min: [0, 0], max: [1, 1] },
    });
  });
});
