/**
 * Binary point-set codec.
 *
 * Format (little-endian): uint32 count + count × (float32 x, float32 y).
 * Bytes past the declared count are ignored on decode.
 */

import type { Vec2 } from './vec2.js';
import { KernelError } from './errors.js';

export type PointCollection = readonly Readonly<Vec2>[];

export type BinaryInput = ArrayBuffer | ArrayBufferView;

/** Bytes needed for a point set of `count` points. */
export function pointSetByteLength(count: number): number {
  return 4 + count * 8;
}

/** DataView over any binary input, honoring a view's offset and length. */
export function asDataView(bytes: BinaryInput): DataView {
  if (bytes instanceof ArrayBuffer) return new DataView(bytes);
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Read a point set starting at byte 0 of `view`.
 * Returns the points and the offset just past them, so the mesh codec can continue.
 */
export function readPointSet(view: DataView): { points: Vec2[]; offset: number } {
  if (view.byteLength < 4) {
    throw new KernelError({ kind: 'MalformedBuffer', byteLength: view.byteLength, required: 4, section: 'point_count' });
  }
  const count = view.getUint32(0, true);
  const required = pointSetByteLength(count);
  if (view.byteLength < required) {
    throw new KernelError({ kind: 'MalformedBuffer', byteLength: view.byteLength, required, section: 'points' });
  }

  const points: Vec2[] = new Array(count);
  let offset = 4;
  for (let i = 0; i < count; i++) {
    const x = view.getFloat32(offset, true); offset += 4;
    const y = view.getFloat32(offset, true); offset += 4;
    points[i] = [x, y];
  }
  return { points, offset };
}

/** Write `points` at byte 0 of `view`. Returns the offset just past them. */
export function writePointSet(view: DataView, points: PointCollection): number {
  view.setUint32(0, points.length, true);
  let offset = 4;
  for (const [x, y] of points) {
    view.setFloat32(offset, x, true); offset += 4;
    view.setFloat32(offset, y, true); offset += 4;
  }
  return offset;
}

export function decodePointSet(bytes: BinaryInput): Vec2[] {
  return readPointSet(asDataView(bytes)).points;
}

export function encodePointSet(points: PointCollection): ArrayBuffer {
  const buffer = new ArrayBuffer(pointSetByteLength(points.length));
  writePointSet(new DataView(buffer), points);
  return buffer;
}
