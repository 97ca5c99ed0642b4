/** Minimal 2D vectors: plain tuples, a few helpers. */
export type Vec2 = [number, number];

/** Axis-aligned bounding box. */
export interface BoundingBox2D { min: Vec2; max: Vec2; }

export function vec2(x: number, y: number): Vec2 {
  return [x, y];
}

export function dist2(a: Readonly<Vec2>, b: Readonly<Vec2>): number {
  const dx = a[0] - b[0];
  const dy = a[1] - b[1];
  return dx * dx + dy * dy;
}

/** Bounds of a point list. A zero box at the origin when empty. */
export function boundsOf(points: readonly Readonly<Vec2>[]): BoundingBox2D {
  if (points.length === 0) return { min: [0, 0], max: [0, 0] };
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  for (const [x, y] of points) {
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }
  return { min: [minX, minY], max: [maxX, maxY] };
}
