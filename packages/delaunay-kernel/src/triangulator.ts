/**
 * Delaunay triangulation by Bowyer-Watson incremental insertion.
 *
 *   1. Enclose every input point in a synthetic super-triangle.
 *   2. Insert points in input order. Each insertion removes the triangles
 *      whose circumcircle strictly contains the point ("bad" triangles) and
 *      fans the new point to the boundary of the cavity they leave.
 *   3. Drop every triangle touching a super-triangle vertex.
 *
 * All working state is local to one triangulate() call.
 */

import type { Vec2 } from './vec2.js';
import { dist2, boundsOf } from './vec2.js';
import { KernelError } from './errors.js';
import type { PointCollection } from './point-set.js';
import type { Triangle, TriangleMesh } from './mesh.js';
import { createMesh } from './mesh.js';

/** Below this |determinant| a triangle counts as collinear. */
export const DEGENERATE_EPSILON = 1e-9;
/** Cocircular points fall outside by this margin on squared radius. */
export const CIRCUMCIRCLE_EPSILON = 1e-9;
/** Super-triangle half-width, in multiples of the bounding box's larger side. */
const SUPER_TRIANGLE_SCALE = 20;

// ─── Preconditions ─────────────────────────────────────────────

/** Throws InsufficientPoints or DuplicatePoints. */
export function validatePointSet(points: PointCollection): void {
  if (points.length < 3) {
    throw new KernelError({ kind: 'InsufficientPoints', count: points.length });
  }
  // NaN never equals itself, so NaN points cannot be duplicates.
  // `${-0}` is "0", matching -0 === 0.
  const seen = new Map<string, number>();
  points.forEach(([x, y], i) => {
    if (Number.isNaN(x) || Number.isNaN(y)) return;
    const key = `${x}:${y}`;
    const first = seen.get(key);
    if (first !== undefined) {
      throw new KernelError({ kind: 'DuplicatePoints', first, second: i, point: [x, y] });
    }
    seen.set(key, i);
  });
}

// ─── Geometry ──────────────────────────────────────────────────

/** Three vertices far outside the bounding box that enclose every point. */
export function superTriangle(points: PointCollection): [Vec2, Vec2, Vec2] {
  const { min, max } = boundsOf(points);
  const delta = Math.max(max[0] - min[0], max[1] - min[1]);
  const midX = (min[0] + max[0]) / 2;
  const midY = (min[1] + max[1]) / 2;
  const s = SUPER_TRIANGLE_SCALE * delta;
  return [
    [midX - s, midY - delta],
    [midX, midY + s],
    [midX + s, midY - delta],
  ];
}

/**
 * True when p lies strictly inside the circumcircle of abc.
 * Near-collinear triangles (|d| < DEGENERATE_EPSILON) report false.
 */
export function isPointInCircumcircle(
  p: Readonly<Vec2>, a: Readonly<Vec2>, b: Readonly<Vec2>, c: Readonly<Vec2>,
): boolean {
  const [ax, ay] = a;
  const [bx, by] = b;
  const [cx, cy] = c;

  const d = 2 * (ax * (by - cy) + bx * (cy - ay) + cx * (ay - by));
  if (Math.abs(d) < DEGENERATE_EPSILON) return false;

  const a2 = ax * ax + ay * ay;
  const b2 = bx * bx + by * by;
  const c2 = cx * cx + cy * cy;
  const center: Vec2 = [
    (a2 * (by - cy) + b2 * (cy - ay) + c2 * (ay - by)) / d,
    (a2 * (cx - bx) + b2 * (ax - cx) + c2 * (bx - ax)) / d,
  ];

  return dist2(center, p) < dist2(center, a) - CIRCUMCIRCLE_EPSILON;
}

// ─── Triangle arena ────────────────────────────────────────────

/**
 * Working triangles addressed by stable integer handles.
 * Vertices live in a flat array (3 per handle); `live` lists the current
 * triangulation and removal is swap-and-truncate through `slot`.
 */
class TriangleArena {
  private readonly verts: number[] = [];
  private readonly slot: number[] = [];
  readonly live: number[] = [];

  add(a: number, b: number, c: number): number {
    const handle = this.slot.length;
    this.verts.push(a, b, c);
    this.slot.push(this.live.length);
    this.live.push(handle);
    return handle;
  }

  remove(handle: number): void {
    const at = this.slot[handle];
    const last = this.live[this.live.length - 1];
    this.live[at] = last;
    this.slot[last] = at;
    this.live.pop();
    this.slot[handle] = -1;
  }

  vertex(handle: number, k: 0 | 1 | 2): number {
    return this.verts[handle * 3 + k];
  }

  triangle(handle: number): Triangle {
    const base = handle * 3;
    return [this.verts[base], this.verts[base + 1], this.verts[base + 2]];
  }
}

// ─── Bowyer-Watson ─────────────────────────────────────────────

/** Validate, triangulate and return a validated mesh over `points`. */
export function triangulate(points: PointCollection): TriangleMesh {
  validatePointSet(points);

  const n = points.length;
  const all: Readonly<Vec2>[] = [...points, ...superTriangle(points)];
  const arena = new TriangleArena();
  arena.add(n, n + 1, n + 2);

  // Undirected edge key; unique while vertex indices stay below `stride`.
  const stride = n + 3;
  const edgeKey = (u: number, v: number) => (u < v ? u * stride + v : v * stride + u);

  for (let i = 0; i < n; i++) {
    const p = all[i];

    const bad: number[] = [];
    for (const h of arena.live) {
      const a = all[arena.vertex(h, 0)];
      const b = all[arena.vertex(h, 1)];
      const c = all[arena.vertex(h, 2)];
      if (isPointInCircumcircle(p, a, b, c)) bad.push(h);
    }

    // An edge owned by exactly one bad triangle bounds the cavity.
    const owners = new Map<number, number>();
    for (const h of bad) {
      const [a, b, c] = arena.triangle(h);
      for (const key of [edgeKey(a, b), edgeKey(b, c), edgeKey(c, a)]) {
        owners.set(key, (owners.get(key) ?? 0) + 1);
      }
    }
    const boundary: [number, number][] = [];
    for (const h of bad) {
      const [a, b, c] = arena.triangle(h);
      for (const [u, v] of [[a, b], [b, c], [c, a]]) {
        if (owners.get(edgeKey(u, v)) === 1) boundary.push([u, v]);
      }
    }

    for (const h of bad) arena.remove(h);
    for (const [u, v] of boundary) arena.add(u, v, i);
  }

  const result: Triangle[] = [];
  for (const h of arena.live) {
    const tri = arena.triangle(h);
    if (tri[0] < n && tri[1] < n && tri[2] < n) result.push(tri);
  }
  return createMesh(points, result);
}

// ─── Verification ──────────────────────────────────────────────

export interface DelaunayViolation {
  triangle: number;
  point: number;
}

/** Every (triangle, point) pair where a mesh point lies strictly inside a circumcircle. */
export function findDelaunayViolations(mesh: TriangleMesh): DelaunayViolation[] {
  const violations: DelaunayViolation[] = [];
  mesh.triangles.forEach(([a, b, c], t) => {
    const pa = mesh.points[a];
    const pb = mesh.points[b];
    const pc = mesh.points[c];
    mesh.points.forEach((p, i) => {
      if (i === a || i === b || i === c) return;
      if (isPointInCircumcircle(p, pa, pb, pc)) violations.push({ triangle: t, point: i });
    });
  });
  return violations;
}
