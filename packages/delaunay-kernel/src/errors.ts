/**
 * Kernel failures.
 *
 * Every codec, mesh and triangulation failure is one variant of
 * KernelErrorDetail, thrown wrapped in a KernelError. Callers switch on
 * `err.detail.kind`; the message is for humans only.
 */

import type { Vec2 } from './vec2.js';

export type KernelErrorDetail =
  | { kind: 'MalformedBuffer'; byteLength: number; required: number; section: 'point_count' | 'points' | 'triangle_count' | 'triangles' }
  | { kind: 'InsufficientPoints'; count: number }
  | { kind: 'DuplicatePoints'; first: number; second: number; point: Vec2 }
  | { kind: 'InvalidTriangleIndexCount'; triangle: number; indices: readonly number[] }
  | { kind: 'TriangleIndexOutOfRange'; triangle: number; indices: readonly number[]; index: number; pointCount: number }
  | { kind: 'TriangleNonDistinctVertices'; triangle: number; indices: readonly number[] }
  | { kind: 'DuplicateTriangle'; triangle: number; indices: readonly number[]; original: number };

export type KernelErrorKind = KernelErrorDetail['kind'];

export function describeKernelError(detail: KernelErrorDetail): string {
  switch (detail.kind) {
    case 'MalformedBuffer':
      return `Buffer too short: ${detail.byteLength} bytes, need at least ${detail.required} to read ${detail.section.replace('_', ' ')}`;
    case 'InsufficientPoints':
      return `Need at least 3 points for triangulation (got ${detail.count})`;
    case 'DuplicatePoints':
      return `Duplicate points in point set: #${detail.first} and #${detail.second} are both (${detail.point[0]}, ${detail.point[1]})`;
    case 'InvalidTriangleIndexCount':
      return `Triangle #${detail.triangle} has ${detail.indices.length} indices, expected exactly 3`;
    case 'TriangleIndexOutOfRange':
      return `Triangle #${detail.triangle} (${detail.indices.join(', ')}) references index ${detail.index}, valid range is [0, ${detail.pointCount})`;
    case 'TriangleNonDistinctVertices':
      return `Triangle #${detail.triangle} (${detail.indices.join(', ')}) must reference three distinct points`;
    case 'DuplicateTriangle':
      return `Triangle #${detail.triangle} (${detail.indices.join(', ')}) duplicates triangle #${detail.original}`;
  }
}

export class KernelError extends Error {
  readonly detail: KernelErrorDetail;

  constructor(detail: KernelErrorDetail) {
    super(describeKernelError(detail));
    this.name = 'KernelError';
    this.detail = detail;
  }

  get kind(): KernelErrorKind {
    return this.detail.kind;
  }
}

export function isKernelError(err: unknown): err is KernelError {
  return err instanceof KernelError;
}
