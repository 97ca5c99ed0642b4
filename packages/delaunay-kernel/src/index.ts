// Public API
export type { Vec2, BoundingBox2D } from './vec2.js';
export { vec2, boundsOf } from './vec2.js';

// Errors
export type { KernelErrorDetail, KernelErrorKind } from './errors.js';
export { KernelError, isKernelError, describeKernelError } from './errors.js';

// Point-set codec
export type { PointCollection, BinaryInput } from './point-set.js';
export { decodePointSet, encodePointSet, pointSetByteLength } from './point-set.js';

// Mesh
export type { Triangle, TriangleMesh, MeshReadback } from './mesh.js';
export { createMesh, encodeMesh, decodeMesh, meshByteLength, meshReadback } from './mesh.js';

// Triangulation
export type { DelaunayViolation } from './triangulator.js';
export {
  triangulate, validatePointSet, superTriangle,
  isPointInCircumcircle, findDelaunayViolations,
} from './triangulator.js';
