/**
 * Entry registry: in-memory named point-set and mesh store.
 *
 * Every mutating MCP tool stores its result here and returns
 * a structured readback so the caller always knows the current state.
 */

import {
  boundsOf, meshReadback,
  type BoundingBox2D, type MeshReadback, type PointCollection, type TriangleMesh,
} from '@planar-mesh/delaunay-kernel';

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

function checkName(kind: string, name: string | undefined): void {
  if (name !== undefined && !NAME_PATTERN.test(name)) {
    throw new Error(
      `Invalid ${kind} name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
}

// ─── Point sets ─────────────────────────────────────────────────

export type PointSetSource = 'vertices' | 'bytes' | 'file';

export interface PointSetEntry {
  id: string;
  points: PointCollection;
  source: PointSetSource;
}

export interface PointSetResult {
  point_set_id: string;
  source: PointSetSource;
  readback: {
    point_count: number;
    bounds: BoundingBox2D;
  };
}

let nextPointSetId = 1;
const pointSets = new Map<string, PointSetEntry>();

function pointSetResult(entry: PointSetEntry): PointSetResult {
  return {
    point_set_id: entry.id,
    source: entry.source,
    readback: { point_count: entry.points.length, bounds: boundsOf(entry.points) },
  };
}

/** Store a point set and return its ID + readback. Named entries overwrite. */
export function createPointSet(points: PointCollection, source: PointSetSource, name?: string): PointSetResult {
  checkName('point set', name);
  const id = name ?? `ps_${nextPointSetId++}`;
  if (pointSets.has(id) && !name) {
    return createPointSet(points, source);
  }
  const entry = { id, points, source };
  pointSets.set(id, entry);
  return pointSetResult(entry);
}

/** Retrieve a point set or throw a clear error. */
export function getPointSet(id: string): PointSetEntry {
  const entry = pointSets.get(id);
  if (!entry) {
    const available = [...pointSets.keys()];
    throw new Error(
      `Point set "${id}" not found. Available point sets: [${available.join(', ')}]`
    );
  }
  return entry;
}

// ─── Meshes ─────────────────────────────────────────────────────

export interface MeshEntry {
  id: string;
  mesh: TriangleMesh;
  /** Point set the mesh was triangulated from; null for decoded meshes. */
  pointSetId: string | null;
}

export interface MeshResult {
  mesh_id: string;
  point_set_id: string | null;
  readback: MeshReadback;
}

let nextMeshId = 1;
const meshes = new Map<string, MeshEntry>();

function meshResult(entry: MeshEntry): MeshResult {
  return { mesh_id: entry.id, point_set_id: entry.pointSetId, readback: meshReadback(entry.mesh) };
}

export function storeMesh(mesh: TriangleMesh, pointSetId: string | null, name?: string): MeshResult {
  checkName('mesh', name);
  const id = name ?? `mesh_${nextMeshId++}`;
  if (meshes.has(id) && !name) {
    return storeMesh(mesh, pointSetId);
  }
  const entry = { id, mesh, pointSetId };
  meshes.set(id, entry);
  return meshResult(entry);
}

export function getMesh(id: string): MeshEntry {
  const entry = meshes.get(id);
  if (!entry) {
    const available = [...meshes.keys()];
    throw new Error(`Mesh "${id}" not found. Available meshes: [${available.join(', ')}]`);
  }
  return entry;
}

// ─── Shared ─────────────────────────────────────────────────────

export function list(): { point_sets: PointSetResult[]; meshes: MeshResult[] } {
  return {
    point_sets: [...pointSets.values()].map(pointSetResult),
    meshes: [...meshes.values()].map(meshResult),
  };
}

/** Remove a point set or mesh by ID. */
export function remove(id: string): 'point_set' | 'mesh' {
  if (pointSets.delete(id)) return 'point_set';
  if (meshes.delete(id)) return 'mesh';
  throw new Error(`Entry "${id}" not found, cannot delete.`);
}

/** Clear all entries (for testing). */
export function clear(): void {
  pointSets.clear();
  meshes.clear();
  nextPointSetId = 1;
  nextMeshId = 1;
}
