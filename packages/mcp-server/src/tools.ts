/**
 * MCP tool registrations: point sets, triangulation and mesh exchange.
 *
 * Every tool returns JSON with an entry ID and a readback so the caller
 * always knows the current state after every operation. Failures come
 * back as `{ error, kind }` with isError set.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  decodePointSet, triangulate, encodeMesh, decodeMesh, meshReadback,
  type PointCollection, type TriangleMesh, type Vec2,
} from '@planar-mesh/delaunay-kernel';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ServerConfig } from './config.js';
import { toolError } from './errors.js';
import { log } from './log.js';
import * as registry from './registry.js';
import { resolvePointSet } from './source.js';

type Handler = () => unknown | Promise<unknown>;

/** Run a tool body, serialize its result, map any failure to an error result. */
async function respond(tool: string, body: Handler): Promise<CallToolResult> {
  try {
    const result = await body();
    return { content: [{ type: 'text', text: JSON.stringify(result) }] };
  } catch (err) {
    const failure = toolError(err);
    log.warn(`${tool} failed`, { error: err instanceof Error ? err.message : String(err) });
    return failure;
  }
}

function toBase64(buffer: ArrayBuffer): string {
  return Buffer.from(buffer).toString('base64');
}

function fromBase64(data: string): Uint8Array {
  return Buffer.from(data, 'base64');
}

const nameParam = z.string().optional()
  .describe('Optional name for the result (letters, digits, hyphens, underscores only)');

const coordinate = z.number()
  .refine((v) => Number.isFinite(Math.fround(v)), 'Coordinate must be a finite float32 value');

const base64Param = z.string().base64();

export function registerTools(server: McpServer, config: ServerConfig): void {

  /** Triangulate `points`, enforcing the point ceiling. Stores nothing. */
  function runTriangulation(label: string, points: PointCollection): { mesh: TriangleMesh; elapsed: number } {
    if (points.length > config.maxPoints) {
      throw new Error(
        `Point set "${label}" has ${points.length} points; the limit is ${config.maxPoints}. ` +
        'Raise PLANAR_MESH_MAX_POINTS or split the point set.'
      );
    }
    const start = Date.now();
    const mesh = triangulate(points);
    const elapsed = Date.now() - start;
    log.debug('triangulated', { point_set: label, points: mesh.pointCount, triangles: mesh.triangleCount, ms: elapsed });
    return { mesh, elapsed };
  }

  // ─── Point sets (3) ─────────────────────────────────────────

  server.tool(
    'create_point_set',
    'Create a 2D point set from [x, y] pairs. Coordinates are stored as float32, matching the binary format.',
    {
      vertices: z.array(z.tuple([coordinate, coordinate])).max(1_000_000)
        .describe('Array of [x, y] coordinates'),
      name: nameParam,
    },
    async ({ vertices, name }) => respond('create_point_set', () => {
      const points = vertices.map(([x, y]): Vec2 => [Math.fround(x), Math.fround(y)]);
      return registry.createPointSet(points, 'vertices', name);
    })
  );

  server.tool(
    'decode_point_set',
    'Decode a binary point set (uint32 count + float32 x,y pairs, little-endian) given as base64.',
    {
      data_base64: base64Param.describe('Point-set bytes, base64-encoded'),
      name: nameParam,
    },
    async ({ data_base64, name }) => respond('decode_point_set', () => {
      const points = decodePointSet(fromBase64(data_base64));
      return registry.createPointSet(points, 'bytes', name);
    })
  );

  server.tool(
    'load_point_set',
    'Load a stored point set by its UUID from the data directory.',
    {
      point_set_id: z.string().describe('UUID of the stored point set'),
      name: nameParam,
    },
    async ({ point_set_id, name }) => respond('load_point_set', async () => {
      const bytes = await resolvePointSet(point_set_id, config.dataDir);
      return registry.createPointSet(decodePointSet(bytes), 'file', name);
    })
  );

  // ─── Triangulation (2) ──────────────────────────────────────

  server.tool(
    'triangulate',
    'Compute the Delaunay triangulation of a point set. Needs at least 3 distinct points. Returns mesh stats (triangle/edge count, bounds, timing).',
    {
      point_set: z.string().describe('ID of the point set to triangulate'),
      name: nameParam,
    },
    async ({ point_set, name }) => respond('triangulate', () => {
      const entry = registry.getPointSet(point_set);
      const { mesh, elapsed } = runTriangulation(entry.id, entry.points);
      return { ...registry.storeMesh(mesh, entry.id, name), computed_in_ms: elapsed };
    })
  );

  server.tool(
    'triangulate_stored',
    'Load a stored point set by UUID, triangulate it and return the mesh bytes as base64 in one step. Nothing is kept in the registry.',
    {
      point_set_id: z.string().describe('UUID of the stored point set'),
    },
    async ({ point_set_id }) => respond('triangulate_stored', async () => {
      const bytes = await resolvePointSet(point_set_id, config.dataDir);
      const { mesh, elapsed } = runTriangulation(point_set_id, decodePointSet(bytes));
      const encoded = encodeMesh(mesh);
      return {
        point_set_id,
        readback: meshReadback(mesh),
        computed_in_ms: elapsed,
        content_type: 'application/octet-stream',
        bytes: encoded.byteLength,
        data_base64: toBase64(encoded),
      };
    })
  );

  // ─── Mesh exchange (4) ──────────────────────────────────────

  server.tool(
    'get_mesh',
    'Get the readback and triangle index triples of a mesh.',
    {
      mesh: z.string().describe('ID of the mesh'),
    },
    async ({ mesh }) => respond('get_mesh', () => {
      const entry = registry.getMesh(mesh);
      return {
        mesh_id: entry.id,
        point_set_id: entry.pointSetId,
        readback: meshReadback(entry.mesh),
        triangles: entry.mesh.triangles,
      };
    })
  );

  server.tool(
    'encode_mesh',
    'Encode a mesh in the binary mesh format (point set + uint32 triangle count + uint32 index triples) and return it as base64.',
    {
      mesh: z.string().describe('ID of the mesh'),
    },
    async ({ mesh }) => respond('encode_mesh', () => {
      const entry = registry.getMesh(mesh);
      const encoded = encodeMesh(entry.mesh);
      return { mesh_id: entry.id, bytes: encoded.byteLength, data_base64: toBase64(encoded) };
    })
  );

  server.tool(
    'decode_mesh',
    'Decode and validate a binary mesh given as base64. Rejects out-of-range, repeated or duplicate triangles.',
    {
      data_base64: base64Param.describe('Mesh bytes, base64-encoded'),
      name: nameParam,
    },
    async ({ data_base64, name }) => respond('decode_mesh', () => {
      const mesh = decodeMesh(fromBase64(data_base64));
      return registry.storeMesh(mesh, null, name);
    })
  );

  server.tool(
    'export_mesh',
    'Write a mesh to a binary file in the export directory.',
    {
      mesh: z.string().describe('ID of the mesh to export'),
      filename: z.string().optional().describe('File name (default: <mesh_id>.mesh)'),
    },
    async ({ mesh, filename }) => respond('export_mesh', () => {
      const entry = registry.getMesh(mesh);
      const encoded = encodeMesh(entry.mesh);
      fs.mkdirSync(config.exportDir, { recursive: true });
      const safeName = (filename ?? `${entry.id}.mesh`).replace(/[^a-zA-Z0-9_.-]/g, '_');
      const filePath = path.join(config.exportDir, safeName);
      fs.writeFileSync(filePath, Buffer.from(encoded));
      log.info('exported mesh', { mesh: entry.id, path: filePath });
      return {
        mesh_id: entry.id,
        path: filePath,
        bytes: encoded.byteLength,
        triangle_count: entry.mesh.triangleCount,
      };
    })
  );

  // ─── Registry (2) ───────────────────────────────────────────

  server.tool(
    'list_entries',
    'List all point sets and meshes with their readbacks.',
    async () => respond('list_entries', () => registry.list())
  );

  server.tool(
    'delete_entry',
    'Delete a point set or mesh by ID.',
    {
      id: z.string().describe('ID of the point set or mesh'),
    },
    async ({ id }) => respond('delete_entry', () => ({ deleted: id, type: registry.remove(id) }))
  );
}
