/**
 * Server configuration, read once from the environment.
 *
 *   PLANAR_MESH_DATA_DIR     point sets stored as <uuid>.bin
 *   PLANAR_MESH_EXPORT_DIR   where export_mesh writes files
 *   PLANAR_MESH_MAX_POINTS   ceiling on points per triangulation
 *   PLANAR_MESH_LOG_LEVEL    debug | info | warn | error
 */

import * as path from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './log.js';

const EnvSchema = z.object({
  TMPDIR: z.string().min(1).optional(),
  PLANAR_MESH_DATA_DIR: z.string().min(1).optional(),
  PLANAR_MESH_EXPORT_DIR: z.string().min(1).optional(),
  PLANAR_MESH_MAX_POINTS: z.coerce.number().int().positive().default(5000),
  PLANAR_MESH_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface ServerConfig {
  dataDir: string;
  exportDir: string;
  maxPoints: number;
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const e = parsed.data;
  const root = path.join(e.TMPDIR ?? '/tmp', 'planar-mesh');
  return {
    dataDir: e.PLANAR_MESH_DATA_DIR ?? path.join(root, 'point-sets'),
    exportDir: e.PLANAR_MESH_EXPORT_DIR ?? root,
    maxPoints: e.PLANAR_MESH_MAX_POINTS,
    logLevel: e.PLANAR_MESH_LOG_LEVEL,
  };
}
