/**
 * Point-set source: maps an opaque UUID to the bytes of a stored point set.
 *
 * Point sets live as `<uuid>.bin` files in the configured data directory.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

export type SourceErrorKind = 'invalid_id' | 'not_found' | 'upstream';

export class SourceError extends Error {
  readonly kind: SourceErrorKind;

  constructor(kind: SourceErrorKind, message: string) {
    super(message);
    this.name = 'SourceError';
    this.kind = kind;
  }
}

const PointSetId = z.string().uuid();

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

export async function resolvePointSet(id: string, dataDir: string): Promise<Uint8Array> {
  if (!PointSetId.safeParse(id).success) {
    throw new SourceError('invalid_id', 'Invalid UUID format');
  }
  const file = path.join(dataDir, `${id.toLowerCase()}.bin`);
  try {
    return await fs.readFile(file);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      throw new SourceError('not_found', 'PointSet not found');
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new SourceError('upstream', `Upstream error: ${reason}`);
  }
}
