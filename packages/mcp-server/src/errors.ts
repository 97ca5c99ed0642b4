/**
 * Turns anything a tool throws into an MCP error result.
 *
 * The body is JSON `{ error, kind }`: kernel failures keep their
 * variant name, source failures their lookup kind.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { isKernelError } from '@planar-mesh/delaunay-kernel';
import { SourceError } from './source.js';

export interface ToolErrorBody {
  error: string;
  kind: string;
}

export function toolErrorBody(err: unknown): ToolErrorBody {
  if (isKernelError(err)) {
    return { error: `Processing error: ${err.message}`, kind: err.kind };
  }
  if (err instanceof SourceError) {
    return { error: err.message, kind: err.kind };
  }
  if (err instanceof Error) {
    return { error: err.message, kind: 'invalid_request' };
  }
  return { error: String(err), kind: 'invalid_request' };
}

export function toolError(err: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(toolErrorBody(err)) }],
    isError: true,
  };
}
