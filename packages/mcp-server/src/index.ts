#!/usr/bin/env node
/**
 * planar-mesh MCP Server
 *
 * Wraps the Delaunay kernel as callable tools for LLM agents.
 * Runs over stdio transport.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config.js';
import { log, setLogLevel } from './log.js';
import { registerTools } from './tools.js';

const config = loadConfig();
setLogLevel(config.logLevel);

const server = new McpServer({
  name: 'planar-mesh',
  version: '0.1.0',
});

registerTools(server, config);

const transport = new StdioServerTransport();
await server.connect(transport);
log.info('listening on stdio', { data_dir: config.dataDir, export_dir: config.exportDir, max_points: config.maxPoints });
