/**
 * MCP Server initialization and transport
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './tools/index.js';
import { logToStderr, interceptConsole } from './logger.js';
import type { WikiLadderEngine } from '../../core/engine.js';
import { getVersion } from '../cli/version.js';

export function createMcpServer(engine: WikiLadderEngine): McpServer {
  const server = new McpServer({
    name: 'wikiladder',
    version: getVersion(),
  });

  registerAllTools(server, engine);
  return server;
}

export async function startMcpServer(engine: WikiLadderEngine): Promise<McpServer> {
  // Intercept console.log to prevent stdout pollution
  interceptConsole();

  const server = createMcpServer(engine);

  // Connect via stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logToStderr(`MCP Server started (stdio transport, wiki: ${engine.config.wiki.domain})`);
  return server;
}
