/**
 * Register all MCP tools
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { WikiLadderEngine } from '../../../core/engine.js';
import { registerFindPathTool } from './wikiladder-find-path.js';
import { registerInspectPageTool } from './wikiladder-inspect-page.js';

export function registerAllTools(
  server: McpServer,
  engine: WikiLadderEngine,
): void {
  registerFindPathTool(server, engine);
  registerInspectPageTool(server, engine);
}
