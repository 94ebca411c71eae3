/**
 * wikiladder_inspect_page - Link metrics of one page
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { WikiLadderEngine } from '../../../core/engine.js';
import { toMcpError } from '../errors.js';

export const inspectPageInput = {
  title: z.string().min(1).describe('Page title'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(500)
    .optional()
    .describe('Outbound links to list (default: 50)'),
};

export function inspectPageHandler(engine: WikiLadderEngine) {
  return async (input: { title: string; limit?: number }) => {
    try {
      const page = await engine.inspectPage(input.title, input.limit);

      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(page, null, 2),
          },
        ],
      };
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerInspectPageTool(
  server: McpServer,
  engine: WikiLadderEngine,
): void {
  server.tool(
    'wikiladder_inspect_page',
    [
      'Report the outbound link count (degree), known backlink count (popularity),',
      'redirects and a sorted sample of outbound links of a wiki page.',
    ].join('\n'),
    inspectPageInput,
    inspectPageHandler(engine),
  );
}
