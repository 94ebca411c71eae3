/**
 * wikiladder_find_path - Chain of article links through the given titles
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { WikiLadderEngine } from '../../../core/engine.js';
import { toMcpError } from '../errors.js';
import { logToStderr } from '../logger.js';

export const findPathInput = {
  titles: z
    .array(z.string().min(1))
    .min(2)
    .describe('Page titles in visiting order: start, optional waypoints, destination'),
};

export function findPathHandler(engine: WikiLadderEngine) {
  return async (input: { titles: string[] }) => {
    try {
      const result = await engine.findChainedPath(input.titles);

      if (result.status === 'not_found') {
        logToStderr(
          `No path through ${input.titles.join(' -> ')} (${result.reason})`,
          'warn',
        );
      }

      return {
        content: [
          {
            type: 'text' as const,
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (error) {
      throw toMcpError(error);
    }
  };
}

export function registerFindPathTool(
  server: McpServer,
  engine: WikiLadderEngine,
): void {
  server.tool(
    'wikiladder_find_path',
    [
      'Find a chain of wiki article links from the first title to the last,',
      'passing through every title in between in order.',
      'Returns { status: "found", path } or { status: "not_found", reason, partial },',
      'where null in partial marks the gap that could not be closed.',
    ].join('\n'),
    findPathInput,
    findPathHandler(engine),
  );
}
