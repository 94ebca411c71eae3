/**
 * wikiladder serve - Start the MCP Server on stdio
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { handleCommandError } from '../output/error-display.js';
import { startMcpServer } from '../../mcp/server.js';
import { logToStderr } from '../../mcp/logger.js';
import { toError } from '../../../shared/errors.js';

export function serveCommand(): Command {
  return new Command('serve')
    .description('Start the MCP Server (stdio transport)')
    .option('--no-cache', 'Neither read nor write the link cache')
    .action(async (options: { cache: boolean }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals, {
          cache: options.cache === false ? false : undefined,
        });

        // Occupies stdout
        const server = await startMcpServer(engine);

        let shuttingDown = false;

        const gracefulShutdown = async (signal: string) => {
          if (shuttingDown) return;
          shuttingDown = true;

          logToStderr(`Received ${signal}. Shutting down...`);

          try {
            await server.close();
            await engine.close();
          } catch (error) {
            logToStderr(`Shutdown failed: ${toError(error).message}`, 'error');
            process.exit(1);
          }

          process.exit(0);
        };

        process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
        process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
