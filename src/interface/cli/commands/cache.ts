/**
 * wikiladder cache stats|clear - Persistent link cache maintenance
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatBytes, formatSuccess, formatWarning } from '../output/formatter.js';
import { resolveCachePath } from '../../../config/config.js';

export function cacheCommand(): Command {
  return new Command('cache')
    .description('Inspect or clear the persistent link cache')
    .addCommand(cacheStatsCommand())
    .addCommand(cacheClearCommand());
}

function cacheStatsCommand(): Command {
  return new Command('stats')
    .description('Display link cache statistics')
    .action(async (_options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const stats = engine.cacheStats();
        const dbPath = resolveCachePath(globals.cwd, engine.config);
        await engine.close();
        const sizeBytes = fs.existsSync(dbPath) ? fs.statSync(dbPath).size : 0;

        if (globals.json) {
          printJson({ enabled: stats !== null, path: dbPath, size_bytes: sizeBytes, ...stats });
          return;
        }
        if (globals.quiet) return;

        if (!stats) {
          process.stderr.write(formatWarning('Link cache disabled (cache.enabled is false)') + '\n');
          return;
        }
        process.stderr.write('\n');
        process.stderr.write(`  ${formatBold('Cache:')}          ${dbPath}\n`);
        process.stderr.write(`  ${formatBold('Pages (out):')}    ${stats.outboundPages}\n`);
        process.stderr.write(`  ${formatBold('Pages (in):')}     ${stats.inboundPages}\n`);
        process.stderr.write(`  ${formatBold('Redirect sets:')}  ${stats.redirectPages}\n`);
        process.stderr.write(`  ${formatBold('Links:')}          ${stats.links}\n`);
        process.stderr.write(`  ${formatBold('DB size:')}        ${formatBytes(sizeBytes)}\n`);
        process.stderr.write('\n');
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function cacheClearCommand(): Command {
  return new Command('clear')
    .description('Delete every cached link')
    .action(async (_options: unknown, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        const enabled = engine.cacheEnabled;
        engine.clearCache();
        await engine.close();

        if (globals.json) {
          printJson({ cleared: enabled });
        } else if (!globals.quiet) {
          process.stderr.write(
            (enabled
              ? formatSuccess('Link cache cleared')
              : formatWarning('Link cache disabled; nothing to clear')) + '\n',
          );
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
