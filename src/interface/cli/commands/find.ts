/**
 * wikiladder find <start> <end> [more...] - Find a chain of links
 */

import { Command } from 'commander';
import { resolveGlobalOptions, type GlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { parsePositiveInt } from '../utils/parse-options.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatDim, formatElapsed, formatPath, formatWarning } from '../output/formatter.js';
import type { SearchOverrides } from '../../../config/types.js';
import type { PathResult } from '../../../shared/types.js';

interface FindOptions {
  queryLimit?: number;
  anchorThreshold?: number;
  fetchLimit?: number;
  maxExpansions?: number;
  cache: boolean;
}

export function findCommand(): Command {
  return new Command('find')
    .description('Find a chain of article links from one page to another')
    .argument('<start>', 'Start page title')
    .argument('<end>', 'Destination page title')
    .argument('[more...]', 'Further destinations, reached in order')
    .option('--query-limit <n>', 'Backlinks requested per API page (1-500)', parsePositiveInt)
    .option('--anchor-threshold <n>', 'Backlinks a page needs to serve as an anchor', parsePositiveInt)
    .option('--fetch-limit <n>', 'Backlink pages fetched per title', parsePositiveInt)
    .option('--max-expansions <n>', 'Ladders expanded per search phase', parsePositiveInt)
    .option('--no-cache', 'Neither read nor write the link cache')
    .action(
      async (start: string, end: string, more: string[], options: FindOptions, cmd: Command) => {
        const globals = resolveGlobalOptions(cmd);

        let result: PathResult;
        try {
          result = await search(globals, [start, end, ...more], toOverrides(options));
        } catch (error) {
          handleCommandError(error, globals);
        }

        if (globals.json) {
          printJson(result);
        } else {
          renderResult(result, globals);
        }

        if (result.status === 'not_found') {
          process.exit(1);
        }
      },
    );
}

function toOverrides(options: FindOptions): SearchOverrides {
  return {
    queryLimit: options.queryLimit,
    anchorThreshold: options.anchorThreshold,
    fetchLimit: options.fetchLimit,
    maxExpansions: options.maxExpansions,
    cache: options.cache === false ? false : undefined,
  };
}

async function search(
  globals: GlobalOptions,
  titles: string[],
  overrides: SearchOverrides,
): Promise<PathResult> {
  const engine = await openEngine(globals, overrides);
  try {
    return await engine.findChainedPath(titles);
  } finally {
    await engine.close();
  }
}

function renderResult(result: PathResult, globals: GlobalOptions): void {
  const { stats } = result;
  const summary = formatDim(
    `${formatElapsed(stats.elapsedMs)}, ${stats.fetches} fetch(es), ${stats.cacheHits} cache hit(s)`,
  );

  if (result.status === 'found') {
    process.stdout.write(formatPath(result.path) + '\n');
    if (!globals.quiet) {
      process.stderr.write(`  Found ${result.path.length - 1} link(s) in ${summary}\n`);
    }
    return;
  }

  const why =
    result.reason === 'network_unavailable'
      ? 'every request to the wiki failed'
      : 'search space exhausted';
  process.stderr.write(formatWarning(`No path found (${why})`) + '\n');
  if (!globals.quiet) {
    process.stderr.write(`  Closest: ${formatPath(result.partial)}\n`);
    process.stderr.write(`  ${summary}\n`);
  }
}
