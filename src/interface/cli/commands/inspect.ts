/**
 * wikiladder inspect <title> - Display link metrics of a page
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { openEngine } from '../utils/open-engine.js';
import { parsePositiveInt } from '../utils/parse-options.js';
import { printJson } from '../output/json-output.js';
import { handleCommandError } from '../output/error-display.js';
import { formatBold, formatDim } from '../output/formatter.js';
import type { PageInspection } from '../../../shared/types.js';

export function inspectCommand(): Command {
  return new Command('inspect')
    .description('Display degree, popularity and redirects of a page')
    .argument('<title>', 'Page title')
    .option('--limit <n>', 'Outbound links to list', parsePositiveInt, 20)
    .action(async (title: string, options: { limit: number }, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);

      try {
        const engine = await openEngine(globals);
        let page: PageInspection;
        try {
          page = await engine.inspectPage(title, options.limit);
        } finally {
          await engine.close();
        }

        if (globals.json) {
          printJson(page);
        } else if (!globals.quiet) {
          renderPage(page);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}

function renderPage(page: PageInspection): void {
  process.stderr.write('\n');
  process.stderr.write(`  ${formatBold(page.title)}\n`);
  process.stderr.write(`  ${formatBold('Degree:')}     ${page.degree} outbound link(s)\n`);
  process.stderr.write(`  ${formatBold('Popularity:')} ${page.popularity} known backlink(s)\n`);
  process.stderr.write(
    `  ${formatBold('Redirects:')}  ${page.redirects.length > 0 ? page.redirects.join(', ') : formatDim('none')}\n`,
  );
  if (page.outbound.length > 0) {
    process.stderr.write(`  ${formatBold('Links to:')}\n`);
    for (const t of page.outbound) {
      process.stderr.write(`    - ${t}\n`);
    }
    if (page.degree > page.outbound.length) {
      process.stderr.write(`    ${formatDim(`... ${page.degree - page.outbound.length} more`)}\n`);
    }
  }
  process.stderr.write('\n');
}
