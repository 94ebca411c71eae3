/**
 * CLI entry point - creates the commander.js program with all commands
 */

import { Command } from 'commander';
import { addGlobalOptions, resolveGlobalOptions } from './utils/global-options.js';
import { setColorEnabled } from './output/formatter.js';
import { findCommand } from './commands/find.js';
import { inspectCommand } from './commands/inspect.js';
import { initCommand } from './commands/init.js';
import { cacheCommand } from './commands/cache.js';
import { serveCommand } from './commands/serve.js';
import { versionCommand } from './commands/version.js';
import { getVersion } from './version.js';

export function createCli(): Command {
  const program = new Command('wikiladder')
    .description('Find chains of article links between wiki pages')
    .version(getVersion(), '-V, --version');

  addGlobalOptions(program);
  program.hook('preAction', (_program, actionCommand) => {
    setColorEnabled(!resolveGlobalOptions(actionCommand).noColor);
  });

  program.addCommand(findCommand());
  program.addCommand(inspectCommand());
  program.addCommand(initCommand());
  program.addCommand(cacheCommand());
  program.addCommand(serveCommand());
  program.addCommand(versionCommand());

  return program;
}
