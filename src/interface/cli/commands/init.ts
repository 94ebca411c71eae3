/**
 * wikiladder init - Write .wikiladder/config.json with defaults
 */

import { Command } from 'commander';
import { resolveGlobalOptions } from '../utils/global-options.js';
import { printJson } from '../output/json-output.js';
import { exitWithError, handleCommandError } from '../output/error-display.js';
import { formatSuccess, formatBold } from '../output/formatter.js';
import { configExists, resolveConfigPath, saveConfig } from '../../../config/config.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import type { WikiLadderConfig } from '../../../config/types.js';

interface InitOptions {
  domain: string;
  homeTitle: string;
  force: boolean;
}

export function initCommand(): Command {
  return new Command('init')
    .description('Write .wikiladder/config.json with default settings')
    .option('--domain <host>', 'Wiki to search', DEFAULT_CONFIG.wiki.domain)
    .option('--home-title <title>', 'Main page of the wiki', DEFAULT_CONFIG.wiki.home_title)
    .option('-f, --force', 'Overwrite an existing config', false)
    .action((options: InitOptions, cmd: Command) => {
      const globals = resolveGlobalOptions(cmd);
      const configPath = resolveConfigPath(globals.cwd);

      if (configExists(globals.cwd) && !options.force) {
        exitWithError(
          {
            message: 'Project already initialized',
            cause: `${configPath} exists`,
            hint: "Run 'wikiladder init --force' to overwrite it",
          },
          globals,
        );
      }

      try {
        const config: WikiLadderConfig = {
          ...DEFAULT_CONFIG,
          wiki: {
            ...DEFAULT_CONFIG.wiki,
            domain: options.domain,
            home_title: options.homeTitle,
          },
        };
        saveConfig(globals.cwd, config);

        if (globals.json) {
          printJson({ config_path: configPath, config });
        } else if (!globals.quiet) {
          process.stderr.write(formatSuccess('Project initialized') + '\n');
          process.stderr.write(`  ${formatBold('Config:')} ${configPath}\n`);
          process.stderr.write(`  ${formatBold('Wiki:')}   ${config.wiki.domain}\n`);
        }
      } catch (error) {
        handleCommandError(error, globals);
      }
    });
}
