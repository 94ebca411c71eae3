/**
 * Engine construction shared by every command
 */

import { createWikiLadderEngine, type WikiLadderEngine } from '../../../core/engine.js';
import type { SearchOverrides } from '../../../config/types.js';
import { resolveLogLevel, type GlobalOptions } from './global-options.js';

export function openEngine(
  globals: GlobalOptions,
  overrides: SearchOverrides = {},
): Promise<WikiLadderEngine> {
  return createWikiLadderEngine(globals.cwd, {
    overrides,
    logLevel: resolveLogLevel(globals),
  });
}
