/**
 * 3-layer error display: Error / Cause / Hint
 */

import { formatDim, formatError, formatHint } from './formatter.js';
import { printJsonError } from './json-output.js';
import type { GlobalOptions } from '../utils/global-options.js';
import { WikiLadderError } from '../../../shared/errors.js';

export interface ErrorDisplay {
  message: string;
  code?: string;
  cause?: string;
  hint?: string;
  stack?: string;
  /** process exit code; 2 for configuration problems */
  exitCode?: number;
}

const CONFIG_CODES: ReadonlySet<string> = new Set(['CONFIG_ERROR', 'INVALID_SEARCH_CONFIG']);

export function toErrorDisplay(error: unknown): ErrorDisplay {
  if (error instanceof WikiLadderError) {
    return {
      message: error.message,
      code: error.code,
      cause: error.cause?.message,
      hint: getHintForCode(error.code),
      stack: error.stack,
      exitCode: CONFIG_CODES.has(error.code) ? 2 : 1,
    };
  }
  if (error instanceof Error) {
    return {
      message: error.message,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

export function getHintForCode(code: string): string | undefined {
  switch (code) {
    case 'CONFIG_ERROR':
      return "Check your .wikiladder/config.json file, or run 'wikiladder init' to recreate it.";
    case 'INVALID_SEARCH_CONFIG':
      return 'Use query limits of 1-500 and an anchor threshold of at most 500 x the query limit.';
    case 'TRANSPORT_ERROR':
      return 'Check your network connection and wiki.domain in .wikiladder/config.json.';
    case 'DATABASE_ERROR':
      return "Run 'wikiladder cache clear' or delete .wikiladder/links.db.";
    case 'INVALID_TITLE':
      return 'Titles must not be empty or contain any of { } < > [ ] |.';
    case 'INVALID_INPUT':
      return "Run 'wikiladder --help' for usage.";
    case 'LADDER_ERROR':
      return 'Rerun with --verbose and report the output.';
    default:
      return undefined;
  }
}

export function renderError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): void {
  if (globals.json) {
    printJsonError({
      message: error.message,
      code: error.code,
      cause: error.cause,
      hint: error.hint,
    });
    return;
  }

  const lines: string[] = [];
  lines.push(formatError(error.message));

  if (error.cause) {
    lines.push(`  Cause: ${error.cause}`);
  }

  if (error.hint) {
    lines.push(`  ${formatHint(error.hint)}`);
  }

  if (globals.verbose && error.stack) {
    lines.push('');
    lines.push(formatDim(error.stack));
  }

  process.stderr.write(lines.join('\n') + '\n');
}

export function exitWithError(
  error: ErrorDisplay,
  globals: GlobalOptions,
): never {
  renderError(error, globals);
  process.exit(error.exitCode ?? 1);
}

export function handleCommandError(error: unknown, globals: GlobalOptions): never {
  const display = toErrorDisplay(error);
  exitWithError(display, globals);
}
