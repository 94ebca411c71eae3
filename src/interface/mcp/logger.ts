/**
 * MCP Server logger - writes to stderr
 * stdout is reserved for MCP protocol (JSON-RPC)
 */

import { formatLogLine } from '../../shared/logger.js';

/** Unfiltered by level: server lifecycle lines always show. */
export function logToStderr(
  message: string,
  level: 'debug' | 'info' | 'warn' | 'error' = 'info',
): void {
  process.stderr.write(formatLogLine(level, `[MCP] ${message}`, []) + '\n');
}

/**
 * Intercept console.log/info to prevent accidental stdout writes
 * during MCP serve mode (stdout is reserved for JSON-RPC protocol)
 */
export function interceptConsole(): void {
  console.log = (...args: unknown[]) => {
    logToStderr(args.map(String).join(' '), 'info');
  };
  console.info = (...args: unknown[]) => {
    logToStderr(args.map(String).join(' '), 'info');
  };
  // console.warn and console.error already write to stderr
}
