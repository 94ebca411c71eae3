/**
 * CLI output formatter with picocolors
 */

import pc from 'picocolors';
import type { Title } from '../../../shared/types.js';

const PATH_SEPARATOR = ' -> ';
const GAP = '...';

let colors = pc.createColors(pc.isColorSupported);

/** --no-color, NO_COLOR and non-TTY stdout turn colors off */
export function setColorEnabled(enabled: boolean): void {
  colors = pc.createColors(enabled);
}

export function formatSuccess(message: string): string {
  return colors.green(`OK ${message}`);
}

export function formatWarning(message: string): string {
  return colors.yellow(`WARN ${message}`);
}

export function formatError(message: string): string {
  return colors.red(`Error: ${message}`);
}

export function formatHint(message: string): string {
  return colors.cyan(`Hint: ${message}`);
}

export function formatDim(text: string): string {
  return colors.dim(text);
}

export function formatBold(text: string): string {
  return colors.bold(text);
}

/** `A -> B -> C`; a null rung (unclosed gap) prints as `...` */
export function formatPath(path: ReadonlyArray<Title | null>): string {
  return path.map((t) => t ?? GAP).join(PATH_SEPARATOR);
}

export function formatElapsed(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
