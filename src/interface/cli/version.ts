/**
 * Version utility - reads version from package.json
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

let cachedVersion: string | null = null;

/** Nearest package.json above `dir` (src/ and dist/src/ sit at different depths). */
function findPackageJson(dir: string): string | null {
  let current = dir;
  for (;;) {
    const candidate = join(current, 'package.json');
    if (existsSync(candidate)) return candidate;
    const parent = dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  const pkgPath = findPackageJson(dirname(fileURLToPath(import.meta.url)));
  if (!pkgPath) return '0.0.0';

  const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
  cachedVersion =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
      ? pkg.version
      : '0.0.0';
  return cachedVersion;
}
