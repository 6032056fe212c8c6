/**
 * Package root lookup
 *
 * config.defaults.yaml sits at the package root, next to config.yaml and the
 * default log file. The root is the nearest directory above this module that
 * holds it, so the same lookup works from src/ and from dist/src/.
 */

import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, isAbsolute, join } from 'path';

export const DEFAULTS_FILE = 'config.defaults.yaml';

export function findPackageRoot(startDir: string): string | null {
  let dir = startDir;
  for (;;) {
    if (existsSync(join(dir, DEFAULTS_FILE))) return dir;
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

export const PACKAGE_ROOT = findPackageRoot(dirname(fileURLToPath(import.meta.url))) ?? process.cwd();

/** Resolve a config-relative path against the package root. */
export function resolvePackagePath(path: string): string {
  return isAbsolute(path) ? path : join(PACKAGE_ROOT, path);
}
