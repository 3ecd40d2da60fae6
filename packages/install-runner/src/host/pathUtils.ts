/**
 * Shared utilities for path operations
 */

import { posix } from 'path';

/**
 * Resolve a path against the current working directory.
 * If the path is absolute, it's only normalized.
 * Host paths are POSIX on every supported host, including containers.
 */
export function resolveHostPath(path: string, cwd: string): string {
  return posix.resolve(cwd, path);
}
