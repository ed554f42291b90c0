/**
 * Filesystem path helpers for socket endpoints.
 *
 * @module utils/paths
 */

import { homedir } from 'os';
import { resolve } from 'path';

/**
 * Expands a leading `~` to the user's home directory.
 *
 * Paths without a tilde are returned untouched, relative or not.
 */
export function expandPath(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return path;
}
