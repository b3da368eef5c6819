/**
 * Home Directory Utilities
 *
 * Path resolution relative to the home directory and tilde display.
 */

import { homedir } from 'os';
import { resolve, normalize, sep } from 'path';

export function getHomeDirectory(): string {
  return homedir();
}

/**
 * Convert a path under the home directory to tilde notation for display.
 * Other paths are returned unchanged.
 */
export function normalizePathWithTilde(path: string, homeDir: string = getHomeDirectory()): string {
  const normalizedPath = normalize(resolve(path));
  const normalizedHome = normalize(homeDir);

  if (normalizedPath === normalizedHome) {
    return '~';
  }
  if (normalizedPath.startsWith(normalizedHome + sep)) {
    return '~/' + normalizedPath.slice(normalizedHome.length + 1);
  }
  return normalizedPath;
}

/**
 * Expand a leading ~ to the home directory.
 */
export function expandTilde(path: string, homeDir: string = getHomeDirectory()): string {
  if (path === '~' || path === '~/') {
    return homeDir;
  }
  if (path.startsWith('~/')) {
    return resolve(homeDir, path.slice(2));
  }
  return path;
}
