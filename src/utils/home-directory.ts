/**
 * Home Directory Utilities
 *
 * Path resolution and display normalization around the user's home directory.
 */

import { homedir } from 'os';
import { resolve, normalize } from 'path';

/**
 * Get the home directory path.
 */
export function getHomeDirectory(): string {
  return homedir();
}

/**
 * Convert a path under the home directory to tilde notation for display.
 * Other paths are returned unchanged.
 */
export function normalizePathWithTilde(path: string, home: string = getHomeDirectory()): string {
  const normalizedPath = normalize(resolve(path));
  const normalizedHome = normalize(home);

  if (normalizedPath === normalizedHome) {
    return '~/';
  }

  if (normalizedPath.startsWith(normalizedHome + '/')) {
    return '~/' + normalizedPath.slice(normalizedHome.length + 1);
  }

  return normalizedPath;
}

/**
 * Expand tilde notation to the full home directory path.
 */
export function expandTilde(path: string, home: string = getHomeDirectory()): string {
  if (path === '~' || path === '~/') {
    return home;
  }

  if (path.startsWith('~/')) {
    return resolve(home, path.slice(2));
  }

  return path;
}
