/**
 * Path Utilities
 */

import path from 'path';

/**
 * Resolve a configured path: `~` against the home directory, absolute paths as-is,
 * anything else against the repository root
 */
export function resolvePath(target: string, workingDir: string, homeDir: string): string {
  if (target === '~') {
    return homeDir;
  }
  if (target.startsWith('~/')) {
    return path.join(homeDir, target.slice(2));
  }
  if (path.isAbsolute(target)) {
    return path.normalize(target);
  }
  return path.resolve(workingDir, target);
}

/**
 * Rewrite an absolute path under the home directory as `~/...`
 */
export function normalizeHomePath(absolutePath: string, homeDir: string): string {
  const relative = path.relative(homeDir, absolutePath);
  if (relative === '') {
    return '~';
  }
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    return absolutePath;
  }
  return `~/${relative.split(path.sep).join('/')}`;
}

/**
 * Sibling path used when a file is copied aside or staged next to itself
 */
export function siblingPath(filePath: string, extension: string): string {
  return `${filePath}.${extension}`;
}
