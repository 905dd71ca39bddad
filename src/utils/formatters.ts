import { homedir } from 'os';
import { relative, isAbsolute, sep } from 'path';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Replace the home directory prefix with `~`. Other paths are returned unchanged.
 */
export function toTildePath(path: string, home: string = homedir()): string {
  if (path === home) {
    return '~';
  }
  if (path.startsWith(home + sep)) {
    return '~' + path.slice(home.length);
  }
  return path;
}

/**
 * Format a file system path for display to the user.
 *
 * - Paths inside cwd are shown relative to it
 * - Other paths under the home directory use tilde notation
 * - Everything else stays absolute
 *
 * @example
 * formatPathForDisplay('/work/lib/package/Foo.hpp', '/work/lib') // => 'package/Foo.hpp'
 * formatPathForDisplay('/home/me/.hdrpack/p/foo-1.0.0/p', '/work') // => '~/.hdrpack/p/foo-1.0.0/p'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd(), home: string = homedir()): string {
  if (path.startsWith('~') || !isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  return toTildePath(path, home);
}

/**
 * Format a recipe reference line, e.g. `arff-files/1.2.3`
 */
export function formatRecipeLabel(name: string, version: string): string {
  return `${name}/${version}`;
}

/**
 * Format tree connector symbols
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Format file count with appropriate description
 */
export function formatFileCount(count: number, type: string = 'files'): string {
  return `${count} ${count === 1 ? type.slice(0, -1) : type}`;
}
