import { promises as fs, constants as fsConstants, Dirent } from 'fs';
import { createHash } from 'crypto';
import { join, dirname } from 'path';
import { parse as parseJsonc, ParseError, printParseErrorCode } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Copy a file from source to destination
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  try {
    await ensureDir(dirname(dest));
    await fs.copyFile(src, dest);
    logger.debug(`Copied file: ${src} -> ${dest}`);
  } catch (error) {
    throw new FileSystemError(`Failed to copy file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    const stats = await fs.stat(path);
    if (stats.isDirectory()) {
      await fs.rm(path, { recursive: true });
    } else {
      await fs.unlink(path);
    }
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      // File doesn't exist, which is fine
      return;
    }
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * List the entries of a directory (non-recursive)
 */
export async function listEntries(dirPath: string): Promise<Dirent[]> {
  try {
    return await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(`Failed to list directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Rename a file or directory
 */
export async function renamePath(srcPath: string, destPath: string): Promise<void> {
  try {
    await fs.rename(srcPath, destPath);
    logger.debug(`Renamed: ${srcPath} -> ${destPath}`);
  } catch (error) {
    throw new FileSystemError(`Failed to rename: ${srcPath} -> ${destPath}`, { srcPath, destPath, error });
  }
}

/**
 * Create a file only if nothing exists at the path.
 * Returns false when the path is already taken.
 */
export async function createExclusiveFile(path: string, content: string): Promise<boolean> {
  try {
    await fs.writeFile(path, content, { encoding: 'utf8', flag: 'wx' });
    return true;
  } catch (error) {
    if (errorCode(error) === 'EEXIST') {
      return false;
    }
    throw new FileSystemError(`Failed to create file: ${path}`, { path, error });
  }
}

/**
 * sha256 of a file's bytes, hex encoded
 */
export async function hashFile(path: string): Promise<string> {
  try {
    const content = await fs.readFile(path);
    return createHash('sha256').update(content).digest('hex');
  } catch (error) {
    throw new FileSystemError(`Failed to hash file: ${path}`, { path, error });
  }
}

/**
 * Recursively walk through a directory and yield all files.
 * Directories whose absolute path is in `skipDirs` are not entered.
 */
export async function* walkFiles(dirPath: string, skipDirs: ReadonlySet<string> = new Set()): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(`Failed to walk directory: ${dirPath}`, { dirPath, error });
  }

  for (const entry of entries) {
    // Filter out junk files like .DS_Store, Thumbs.db, etc.
    if (isJunk(entry.name)) {
      continue;
    }

    const fullPath = join(dirPath, entry.name);
    if (entry.isFile()) {
      yield fullPath;
    } else if (entry.isDirectory() && !skipDirs.has(fullPath)) {
      yield* walkFiles(fullPath, skipDirs);
    }
  }
}

/**
 * Read a JSONC file (JSON with Comments) and parse it.
 * The JSONC parser also handles standard JSON files.
 */
export async function readJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new FileSystemError(
      `Failed to parse JSONC file: ${path} (${printParseErrorCode(first.error)} at offset ${first.offset})`,
      { path, errors }
    );
  }
  return result;
}
