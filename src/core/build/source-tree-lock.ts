import * as path from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { createExclusiveFile, readTextFile, remove } from '../../utils/fs.js';
import { SourceTreeBusyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * One orchestration per source tree at a time.
 *
 * Runs inside this process are tracked in memory; runs from other processes
 * are kept out by an exclusively created lock file in the source folder.
 */

const activeSourceTrees = new Set<string>();

export function getLockPath(sourceFolder: string): string {
  return path.join(path.resolve(sourceFolder), FILE_PATTERNS.LOCK_FILE);
}

async function describeHolder(lockPath: string): Promise<string | undefined> {
  try {
    return (await readTextFile(lockPath)).trim() || undefined;
  } catch (error) {
    logger.debug(`Could not read lock file ${lockPath}`, error);
    return undefined;
  }
}

export async function withSourceTreeLock<T>(sourceFolder: string, body: () => Promise<T>): Promise<T> {
  const key = path.resolve(sourceFolder);
  if (activeSourceTrees.has(key)) {
    throw new SourceTreeBusyError(key, 'this process');
  }
  activeSourceTrees.add(key);

  const lockPath = getLockPath(key);
  try {
    const created = await createExclusiveFile(lockPath, `pid ${process.pid} since ${new Date().toISOString()}\n`);
    if (!created) {
      throw new SourceTreeBusyError(key, await describeHolder(lockPath));
    }
    logger.debug(`Acquired source tree lock ${lockPath}`);

    try {
      return await body();
    } finally {
      try {
        await remove(lockPath);
        logger.debug(`Released source tree lock ${lockPath}`);
      } catch (error) {
        // The body's own outcome stays the one reported
        logger.warn(`Could not remove lock file ${lockPath}; delete it before the next run`, error);
      }
    }
  } finally {
    activeSourceTrees.delete(key);
  }
}
