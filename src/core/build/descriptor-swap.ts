/**
 * Scoped replacement of the source tree's descriptor.
 *
 * acquire: write the minimal descriptor, move the original to the backup
 *          name, move the minimal descriptor into place
 * release: move the in-place descriptor back to the minimal name, move the
 *          backup back, delete the minimal file, compare hashes
 *
 * `withDescriptorSwap` always pairs acquire with release.
 */

import * as path from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { exists, hashFile, remove, renamePath, writeTextFile } from '../../utils/fs.js';
import { RestoreFailureError, SourceTreeStateError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { MinimalDescriptor } from './minimal-descriptor.js';

export interface DescriptorSwapPaths {
  descriptorPath: string;
  backupPath: string;
  minimalPath: string;
}

export function getDescriptorSwapPaths(
  sourceFolder: string,
  descriptorFile: string,
  minimalFileName: string = FILE_PATTERNS.MINIMAL_DESCRIPTOR
): DescriptorSwapPaths {
  const descriptorPath = path.join(sourceFolder, descriptorFile);
  return {
    descriptorPath,
    backupPath: `${descriptorPath}${FILE_PATTERNS.DESCRIPTOR_BACKUP_SUFFIX}`,
    minimalPath: path.join(sourceFolder, minimalFileName)
  };
}

export class DescriptorSwap {
  private originalHash: string | null = null;
  private swapped = false;

  constructor(
    readonly paths: DescriptorSwapPaths,
    private readonly minimal: MinimalDescriptor
  ) {}

  get isSwapped(): boolean {
    return this.swapped;
  }

  async acquire(): Promise<void> {
    const { descriptorPath, backupPath, minimalPath } = this.paths;

    if (!(await exists(descriptorPath))) {
      throw new SourceTreeStateError(`Descriptor not found: ${descriptorPath}`, { descriptorPath });
    }
    if (await exists(backupPath)) {
      throw new SourceTreeStateError(
        `Found leftover backup ${backupPath} from an earlier run; restore it over ${descriptorPath} before retrying`,
        { descriptorPath, backupPath }
      );
    }
    if (await exists(minimalPath)) {
      throw new SourceTreeStateError(`Refusing to overwrite existing ${minimalPath}`, { minimalPath });
    }

    this.originalHash = await hashFile(descriptorPath);
    await writeTextFile(minimalPath, this.minimal.content);

    try {
      await renamePath(descriptorPath, backupPath);
    } catch (error) {
      await remove(minimalPath);
      throw error;
    }
    // From here on the original only exists under the backup name
    this.swapped = true;

    await renamePath(minimalPath, descriptorPath);
    logger.debug(`Swapped minimal descriptor into ${descriptorPath}`);
  }

  async release(): Promise<void> {
    if (!this.swapped) {
      return;
    }
    const { descriptorPath, backupPath, minimalPath } = this.paths;

    if (!(await exists(backupPath))) {
      const found = (await exists(descriptorPath))
        ? `no backup, and ${path.basename(descriptorPath)} holds the minimal descriptor`
        : 'neither the backup nor the descriptor';
      throw new RestoreFailureError(descriptorPath, {
        expected: `original descriptor at ${backupPath}`,
        found
      });
    }

    try {
      if (await exists(descriptorPath)) {
        await renamePath(descriptorPath, minimalPath);
      }
      await renamePath(backupPath, descriptorPath);
    } catch (error) {
      throw new RestoreFailureError(
        descriptorPath,
        {
          expected: `original descriptor moved back from ${backupPath}`,
          found: error instanceof Error ? error.message : String(error)
        },
        { cause: error }
      );
    }
    this.swapped = false;

    try {
      await remove(minimalPath);
    } catch (error) {
      // The original is back in place; the leftover only blocks the next acquire
      logger.warn(`Could not remove ${minimalPath}; delete it before the next run`, error);
    }

    const restoredHash = await hashFile(descriptorPath);
    if (restoredHash !== this.originalHash) {
      throw new RestoreFailureError(descriptorPath, {
        expected: `content hash ${this.originalHash}`,
        found: `content hash ${restoredHash}`
      });
    }
    logger.debug(`Restored original descriptor at ${descriptorPath}`);
  }
}

/**
 * Run `body` with the minimal descriptor in place of the original.
 *
 * Release runs on every exit path. A restore failure always wins: it is
 * raised even when the body succeeded, and when the body also failed its
 * error becomes the restore error's cause.
 */
export async function withDescriptorSwap<T>(
  paths: DescriptorSwapPaths,
  minimal: MinimalDescriptor,
  body: (swap: DescriptorSwap) => Promise<T>
): Promise<T> {
  const swap = new DescriptorSwap(paths, minimal);
  let outcome: { ok: true; value: T } | { ok: false; error: unknown };

  try {
    await swap.acquire();
    outcome = { ok: true, value: await body(swap) };
  } catch (error) {
    outcome = { ok: false, error };
  }

  try {
    await swap.release();
  } catch (restoreError) {
    if (restoreError instanceof RestoreFailureError && !outcome.ok && restoreError.cause === undefined) {
      restoreError.cause = outcome.error;
    }
    logger.error('Descriptor restore failed', restoreError);
    throw restoreError;
  }

  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.value;
}
