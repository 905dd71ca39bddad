import * as path from 'path';
import { isJunk } from 'junk';
import type { ArtifactSet } from '../../types/index.js';
import { copyFile, exists, isFile, listEntries, remove } from '../../utils/fs.js';
import { CopyError, PackageFolderInUseError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface PackagedFile {
  name: string;
  path: string;
}

export interface PackageArtifactsOptions {
  /**
   * Folder whose earlier artifacts are removed before the first copy. Any
   * entry that is not one of this set's files aborts packaging untouched.
   */
  cleanFolder?: string;
}

/**
 * Remove what an earlier run of the same artifact set left behind.
 */
async function clearPreviousArtifacts(folder: string, artifacts: ArtifactSet): Promise<void> {
  const root = path.resolve(folder);
  if (!(await exists(root))) {
    return;
  }

  const ownNames = new Set(
    artifacts
      .filter(artifact => path.dirname(path.resolve(artifact.destinationPath)) === root)
      .map(artifact => path.basename(artifact.destinationPath))
  );
  const entries = await listEntries(root);
  const foreign = entries
    .filter(entry => !(entry.isFile() && (ownNames.has(entry.name) || isJunk(entry.name))))
    .map(entry => entry.name)
    .sort();
  if (foreign.length > 0) {
    throw new PackageFolderInUseError(root, foreign);
  }

  for (const entry of entries) {
    await remove(path.join(root, entry.name));
  }
}

/**
 * Copy exactly the declared artifacts into the package folder.
 *
 * Every source is checked before the first copy. If a copy fails part way,
 * the files this call already wrote are removed again.
 */
export async function packageArtifacts(
  artifacts: ArtifactSet,
  options: PackageArtifactsOptions = {}
): Promise<PackagedFile[]> {
  for (const artifact of artifacts) {
    if (!(await isFile(artifact.sourcePath))) {
      throw new CopyError(artifact.name, artifact.sourcePath, 'source file does not exist');
    }
  }

  if (options.cleanFolder) {
    await clearPreviousArtifacts(options.cleanFolder, artifacts);
  }

  const written: PackagedFile[] = [];
  try {
    for (const artifact of artifacts) {
      await copyFile(artifact.sourcePath, artifact.destinationPath);
      written.push({ name: artifact.name, path: artifact.destinationPath });
    }
  } catch (error) {
    const failed = artifacts[written.length];
    for (const file of written) {
      await remove(file.path);
    }
    throw new CopyError(failed.name, failed.sourcePath, error instanceof Error ? error.message : String(error));
  }

  logger.info(`Packaged ${written.length} artifact(s)`);
  return written;
}
