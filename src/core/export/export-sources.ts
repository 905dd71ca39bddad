/**
 * Export snapshot: the recipe, its descriptor and every source file matched by
 * the recipe's export globs, copied with relative paths preserved.
 */

import * as path from 'path';
import { minimatch } from 'minimatch';
import type { RecipeDefinition } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { copyFile, ensureDir, remove, walkFiles } from '../../utils/fs.js';
import { RecipeValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ExportSourcesInput {
  recipe: RecipeDefinition;
  sourceFolder: string;
  exportFolder: string;
  /** Folders never scanned, e.g. build and package output */
  excludeFolders?: readonly string[];
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

export function matchesExportPatterns(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => minimatch(relativePath, pattern, { dot: false }));
}

/**
 * Copy the export set into `exportFolder`, replacing what was there.
 * Returns the exported paths relative to the source folder, sorted.
 */
export async function exportSources(input: ExportSourcesInput): Promise<string[]> {
  const sourceFolder = path.resolve(input.sourceFolder);
  const exportFolder = path.resolve(input.exportFolder);
  const fromExport = path.relative(exportFolder, sourceFolder);
  if (fromExport === '' || (!fromExport.startsWith('..') && !path.isAbsolute(fromExport))) {
    throw new RecipeValidationError(`export folder ${exportFolder} must not contain the source folder`);
  }
  const skipDirs = new Set<string>([
    exportFolder,
    ...(input.excludeFolders ?? []).map(folder => path.resolve(folder))
  ]);

  const selected = new Set<string>([toPosix(input.recipe.descriptorFile)]);
  if (input.recipe.recipePath) {
    selected.add(FILE_PATTERNS.RECIPE_YML);
  }

  let matched = 0;
  for await (const fullPath of walkFiles(sourceFolder, skipDirs)) {
    const relativePath = toPosix(path.relative(sourceFolder, fullPath));
    if (matchesExportPatterns(relativePath, input.recipe.exportsSources)) {
      selected.add(relativePath);
      matched++;
    }
  }

  if (matched === 0) {
    throw new RecipeValidationError(
      `no files in ${sourceFolder} match exports-sources (${input.recipe.exportsSources.join(', ')})`
    );
  }

  await remove(exportFolder);
  await ensureDir(exportFolder);

  const exported = [...selected].sort();
  for (const relativePath of exported) {
    await copyFile(path.join(sourceFolder, relativePath), path.join(exportFolder, relativePath));
  }

  logger.info(`Exported ${exported.length} file(s) to ${exportFolder}`);
  return exported;
}
