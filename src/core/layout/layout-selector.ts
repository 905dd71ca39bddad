import * as path from 'path';
import type { BuildContext, BuildEnvironmentSettings, LayoutMode, PackageLayout, RecipeMetadata } from '../../types/index.js';
import { DEFAULT_FOLDERS } from '../../constants/index.js';
import { RecipeValidationError } from '../../utils/errors.js';
import { getHdrpackDirectories, getPackageCachePath } from '../directory.js';

export interface LayoutSelectionInput {
  /** Explicit context from the caller; wins over any path inference */
  context?: BuildContext;
  buildFolder?: string;
  /** Defaults to the package cache root under HDRPACK_HOME, e.g. `/home/ci/.hdrpack/p/` */
  cacheMarker?: string;
  env?: NodeJS.ProcessEnv;
}

function toPosix(folder: string): string {
  return folder.split(path.sep).join('/');
}

export function getCacheMarker(env?: NodeJS.ProcessEnv): string {
  const packages = toPosix(path.resolve(getHdrpackDirectories(env).packages));
  return packages.endsWith('/') ? packages : `${packages}/`;
}

/**
 * Decide between the flat development layout and the nested cache layout.
 *
 * An injected context decides on its own. Without one, a build folder whose
 * path contains the cache marker selects the cache layout.
 */
export function selectLayoutMode(input: LayoutSelectionInput = {}): LayoutMode {
  if (input.context) {
    return input.context === 'packaging' ? 'cache' : 'flat';
  }
  if (!input.buildFolder) {
    return 'flat';
  }
  const marker = input.cacheMarker ?? getCacheMarker(input.env);
  // Windows paths are compared with forward slashes
  return `${toPosix(input.buildFolder)}/`.includes(marker) ? 'cache' : 'flat';
}

export interface ComputeLayoutInput extends LayoutSelectionInput {
  sourceFolder: string;
  packageFolder?: string;
  metadata: RecipeMetadata;
  settings: BuildEnvironmentSettings;
}

/**
 * Resolve the three filesystem roots for a run.
 *
 * cache: <build>/build/<BuildType>, generators in <...>/generators
 * flat:  <build> for both
 */
export function computePackageLayout(input: ComputeLayoutInput): PackageLayout {
  const mode = selectLayoutMode(input);
  const sourceFolder = path.resolve(input.sourceFolder);
  const baseBuildFolder = input.buildFolder
    ? path.resolve(sourceFolder, input.buildFolder)
    : path.join(sourceFolder, DEFAULT_FOLDERS.BUILD);

  let buildFolder = baseBuildFolder;
  let generatorsFolder = baseBuildFolder;
  if (mode === 'cache') {
    buildFolder = path.join(baseBuildFolder, DEFAULT_FOLDERS.BUILD, input.settings.buildType);
    generatorsFolder = path.join(buildFolder, 'generators');
  }

  let packageFolder: string;
  if (input.packageFolder) {
    packageFolder = path.resolve(sourceFolder, input.packageFolder);
  } else if (mode === 'cache') {
    packageFolder = path.join(getPackageCachePath(input.metadata.name, input.metadata.version, input.env), 'p');
  } else {
    packageFolder = path.join(sourceFolder, DEFAULT_FOLDERS.PACKAGE);
  }

  assertDistinctRoots(sourceFolder, buildFolder, packageFolder);
  return Object.freeze({ mode, sourceFolder, buildFolder, generatorsFolder, packageFolder });
}

function isSameOrInside(child: string, parent: string): boolean {
  const relative = path.relative(parent, child);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Build and package output may live under the source folder, but never the
 * other way round, and the three roots must differ.
 */
function assertDistinctRoots(sourceFolder: string, buildFolder: string, packageFolder: string): void {
  if (isSameOrInside(sourceFolder, buildFolder)) {
    throw new RecipeValidationError(`build folder ${buildFolder} must not contain the source folder`);
  }
  if (isSameOrInside(sourceFolder, packageFolder)) {
    throw new RecipeValidationError(`package folder ${packageFolder} must not contain the source folder`);
  }
  if (isSameOrInside(packageFolder, buildFolder) || isSameOrInside(buildFolder, packageFolder)) {
    throw new RecipeValidationError(`build folder ${buildFolder} and package folder ${packageFolder} must not overlap`);
  }
}
