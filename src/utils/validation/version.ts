import * as semver from 'semver';
import type { RecipeMetadata } from '../../types/index.js';

export interface VersionValidationOptions {
  /** Context for messages (e.g., "package", "export") */
  context?: string;
}

export interface VersionValidationWarning {
  code: 'UNRESOLVED_VERSION' | 'NON_SEMVER_VERSION';
  message: string;
}

/**
 * Check a recipe's version before it is used to name package output.
 * Returns a warning object if the version is questionable, null if valid.
 */
export function validateRecipeVersion(
  metadata: RecipeMetadata,
  options: VersionValidationOptions = {}
): VersionValidationWarning | null {
  const suffix = options.context ? ` for ${options.context}` : '';

  if (!metadata.versionResolved) {
    return {
      code: 'UNRESOLVED_VERSION',
      message: `No version directive found; using placeholder version ${metadata.version}${suffix}`
    };
  }

  // e.g. "01.2.3" is a valid descriptor triple but not valid semver
  if (!semver.valid(metadata.version)) {
    return {
      code: 'NON_SEMVER_VERSION',
      message: `Version ${metadata.version} is not valid semver${suffix}`
    };
  }

  return null;
}
