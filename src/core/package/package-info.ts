import type { PackageInfo, RecipeMetadata } from '../../types/index.js';
import { PACKAGE_TYPE } from '../../constants/index.js';

/**
 * What downstream consumers see: a header-only package with no binaries or
 * libraries and the package root as its only include directory.
 */
export function publishPackageInfo(metadata: RecipeMetadata): PackageInfo {
  return Object.freeze({
    name: metadata.name,
    version: metadata.version,
    packageType: PACKAGE_TYPE,
    bindirs: Object.freeze([]),
    libdirs: Object.freeze([]),
    includedirs: Object.freeze(['.'])
  });
}
