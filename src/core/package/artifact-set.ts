import * as path from 'path';
import type { ArtifactDeclaration, ArtifactSet, PackageLayout } from '../../types/index.js';
import { RecipeValidationError } from '../../utils/errors.js';

/**
 * Resolve declared artifacts against a layout. Destinations are flattened to
 * the package folder root, so two artifacts may not share a file name.
 */
export function buildArtifactSet(
  declarations: readonly ArtifactDeclaration[],
  layout: PackageLayout
): ArtifactSet {
  const seen = new Map<string, string>();

  const entries = declarations.map(declaration => {
    const root = declaration.from === 'build' ? layout.buildFolder : layout.sourceFolder;
    const fileName = path.basename(declaration.path);
    const previous = seen.get(fileName);
    if (previous) {
      throw new RecipeValidationError(
        `artifacts '${previous}' and '${declaration.name}' both flatten to ${fileName}`
      );
    }
    seen.set(fileName, declaration.name);

    return Object.freeze({
      name: declaration.name,
      sourcePath: path.resolve(root, declaration.path),
      destinationPath: path.join(layout.packageFolder, fileName)
    });
  });

  return Object.freeze(entries);
}
