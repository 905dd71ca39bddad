import * as path from 'path';
import type {
  ArtifactDeclaration,
  DependencyReference,
  RecipeDefinition,
  RecipeMetadata,
  RecipeYml
} from '../../types/index.js';
import { DEFAULT_FOLDERS, FILE_PATTERNS } from '../../constants/index.js';
import { exists, readTextFile } from '../../utils/fs.js';
import { parseRecipeYml } from '../../utils/recipe-yml.js';
import { RecipeValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { findCommand, parseProjectName, readKeywordArgument } from '../build/minimal-descriptor.js';
import { resolveVersion, splitDescriptorLines, UnresolvedVersionPolicy } from '../version/version-resolver.js';

export interface LoadRecipeOptions {
  onUnresolvedVersion?: UnresolvedVersionPolicy;
}

/**
 * ArffFiles -> arff-files
 */
export function toPackageName(projectName: string): string {
  return projectName
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/[^A-Za-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase();
}

/**
 * ArffFiles -> arffFiles
 */
function toLowerCamel(projectName: string): string {
  return projectName.charAt(0).toLowerCase() + projectName.slice(1);
}

export function defaultGeneratedHeader(projectName: string): string {
  return `${DEFAULT_FOLDERS.GENERATED_HEADER_DIR}/${toLowerCamel(projectName)}_config.h`;
}

export function defaultArtifacts(projectName: string, generatedHeader: string): ArtifactDeclaration[] {
  return [
    { name: 'header', from: 'source', path: `${projectName}${FILE_PATTERNS.HEADER_EXTENSION}` },
    { name: 'config-header', from: 'build', path: generatedHeader },
    { name: 'license', from: 'source', path: FILE_PATTERNS.LICENSE },
    { name: 'readme', from: 'source', path: FILE_PATTERNS.README_MD }
  ];
}

export function parseDependencyReference(reference: string): DependencyReference {
  const [name, version, ...rest] = reference.split('/');
  if (!name || !version || rest.length > 0) {
    throw new RecipeValidationError(`test requirement '${reference}' must look like name/version`);
  }
  return { name, version };
}

/**
 * Read hdrpack.yml (when present) and the descriptor, resolve the version
 * once, and freeze the metadata.
 */
export async function loadRecipe(sourceFolder: string, options: LoadRecipeOptions = {}): Promise<RecipeDefinition> {
  const root = path.resolve(sourceFolder);
  const recipePath = path.join(root, FILE_PATTERNS.RECIPE_YML);
  let yml: RecipeYml | null = null;
  if (await exists(recipePath)) {
    yml = await parseRecipeYml(recipePath);
  } else {
    logger.debug(`No ${FILE_PATTERNS.RECIPE_YML} in ${root}; deriving recipe from the descriptor`);
  }

  const descriptorFile = yml?.descriptor ?? FILE_PATTERNS.DESCRIPTOR;
  const descriptorPath = path.join(root, descriptorFile);
  if (!(await exists(descriptorPath))) {
    throw new RecipeValidationError(`descriptor not found: ${descriptorPath}`);
  }
  const descriptor = await readTextFile(descriptorPath);

  const project = findCommand(descriptor, 'project');
  const projectName = project ? parseProjectName(project) : null;
  if (!project || !projectName) {
    throw new RecipeValidationError(`${descriptorFile} has no project() command`);
  }

  const { version, resolved } = resolveVersion(splitDescriptorLines(descriptor), {
    onUnresolved: options.onUnresolvedVersion,
    sourceName: descriptorPath
  });

  const homepage = yml?.homepage ?? readKeywordArgument(project, 'HOMEPAGE_URL');
  const metadata: RecipeMetadata = Object.freeze({
    name: yml?.name ?? toPackageName(projectName),
    version,
    versionResolved: resolved,
    description: yml?.description ?? readKeywordArgument(project, 'DESCRIPTION'),
    url: yml?.url ?? homepage,
    homepage,
    license: yml?.license,
    topics: new Set(yml?.topics ?? []),
    projectName
  });

  const generatedHeader = yml?.['generated-header'] ?? defaultGeneratedHeader(projectName);

  return {
    metadata,
    recipePath: yml ? recipePath : null,
    descriptorFile,
    configSubdirectory: yml?.['config-subdirectory'] ?? DEFAULT_FOLDERS.CONFIG_SUBDIRECTORY,
    generatedHeader,
    exportsSources: yml?.['exports-sources'] ?? [
      `${projectName}${FILE_PATTERNS.HEADER_EXTENSION}`,
      FILE_PATTERNS.LICENSE,
      FILE_PATTERNS.README_MD
    ],
    artifacts: yml?.artifacts ?? defaultArtifacts(projectName, generatedHeader),
    testRequires: (yml?.['test-requires'] ?? []).map(parseDependencyReference)
  };
}
