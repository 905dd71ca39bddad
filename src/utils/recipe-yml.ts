import * as yaml from 'js-yaml';
import type { ArtifactDeclaration, ArtifactOrigin, RecipeYml } from '../types/index.js';
import { FILE_PATTERNS, PACKAGE_TYPE } from '../constants/index.js';
import { readTextFile } from './fs.js';
import { RecipeValidationError } from './errors.js';

type YamlObject = Record<string, unknown>;

function isObject(value: unknown): value is YamlObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(doc: YamlObject, key: string): string | undefined {
  const value = doc[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new RecipeValidationError(`${FILE_PATTERNS.RECIPE_YML} field '${key}' must be a string`);
  }
  return value;
}

function optionalStringList(doc: YamlObject, key: string): string[] | undefined {
  const value = doc[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || value.some(item => typeof item !== 'string')) {
    throw new RecipeValidationError(`${FILE_PATTERNS.RECIPE_YML} field '${key}' must be a list of strings`);
  }
  return value.map(item => String(item));
}

function parseArtifact(entry: unknown, index: number): ArtifactDeclaration {
  if (!isObject(entry)) {
    throw new RecipeValidationError(`artifacts[${index}] must be a mapping`);
  }
  const name = optionalString(entry, 'name');
  const from = optionalString(entry, 'from') ?? 'source';
  const artifactPath = optionalString(entry, 'path');
  if (!name || !artifactPath) {
    throw new RecipeValidationError(`artifacts[${index}] requires both 'name' and 'path'`);
  }
  if (from !== 'source' && from !== 'build') {
    throw new RecipeValidationError(`artifacts[${index}] 'from' must be 'source' or 'build' (found '${from}')`);
  }
  const origin: ArtifactOrigin = from;
  return { name, from: origin, path: artifactPath };
}

/**
 * Validate a loaded hdrpack.yml document.
 */
export function validateRecipeYml(parsed: unknown): RecipeYml {
  if (!isObject(parsed)) {
    throw new RecipeValidationError(`${FILE_PATTERNS.RECIPE_YML} must contain a mapping`);
  }

  const name = optionalString(parsed, 'name');
  if (!name) {
    throw new RecipeValidationError(`${FILE_PATTERNS.RECIPE_YML} must contain a name field`);
  }

  const packageType = optionalString(parsed, 'package-type');
  if (packageType !== undefined && packageType !== PACKAGE_TYPE) {
    throw new RecipeValidationError(`only '${PACKAGE_TYPE}' packages are supported (found '${packageType}')`);
  }

  // cmake -S only ever reads <source>/CMakeLists.txt
  const descriptor = optionalString(parsed, 'descriptor');
  if (descriptor !== undefined && descriptor !== FILE_PATTERNS.DESCRIPTOR) {
    throw new RecipeValidationError(
      `'descriptor' must be ${FILE_PATTERNS.DESCRIPTOR}, the file cmake reads from the source folder (found '${descriptor}')`
    );
  }

  const rawArtifacts = parsed.artifacts;
  let artifacts: ArtifactDeclaration[] | undefined;
  if (rawArtifacts !== undefined && rawArtifacts !== null) {
    if (!Array.isArray(rawArtifacts)) {
      throw new RecipeValidationError(`${FILE_PATTERNS.RECIPE_YML} field 'artifacts' must be a list`);
    }
    artifacts = rawArtifacts.map((entry: unknown, index: number) => parseArtifact(entry, index));
  }

  return {
    name,
    description: optionalString(parsed, 'description'),
    url: optionalString(parsed, 'url'),
    homepage: optionalString(parsed, 'homepage'),
    license: optionalString(parsed, 'license'),
    topics: optionalStringList(parsed, 'topics'),
    'package-type': packageType === undefined ? undefined : PACKAGE_TYPE,
    descriptor,
    'config-subdirectory': optionalString(parsed, 'config-subdirectory'),
    'generated-header': optionalString(parsed, 'generated-header'),
    'exports-sources': optionalStringList(parsed, 'exports-sources'),
    artifacts,
    'test-requires': optionalStringList(parsed, 'test-requires')
  };
}

/**
 * Parse hdrpack.yml file with validation
 */
export async function parseRecipeYml(recipeYmlPath: string): Promise<RecipeYml> {
  const content = await readTextFile(recipeYmlPath);
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new RecipeValidationError(`failed to parse ${recipeYmlPath}: ${error}`);
  }
  return validateRecipeYml(parsed);
}
