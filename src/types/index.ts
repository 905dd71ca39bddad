/**
 * Common types and interfaces for the hdrpack recipe runner
 */

// Recipe types

/**
 * Immutable recipe metadata. Built once by the recipe loader and passed
 * read-only to every later phase.
 */
export interface RecipeMetadata {
  readonly name: string;
  /** Resolved `MAJOR.MINOR.PATCH` triple, or the unresolved placeholder */
  readonly version: string;
  readonly versionResolved: boolean;
  readonly description?: string;
  readonly url?: string;
  readonly homepage?: string;
  readonly license?: string;
  readonly topics: ReadonlySet<string>;
  /** Project name taken from the descriptor's `project()` command */
  readonly projectName: string;
}

export type ArtifactOrigin = 'source' | 'build';

export interface ArtifactDeclaration {
  name: string;
  from: ArtifactOrigin;
  /** Path relative to the source folder or to the build folder */
  path: string;
}

// hdrpack.yml file types
export interface RecipeYml {
  name: string;
  description?: string;
  url?: string;
  homepage?: string;
  license?: string;
  topics?: string[];
  'package-type'?: 'header-library';
  descriptor?: string;
  'config-subdirectory'?: string;
  'generated-header'?: string;
  'exports-sources'?: string[];
  artifacts?: ArtifactDeclaration[];
  'test-requires'?: string[];
}

/**
 * Recipe file plus the defaults it leaves out, resolved against a source folder.
 */
export interface RecipeDefinition {
  metadata: RecipeMetadata;
  recipePath: string | null;
  descriptorFile: string;
  configSubdirectory: string;
  generatedHeader: string;
  exportsSources: string[];
  artifacts: ArtifactDeclaration[];
  testRequires: DependencyReference[];
}

export interface DependencyReference {
  name: string;
  version: string;
}

// Build environment

export type BuildType = 'Debug' | 'Release' | 'RelWithDebInfo' | 'MinSizeRel';

export interface BuildEnvironmentSettings {
  readonly buildType: BuildType;
  readonly compiler: string;
  readonly compilerVersion?: string;
  readonly cppstd?: string;
  readonly arch: string;
  readonly os: string;
}

/**
 * Who is running the recipe: a developer in their checkout, or the package
 * cache building a package for consumers.
 */
export type BuildContext = 'development' | 'packaging';

export type LayoutMode = 'flat' | 'cache';

export interface PackageLayout {
  readonly mode: LayoutMode;
  readonly sourceFolder: string;
  readonly buildFolder: string;
  readonly generatorsFolder: string;
  readonly packageFolder: string;
}

// Packaging

export interface ArtifactEntry {
  readonly name: string;
  readonly sourcePath: string;
  readonly destinationPath: string;
}

export type ArtifactSet = readonly ArtifactEntry[];

export interface PackageInfo {
  readonly name: string;
  readonly version: string;
  readonly packageType: 'header-library';
  readonly bindirs: readonly string[];
  readonly libdirs: readonly string[];
  readonly includedirs: readonly string[];
}

// Command types

export interface RecipeCommandOptions {
  sourceFolder?: string;
  buildFolder?: string;
  packageFolder?: string;
  exportFolder?: string;
  context?: BuildContext;
  profile?: string;
  setting?: string[];
  json?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  errorCode?: ErrorCodes;
  warnings?: string[];
}

// Error types
export enum ErrorCodes {
  BUILD_CONFIGURE_FAILED = 'BUILD_CONFIGURE_FAILED',
  RESTORE_FAILED = 'RESTORE_FAILED',
  COPY_FAILED = 'COPY_FAILED',
  SOURCE_TREE_BUSY = 'SOURCE_TREE_BUSY',
  SOURCE_TREE_STATE = 'SOURCE_TREE_STATE',
  UNRESOLVED_VERSION = 'UNRESOLVED_VERSION',
  INVALID_RECIPE = 'INVALID_RECIPE',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  PACKAGE_FOLDER_IN_USE = 'PACKAGE_FOLDER_IN_USE',
  INTERRUPTED = 'INTERRUPTED'
}

export class RecipeError extends Error {
  public code: ErrorCodes;
  public details?: unknown;

  constructor(message: string, code: ErrorCodes, details?: unknown) {
    super(message);
    this.name = 'RecipeError';
    this.code = code;
    this.details = details;
  }
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
