/**
 * Shared constants for the hdrpack CLI
 * Single source of truth for file names, directory names and markers.
 */

export const DIR_PATTERNS = {
  HDRPACK: '.hdrpack'
} as const;

export const FILE_PATTERNS = {
  RECIPE_YML: 'hdrpack.yml',
  DESCRIPTOR: 'CMakeLists.txt',
  DESCRIPTOR_BACKUP_SUFFIX: '.hdrpack-backup',
  MINIMAL_DESCRIPTOR: 'CMakeLists.minimal.txt',
  LOCK_FILE: '.hdrpack.lock',
  TOOLCHAIN: 'hdrpack_toolchain.cmake',
  DEPS: 'hdrpack_deps.cmake',
  LICENSE: 'LICENSE',
  README_MD: 'README.md',
  HEADER_EXTENSION: '.hpp',
  PROFILE_EXTENSION: '.jsonc'
} as const;

export const HDRPACK_DIRS = {
  PROFILES: 'profiles',
  PACKAGES: 'p',
  DEPS: 'deps'
} as const;

/**
 * Default folders relative to the source folder for development builds.
 */
export const DEFAULT_FOLDERS = {
  BUILD: 'build',
  PACKAGE: 'package',
  EXPORT: 'export',
  CONFIG_SUBDIRECTORY: 'config',
  GENERATED_HEADER_DIR: 'configured_files/include'
} as const;

export const UNRESOLVED_VERSION = 'X.X.X';

export const PACKAGE_TYPE = 'header-library' as const;

export const CONFIGURE_FLAGS = {
  ENABLE_TESTING: 'ENABLE_TESTING',
  CODE_COVERAGE: 'CODE_COVERAGE'
} as const;

export const ENV_VARS = {
  HOME: 'HDRPACK_HOME',
  VERBOSE: 'HDRPACK_VERBOSE',
  BUILD_TYPE: 'HDRPACK_BUILD_TYPE'
} as const;

export const CLI_EXIT_CODES = {
  FAILURE: 1,
  SOURCE_TREE_INCONSISTENT: 2
} as const;

/**
 * 128 + signal number, as shells report a signal exit.
 */
export const SIGNAL_EXIT_CODES = {
  SIGINT: 130,
  SIGTERM: 143
} as const;
