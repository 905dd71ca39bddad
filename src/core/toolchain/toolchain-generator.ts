/**
 * Toolchain and dependency descriptors for the external build system.
 * Writes files only; CMake is never invoked here.
 */

import * as path from 'path';
import type {
  BuildEnvironmentSettings,
  DependencyReference,
  PackageLayout,
  RecipeMetadata
} from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { getDependencyRoot } from '../directory.js';
import { hostDefaults } from '../profile.js';

const CXX_COMPILERS: Record<string, string> = {
  gcc: 'g++',
  clang: 'clang++',
  'apple-clang': 'clang++',
  msvc: 'cl'
};

const CMAKE_SYSTEM_NAMES: Record<string, string> = {
  Macos: 'Darwin'
};

export interface GeneratedToolchainFiles {
  toolchainPath: string;
  depsPath: string;
}

export interface ToolchainInput {
  metadata: RecipeMetadata;
  settings: BuildEnvironmentSettings;
  layout: PackageLayout;
  testRequires: readonly DependencyReference[];
  env?: NodeJS.ProcessEnv;
  host?: BuildEnvironmentSettings;
}

function toCMakePath(value: string): string {
  return value.split(path.sep).join('/');
}

/**
 * `17` and `gnu17` both select C++17; the gnu form also turns on extensions.
 */
function parseCppStd(cppstd: string): { standard: string; extensions: boolean } {
  return cppstd.startsWith('gnu')
    ? { standard: cppstd.slice(3), extensions: true }
    : { standard: cppstd, extensions: false };
}

export function renderToolchain(input: ToolchainInput): string {
  const { metadata, settings } = input;
  const host = input.host ?? hostDefaults();
  const lines = [
    `# hdrpack toolchain for ${metadata.name}/${metadata.version}. Do not edit.`,
    `set(CMAKE_BUILD_TYPE "${settings.buildType}" CACHE STRING "Build type" FORCE)`,
    `set(CMAKE_CXX_COMPILER "${CXX_COMPILERS[settings.compiler] ?? settings.compiler}")`
  ];

  if (settings.cppstd) {
    const { standard, extensions } = parseCppStd(settings.cppstd);
    lines.push(`set(CMAKE_CXX_STANDARD ${standard})`);
    lines.push('set(CMAKE_CXX_STANDARD_REQUIRED ON)');
    lines.push(`set(CMAKE_CXX_EXTENSIONS ${extensions ? 'ON' : 'OFF'})`);
  }

  if (settings.os !== host.os || settings.arch !== host.arch) {
    lines.push(`set(CMAKE_SYSTEM_NAME ${CMAKE_SYSTEM_NAMES[settings.os] ?? settings.os})`);
    lines.push(`set(CMAKE_SYSTEM_PROCESSOR ${settings.arch})`);
  }

  lines.push(`include("\${CMAKE_CURRENT_LIST_DIR}/${FILE_PATTERNS.DEPS}")`);
  return lines.join('\n') + '\n';
}

export function renderDeps(input: ToolchainInput): string {
  const lines = [`# hdrpack dependencies for ${input.metadata.name}/${input.metadata.version}. Do not edit.`];
  for (const dependency of input.testRequires) {
    const root = toCMakePath(getDependencyRoot(dependency.name, dependency.version, input.env));
    lines.push(`set(${dependency.name}_REQUESTED_VERSION "${dependency.version}")`);
    lines.push(`list(PREPEND CMAKE_PREFIX_PATH "${root}")`);
  }
  return lines.join('\n') + '\n';
}

export async function generateToolchainFiles(input: ToolchainInput): Promise<GeneratedToolchainFiles> {
  const toolchainPath = path.join(input.layout.generatorsFolder, FILE_PATTERNS.TOOLCHAIN);
  const depsPath = path.join(input.layout.generatorsFolder, FILE_PATTERNS.DEPS);

  await writeTextFile(toolchainPath, renderToolchain(input));
  await writeTextFile(depsPath, renderDeps(input));

  logger.info(`Generated ${FILE_PATTERNS.TOOLCHAIN} and ${FILE_PATTERNS.DEPS} in ${input.layout.generatorsFolder}`);
  return { toolchainPath, depsPath };
}
