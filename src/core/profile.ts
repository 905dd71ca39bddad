import * as path from 'path';
import type { BuildEnvironmentSettings, BuildType } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';
import { exists, readJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getDefaultProfilePath } from './directory.js';

/**
 * Build settings resolution.
 * Layers, later wins: host defaults, profile file (JSONC), HDRPACK_BUILD_TYPE,
 * then `key=value` assignments from the command line.
 */

export const SETTING_KEYS = [
  'build_type',
  'compiler',
  'compiler.version',
  'compiler.cppstd',
  'arch',
  'os'
] as const;

export type SettingKey = (typeof SETTING_KEYS)[number];

export type SettingsOverrides = Partial<Record<SettingKey, string>>;

const BUILD_TYPES: readonly BuildType[] = ['Debug', 'Release', 'RelWithDebInfo', 'MinSizeRel'];

const OS_NAMES: Record<string, string> = {
  linux: 'Linux',
  darwin: 'Macos',
  win32: 'Windows',
  freebsd: 'FreeBSD'
};

const ARCH_NAMES: Record<string, string> = {
  x64: 'x86_64',
  ia32: 'x86',
  arm64: 'armv8',
  arm: 'armv7'
};

function isSettingKey(key: string): key is SettingKey {
  return (SETTING_KEYS as readonly string[]).includes(key);
}

function isBuildType(value: string): value is BuildType {
  return (BUILD_TYPES as readonly string[]).includes(value);
}

export function hostDefaults(
  platform: string = process.platform,
  arch: string = process.arch
): BuildEnvironmentSettings {
  return {
    buildType: 'Release',
    compiler: platform === 'win32' ? 'msvc' : platform === 'darwin' ? 'apple-clang' : 'gcc',
    arch: ARCH_NAMES[arch] ?? arch,
    os: OS_NAMES[platform] ?? platform
  };
}

/**
 * Parse `-s key=value` assignments.
 */
export function parseSettingAssignments(assignments: readonly string[]): SettingsOverrides {
  const overrides: SettingsOverrides = {};
  for (const assignment of assignments) {
    const separator = assignment.indexOf('=');
    if (separator <= 0) {
      throw new ConfigError(`Invalid setting '${assignment}': expected key=value`);
    }
    const key = assignment.slice(0, separator).trim();
    const value = assignment.slice(separator + 1).trim();
    if (!isSettingKey(key)) {
      throw new ConfigError(`Unknown setting '${key}'. Known settings: ${SETTING_KEYS.join(', ')}`);
    }
    overrides[key] = value;
  }
  return overrides;
}

/**
 * Read a settings profile. The file is a flat JSONC object keyed by setting name:
 *
 * @example
 * {
 *   // toolchain for CI
 *   "build_type": "Debug",
 *   "compiler": "clang",
 *   "compiler.version": "17"
 * }
 */
export async function loadProfile(profilePath: string): Promise<SettingsOverrides> {
  const parsed = await readJsoncFile(profilePath);
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`Profile ${profilePath} must contain a JSON object`);
  }

  const overrides: SettingsOverrides = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isSettingKey(key)) {
      throw new ConfigError(`Unknown setting '${key}' in profile ${profilePath}`);
    }
    if (typeof value !== 'string' && typeof value !== 'number') {
      throw new ConfigError(`Setting '${key}' in profile ${profilePath} must be a string or number`);
    }
    overrides[key] = String(value);
  }
  logger.debug(`Loaded profile ${profilePath}`, overrides);
  return overrides;
}

export function applySettings(base: BuildEnvironmentSettings, overrides: SettingsOverrides): BuildEnvironmentSettings {
  const buildType = overrides.build_type ?? base.buildType;
  if (!isBuildType(buildType)) {
    throw new ConfigError(`Invalid build_type '${buildType}'. Expected one of: ${BUILD_TYPES.join(', ')}`);
  }

  return {
    buildType,
    compiler: overrides.compiler ?? base.compiler,
    compilerVersion: overrides['compiler.version'] ?? base.compilerVersion,
    cppstd: overrides['compiler.cppstd'] ?? base.cppstd,
    arch: overrides.arch ?? base.arch,
    os: overrides.os ?? base.os
  };
}

export interface ResolveSettingsOptions {
  /** Explicit profile; missing file is an error */
  profilePath?: string;
  cwd?: string;
  assignments?: readonly string[];
  env?: NodeJS.ProcessEnv;
  defaults?: BuildEnvironmentSettings;
}

export async function resolveBuildSettings(options: ResolveSettingsOptions = {}): Promise<BuildEnvironmentSettings> {
  const env = options.env ?? process.env;
  let settings = options.defaults ?? hostDefaults();

  if (options.profilePath) {
    const profilePath = path.resolve(options.cwd ?? process.cwd(), options.profilePath);
    if (!(await exists(profilePath))) {
      throw new ConfigError(`Profile not found: ${profilePath}`);
    }
    settings = applySettings(settings, await loadProfile(profilePath));
  } else {
    const defaultProfile = getDefaultProfilePath(env);
    if (await exists(defaultProfile)) {
      settings = applySettings(settings, await loadProfile(defaultProfile));
    }
  }

  const envBuildType = env[ENV_VARS.BUILD_TYPE];
  if (envBuildType) {
    settings = applySettings(settings, { build_type: envBuildType });
  }

  if (options.assignments && options.assignments.length > 0) {
    settings = applySettings(settings, parseSettingAssignments(options.assignments));
  }

  return Object.freeze(settings);
}
