import * as os from 'os';
import * as path from 'path';
import { DIR_PATTERNS, ENV_VARS, FILE_PATTERNS, HDRPACK_DIRS } from '../constants/index.js';

/**
 * hdrpack home directory resolution.
 *
 * Uses ~/.hdrpack on all platforms (like AWS CLI with ~/.aws); `HDRPACK_HOME`
 * replaces the whole root.
 */

export interface HdrpackDirectories {
  root: string;
  profiles: string;
  packages: string;
  deps: string;
}

export function getHdrpackDirectories(env: NodeJS.ProcessEnv = process.env): HdrpackDirectories {
  const root = env[ENV_VARS.HOME] || path.join(os.homedir(), DIR_PATTERNS.HDRPACK);

  return {
    root,
    profiles: path.join(root, HDRPACK_DIRS.PROFILES),
    packages: path.join(root, HDRPACK_DIRS.PACKAGES),
    deps: path.join(root, HDRPACK_DIRS.DEPS)
  };
}

export function getDefaultProfilePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getHdrpackDirectories(env).profiles, `default${FILE_PATTERNS.PROFILE_EXTENSION}`);
}

/**
 * Cache folder for one package reference: <root>/p/<name>-<version>
 */
export function getPackageCachePath(name: string, version: string, env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getHdrpackDirectories(env).packages, `${name}-${version}`);
}

export function getDependencyRoot(name: string, version: string, env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getHdrpackDirectories(env).deps, name, version);
}
