import { execFile } from 'child_process';
import { promisify } from 'util';
import type { BuildEnvironmentSettings, PackageLayout } from '../../types/index.js';
import { CONFIGURE_FLAGS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';

const execFileAsync = promisify(execFile);

export interface ConfigureRequest {
  layout: PackageLayout;
  settings: BuildEnvironmentSettings;
  toolchainFile: string;
  /** Aborted when the run is interrupted; the runner stops the child */
  signal?: AbortSignal;
}

export interface ConfigureOutcome {
  /** null when the process could not be started or was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  command: string[];
}

/**
 * Runs the external build system's configure phase. Never builds.
 */
export interface ConfigureRunner {
  configure(request: ConfigureRequest): Promise<ConfigureOutcome>;
}

export function buildConfigureArgs(request: ConfigureRequest): string[] {
  const { layout, settings, toolchainFile } = request;
  return [
    '-S',
    layout.sourceFolder,
    '-B',
    layout.buildFolder,
    `-DCMAKE_TOOLCHAIN_FILE=${toolchainFile}`,
    `-DCMAKE_BUILD_TYPE=${settings.buildType}`,
    `-D${CONFIGURE_FLAGS.ENABLE_TESTING}=OFF`,
    `-D${CONFIGURE_FLAGS.CODE_COVERAGE}=OFF`
  ];
}

interface ExecFailure {
  code?: unknown;
  stdout?: unknown;
  stderr?: unknown;
  message?: unknown;
}

function asExecFailure(error: unknown): ExecFailure {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  return {
    code: 'code' in error ? error.code : undefined,
    stdout: 'stdout' in error ? error.stdout : undefined,
    stderr: 'stderr' in error ? error.stderr : undefined,
    message: 'message' in error ? error.message : undefined
  };
}

export class CMakeConfigureRunner implements ConfigureRunner {
  constructor(private readonly executable: string = 'cmake') {}

  async configure(request: ConfigureRequest): Promise<ConfigureOutcome> {
    const args = buildConfigureArgs(request);
    const command = [this.executable, ...args];
    logger.info(`Running ${command.join(' ')}`);

    try {
      const { stdout, stderr } = await execFileAsync(this.executable, args, {
        cwd: request.layout.sourceFolder,
        maxBuffer: 16 * 1024 * 1024,
        signal: request.signal
      });
      return { exitCode: 0, stdout, stderr, command };
    } catch (error) {
      const failure = asExecFailure(error);
      // Spawn and abort errors carry a string code such as ENOENT or ABORT_ERR
      const exitCode = typeof failure.code === 'number' ? failure.code : null;
      const stderr =
        typeof failure.stderr === 'string' && failure.stderr.trim()
          ? failure.stderr
          : typeof failure.message === 'string'
            ? failure.message
            : String(error);
      return {
        exitCode,
        stdout: typeof failure.stdout === 'string' ? failure.stdout : '',
        stderr,
        command
      };
    }
  }
}
