import { RecipeError, ErrorCodes, CommandResult } from '../types/index.js';
import { CLI_EXIT_CODES } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the recipe phases
 */

export class BuildConfigureError extends RecipeError {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, details: { exitCode: number | null; stderr?: string; command?: string[] }) {
    super(`Configure step failed: ${message}`, ErrorCodes.BUILD_CONFIGURE_FAILED, details);
    this.name = 'BuildConfigureError';
    this.exitCode = details.exitCode;
    this.stderr = details.stderr ?? '';
  }
}

/**
 * The descriptor swap could not be undone. The source tree needs manual repair.
 */
export class RestoreFailureError extends RecipeError {
  readonly severity = 'fatal' as const;
  readonly expected: string;
  readonly found: string;

  constructor(
    descriptorPath: string,
    state: { expected: string; found: string },
    options: { cause?: unknown } = {}
  ) {
    super(
      `Source tree is inconsistent: could not restore ${descriptorPath}. ` +
        `Expected ${state.expected}; found ${state.found}.`,
      ErrorCodes.RESTORE_FAILED,
      { descriptorPath, ...state }
    );
    this.name = 'RestoreFailureError';
    this.expected = state.expected;
    this.found = state.found;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class CopyError extends RecipeError {
  constructor(artifactName: string, sourcePath: string, reason: string) {
    super(`Cannot package '${artifactName}' from ${sourcePath}: ${reason}`, ErrorCodes.COPY_FAILED, {
      artifactName,
      sourcePath
    });
    this.name = 'CopyError';
  }
}

export class SourceTreeBusyError extends RecipeError {
  constructor(sourceFolder: string, holder?: string) {
    super(
      `Another run is already orchestrating ${sourceFolder}${holder ? ` (${holder})` : ''}`,
      ErrorCodes.SOURCE_TREE_BUSY,
      { sourceFolder, holder }
    );
    this.name = 'SourceTreeBusyError';
  }
}

export class SourceTreeStateError extends RecipeError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.SOURCE_TREE_STATE, details);
    this.name = 'SourceTreeStateError';
  }
}

/**
 * The package folder holds entries that are not this package's artifacts.
 */
export class PackageFolderInUseError extends RecipeError {
  constructor(packageFolder: string, foreignEntries: string[]) {
    super(
      `Package folder ${packageFolder} holds files that are not artifacts of this package ` +
        `(${foreignEntries.join(', ')}); empty it or choose another package folder`,
      ErrorCodes.PACKAGE_FOLDER_IN_USE,
      { packageFolder, foreignEntries }
    );
    this.name = 'PackageFolderInUseError';
  }
}

export class InterruptedError extends RecipeError {
  readonly signal: string;

  constructor(signal: string) {
    super(`Interrupted by ${signal}`, ErrorCodes.INTERRUPTED, { signal });
    this.name = 'InterruptedError';
    this.signal = signal;
  }
}

export class UnresolvedVersionError extends RecipeError {
  constructor(descriptorPath: string) {
    super(
      `No 'VERSION MAJOR.MINOR.PATCH' directive found in ${descriptorPath}`,
      ErrorCodes.UNRESOLVED_VERSION,
      { descriptorPath }
    );
    this.name = 'UnresolvedVersionError';
  }
}

export class RecipeValidationError extends RecipeError {
  constructor(message: string, details?: unknown) {
    super(`Invalid recipe: ${message}`, ErrorCodes.INVALID_RECIPE, details);
    this.name = 'RecipeValidationError';
  }
}

export class FileSystemError extends RecipeError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends RecipeError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult<never> {
  if (error instanceof RecipeError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message,
      errorCode: error.code
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

export function exitCodeFor(errorCode: ErrorCodes | undefined): number {
  return errorCode === ErrorCodes.RESTORE_FAILED
    ? CLI_EXIT_CODES.SOURCE_TREE_INCONSISTENT
    : CLI_EXIT_CODES.FAILURE;
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(exitCodeFor(result.errorCode));
    }
  };
}

/**
 * Re-raise a failed pipeline result inside a command action so that
 * withErrorHandling reports it with the right exit code.
 */
export function throwResultError(result: CommandResult<unknown>, fallback: string): never {
  const message = result.error || fallback;
  if (result.errorCode) {
    throw new RecipeError(message, result.errorCode);
  }
  throw new Error(message);
}
