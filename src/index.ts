#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import fs from 'fs/promises';
import { constants } from 'fs';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';

import { setupCreateCommand } from './commands/create.js';
import { setupBuildCommand } from './commands/build.js';
import { setupPackageCommand } from './commands/package.js';
import { setupExportCommand } from './commands/export.js';
import { setupInspectCommand } from './commands/inspect.js';

/**
 * hdrpack CLI - Main entry point
 *
 * Package recipe runner for header-only CMake libraries.
 */

const program = new Command();

program
  .name('hdrpack')
  .description('hdrpack - package recipes for header-only CMake libraries')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .configureHelp({ sortSubcommands: true });

// === RECIPE LIFECYCLE ===
setupCreateCommand(program);
setupBuildCommand(program);
setupPackageCommand(program);
setupExportCommand(program);
setupInspectCommand(program);

program.hook('preAction', async () => {
  const opts = program.opts<{ cwd?: string }>();

  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    try {
      const stats = await fs.stat(resolvedCwd);
      if (!stats.isDirectory()) {
        throw new Error(`'${opts.cwd}' is not a directory`);
      }
      await fs.access(resolvedCwd, constants.R_OK | constants.W_OK);
      logger.info(`Working directory will be: ${resolvedCwd}`);
    } catch (err) {
      const errMsg = err instanceof Error ? err.message : String(err);
      logger.error('Invalid --cwd provided', { error: errMsg, cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': Directory must exist, be accessible, and writable. Details: ${errMsg}`);
      process.exit(1);
    }
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', error);
  console.error('❌ An unexpected error occurred. Run with HDRPACK_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with HDRPACK_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('hdrpack')
  )) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', error);
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  });
}

export { program };
