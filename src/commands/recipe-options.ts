import { Command, Option } from 'commander';
import * as path from 'path';

import type { CommandResult, RecipeCommandOptions } from '../types/index.js';
import { throwResultError } from '../utils/errors.js';
import { runRecipePipeline, RecipeCommand, RecipeRunResult } from '../core/recipe/recipe-pipeline.js';
import { displayRunSummary, displayWarnings } from '../core/recipe/recipe-output.js';

/**
 * Options shared by the recipe commands
 */

function collectSetting(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function addFolderOptions(command: Command): Command {
  return command
    .option('--source-folder <dir>', 'folder holding the descriptor and sources (default: cwd)')
    .option('--build-folder <dir>', 'build output folder (default: <source>/build)')
    .option('--package-folder <dir>', 'package output folder');
}

export function addBuildOptions(command: Command): Command {
  return command
    .addOption(
      new Option('--context <context>', 'development (flat layout) or packaging (cache layout)')
        .choices(['development', 'packaging'])
    )
    .option('--profile <path>', 'settings profile (JSONC)')
    .option('-s, --setting <key=value>', 'override a build setting (repeatable)', collectSetting, []);
}

/**
 * Working directory for a command: the global --cwd when given.
 */
export function resolveCommandCwd(command: Command): string {
  const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
  return cwd ? path.resolve(process.cwd(), cwd) : process.cwd();
}

/**
 * Run a recipe command, print its summary and turn a failure into a thrown
 * error for withErrorHandling.
 */
export async function executeRecipeCommand(
  name: RecipeCommand,
  options: RecipeCommandOptions,
  command: Command
): Promise<CommandResult<RecipeRunResult>> {
  const cwd = resolveCommandCwd(command);
  const result = await runRecipePipeline({ ...options, command: name }, { cwd });
  displayWarnings(result.warnings);
  if (!result.success || !result.data) {
    throwResultError(result, `${name} failed`);
  }
  displayRunSummary(result.data, cwd);
  return result;
}
