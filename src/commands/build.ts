import { Command } from 'commander';
import type { RecipeCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { addBuildOptions, addFolderOptions, executeRecipeCommand } from './recipe-options.js';

export function setupBuildCommand(program: Command): void {
  const command = program
    .command('build')
    .description('Generate the toolchain and run the configure-only pass that produces the config header');

  addBuildOptions(addFolderOptions(command))
    .action(withErrorHandling(async (options: RecipeCommandOptions, cmd: Command) => {
      await executeRecipeCommand('build', options, cmd);
    }));
}
