import { Command } from 'commander';
import type { RecipeCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { addBuildOptions, addFolderOptions, executeRecipeCommand } from './recipe-options.js';

export function setupPackageCommand(program: Command): void {
  const command = program
    .command('package')
    .description(
      'Copy the declared artifacts into the package folder.\n' +
      'Expects the generated header from a previous `hdrpack build` with the same folders.'
    );

  addBuildOptions(addFolderOptions(command))
    .action(withErrorHandling(async (options: RecipeCommandOptions, cmd: Command) => {
      await executeRecipeCommand('package', options, cmd);
    }));
}
