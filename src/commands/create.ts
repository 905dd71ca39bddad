import { Command } from 'commander';
import type { RecipeCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { addBuildOptions, addFolderOptions, executeRecipeCommand } from './recipe-options.js';

export function setupCreateCommand(program: Command): void {
  const command = program
    .command('create')
    .description(
      'Run the whole recipe: resolve the version, generate the toolchain, configure,\n' +
      'and assemble the package folder.\n' +
      'Usage:\n' +
      '  hdrpack create                          # development layout under ./build and ./package\n' +
      '  hdrpack create --context packaging      # cache layout under ~/.hdrpack/p'
    );

  addBuildOptions(addFolderOptions(command))
    .action(withErrorHandling(async (options: RecipeCommandOptions, cmd: Command) => {
      await executeRecipeCommand('create', options, cmd);
    }));
}
