import { Command } from 'commander';
import type { RecipeCommandOptions } from '../types/index.js';
import { withErrorHandling } from '../utils/errors.js';
import { addFolderOptions, executeRecipeCommand } from './recipe-options.js';

export function setupExportCommand(program: Command): void {
  const command = program
    .command('export')
    .description('Snapshot the recipe, descriptor and exports-sources files into an export folder')
    .option('--export-folder <dir>', 'destination (default: <source>/export; replaced on each run)');

  addFolderOptions(command)
    .action(withErrorHandling(async (options: RecipeCommandOptions, cmd: Command) => {
      await executeRecipeCommand('export', options, cmd);
    }));
}
