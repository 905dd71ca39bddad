import { Command } from 'commander';
import type { RecipeCommandOptions } from '../types/index.js';
import { throwResultError, withErrorHandling } from '../utils/errors.js';
import { runRecipePipeline } from '../core/recipe/recipe-pipeline.js';
import { displayMetadataJson, displayRunSummary, displayWarnings } from '../core/recipe/recipe-output.js';
import { resolveCommandCwd } from './recipe-options.js';

export function setupInspectCommand(program: Command): void {
  program
    .command('inspect')
    .description('Print the recipe metadata resolved from hdrpack.yml and the descriptor')
    .option('--source-folder <dir>', 'folder holding the descriptor (default: cwd)')
    .option('--json', 'print the metadata as JSON')
    .action(withErrorHandling(async (options: RecipeCommandOptions, cmd: Command) => {
      const cwd = resolveCommandCwd(cmd);
      const result = await runRecipePipeline({ ...options, command: 'inspect' }, { cwd });
      if (!result.success || !result.data) {
        throwResultError(result, 'inspect failed');
      }
      if (options.json) {
        displayMetadataJson(result.data.metadata);
        return;
      }
      displayWarnings(result.warnings);
      displayRunSummary(result.data, cwd);
    }));
}
