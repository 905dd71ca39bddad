import * as path from 'path';
import type { BuildEnvironmentSettings, PackageLayout, RecipeDefinition } from '../../types/index.js';
import { ensureDir, exists, readTextFile } from '../../utils/fs.js';
import { BuildConfigureError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CMakeConfigureRunner, ConfigureRunner } from './configure-runner.js';
import { getDescriptorSwapPaths, withDescriptorSwap } from './descriptor-swap.js';
import { withDeferredInterrupts } from './interrupt-guard.js';
import { synthesizeMinimalDescriptor } from './minimal-descriptor.js';
import { withSourceTreeLock } from './source-tree-lock.js';

export interface OrchestrateInput {
  recipe: RecipeDefinition;
  layout: PackageLayout;
  settings: BuildEnvironmentSettings;
  toolchainFile: string;
  runner?: ConfigureRunner;
}

export interface OrchestrationResult {
  generatedHeaderPath: string;
  command: string[];
}

export function getGeneratedHeaderPath(recipe: RecipeDefinition, layout: PackageLayout): string {
  return path.join(layout.buildFolder, recipe.generatedHeader);
}

/**
 * Configure-only pass against a minimal descriptor.
 *
 * Holds the source tree lock for the whole cycle. The descriptor is restored
 * before any configure failure is raised; a restore failure replaces it.
 * SIGINT and SIGTERM stop the configure child but take effect only after the
 * descriptor and the lock are back in order.
 */
export async function orchestrateConfigure(input: OrchestrateInput): Promise<OrchestrationResult> {
  const { recipe, layout, settings, toolchainFile } = input;
  const runner = input.runner ?? new CMakeConfigureRunner();
  const swapPaths = getDescriptorSwapPaths(layout.sourceFolder, recipe.descriptorFile);

  return withDeferredInterrupts(signal =>
    withSourceTreeLock(layout.sourceFolder, async () => {
      const original = await readTextFile(swapPaths.descriptorPath);
      const minimal = synthesizeMinimalDescriptor(original, recipe.configSubdirectory);
      await ensureDir(layout.buildFolder);

      const result = await withDescriptorSwap(swapPaths, minimal, async () => {
        const outcome = await runner.configure({ layout, settings, toolchainFile, signal });
        if (outcome.exitCode !== 0) {
          throw new BuildConfigureError(
            `${outcome.command.join(' ')} exited with ${outcome.exitCode ?? 'no exit code'}`,
            { exitCode: outcome.exitCode, stderr: outcome.stderr, command: outcome.command }
          );
        }

        const generatedHeaderPath = getGeneratedHeaderPath(recipe, layout);
        if (!(await exists(generatedHeaderPath))) {
          throw new BuildConfigureError(`no generated header at ${generatedHeaderPath}`, {
            exitCode: outcome.exitCode,
            stderr: outcome.stderr,
            command: outcome.command
          });
        }
        return { generatedHeaderPath, command: outcome.command };
      });

      logger.info(`Configured ${recipe.metadata.name}; generated ${result.generatedHeaderPath}`);
      return result;
    })
  );
}
