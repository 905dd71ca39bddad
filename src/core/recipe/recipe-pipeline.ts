import * as path from 'path';

import type {
  BuildEnvironmentSettings,
  CommandResult,
  PackageInfo,
  PackageLayout,
  RecipeCommandOptions,
  RecipeDefinition,
  RecipeMetadata
} from '../../types/index.js';
import { DEFAULT_FOLDERS } from '../../constants/index.js';
import { handleError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { validateRecipeVersion } from '../../utils/validation/version.js';
import { computePackageLayout } from '../layout/layout-selector.js';
import { resolveBuildSettings } from '../profile.js';
import { generateToolchainFiles, GeneratedToolchainFiles } from '../toolchain/toolchain-generator.js';
import { orchestrateConfigure } from '../build/build-orchestrator.js';
import type { ConfigureRunner } from '../build/configure-runner.js';
import { buildArtifactSet } from '../package/artifact-set.js';
import { packageArtifacts, PackagedFile } from '../package/packager.js';
import { publishPackageInfo } from '../package/package-info.js';
import { exportSources } from '../export/export-sources.js';
import type { UnresolvedVersionPolicy } from '../version/version-resolver.js';
import { loadRecipe } from './recipe-loader.js';

export type RecipeCommand = 'create' | 'build' | 'package' | 'export' | 'inspect';

export type RecipePhase = 'resolve' | 'layout' | 'generate' | 'build' | 'package' | 'package-info' | 'export';

export const COMMAND_PHASES: Readonly<Record<RecipeCommand, readonly RecipePhase[]>> = {
  create: ['resolve', 'layout', 'generate', 'build', 'package', 'package-info'],
  build: ['resolve', 'layout', 'generate', 'build'],
  package: ['resolve', 'layout', 'package', 'package-info'],
  export: ['resolve', 'export'],
  inspect: ['resolve']
};

export interface RecipePipelineOptions extends RecipeCommandOptions {
  command: RecipeCommand;
  /** Skips profile resolution when given */
  settings?: BuildEnvironmentSettings;
  onUnresolvedVersion?: UnresolvedVersionPolicy;
}

export interface RecipePipelineDeps {
  runner?: ConfigureRunner;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface RecipeRunResult {
  command: RecipeCommand;
  phases: RecipePhase[];
  metadata: RecipeMetadata;
  settings?: BuildEnvironmentSettings;
  layout?: PackageLayout;
  toolchain?: GeneratedToolchainFiles;
  generatedHeaderPath?: string;
  packagedFiles?: PackagedFile[];
  packageInfo?: PackageInfo;
  exportFolder?: string;
  exportedFiles?: string[];
}

async function resolveSettings(
  options: RecipePipelineOptions,
  deps: RecipePipelineDeps
): Promise<BuildEnvironmentSettings> {
  if (options.settings) {
    return options.settings;
  }
  return resolveBuildSettings({
    profilePath: options.profile,
    cwd: deps.cwd,
    assignments: options.setting,
    env: deps.env
  });
}

async function runExport(
  recipe: RecipeDefinition,
  sourceFolder: string,
  options: RecipePipelineOptions
): Promise<{ exportFolder: string; exportedFiles: string[] }> {
  const exportFolder = path.resolve(sourceFolder, options.exportFolder ?? DEFAULT_FOLDERS.EXPORT);
  const exportedFiles = await exportSources({
    recipe,
    sourceFolder,
    exportFolder,
    excludeFolders: [
      path.resolve(sourceFolder, options.buildFolder ?? DEFAULT_FOLDERS.BUILD),
      path.resolve(sourceFolder, options.packageFolder ?? DEFAULT_FOLDERS.PACKAGE)
    ]
  });
  return { exportFolder, exportedFiles };
}

/**
 * Run the phases of one recipe command in order.
 *
 * Each phase is awaited before the next starts. The first failure ends the
 * run and is reported through the returned CommandResult.
 */
export async function runRecipePipeline(
  options: RecipePipelineOptions,
  deps: RecipePipelineDeps = {}
): Promise<CommandResult<RecipeRunResult>> {
  const cwd = deps.cwd ?? process.cwd();
  const phases = COMMAND_PHASES[options.command];
  const has = (phase: RecipePhase): boolean => phases.includes(phase);
  const warnings: string[] = [];

  try {
    const sourceFolder = path.resolve(cwd, options.sourceFolder ?? '.');
    const recipe = await loadRecipe(sourceFolder, { onUnresolvedVersion: options.onUnresolvedVersion });
    const result: RecipeRunResult = {
      command: options.command,
      phases: ['resolve'],
      metadata: recipe.metadata
    };

    const versionWarning = validateRecipeVersion(recipe.metadata, { context: options.command });
    if (versionWarning) {
      logger.warn(versionWarning.message);
      warnings.push(versionWarning.message);
    }

    if (has('export')) {
      const exported = await runExport(recipe, sourceFolder, options);
      result.exportFolder = exported.exportFolder;
      result.exportedFiles = exported.exportedFiles;
      result.phases.push('export');
    }

    if (has('layout')) {
      const settings = await resolveSettings(options, deps);
      result.settings = settings;
      const layout = computePackageLayout({
        sourceFolder,
        buildFolder: options.buildFolder,
        packageFolder: options.packageFolder,
        context: options.context,
        metadata: recipe.metadata,
        settings,
        env: deps.env
      });
      result.layout = layout;
      result.phases.push('layout');
      logger.debug(`Layout for ${recipe.metadata.name}`, layout);

      if (has('generate')) {
        result.toolchain = await generateToolchainFiles({
          metadata: recipe.metadata,
          settings,
          layout,
          testRequires: recipe.testRequires,
          env: deps.env
        });
        result.phases.push('generate');
      }

      if (has('build') && result.toolchain) {
        const configured = await orchestrateConfigure({
          recipe,
          layout,
          settings,
          toolchainFile: result.toolchain.toolchainPath,
          runner: deps.runner
        });
        result.generatedHeaderPath = configured.generatedHeaderPath;
        result.phases.push('build');
      }

      if (has('package')) {
        const artifacts = buildArtifactSet(recipe.artifacts, layout);
        result.packagedFiles = await packageArtifacts(artifacts, { cleanFolder: layout.packageFolder });
        result.phases.push('package');
      }
    }

    if (has('package-info')) {
      result.packageInfo = publishPackageInfo(recipe.metadata);
      result.phases.push('package-info');
    }

    logger.info(`${options.command} finished for ${recipe.metadata.name}/${recipe.metadata.version}`);

    return {
      success: true,
      data: result,
      warnings: warnings.length > 0 ? warnings : undefined
    };
  } catch (error) {
    const failed = handleError(error);
    return { ...failed, warnings: warnings.length > 0 ? warnings : undefined };
  }
}
