/**
 * Library entry: the recipe pipeline and each of its phases.
 */

export * from '../types/index.js';
export * from '../utils/errors.js';

export { loadRecipe, toPackageName, defaultArtifacts, defaultGeneratedHeader } from './recipe/recipe-loader.js';
export { runRecipePipeline, COMMAND_PHASES } from './recipe/recipe-pipeline.js';
export type {
  RecipeCommand,
  RecipePhase,
  RecipePipelineDeps,
  RecipePipelineOptions,
  RecipeRunResult
} from './recipe/recipe-pipeline.js';

export { parseVersionDirective, resolveVersion, splitDescriptorLines } from './version/version-resolver.js';
export type { VersionParseResult, UnresolvedVersionPolicy } from './version/version-resolver.js';

export { selectLayoutMode, computePackageLayout, getCacheMarker } from './layout/layout-selector.js';
export { resolveBuildSettings, hostDefaults, parseSettingAssignments } from './profile.js';
export { generateToolchainFiles, renderToolchain, renderDeps } from './toolchain/toolchain-generator.js';

export { orchestrateConfigure, getGeneratedHeaderPath } from './build/build-orchestrator.js';
export { withDeferredInterrupts } from './build/interrupt-guard.js';
export type { DeferredSignal } from './build/interrupt-guard.js';
export { CMakeConfigureRunner, buildConfigureArgs } from './build/configure-runner.js';
export type { ConfigureRunner, ConfigureRequest, ConfigureOutcome } from './build/configure-runner.js';
export { synthesizeMinimalDescriptor } from './build/minimal-descriptor.js';
export { withDescriptorSwap, getDescriptorSwapPaths } from './build/descriptor-swap.js';
export { withSourceTreeLock } from './build/source-tree-lock.js';

export { buildArtifactSet } from './package/artifact-set.js';
export { packageArtifacts } from './package/packager.js';
export type { PackagedFile } from './package/packager.js';
export { publishPackageInfo } from './package/package-info.js';
export { exportSources } from './export/export-sources.js';
