/**
 * @fileoverview Display/output logic for the recipe commands
 *
 * Builds the summary lines for a finished run and prints them. Kept apart
 * from the pipeline so the lines can be asserted directly.
 */

import { basename } from 'path';
import type { RecipeMetadata } from '../../types/index.js';
import {
  formatFileCount,
  formatPathForDisplay,
  formatRecipeLabel,
  getTreeConnector
} from '../../utils/formatters.js';
import type { RecipeRunResult } from './recipe-pipeline.js';

const COMMAND_VERBS: Record<RecipeRunResult['command'], string> = {
  create: 'Created',
  build: 'Built',
  package: 'Packaged',
  export: 'Exported',
  inspect: 'Inspected'
};

/**
 * Plain object form of the metadata, with topics as a sorted array.
 */
export function metadataToJson(metadata: RecipeMetadata): Record<string, unknown> {
  return {
    name: metadata.name,
    version: metadata.version,
    versionResolved: metadata.versionResolved,
    projectName: metadata.projectName,
    description: metadata.description,
    url: metadata.url,
    homepage: metadata.homepage,
    license: metadata.license,
    topics: [...metadata.topics].sort()
  };
}

export function formatMetadataLines(metadata: RecipeMetadata): string[] {
  const lines = [`✓ ${formatRecipeLabel(metadata.name, metadata.version)}`];
  lines.push(`  - Project: ${metadata.projectName}`);
  if (!metadata.versionResolved) {
    lines.push('  - Version: placeholder (no VERSION directive found)');
  }
  if (metadata.description) {
    lines.push(`  - Description: ${metadata.description}`);
  }
  if (metadata.homepage) {
    lines.push(`  - Homepage: ${metadata.homepage}`);
  }
  if (metadata.url && metadata.url !== metadata.homepage) {
    lines.push(`  - URL: ${metadata.url}`);
  }
  if (metadata.license) {
    lines.push(`  - License: ${metadata.license}`);
  }
  if (metadata.topics.size > 0) {
    lines.push(`  - Topics: ${[...metadata.topics].sort().join(', ')}`);
  }
  return lines;
}

/**
 * Summary lines for a finished run
 */
export function formatRunSummary(result: RecipeRunResult, cwd: string): string[] {
  if (result.command === 'inspect') {
    return formatMetadataLines(result.metadata);
  }

  const lines = [`✓ ${COMMAND_VERBS[result.command]} ${formatRecipeLabel(result.metadata.name, result.metadata.version)}`];

  if (result.layout) {
    const layout = result.layout;
    lines.push(`✓ Layout: ${layout.mode}`);
    lines.push(`✓ Build folder: ${formatPathForDisplay(layout.buildFolder, cwd)}`);
  }
  if (result.generatedHeaderPath) {
    lines.push(`✓ Generated header: ${formatPathForDisplay(result.generatedHeaderPath, cwd)}`);
  }
  const packagedFiles = result.packagedFiles;
  if (packagedFiles && result.layout) {
    lines.push(
      `✓ Package folder: ${formatPathForDisplay(result.layout.packageFolder, cwd)} ` +
        `(${formatFileCount(packagedFiles.length)})`
    );
    packagedFiles.forEach((file, index) => {
      lines.push(`  ${getTreeConnector(index === packagedFiles.length - 1)}${basename(file.path)}`);
    });
  }
  if (result.exportFolder && result.exportedFiles) {
    lines.push(
      `✓ Export folder: ${formatPathForDisplay(result.exportFolder, cwd)} ` +
        `(${formatFileCount(result.exportedFiles.length)})`
    );
  }
  if (result.packageInfo) {
    lines.push(`✓ Package type: ${result.packageInfo.packageType}`);
  }
  return lines;
}

export function displayRunSummary(result: RecipeRunResult, cwd: string): void {
  for (const line of formatRunSummary(result, cwd)) {
    console.log(line);
  }
}

export function displayMetadataJson(metadata: RecipeMetadata): void {
  console.log(JSON.stringify(metadataToJson(metadata), null, 2));
}

export function displayWarnings(warnings: readonly string[] | undefined): void {
  for (const warning of warnings ?? []) {
    console.log(`⚠️  ${warning}`);
  }
}
