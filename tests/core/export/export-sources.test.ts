import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { exportSources, matchesExportPatterns } from '../../../src/core/export/export-sources.js';
import { loadRecipe } from '../../../src/core/recipe/recipe-loader.js';
import { RecipeValidationError } from '../../../src/utils/errors.js';
import { makeTempDir, removeTempDir, writeFooLibrary, writeTree } from '../../test-helpers.js';

describe('matchesExportPatterns', () => {
  it('matches relative posix paths and skips dot files', () => {
    assert.equal(matchesExportPatterns('include/foo/bar.hpp', ['include/**']), true);
    assert.equal(matchesExportPatterns('Foo.hpp', ['**/*.hpp']), true);
    assert.equal(matchesExportPatterns('.clang-format', ['*']), false);
  });
});

describe('exportSources', () => {
  let root: string;
  let sourceFolder: string;

  beforeEach(async () => {
    root = await makeTempDir('export');
    sourceFolder = path.join(root, 'foo');
    await writeFooLibrary(sourceFolder);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('exports the default set derived from the project name', async () => {
    const recipe = await loadRecipe(sourceFolder);
    const exported = await exportSources({ recipe, sourceFolder, exportFolder: path.join(root, 'out') });
    assert.deepEqual(exported, ['CMakeLists.txt', 'Foo.hpp', 'LICENSE', 'README.md']);
    assert.equal(await readFile(path.join(root, 'out', 'Foo.hpp'), 'utf8'), '#pragma once\n#include "foo_config.h"\n');
  });

  it('copies glob matches with their relative paths and skips output folders', async () => {
    await writeTree(sourceFolder, {
      'hdrpack.yml': 'name: foo\nexports-sources:\n  - "**/*.hpp"\n  - "config/**"\n  - LICENSE\n',
      'build/Generated.hpp': '#pragma once\n',
      'package/Foo.hpp': '#pragma once\n'
    });
    const recipe = await loadRecipe(sourceFolder);
    const exportFolder = path.join(sourceFolder, 'export');

    const exported = await exportSources({
      recipe,
      sourceFolder,
      exportFolder,
      excludeFolders: [path.join(sourceFolder, 'build'), path.join(sourceFolder, 'package')]
    });

    assert.deepEqual(exported, [
      'CMakeLists.txt',
      'Extra.hpp',
      'Foo.hpp',
      'LICENSE',
      'config/CMakeLists.txt',
      'config/foo_config.h.in',
      'hdrpack.yml'
    ]);
    assert.equal(
      await readFile(path.join(exportFolder, 'config', 'foo_config.h.in'), 'utf8'),
      '#define FOO_VERSION "@PROJECT_VERSION@"\n'
    );

    // A second run replaces the snapshot instead of nesting it
    assert.deepEqual(
      await exportSources({
        recipe,
        sourceFolder,
        exportFolder,
        excludeFolders: [path.join(sourceFolder, 'build'), path.join(sourceFolder, 'package')]
      }),
      exported
    );
  });

  it('fails when no file matches the export globs', async () => {
    await writeTree(sourceFolder, { 'hdrpack.yml': 'name: foo\nexports-sources:\n  - "src/**"\n' });
    const recipe = await loadRecipe(sourceFolder);
    await assert.rejects(
      exportSources({ recipe, sourceFolder, exportFolder: path.join(root, 'out') }),
      RecipeValidationError
    );
  });

  it('refuses an export folder that contains the source folder', async () => {
    const recipe = await loadRecipe(sourceFolder);
    await assert.rejects(exportSources({ recipe, sourceFolder, exportFolder: root }), RecipeValidationError);
    assert.equal(await readFile(path.join(sourceFolder, 'LICENSE'), 'utf8'), 'MIT License\n');
  });
});
