import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { formatMetadataLines, formatRunSummary, metadataToJson } from '../../../src/core/recipe/recipe-output.js';
import type { RecipeRunResult } from '../../../src/core/recipe/recipe-pipeline.js';
import type { RecipeMetadata } from '../../../src/types/index.js';

const metadata: RecipeMetadata = Object.freeze({
  name: 'foo',
  version: '3.4.5',
  versionResolved: true,
  description: 'Reads foo files',
  homepage: 'https://example.com/foo',
  url: 'https://example.com/foo',
  license: 'MIT',
  topics: new Set(['parser', 'foo']),
  projectName: 'Foo'
});

describe('formatRunSummary', () => {
  it('lists the layout and every packaged file for create', () => {
    const result: RecipeRunResult = {
      command: 'create',
      phases: ['resolve', 'layout', 'generate', 'build', 'package', 'package-info'],
      metadata,
      layout: {
        mode: 'flat',
        sourceFolder: '/work/foo',
        buildFolder: '/work/foo/build',
        generatorsFolder: '/work/foo/build',
        packageFolder: '/work/foo/package'
      },
      generatedHeaderPath: '/work/foo/build/configured_files/include/foo_config.h',
      packagedFiles: [
        { name: 'header', path: '/work/foo/package/Foo.hpp' },
        { name: 'config-header', path: '/work/foo/package/foo_config.h' },
        { name: 'license', path: '/work/foo/package/LICENSE' },
        { name: 'readme', path: '/work/foo/package/README.md' }
      ],
      packageInfo: {
        name: 'foo',
        version: '3.4.5',
        packageType: 'header-library',
        bindirs: [],
        libdirs: [],
        includedirs: ['.']
      }
    };

    assert.deepEqual(formatRunSummary(result, '/work'), [
      '✓ Created foo/3.4.5',
      '✓ Layout: flat',
      '✓ Build folder: foo/build',
      '✓ Generated header: foo/build/configured_files/include/foo_config.h',
      '✓ Package folder: foo/package (4 files)',
      '  ├── Foo.hpp',
      '  ├── foo_config.h',
      '  ├── LICENSE',
      '  └── README.md',
      '✓ Package type: header-library'
    ]);
  });

  it('reports the export folder and file count', () => {
    const result: RecipeRunResult = {
      command: 'export',
      phases: ['resolve', 'export'],
      metadata,
      exportFolder: '/work/foo/export',
      exportedFiles: ['CMakeLists.txt']
    };
    assert.deepEqual(formatRunSummary(result, '/work/foo'), [
      '✓ Exported foo/3.4.5',
      '✓ Export folder: export (1 file)'
    ]);
  });

  it('prints the metadata for inspect', () => {
    const result: RecipeRunResult = { command: 'inspect', phases: ['resolve'], metadata };
    assert.deepEqual(formatRunSummary(result, '/work'), formatMetadataLines(metadata));
  });
});

describe('formatMetadataLines', () => {
  it('shows declared fields and sorted topics', () => {
    assert.deepEqual(formatMetadataLines(metadata), [
      '✓ foo/3.4.5',
      '  - Project: Foo',
      '  - Description: Reads foo files',
      '  - Homepage: https://example.com/foo',
      '  - License: MIT',
      '  - Topics: foo, parser'
    ]);
  });

  it('flags a placeholder version', () => {
    const unresolved: RecipeMetadata = { ...metadata, version: 'X.X.X', versionResolved: false, topics: new Set<string>() };
    assert.deepEqual(formatMetadataLines(unresolved).slice(0, 3), [
      '✓ foo/X.X.X',
      '  - Project: Foo',
      '  - Version: placeholder (no VERSION directive found)'
    ]);
  });
});

describe('metadataToJson', () => {
  it('turns topics into a sorted array', () => {
    assert.deepEqual(metadataToJson(metadata).topics, ['foo', 'parser']);
  });
});
