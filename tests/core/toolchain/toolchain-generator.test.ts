import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import {
  generateToolchainFiles,
  renderDeps,
  renderToolchain,
  ToolchainInput
} from '../../../src/core/toolchain/toolchain-generator.js';
import type { PackageLayout, RecipeMetadata } from '../../../src/types/index.js';
import { LINUX_RELEASE, makeTempDir, removeTempDir } from '../../test-helpers.js';

const metadata: RecipeMetadata = Object.freeze({
  name: 'foo',
  version: '3.4.5',
  versionResolved: true,
  topics: new Set<string>(),
  projectName: 'Foo'
});

function inputFor(layout: PackageLayout, overrides: Partial<ToolchainInput> = {}): ToolchainInput {
  return {
    metadata,
    settings: LINUX_RELEASE,
    layout,
    testRequires: [],
    host: LINUX_RELEASE,
    env: { HDRPACK_HOME: '/opt/hdrpack' },
    ...overrides
  };
}

const flatLayout: PackageLayout = {
  mode: 'flat',
  sourceFolder: '/work/foo',
  buildFolder: '/work/foo/build',
  generatorsFolder: '/work/foo/build',
  packageFolder: '/work/foo/package'
};

describe('renderToolchain', () => {
  it('sets the build type and compiler for a native build', () => {
    assert.equal(
      renderToolchain(inputFor(flatLayout)),
      [
        '# hdrpack toolchain for foo/3.4.5. Do not edit.',
        'set(CMAKE_BUILD_TYPE "Release" CACHE STRING "Build type" FORCE)',
        'set(CMAKE_CXX_COMPILER "g++")',
        'include("${CMAKE_CURRENT_LIST_DIR}/hdrpack_deps.cmake")',
        ''
      ].join('\n')
    );
  });

  it('adds the language standard and the target system when cross-building', () => {
    const rendered = renderToolchain(
      inputFor(flatLayout, {
        settings: { buildType: 'Debug', compiler: 'apple-clang', cppstd: 'gnu17', arch: 'armv8', os: 'Macos' }
      })
    );
    assert.deepEqual(rendered.split('\n'), [
      '# hdrpack toolchain for foo/3.4.5. Do not edit.',
      'set(CMAKE_BUILD_TYPE "Debug" CACHE STRING "Build type" FORCE)',
      'set(CMAKE_CXX_COMPILER "clang++")',
      'set(CMAKE_CXX_STANDARD 17)',
      'set(CMAKE_CXX_STANDARD_REQUIRED ON)',
      'set(CMAKE_CXX_EXTENSIONS ON)',
      'set(CMAKE_SYSTEM_NAME Darwin)',
      'set(CMAKE_SYSTEM_PROCESSOR armv8)',
      'include("${CMAKE_CURRENT_LIST_DIR}/hdrpack_deps.cmake")',
      ''
    ]);
  });

  it('passes unknown compilers through', () => {
    const rendered = renderToolchain(inputFor(flatLayout, { settings: { ...LINUX_RELEASE, compiler: 'icpx' } }));
    assert.equal(rendered.split('\n')[2], 'set(CMAKE_CXX_COMPILER "icpx")');
  });
});

describe('renderDeps', () => {
  it('records each test requirement and its prefix path', () => {
    const rendered = renderDeps(
      inputFor(flatLayout, { testRequires: [{ name: 'doctest', version: '2.4.11' }] })
    );
    const root = path.join('/opt/hdrpack', 'deps', 'doctest', '2.4.11').split(path.sep).join('/');
    assert.equal(
      rendered,
      '# hdrpack dependencies for foo/3.4.5. Do not edit.\n' +
        'set(doctest_REQUESTED_VERSION "2.4.11")\n' +
        `list(PREPEND CMAKE_PREFIX_PATH "${root}")\n`
    );
  });

  it('writes only the header without requirements', () => {
    assert.equal(renderDeps(inputFor(flatLayout)), '# hdrpack dependencies for foo/3.4.5. Do not edit.\n');
  });
});

describe('generateToolchainFiles', () => {
  let root: string;

  before(async () => {
    root = await makeTempDir('toolchain');
  });

  after(async () => {
    await removeTempDir(root);
  });

  it('writes both files into the generators folder', async () => {
    const layout: PackageLayout = { ...flatLayout, generatorsFolder: path.join(root, 'build', 'generators') };
    const files = await generateToolchainFiles(inputFor(layout));

    assert.deepEqual(files, {
      toolchainPath: path.join(root, 'build', 'generators', 'hdrpack_toolchain.cmake'),
      depsPath: path.join(root, 'build', 'generators', 'hdrpack_deps.cmake')
    });
    assert.equal(await readFile(files.toolchainPath, 'utf8'), renderToolchain(inputFor(layout)));
    assert.equal(await readFile(files.depsPath, 'utf8'), renderDeps(inputFor(layout)));
  });
});
