import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { computePackageLayout, getCacheMarker, selectLayoutMode } from '../../../src/core/layout/layout-selector.js';
import type { RecipeMetadata } from '../../../src/types/index.js';
import { RecipeValidationError } from '../../../src/utils/errors.js';
import { LINUX_RELEASE } from '../../test-helpers.js';

const metadata: RecipeMetadata = Object.freeze({
  name: 'foo',
  version: '3.4.5',
  versionResolved: true,
  topics: new Set<string>(),
  projectName: 'Foo'
});

describe('selectLayoutMode', () => {
  const env = { HDRPACK_HOME: '/home/ci/.hdrpack' };

  it('selects the cache layout when the build folder is inside the package cache', () => {
    assert.equal(selectLayoutMode({ buildFolder: '/home/ci/.hdrpack/p/foo-3.4.5/b', env }), 'cache');
  });

  it('follows a relocated HDRPACK_HOME', () => {
    const relocated = { HDRPACK_HOME: '/srv/recipes-home' };
    assert.equal(getCacheMarker(relocated), '/srv/recipes-home/p/');
    assert.equal(selectLayoutMode({ buildFolder: '/srv/recipes-home/p/foo-3.4.5/b', env: relocated }), 'cache');
    assert.equal(selectLayoutMode({ buildFolder: '/home/ci/.hdrpack/p/foo-3.4.5/b', env: relocated }), 'flat');
  });

  it('selects the flat layout for any other build folder', () => {
    assert.equal(selectLayoutMode({ buildFolder: '/work/foo/build', env }), 'flat');
    assert.equal(selectLayoutMode({ buildFolder: '/home/ci/.hdrpack/pkg/build', env }), 'flat');
  });

  it('selects the flat layout without a build folder', () => {
    assert.equal(selectLayoutMode(), 'flat');
  });

  it('lets an injected context override the marker', () => {
    assert.equal(
      selectLayoutMode({ context: 'development', buildFolder: '/home/ci/.hdrpack/p/foo/b', env }),
      'flat'
    );
    assert.equal(selectLayoutMode({ context: 'packaging', buildFolder: '/work/foo/build', env }), 'cache');
  });

  it('accepts a custom marker', () => {
    assert.equal(selectLayoutMode({ buildFolder: '/data/cache/foo/b', cacheMarker: '/cache/' }), 'cache');
  });
});

describe('computePackageLayout', () => {
  it('uses the build folder as-is for development builds', () => {
    const layout = computePackageLayout({
      sourceFolder: '/work/foo',
      context: 'development',
      metadata,
      settings: LINUX_RELEASE
    });
    assert.deepEqual(layout, {
      mode: 'flat',
      sourceFolder: path.resolve('/work/foo'),
      buildFolder: path.resolve('/work/foo/build'),
      generatorsFolder: path.resolve('/work/foo/build'),
      packageFolder: path.resolve('/work/foo/package')
    });
    assert.ok(Object.isFrozen(layout));
  });

  it('nests build output by build type for cache builds', () => {
    const layout = computePackageLayout({
      sourceFolder: '/cache/foo/s',
      buildFolder: '/cache/foo/b',
      context: 'packaging',
      metadata,
      settings: { ...LINUX_RELEASE, buildType: 'Debug' },
      env: { HDRPACK_HOME: '/cache/home' }
    });
    assert.equal(layout.mode, 'cache');
    assert.equal(layout.buildFolder, path.join(path.resolve('/cache/foo/b'), 'build', 'Debug'));
    assert.equal(layout.generatorsFolder, path.join(path.resolve('/cache/foo/b'), 'build', 'Debug', 'generators'));
    assert.equal(layout.packageFolder, path.join('/cache/home', 'p', 'foo-3.4.5', 'p'));
  });

  it('resolves relative folders against the source folder', () => {
    const layout = computePackageLayout({
      sourceFolder: '/work/foo',
      buildFolder: 'out/build',
      packageFolder: '../dist/foo',
      metadata,
      settings: LINUX_RELEASE
    });
    assert.equal(layout.buildFolder, path.resolve('/work/foo/out/build'));
    assert.equal(layout.packageFolder, path.resolve('/work/dist/foo'));
  });

  it('rejects a package folder that contains the source folder', () => {
    assert.throws(
      () =>
        computePackageLayout({
          sourceFolder: '/work/foo',
          packageFolder: '/work',
          metadata,
          settings: LINUX_RELEASE
        }),
      RecipeValidationError
    );
  });

  it('rejects a build folder equal to the package folder', () => {
    assert.throws(
      () =>
        computePackageLayout({
          sourceFolder: '/work/foo',
          buildFolder: 'out',
          packageFolder: 'out',
          metadata,
          settings: LINUX_RELEASE
        }),
      RecipeValidationError
    );
  });
});
