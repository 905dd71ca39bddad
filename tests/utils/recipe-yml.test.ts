import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { validateRecipeYml } from '../../src/utils/recipe-yml.js';
import { RecipeValidationError } from '../../src/utils/errors.js';

describe('validateRecipeYml', () => {
  it('accepts a full recipe', () => {
    const recipe = validateRecipeYml({
      name: 'foo',
      description: 'Foo reader',
      topics: ['foo'],
      'package-type': 'header-library',
      'exports-sources': ['*.hpp'],
      artifacts: [{ name: 'header', path: 'Foo.hpp' }],
      'test-requires': ['catch2/3.5.2']
    });
    assert.equal(recipe.name, 'foo');
    assert.equal(recipe['package-type'], 'header-library');
    assert.deepEqual(recipe.artifacts, [{ name: 'header', from: 'source', path: 'Foo.hpp' }]);
    assert.deepEqual(recipe['test-requires'], ['catch2/3.5.2']);
    assert.equal(recipe.descriptor, undefined);
  });

  it('treats null fields as absent', () => {
    assert.equal(validateRecipeYml({ name: 'foo', description: null }).description, undefined);
  });

  it('requires a mapping with a name', () => {
    assert.throws(() => validateRecipeYml('name: foo'), RecipeValidationError);
    assert.throws(() => validateRecipeYml({ description: 'no name' }), {
      message: 'Invalid recipe: hdrpack.yml must contain a name field'
    });
  });

  it('rejects other package types', () => {
    assert.throws(() => validateRecipeYml({ name: 'foo', 'package-type': 'shared-library' }), {
      message: "Invalid recipe: only 'header-library' packages are supported (found 'shared-library')"
    });
  });

  it('only accepts CMakeLists.txt as the descriptor', () => {
    assert.equal(validateRecipeYml({ name: 'foo', descriptor: 'CMakeLists.txt' }).descriptor, 'CMakeLists.txt');
    assert.throws(() => validateRecipeYml({ name: 'foo', descriptor: 'cmake/Root.cmake' }), {
      message:
        "Invalid recipe: 'descriptor' must be CMakeLists.txt, the file cmake reads from the source folder (found 'cmake/Root.cmake')"
    });
  });

  it('rejects malformed artifacts', () => {
    assert.throws(() => validateRecipeYml({ name: 'foo', artifacts: 'Foo.hpp' }), RecipeValidationError);
    assert.throws(() => validateRecipeYml({ name: 'foo', artifacts: [{ name: 'header' }] }), {
      message: "Invalid recipe: artifacts[0] requires both 'name' and 'path'"
    });
    assert.throws(() => validateRecipeYml({ name: 'foo', artifacts: [{ name: 'h', path: 'h.hpp', from: 'tmp' }] }), {
      message: "Invalid recipe: artifacts[0] 'from' must be 'source' or 'build' (found 'tmp')"
    });
  });

  it('rejects wrongly typed lists', () => {
    assert.throws(() => validateRecipeYml({ name: 'foo', topics: 'foo' }), {
      message: "Invalid recipe: hdrpack.yml field 'topics' must be a list of strings"
    });
  });
});
