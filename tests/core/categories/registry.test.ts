import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { CategoryRegistry } from '../../../src/core/categories/registry.js';
import { defineCategory } from '../../../src/core/categories/definitions.js';
import { ConfigError, UnknownCategoryError } from '../../../src/utils/errors.js';

function buildRegistry(): CategoryRegistry {
  return new CategoryRegistry({
    GIT: defineCategory(),
    SH: defineCategory(),
    BASH: defineCategory({ prerequisites: ['SH'] })
  });
}

describe('CategoryRegistry', () => {
  it('keeps declaration order', () => {
    const registry = buildRegistry();
    assert.deepEqual(registry.names(), ['GIT', 'SH', 'BASH']);
    assert.deepEqual(registry.categories.map((category) => category.index), [0, 1, 2]);
  });

  it('looks names up case-insensitively', () => {
    const registry = buildRegistry();
    assert.equal(registry.lookup('bash').name, 'BASH');
    assert.equal(registry.lookup(' Git ').name, 'GIT');
  });

  it('reports unknown names with the known ones', () => {
    const registry = buildRegistry();
    assert.throws(
      () => registry.lookup('fish'),
      (error: unknown) =>
        error instanceof UnknownCategoryError &&
        error.message === "Unknown category 'fish'. Known categories: git, sh, bash"
    );
  });

  it('expands an empty request to every category and collapses duplicates', () => {
    const registry = buildRegistry();
    assert.deepEqual(registry.expand([]).map((category) => category.name), ['GIT', 'SH', 'BASH']);
    assert.deepEqual(registry.expand(['bash', 'BASH', 'git']).map((category) => category.name), ['BASH', 'GIT']);
  });

  it('resolves prerequisites to categories', () => {
    const registry = buildRegistry();
    assert.deepEqual(registry.prerequisitesOf(registry.lookup('bash')).map((category) => category.name), ['SH']);
  });

  it('rejects identifiers that are not uppercase', () => {
    assert.throws(() => new CategoryRegistry({ Git: defineCategory() }), ConfigError);
  });

  it('rejects prerequisites outside the catalog', () => {
    assert.throws(
      () => new CategoryRegistry({ BASH: defineCategory({ prerequisites: ['SH'] }) }),
      (error: unknown) =>
        error instanceof ConfigError && error.message === "Category 'BASH' lists unknown prerequisite 'SH'"
    );
  });
});
