import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  defineCategory,
  defineCommand,
  defineLocation,
  isCategoryDisabled
} from '../../../src/core/categories/definitions.js';
import { ValidationError } from '../../../src/utils/errors.js';

describe('defineLocation', () => {
  it('keeps the repository path and the per-OS templates', () => {
    const location = defineLocation('git/config', { linux: '$HOME/.gitconfig' });
    assert.deepEqual({ ...location }, { repoPath: 'git/config', linux: '$HOME/.gitconfig' });
    assert.ok(Object.isFrozen(location));
  });

  it('rejects empty and absolute repository paths', () => {
    assert.throws(() => defineLocation(''), ValidationError);
    assert.throws(() => defineLocation('/etc/gitconfig'), ValidationError);
  });
});

describe('defineCommand', () => {
  it('keeps arguments in order', () => {
    const command = defineCommand('brew', 'bundle', 'upgrade', '--global');
    assert.deepEqual([...command.args], ['brew', 'bundle', 'upgrade', '--global']);
    assert.ok(Object.isFrozen(command.args));
  });

  it('needs an executable', () => {
    assert.throws(() => defineCommand(), ValidationError);
  });
});

describe('defineCategory', () => {
  it('defaults every field to empty', () => {
    const descriptor = defineCategory();
    assert.deepEqual(descriptor.prerequisites, []);
    assert.deepEqual(descriptor.beforeInstall, []);
    assert.deepEqual(descriptor.locations, []);
    assert.deepEqual(descriptor.afterInstall, []);
  });
});

describe('isCategoryDisabled', () => {
  const unixOnly = defineCategory({
    locations: [
      defineLocation('zsh/zshrc', { linux: '$HOME/.zshrc', darwin: '$HOME/.zshrc' }),
      defineLocation('zsh/zshenv', { linux: '$HOME/.zshenv' })
    ]
  });

  it('is disabled when no location has a path for the OS', () => {
    assert.equal(isCategoryDisabled(unixOnly, 'windows'), true);
  });

  it('is enabled as soon as one location has a path', () => {
    assert.equal(isCategoryDisabled(unixOnly, 'linux'), false);
    assert.equal(isCategoryDisabled(unixOnly, 'darwin'), false);
  });

  it('treats an empty template as absent', () => {
    const blank = defineCategory({ locations: [defineLocation('x', { linux: '' })] });
    assert.equal(isCategoryDisabled(blank, 'linux'), true);
  });
});
