import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { LocationResolver } from '../../../src/core/locations/location-resolver.js';
import { defineCategory, defineLocation } from '../../../src/core/categories/definitions.js';
import { ValidationError } from '../../../src/utils/errors.js';

describe('LocationResolver', () => {
  const gitconfig = defineLocation('git/config', { linux: '$HOME/.gitconfig', darwin: '$HOME/.gitconfig' });
  const editorDir = defineLocation('editor/User/', { linux: '$HOME/.config/editor/User/' });

  function resolver(env: Record<string, string>, os: 'linux' | 'darwin' | 'windows' = 'linux') {
    return new LocationResolver({ repositoryRoot: '/srv/dotfiles', os, environment: () => env });
  }

  it('resolves the repository side against the root', () => {
    const subject = resolver({ HOME: '/home/tester' });
    assert.equal(subject.resolveRepositorySide(gitconfig), '/srv/dotfiles/git/config');
    assert.equal(subject.resolveRepositorySide(editorDir), '/srv/dotfiles/editor/User');
  });

  it('expands and normalizes the OS side', () => {
    const subject = resolver({ HOME: '/home/tester/' });
    assert.equal(subject.resolveSystemSide(gitconfig), '/home/tester/.gitconfig');
    assert.equal(subject.resolveSystemSide(editorDir), '/home/tester/.config/editor/User');
  });

  it('has no OS side when the template is absent', () => {
    assert.equal(resolver({ HOME: '/home/tester' }, 'windows').resolveSystemSide(gitconfig), undefined);
  });

  it('expands %NAME% references only in Windows templates', () => {
    const appData = defineLocation('editor/User/', { linux: '/srv/%NAME%/User/', windows: '%APPDATA%/Code/User/' });
    const env = { APPDATA: 'C:\\Users\\tester\\AppData\\Roaming', NAME: 'tester' };
    assert.equal(resolver(env, 'windows').resolveSystemSide(appData), 'C:\\Users\\tester\\AppData\\Roaming/Code/User');
    assert.equal(resolver(env, 'linux').resolveSystemSide(appData), '/srv/%NAME%/User');
  });

  it('reads the environment on every resolution', () => {
    const env: Record<string, string> = { HOME: '/home/first' };
    const subject = new LocationResolver({ repositoryRoot: '/srv/dotfiles', os: 'linux', environment: () => env });
    assert.equal(subject.resolveSystemSide(gitconfig), '/home/first/.gitconfig');
    env.HOME = '/home/second';
    assert.equal(subject.resolveSystemSide(gitconfig), '/home/second/.gitconfig');
  });

  it('fails on undefined variables when strict', () => {
    const subject = new LocationResolver({
      repositoryRoot: '/srv/dotfiles',
      os: 'linux',
      environment: () => ({}),
      undefinedVariables: 'error'
    });
    assert.throws(() => subject.resolveSystemSide(gitconfig), ValidationError);
  });

  it('reports a category as disabled when no location targets the OS', () => {
    const category = defineCategory({ locations: [gitconfig, editorDir] });
    assert.equal(resolver({}, 'windows').isDisabled(category), true);
    assert.equal(resolver({}, 'darwin').isDisabled(category), false);
  });
});
