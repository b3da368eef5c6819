import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { expandTilde, normalizePathWithTilde } from '../../src/utils/home-directory.js';

describe('home directory helpers', () => {
  const home = '/home/tester';

  it('expands a leading tilde', () => {
    assert.equal(expandTilde('~', home), home);
    assert.equal(expandTilde('~/dotfiles', home), '/home/tester/dotfiles');
    assert.equal(expandTilde('/srv/dotfiles', home), '/srv/dotfiles');
    assert.equal(expandTilde('dir/~/x', home), 'dir/~/x');
  });

  it('abbreviates paths under the home directory', () => {
    assert.equal(normalizePathWithTilde('/home/tester/.gitconfig', home), '~/.gitconfig');
    assert.equal(normalizePathWithTilde('/home/tester', home), '~');
    assert.equal(normalizePathWithTilde('/home/testers/.gitconfig', home), '/home/testers/.gitconfig');
  });
});
