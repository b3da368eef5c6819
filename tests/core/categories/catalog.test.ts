import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';

import { buildDefaultCatalog, DEFAULT_CATEGORY_NAMES } from '../../../src/core/categories/catalog.js';
import { CategoryRegistry } from '../../../src/core/categories/registry.js';
import { isCategoryDisabled } from '../../../src/core/categories/definitions.js';

describe('buildDefaultCatalog', () => {
  const catalog = buildDefaultCatalog('/srv/dotfiles');

  it('declares the built-in categories in order', () => {
    assert.deepEqual(new CategoryRegistry(catalog).names(), [...DEFAULT_CATEGORY_NAMES]);
  });

  it('downloads the zshrc into the repository before installing zsh', () => {
    const [download] = catalog.ZSH.beforeInstall;
    assert.ok(download);
    assert.equal(download.args[0], 'curl');
    assert.equal(download.args[download.args.length - 1], join('/srv/dotfiles', 'zsh', 'zshrc'));
  });

  it('has zsh on unix systems only', () => {
    assert.equal(isCategoryDisabled(catalog.ZSH, 'windows'), true);
    assert.equal(isCategoryDisabled(catalog.ZSH, 'linux'), false);
    assert.equal(isCategoryDisabled(catalog.ZSH, 'darwin'), false);
  });

  it('maps the editor settings directory per OS', () => {
    const [settings] = catalog.VSCODE.locations;
    assert.ok(settings);
    assert.equal(settings.repoPath, 'vscode/User/');
    assert.equal(settings.linux, '$HOME/.config/Code/User/');
    assert.equal(settings.darwin, '$HOME/Library/Application Support/Code/User/');
    assert.equal(settings.windows, '%APPDATA%/Code/User/');
  });

  it('upgrades the global Brewfile after installing brew', () => {
    assert.deepEqual(
      catalog.BREW.afterInstall.map((command) => [...command.args]),
      [['brew', 'bundle', 'upgrade', '--global']]
    );
  });
});
