import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'node:path';

import { getScratchDirectory, loadConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { makeTempDir, removeTempDir, writeFixture } from '../test-helpers.js';

describe('loadConfig', () => {
  let home: string;

  beforeEach(async () => {
    home = await makeTempDir('config');
  });

  afterEach(async () => {
    await removeTempDir(home);
  });

  it('defaults to ~/.dotfiles with empty expansion of undefined variables', async () => {
    const config = await loadConfig({ env: {}, homeDir: home });
    assert.deepEqual(config, { repository: join(home, '.dotfiles'), undefinedVariables: 'empty' });
  });

  it('reads the config file, expanding a leading tilde', async () => {
    await writeFixture(
      home,
      '.dotkeeper/config.jsonc',
      '{\n  // kept in sync by hand\n  "repository": "~/dots",\n  "undefinedVariables": "error",\n}\n'
    );
    const config = await loadConfig({ env: {}, homeDir: home });
    assert.deepEqual(config, { repository: join(home, 'dots'), undefinedVariables: 'error' });
  });

  it('falls back to config.json', async () => {
    await writeFixture(home, '.dotkeeper/config.json', '{ "repository": "/srv/from-json" }');
    const config = await loadConfig({ env: {}, homeDir: home });
    assert.equal(config.repository, '/srv/from-json');
  });

  it('prefers the flag, then the environment, then the file', async () => {
    await writeFixture(home, '.dotkeeper/config.jsonc', '{ "repository": "/srv/from-file" }');
    const env = { DOTKEEPER_REPOSITORY: '/srv/from-env' };

    assert.equal((await loadConfig({ env, homeDir: home })).repository, '/srv/from-env');
    assert.equal(
      (await loadConfig({ env, homeDir: home, flags: { repository: '/srv/from-flag' } })).repository,
      '/srv/from-flag'
    );
  });

  it('switches to strict expansion from the environment', async () => {
    const config = await loadConfig({ env: { DOTKEEPER_STRICT_ENV: '1' }, homeDir: home });
    assert.equal(config.undefinedVariables, 'error');
  });

  it('rejects invalid values', async () => {
    await writeFixture(home, '.dotkeeper/config.jsonc', '{ "undefinedVariables": "ignore" }');
    await assert.rejects(loadConfig({ env: {}, homeDir: home }), ConfigError);
  });

  it('rejects a config file that does not parse', async () => {
    await writeFixture(home, '.dotkeeper/config.jsonc', '{ "repository": ');
    await assert.rejects(
      loadConfig({ env: {}, homeDir: home }),
      (error: unknown) => error instanceof ConfigError && error.message.startsWith('Failed to load configuration')
    );
  });
});

describe('getScratchDirectory', () => {
  it('lives inside the repository', () => {
    assert.equal(getScratchDirectory({ repository: '/srv/dots', undefinedVariables: 'empty' }), '/srv/dots/tmp');
  });
});
