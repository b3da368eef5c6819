import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';

import { expandLocation } from '../../../src/core/reconcile/path-pairs.js';
import { LocationResolver } from '../../../src/core/locations/location-resolver.js';
import { defineLocation } from '../../../src/core/categories/definitions.js';
import { makeTempDir, removeTempDir, writeFixture } from '../../test-helpers.js';

let root: string;
let repo: string;
let home: string;
let resolver: LocationResolver;

before(async () => {
  root = await makeTempDir('pairs');
  repo = join(root, 'repo');
  home = join(root, 'home');
  await fs.mkdir(home, { recursive: true });
  await writeFixture(repo, 'app/conf/a', 'a');
  await writeFixture(repo, 'app/conf/b/c', 'c');
  await fs.mkdir(join(repo, 'empty'), { recursive: true });
  resolver = new LocationResolver({ repositoryRoot: repo, os: 'linux', environment: () => ({ HOME: home }) });
});

after(async () => {
  await removeTempDir(root);
});

describe('expandLocation', () => {
  const appDir = defineLocation('app/conf/', { linux: '$HOME/.config/app/' });

  it('yields one pair per file below a directory', async () => {
    const pairs = await expandLocation(resolver, appDir, 'to-system');
    assert.deepEqual(pairs, [
      { source: join(repo, 'app/conf/a'), destination: join(home, '.config/app/a') },
      { source: join(repo, 'app/conf/b/c'), destination: join(home, '.config/app/b/c') }
    ]);
  });

  it('yields nothing for an empty directory', async () => {
    const empty = defineLocation('empty', { linux: '$HOME/.empty' });
    assert.deepEqual(await expandLocation(resolver, empty, 'to-system'), []);
  });

  it('yields a single pair for a file, even one that does not exist yet', async () => {
    const missing = defineLocation('git/config', { linux: '$HOME/.gitconfig' });
    assert.deepEqual(await expandLocation(resolver, missing, 'to-system'), [
      { source: join(repo, 'git/config'), destination: join(home, '.gitconfig') }
    ]);
  });

  it('yields nothing when the OS has no path', async () => {
    const windowsOnly = defineLocation('app/conf/', { windows: '%APPDATA%/app/' });
    assert.deepEqual(await expandLocation(resolver, windowsOnly, 'to-system'), []);
  });

  it('walks the OS side when backing up', async () => {
    await writeFixture(home, '.config/tool/settings', 's');
    const tool = defineLocation('tool/', { linux: '$HOME/.config/tool/' });
    assert.deepEqual(await expandLocation(resolver, tool, 'to-repository'), [
      { source: join(home, '.config/tool/settings'), destination: join(repo, 'tool/settings') }
    ]);
  });

  it('compares the union of both sides', async () => {
    await writeFixture(home, '.config/merged/only-home', 'h');
    await writeFixture(repo, 'merged/only-repo', 'r');
    const merged = defineLocation('merged', { linux: '$HOME/.config/merged' });
    assert.deepEqual(await expandLocation(resolver, merged, 'compare'), [
      { source: join(repo, 'merged/only-home'), destination: join(home, '.config/merged/only-home') },
      { source: join(repo, 'merged/only-repo'), destination: join(home, '.config/merged/only-repo') }
    ]);
  });
});
