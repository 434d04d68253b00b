import assert from 'node:assert/strict';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, test } from 'node:test';

import {
  discoverRepositories,
  readOriginRepository,
  RepositoryPathResolver,
} from '../src/collaborators/path-resolver';
import { tempDir } from './helpers';

function fakeCheckout(dir: string, originUrl: string, remote = 'origin'): void {
  mkdirSync(path.join(dir, '.git'), { recursive: true });
  writeFileSync(
    path.join(dir, '.git', 'config'),
    [
      '[core]',
      '\trepositoryformatversion = 0',
      `[remote "${remote}"]`,
      `\turl = ${originUrl}`,
      '\tfetch = +refs/heads/*:refs/remotes/origin/*',
      '',
    ].join('\n'),
  );
}

describe('repository discovery', () => {
  let root: string;

  beforeEach(() => {
    root = tempDir('pr-relay-repos-');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  test('reads https and ssh origin urls', () => {
    const https = path.join(root, 'https');
    const ssh = path.join(root, 'ssh');
    fakeCheckout(https, 'https://github.com/Acme/Widgets.git');
    fakeCheckout(ssh, 'git@github.com:acme/gadgets');

    assert.equal(readOriginRepository(https), 'acme/widgets');
    assert.equal(readOriginRepository(ssh), 'acme/gadgets');
  });

  test('ignores other remotes and non-GitHub hosts', () => {
    const upstreamOnly = path.join(root, 'upstream');
    const gitlab = path.join(root, 'gitlab');
    fakeCheckout(upstreamOnly, 'https://github.com/acme/widgets.git', 'upstream');
    fakeCheckout(gitlab, 'https://gitlab.com/acme/widgets.git');

    assert.equal(readOriginRepository(upstreamOnly), null);
    assert.equal(readOriginRepository(gitlab), null);
    assert.equal(readOriginRepository(path.join(root, 'missing')), null);
  });

  test('finds checkouts one and two levels below a root', () => {
    fakeCheckout(path.join(root, 'widgets'), 'https://github.com/acme/widgets.git');
    fakeCheckout(path.join(root, 'acme', 'gadgets'), 'https://github.com/acme/gadgets.git');
    fakeCheckout(path.join(root, 'a', 'b', 'too-deep'), 'https://github.com/acme/deep.git');

    assert.deepEqual(discoverRepositories([root, path.join(root, 'absent')]), {
      'acme/widgets': path.join(root, 'widgets'),
      'acme/gadgets': path.join(root, 'acme', 'gadgets'),
    });
  });

  test('configured locations override discovered ones', () => {
    fakeCheckout(path.join(root, 'widgets'), 'https://github.com/acme/widgets.git');
    fakeCheckout(path.join(root, 'tools'), 'https://github.com/acme/tools.git');

    const resolver = new RepositoryPathResolver({
      repositories: { 'acme/widgets': '/srv/widgets' },
      scanRoots: [root],
    });

    assert.equal(resolver.resolve('acme/widgets'), '/srv/widgets');
    assert.equal(resolver.resolve('Acme/Tools'), path.join(root, 'tools'));
    assert.equal(resolver.resolve('acme/unknown'), null);
  });
});
