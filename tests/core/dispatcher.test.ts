/**
 * Dispatcher Tests
 *
 * End-to-end install, remove, update and list flows against the fake toolchain.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';

import { Dispatcher } from '../../src/core/dispatcher.js';
import {
  AlreadyInstalledError,
  BusyError,
  InstallError,
  NameConflictError,
  NotInstalledError,
  PermissionDeniedError
} from '../../src/utils/errors.js';
import {
  FakeToolchain,
  createScopeEnv,
  createTestRoots,
  pathExists,
  readLinkNames,
  removeTestRoots,
  type TestRoots
} from '../helpers/fake-toolchain.js';

let roots: TestRoots;
let toolchain: FakeToolchain;
let dispatcher: Dispatcher;

beforeEach(async () => {
  roots = await createTestRoots('venvbox-dispatcher-test-');
  toolchain = new FakeToolchain()
    .publish('alpha', { version: '1.0.0', executables: ['alpha'] })
    .publish('beta', { version: '0.5.0', executables: ['beta', 'beta-server'] })
    .publish('libonly', { version: '3.0.0', executables: [] });
  dispatcher = new Dispatcher({ scopeEnv: createScopeEnv(roots), runTool: toolchain.run });
});

afterEach(async () => {
  await removeTestRoots(roots);
});

describe('Dispatcher.install', () => {
  it('provisions, installs and links', async () => {
    const outcome = await dispatcher.install('alpha', { scope: 'user' });
    assert.deepEqual(outcome, {
      name: 'alpha',
      scope: 'user',
      environment: join(roots.userEnvRoot, 'alpha'),
      version: '1.0.0',
      executables: [join(roots.userEnvRoot, 'alpha', 'bin', 'alpha')],
      linksAdded: ['alpha'],
      reinstalled: false,
      linkDir: roots.userLinkDir,
      onPath: false
    });
    assert.equal(
      await fs.readlink(join(roots.userLinkDir, 'alpha')),
      join(roots.userEnvRoot, 'alpha', 'bin', 'alpha')
    );
  });

  it('reports whether the link directory is on PATH', async () => {
    const onPath = new Dispatcher({
      scopeEnv: createScopeEnv(roots, { env: { PATH: `/usr/bin:${roots.userLinkDir}` } }),
      runTool: toolchain.run
    });
    assert.equal((await onPath.install('alpha', { scope: 'user' })).onPath, true);
  });

  it('refuses an installed package unless reinstalling', async () => {
    await dispatcher.install('alpha', { scope: 'user' });
    await assert.rejects(dispatcher.install('alpha', { scope: 'user' }), AlreadyInstalledError);

    const outcome = await dispatcher.install('alpha', { scope: 'user', reinstall: true });
    assert.equal(outcome.reinstalled, true);
    assert.deepEqual(await readLinkNames(roots.userLinkDir), ['alpha']);
  });

  it('leaves no environment behind when the installer fails', async () => {
    await assert.rejects(dispatcher.install('unknown-tool', { scope: 'user' }), InstallError);
    assert.equal(await pathExists(join(roots.userEnvRoot, 'unknown-tool')), false);
    assert.deepEqual(await readLinkNames(roots.userLinkDir), []);
  });

  it('fails with NameConflict on a foreign file and rolls back', async () => {
    await fs.mkdir(roots.userLinkDir, { recursive: true });
    await fs.writeFile(join(roots.userLinkDir, 'beta-server'), 'someone else');

    await assert.rejects(dispatcher.install('beta', { scope: 'user' }), NameConflictError);
    assert.equal(await pathExists(join(roots.userEnvRoot, 'beta')), false);
    assert.deepEqual(await readLinkNames(roots.userLinkDir), ['beta-server']);
    assert.equal(await fs.readFile(join(roots.userLinkDir, 'beta-server'), 'utf8'), 'someone else');
  });

  it('installs a package without executables and links nothing', async () => {
    const outcome = await dispatcher.install('libonly', { scope: 'user' });
    assert.deepEqual(outcome.executables, []);
    assert.deepEqual(outcome.linksAdded, []);
    assert.equal(await dispatcher.registry.exists('libonly', 'user'), true);
  });

  it('lets exactly one of two simultaneous installs through', async () => {
    const results = await Promise.allSettled([
      dispatcher.install('alpha', { scope: 'user' }),
      dispatcher.install('alpha', { scope: 'user' })
    ]);

    const fulfilled = results.filter(r => r.status === 'fulfilled');
    const rejected = results.flatMap(r => (r.status === 'rejected' ? [r.reason] : []));
    assert.equal(fulfilled.length, 1);
    assert.equal(rejected.length, 1);
    assert.ok(rejected[0] instanceof BusyError);
    assert.deepEqual(await readLinkNames(roots.userLinkDir), ['alpha']);
  });

  it('needs root for the system scope', async () => {
    await assert.rejects(dispatcher.install('alpha', { scope: 'system' }), PermissionDeniedError);
    assert.equal(toolchain.calls.length, 0);
  });

  it('installs system-wide as root with world-readable files', async () => {
    const asRoot = new Dispatcher({ scopeEnv: createScopeEnv(roots, { uid: 0 }), runTool: toolchain.run });
    const previous = process.umask(0o077);
    try {
      const outcome = await asRoot.install('alpha', { scope: 'system' });
      assert.equal(outcome.environment, join(roots.systemEnvRoot, 'alpha'));
      assert.equal(outcome.onPath, true);
      assert.deepEqual(await readLinkNames(roots.systemLinkDir), ['alpha']);
      assert.equal((await fs.stat(roots.systemEnvRoot)).mode & 0o777, 0o755);
      assert.equal(process.umask(0o077), 0o077);
    } finally {
      process.umask(previous);
    }
  });
});

describe('Dispatcher.remove', () => {
  it('succeeds once, then reports NotInstalled', async () => {
    await dispatcher.install('alpha', { scope: 'user' });

    const outcome = await dispatcher.remove('alpha', { scope: 'user' });
    assert.deepEqual(outcome, {
      name: 'alpha',
      scope: 'user',
      environment: join(roots.userEnvRoot, 'alpha'),
      linksRemoved: ['alpha']
    });
    await assert.rejects(dispatcher.remove('alpha', { scope: 'user' }), NotInstalledError);
  });

  it('leaves no environment and no owned links', async () => {
    await dispatcher.install('beta', { scope: 'user' });
    await dispatcher.remove('beta', { scope: 'user' });

    assert.equal(await pathExists(join(roots.userEnvRoot, 'beta')), false);
    assert.deepEqual(await readLinkNames(roots.userLinkDir), []);
    assert.deepEqual((await dispatcher.list()).packages, []);
  });

  it("never touches another package's links", async () => {
    await dispatcher.install('alpha', { scope: 'user' });
    await dispatcher.install('beta', { scope: 'user' });

    await dispatcher.remove('alpha', { scope: 'user' });
    assert.deepEqual(await readLinkNames(roots.userLinkDir), ['beta', 'beta-server']);
    assert.equal(
      await fs.readlink(join(roots.userLinkDir, 'beta')),
      join(roots.userEnvRoot, 'beta', 'bin', 'beta')
    );
  });

  it('normalizes the name it is given', async () => {
    await dispatcher.install('alpha', { scope: 'user' });
    assert.equal((await dispatcher.remove('ALPHA', { scope: 'user' })).name, 'alpha');
  });
});

describe('Dispatcher.update', () => {
  it('relinks from {b, c} after the executable set changes', async () => {
    toolchain.publish('gamma', { version: '1.0.0', executables: ['a', 'b'] });
    await dispatcher.install('gamma', { scope: 'user' });
    assert.deepEqual(await readLinkNames(roots.userLinkDir), ['a', 'b']);

    toolchain.publish('gamma', { version: '2.0.0', executables: ['b', 'c'] });
    const outcome = await dispatcher.update('gamma', { scope: 'user' });

    assert.equal(outcome.version, '2.0.0');
    assert.deepEqual(outcome.linksAdded, ['c']);
    assert.deepEqual(outcome.linksRemoved, ['a']);
    assert.deepEqual(await readLinkNames(roots.userLinkDir), ['b', 'c']);
  });

  it('reports NotInstalled for an unknown package', async () => {
    await assert.rejects(dispatcher.update('alpha', { scope: 'user' }), NotInstalledError);
    assert.equal(toolchain.calls.length, 0);
  });

  it('keeps environment and links when the upgrade fails', async () => {
    await dispatcher.install('alpha', { scope: 'user' });
    await assert.rejects(dispatcher.update('alpha==9.9.9', { scope: 'user' }), InstallError);

    assert.equal(await pathExists(join(roots.userEnvRoot, 'alpha', 'bin', 'alpha')), true);
    assert.deepEqual(await readLinkNames(roots.userLinkDir), ['alpha']);
  });
});

describe('Dispatcher.list', () => {
  it('flags names installed in both scopes', async () => {
    const asRoot = new Dispatcher({ scopeEnv: createScopeEnv(roots, { uid: 0 }), runTool: toolchain.run });
    await asRoot.install('alpha', { scope: 'user' });
    await asRoot.install('alpha', { scope: 'system' });
    await asRoot.install('beta', { scope: 'system' });

    const { packages, warnings } = await dispatcher.list();
    assert.deepEqual(warnings, []);
    assert.deepEqual(
      packages.map(pkg => `${pkg.scope}/${pkg.name}${pkg.shadowed ? ' (shadowed)' : ''}`),
      ['user/alpha (shadowed)', 'system/alpha (shadowed)', 'system/beta']
    );
  });

  it('limits the listing to the requested scopes', async () => {
    await dispatcher.install('alpha', { scope: 'user' });
    assert.deepEqual((await dispatcher.list({ scopes: ['system'] })).packages, []);
    assert.equal((await dispatcher.list({ scopes: ['user'] })).packages.length, 1);
  });
});

describe('system scope without root', () => {
  it('refuses to remove or update a system package and leaves it in place', async () => {
    const asRoot = new Dispatcher({ scopeEnv: createScopeEnv(roots, { uid: 0 }), runTool: toolchain.run });
    await asRoot.install('alpha', { scope: 'system' });
    const asUser = new Dispatcher({ scopeEnv: createScopeEnv(roots, { uid: 1000 }), runTool: toolchain.run });

    await assert.rejects(asUser.remove('alpha', { scope: 'system' }), {
      name: 'PermissionDeniedError',
      message: 'Permission denied: system-wide operations need root privileges (try again with sudo)'
    });
    await assert.rejects(asUser.update('alpha', { scope: 'system' }), PermissionDeniedError);
    assert.equal(await pathExists(join(roots.systemEnvRoot, 'alpha')), true);
    assert.deepEqual(await readLinkNames(roots.systemLinkDir), ['alpha']);
  });
});
