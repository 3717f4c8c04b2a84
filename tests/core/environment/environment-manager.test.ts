import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';

import { EnvironmentManager, resolveToolchain } from '../../../src/core/environment/environment-manager.js';
import { parsePackageSpec } from '../../../src/utils/package-spec.js';
import {
  AlreadyExistsError,
  BusyError,
  InstallError,
  MetadataError,
  NotInstalledError,
  PermissionDeniedError,
  ProvisionError
} from '../../../src/utils/errors.js';
import {
  FakeToolchain,
  createScopeEnv,
  createTestRoots,
  pathExists,
  removeTestRoots,
  type TestRoots
} from '../../helpers/fake-toolchain.js';

let roots: TestRoots;
let toolchain: FakeToolchain;
let manager: EnvironmentManager;

beforeEach(async () => {
  roots = await createTestRoots('venvbox-env-test-');
  toolchain = new FakeToolchain().publish('sample', { version: '1.0.0', executables: ['sample'] });
  manager = new EnvironmentManager({ scopeEnv: createScopeEnv(roots), runTool: toolchain.run });
});

afterEach(async () => {
  await removeTestRoots(roots);
});

describe('resolveToolchain', () => {
  it('layers overrides, the environment variable, config and defaults', () => {
    const scopeEnv = createScopeEnv(roots, {
      env: { VENVBOX_PYTHON: 'python3.11' },
      config: { python: 'python3.10', creator: 'virtualenv' }
    });
    assert.deepEqual(resolveToolchain(scopeEnv), {
      python: 'python3.11',
      creator: 'virtualenv',
      upgradeInstaller: true
    });
    assert.equal(resolveToolchain(scopeEnv, { python: 'custom' }).python, 'custom');
    assert.equal(resolveToolchain(createScopeEnv(roots)).python, 'python3');
  });
});

describe('EnvironmentManager.create', () => {
  it('creates the environment and upgrades its installer', async () => {
    const env = await manager.create('sample', 'user');
    assert.equal(env.path, join(roots.userEnvRoot, 'sample'));
    assert.equal(await pathExists(env.interpreter), true);
    assert.deepEqual(toolchain.commandLines(roots.userEnvRoot), [
      `python3 -m venv ${env.path}`,
      '/sample/bin/pip install --upgrade pip --quiet'
    ]);
    assert.deepEqual(toolchain.calls[1].env, { PIP_DISABLE_PIP_VERSION_CHECK: '1' });
  });

  it('skips the installer upgrade when configured off', async () => {
    const quiet = new EnvironmentManager({
      scopeEnv: createScopeEnv(roots, { config: { upgradeInstaller: false } }),
      runTool: toolchain.run
    });
    await quiet.create('sample', 'user');
    assert.equal(toolchain.calls.length, 1);
  });

  it('refuses an existing directory unless forced', async () => {
    await manager.create('sample', 'user');
    await assert.rejects(manager.create('sample', 'user'), AlreadyExistsError);
    await assert.rejects(manager.create('sample', 'user'), {
      message: `Environment directory '${join(roots.userEnvRoot, 'sample')}' already exists. Remove it first`
    });

    const marker = join(roots.userEnvRoot, 'sample', 'leftover');
    await fs.writeFile(marker, 'x');
    await manager.create('sample', 'user', { force: true });
    assert.equal(await pathExists(marker), false);
  });

  it('removes the partial directory when provisioning fails', async () => {
    toolchain.failCreate = true;
    await assert.rejects(manager.create('sample', 'user'), ProvisionError);
    assert.equal(await manager.exists('sample', 'user'), false);
  });

  it('keeps the provisioning error when removing the partial directory fails too', async () => {
    toolchain.failCreate = true;
    const rm = mock.method(fs, 'rm', async () => {
      throw Object.assign(new Error('EBUSY: resource busy or locked'), { code: 'EBUSY' });
    });
    try {
      await assert.rejects(manager.create('sample', 'user'), ProvisionError);
    } finally {
      rm.mock.restore();
    }
  });

  it('needs root for the system scope', async () => {
    await assert.rejects(manager.create('sample', 'system'), PermissionDeniedError);
    assert.equal(toolchain.calls.length, 0);
  });

  it('fails with BusyError while the package is locked elsewhere', async () => {
    await manager.locks.withLock('sample', 'user', async () => {
      await assert.rejects(manager.create('sample', 'user'), BusyError);
    });
  });
});

describe('EnvironmentManager.destroy', () => {
  it('is a no-op for a missing environment unless mustExist', async () => {
    await manager.destroy('sample', 'user');
    await assert.rejects(manager.destroy('sample', 'user', { mustExist: true }), NotInstalledError);
  });

  it('removes the environment directory', async () => {
    await manager.create('sample', 'user');
    await manager.destroy('sample', 'user', { mustExist: true });
    assert.equal(await manager.exists('sample', 'user'), false);
  });
});

describe('EnvironmentManager packages', () => {
  it('installs a package and reports its distribution', async () => {
    const env = await manager.create('sample', 'user');
    await manager.installPackage(env, parsePackageSpec('sample'));
    assert.deepEqual(await manager.queryDistribution(env), { name: 'sample', version: '1.0.0' });
  });

  it('surfaces installer failures as InstallError and keeps the environment', async () => {
    const env = await manager.create('missing', 'user');
    await assert.rejects(manager.installPackage(env, parsePackageSpec('missing')), InstallError);
    assert.equal(await manager.exists('missing', 'user'), true);
  });

  it('upgrades in place', async () => {
    const env = await manager.create('sample', 'user');
    await manager.installPackage(env, parsePackageSpec('sample'));
    toolchain.publish('sample', { version: '1.1.0', executables: ['sample'] });
    await manager.upgradePackage(env, parsePackageSpec('sample'));
    assert.equal((await manager.queryDistribution(env)).version, '1.1.0');
    assert.deepEqual(toolchain.calls[toolchain.calls.length - 2].args, ['install', '--upgrade', 'sample', '--quiet']);
  });

  it('rejects a lease for another package', async () => {
    const env = await manager.create('sample', 'user');
    await manager.locks.withLock('other', 'user', async lease => {
      await assert.rejects(manager.installPackage(env, parsePackageSpec('sample'), { lease }), /does not cover user:sample/);
    });
  });
});

describe('EnvironmentManager.queryDistribution', () => {
  it('falls back to the top-level distribution for URL-named environments', async () => {
    toolchain.publish('https://example.com/team/repo.git', {
      version: '0.3.0',
      executables: ['repo-cli'],
      distribution: 'repo-cli'
    });
    const spec = parsePackageSpec('https://example.com/team/repo.git');
    const env = await manager.create(spec.name, 'user');
    await manager.installPackage(env, spec);
    assert.deepEqual(await manager.queryDistribution(env), { name: 'repo-cli', version: '0.3.0' });
  });

  it('reports damaged and empty environments', async () => {
    const env = await manager.create('sample', 'user');
    await assert.rejects(manager.queryDistribution(env), { message: 'empty (no package installed)' });

    await fs.rm(env.interpreter);
    await assert.rejects(manager.queryDistribution(env), { message: 'damaged (interpreter not found)' });

    await fs.rm(env.installer);
    await assert.rejects(manager.queryDistribution(env), MetadataError);
    await assert.rejects(manager.queryDistribution(env), { message: 'damaged (no inner installer)' });
  });
});
