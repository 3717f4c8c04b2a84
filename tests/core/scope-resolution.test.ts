import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import {
  getScopeRoots,
  getUserDataRoot,
  isLinkDirOnPath,
  resolveScope,
  type ScopeEnvironment
} from '../../src/core/scope-resolution.js';
import { PermissionDeniedError } from '../../src/utils/errors.js';

function scopeEnv(overrides: Partial<ScopeEnvironment> = {}): ScopeEnvironment {
  return { homeDir: '/home/alex', uid: 1000, env: {}, config: {}, ...overrides };
}

describe('getScopeRoots', () => {
  it('maps the user scope under the home directory', () => {
    assert.deepEqual(getScopeRoots('user', scopeEnv()), {
      scope: 'user',
      envRoot: '/home/alex/.venvbox/venvs',
      linkDir: '/home/alex/.local/bin',
      lockDir: '/home/alex/.venvbox/venvs/.locks'
    });
  });

  it('maps the system scope to fixed host paths', () => {
    assert.deepEqual(getScopeRoots('system', scopeEnv()), {
      scope: 'system',
      envRoot: '/opt/venvbox/venvs',
      linkDir: '/usr/local/bin',
      lockDir: '/opt/venvbox/venvs/.locks'
    });
  });

  it('lets environment variables win over config', () => {
    const env = scopeEnv({
      env: { VENVBOX_HOME: '~/data', VENVBOX_BIN_DIR: '/tmp/links' },
      config: { userBinDir: '~/bin', systemRoot: '/srv/venvbox' }
    });
    assert.equal(getUserDataRoot(env), '/home/alex/data');
    assert.equal(getScopeRoots('user', env).linkDir, '/tmp/links');
    assert.equal(getScopeRoots('system', env).envRoot, '/srv/venvbox/venvs');
  });
});

describe('resolveScope', () => {
  it('denies system-scope writes without root', () => {
    assert.throws(() => resolveScope('system', scopeEnv()), PermissionDeniedError);
  });

  it('allows system-scope reads for anyone and writes for root', () => {
    assert.equal(resolveScope('system', scopeEnv(), { access: 'read' }).envRoot, '/opt/venvbox/venvs');
    assert.equal(resolveScope('system', scopeEnv({ uid: 0 })).linkDir, '/usr/local/bin');
  });

  it('never needs privilege for the user scope', () => {
    assert.equal(resolveScope('user', scopeEnv({ uid: undefined })).scope, 'user');
  });
});

describe('isLinkDirOnPath', () => {
  it('checks PATH for the user link directory', () => {
    const onPath = scopeEnv({ env: { PATH: '/usr/bin:/home/alex/.local/bin/' } });
    const offPath = scopeEnv({ env: { PATH: '/usr/bin' } });
    assert.equal(isLinkDirOnPath(getScopeRoots('user', onPath), onPath), true);
    assert.equal(isLinkDirOnPath(getScopeRoots('user', offPath), offPath), false);
  });

  it('assumes the system link directory is reachable', () => {
    const env = scopeEnv({ env: { PATH: '' } });
    assert.equal(isLinkDirOnPath(getScopeRoots('system', env), env), true);
  });
});
