import { delimiter, join, resolve } from 'path';

import type { InstallScope, ScopeRoots, VenvboxConfig } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS, SYSTEM_PATHS, VENVBOX_DIRS } from '../constants/index.js';
import { PermissionDeniedError } from '../utils/errors.js';
import { expandTilde } from '../utils/home-directory.js';

/**
 * Everything scope resolution depends on. Captured once per invocation so that
 * resolution stays a pure function of (scope, environment).
 */
export interface ScopeEnvironment {
  homeDir: string;
  /** Effective uid, undefined on platforms without one */
  uid: number | undefined;
  env: Record<string, string | undefined>;
  config: VenvboxConfig;
}

export type ScopeAccess = 'read' | 'write';

/**
 * Root of venvbox's own data for the user scope (~/.venvbox).
 */
export function getUserDataRoot(scopeEnv: Pick<ScopeEnvironment, 'homeDir' | 'env'>): string {
  const override = scopeEnv.env[ENV_VARS.HOME];
  if (override) {
    return resolve(expandTilde(override, scopeEnv.homeDir));
  }
  return join(scopeEnv.homeDir, DIR_PATTERNS.VENVBOX);
}

function pickPath(scopeEnv: ScopeEnvironment, envVar: string, configured: string | undefined, fallback: string): string {
  const value = scopeEnv.env[envVar] || configured;
  return value ? resolve(expandTilde(value, scopeEnv.homeDir)) : fallback;
}

/**
 * Map a scope to its filesystem roots. No side effects and no privilege check.
 */
export function getScopeRoots(scope: InstallScope, scopeEnv: ScopeEnvironment): ScopeRoots {
  let dataRoot: string;
  let linkDir: string;

  if (scope === 'user') {
    dataRoot = getUserDataRoot(scopeEnv);
    linkDir = pickPath(scopeEnv, ENV_VARS.BIN_DIR, scopeEnv.config.userBinDir, join(scopeEnv.homeDir, DIR_PATTERNS.LOCAL_BIN));
  } else {
    dataRoot = pickPath(scopeEnv, ENV_VARS.SYSTEM_ROOT, scopeEnv.config.systemRoot, SYSTEM_PATHS.ROOT);
    linkDir = pickPath(scopeEnv, ENV_VARS.SYSTEM_BIN_DIR, scopeEnv.config.systemBinDir, SYSTEM_PATHS.BIN);
  }

  const envRoot = join(dataRoot, VENVBOX_DIRS.VENVS);
  return {
    scope,
    envRoot,
    linkDir,
    lockDir: join(envRoot, VENVBOX_DIRS.LOCKS)
  };
}

/**
 * Resolve a scope for an operation. Writing to the system scope requires root.
 *
 * @throws PermissionDeniedError for system-scope writes without privilege
 */
export function resolveScope(
  scope: InstallScope,
  scopeEnv: ScopeEnvironment,
  options: { access?: ScopeAccess } = {}
): ScopeRoots {
  const roots = getScopeRoots(scope, scopeEnv);
  const access = options.access ?? 'write';

  if (scope === 'system' && access === 'write' && scopeEnv.uid !== 0) {
    throw new PermissionDeniedError(
      `system-wide operations need root privileges (try again with sudo)`,
      { scope, envRoot: roots.envRoot, linkDir: roots.linkDir }
    );
  }

  return roots;
}

/**
 * Whether the scope's link directory is on PATH. The system link directory is
 * assumed to be: sudo sessions often do not load the profile that sets PATH.
 */
export function isLinkDirOnPath(roots: ScopeRoots, scopeEnv: ScopeEnvironment): boolean {
  if (roots.scope === 'system') {
    return true;
  }
  const pathDirs = (scopeEnv.env.PATH ?? '').split(delimiter).filter(Boolean);
  return pathDirs.some(dir => resolve(dir) === roots.linkDir);
}
