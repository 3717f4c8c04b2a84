/**
 * Per-package advisory locking
 *
 * Uses proper-lockfile lock directories, one per (package name, scope), so that
 * separate venvbox processes exclude each other. Acquisition never waits: a lock
 * held by another operation fails with BusyError.
 */

import { dirname, join } from 'path';
import lockfile from 'proper-lockfile';

import type { InstallScope } from '../types/index.js';
import { DEFAULTS, LOCK_SUFFIX } from '../constants/index.js';
import { BusyError, FileSystemError, getErrorCode } from '../utils/errors.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { resolveScope, type ScopeEnvironment } from './scope-resolution.js';

export interface LockOptions {
  /** Stale lock threshold in milliseconds; a crashed holder's lock is taken over after it */
  staleMs?: number;
}

/**
 * Proof that the current operation holds the lock for one (name, scope).
 */
export interface PackageLease {
  readonly name: string;
  readonly scope: InstallScope;
  readonly lockPath: string;
  isActive(): boolean;
  release(): Promise<void>;
}

export function lockKey(name: string, scope: InstallScope): string {
  return `${scope}:${name}`;
}

export class LockManager {
  private readonly staleMs: number;

  constructor(
    private readonly scopeEnv: ScopeEnvironment,
    options: LockOptions = {}
  ) {
    this.staleMs = options.staleMs ?? scopeEnv.config.lockStaleMs ?? DEFAULTS.LOCK_STALE_MS;
  }

  private lockTarget(name: string, scope: InstallScope): { file: string; lockPath: string } {
    const { lockDir } = resolveScope(scope, this.scopeEnv, { access: 'read' });
    return {
      file: join(lockDir, name),
      lockPath: join(lockDir, `${name}${LOCK_SUFFIX}`)
    };
  }

  /**
   * Acquire the lock for (name, scope) or fail immediately.
   *
   * @throws BusyError when another operation holds the lock
   */
  async acquire(name: string, scope: InstallScope): Promise<PackageLease> {
    const { file, lockPath } = this.lockTarget(name, scope);
    await ensureDir(dirname(lockPath));

    let releaseLock: () => Promise<void>;
    try {
      releaseLock = await lockfile.lock(file, {
        lockfilePath: lockPath,
        realpath: false,
        retries: 0,
        stale: this.staleMs,
        onCompromised: (err: Error) => {
          logger.warn(`Lock for '${name}' (${scope}) was compromised`, { lockPath, error: err.message });
        }
      });
    } catch (err) {
      if (getErrorCode(err) === 'ELOCKED') {
        throw new BusyError(name, scope, lockPath);
      }
      throw new FileSystemError(`Failed to acquire lock: ${lockPath}`, { lockPath, error: err });
    }

    logger.debug(`Acquired lock ${lockPath}`);
    let active = true;

    return {
      name,
      scope,
      lockPath,
      isActive: () => active,
      release: async () => {
        if (!active) {
          return;
        }
        active = false;
        try {
          await releaseLock();
          logger.debug(`Released lock ${lockPath}`);
        } catch (err) {
          // Lock may already be gone (compromised or removed by hand)
          if (getErrorCode(err) !== 'ERELEASED' && getErrorCode(err) !== 'ENOTACQUIRED') {
            throw new FileSystemError(`Failed to release lock: ${lockPath}`, { lockPath, error: err });
          }
        }
      }
    };
  }

  /**
   * Execute a function with the lock for (name, scope) held
   */
  async withLock<T>(
    name: string,
    scope: InstallScope,
    fn: (lease: PackageLease) => Promise<T>
  ): Promise<T> {
    const lease = await this.acquire(name, scope);
    try {
      return await fn(lease);
    } finally {
      await lease.release();
    }
  }

  /**
   * Check whether (name, scope) is currently locked
   */
  async isLocked(name: string, scope: InstallScope): Promise<boolean> {
    const { file, lockPath } = this.lockTarget(name, scope);
    try {
      return await lockfile.check(file, { lockfilePath: lockPath, realpath: false, stale: this.staleMs });
    } catch (err) {
      if (getErrorCode(err) === 'ENOENT') {
        return false;
      }
      throw err;
    }
  }
}
