/**
 * Environment Lifecycle Manager
 *
 * Creates, populates, upgrades and destroys the isolated environment of each
 * package. Every mutating call runs under the package's lock: callers either
 * pass the lease they already hold, or the call acquires the lock itself.
 */

import { join } from 'path';

import type {
  DistributionInfo,
  Environment,
  InstallScope,
  PackageSpec,
  ToolRunner
} from '../../types/index.js';
import { DEFAULTS, ENVIRONMENT_LAYOUT, ENV_VARS } from '../../constants/index.js';
import { AlreadyExistsError, MetadataError, NotInstalledError } from '../../utils/errors.js';
import { ensureDir, exists, isDirectory, remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { runTool as defaultRunTool } from '../../utils/process.js';
import { LockManager, lockKey, type PackageLease } from '../locks.js';
import { resolveScope, type ScopeAccess, type ScopeEnvironment } from '../scope-resolution.js';
import { InstallerClient, type ToolchainSettings } from './installer-client.js';

export interface EnvironmentManagerOptions {
  scopeEnv: ScopeEnvironment;
  runTool?: ToolRunner;
  locks?: LockManager;
  toolchain?: Partial<ToolchainSettings>;
}

export interface LeaseOption {
  /** Lock already held by the caller for this package */
  lease?: PackageLease;
}

export interface CreateOptions extends LeaseOption {
  /** Replace a leftover environment directory instead of failing */
  force?: boolean;
}

export interface DestroyOptions extends LeaseOption {
  /** Fail with NotInstalledError when there is nothing to destroy */
  mustExist?: boolean;
}

/** Mode for environment roots: traversable by every user. */
const ROOT_DIR_MODE = 0o755;

export function resolveToolchain(scopeEnv: ScopeEnvironment, overrides: Partial<ToolchainSettings> = {}): ToolchainSettings {
  const { config, env } = scopeEnv;
  return {
    python: overrides.python ?? env[ENV_VARS.PYTHON] ?? config.python ?? DEFAULTS.PYTHON,
    creator: overrides.creator ?? config.creator ?? DEFAULTS.CREATOR,
    upgradeInstaller: overrides.upgradeInstaller ?? config.upgradeInstaller ?? DEFAULTS.UPGRADE_INSTALLER
  };
}

export class EnvironmentManager {
  readonly locks: LockManager;
  readonly scopeEnv: ScopeEnvironment;
  private readonly installer: InstallerClient;

  constructor(options: EnvironmentManagerOptions) {
    this.scopeEnv = options.scopeEnv;
    this.locks = options.locks ?? new LockManager(options.scopeEnv);
    this.installer = new InstallerClient(
      options.runTool ?? defaultRunTool,
      resolveToolchain(options.scopeEnv, options.toolchain)
    );
  }

  /**
   * Paths of the environment for (name, scope). Nothing is checked on disk.
   */
  getEnvironment(name: string, scope: InstallScope, access: ScopeAccess = 'read'): Environment {
    const { envRoot } = resolveScope(scope, this.scopeEnv, { access });
    const path = join(envRoot, name);
    const binDir = join(path, ENVIRONMENT_LAYOUT.BIN);
    return {
      name,
      scope,
      path,
      binDir,
      interpreter: join(binDir, ENVIRONMENT_LAYOUT.INTERPRETER),
      installer: join(binDir, ENVIRONMENT_LAYOUT.INSTALLER)
    };
  }

  /**
   * Whether an environment directory exists. Read-only and unlocked.
   */
  async exists(name: string, scope: InstallScope): Promise<boolean> {
    return isDirectory(this.getEnvironment(name, scope).path);
  }

  /**
   * Create the environment for (name, scope).
   *
   * @throws AlreadyExistsError when the directory exists and force is not set
   * @throws ProvisionError when the creation tool fails; the partial directory is removed
   */
  async create(name: string, scope: InstallScope, options: CreateOptions = {}): Promise<Environment> {
    const env = this.getEnvironment(name, scope, 'write');

    return this.guarded(name, scope, options.lease, async () => {
      if (await exists(env.path)) {
        if (!options.force) {
          throw new AlreadyExistsError(env.path);
        }
        logger.debug(`Replacing leftover environment at ${env.path}`);
        await remove(env.path);
      }

      await ensureDir(join(env.path, '..'), ROOT_DIR_MODE);

      try {
        await this.installer.createEnvironment(env.path);
        await this.installer.prepareInstaller(env);
      } catch (error) {
        logger.debug(`Provisioning ${env.path} failed, removing partial environment`);
        await remove(env.path).catch((cleanupError: unknown) => {
          logger.error(`Could not remove partial environment ${env.path}; remove it by hand`, {
            cause: error instanceof Error ? error.message : String(error),
            error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
          });
        });
        throw error;
      }

      logger.debug(`Created environment ${env.path}`);
      return env;
    });
  }

  /**
   * Remove the environment directory for (name, scope). Absent directories are a
   * no-op unless mustExist is set.
   *
   * @throws NotInstalledError in mustExist mode when the directory is absent
   */
  async destroy(name: string, scope: InstallScope, options: DestroyOptions = {}): Promise<void> {
    const env = this.getEnvironment(name, scope, 'write');

    await this.guarded(name, scope, options.lease, async () => {
      if (!(await exists(env.path))) {
        if (options.mustExist) {
          throw new NotInstalledError(name, scope);
        }
        logger.debug(`Environment ${env.path} already absent`);
        return;
      }
      await remove(env.path);
      logger.debug(`Destroyed environment ${env.path}`);
    });
  }

  /**
   * Install a package into a freshly created environment. Rollback is the caller's decision.
   *
   * @throws InstallError when the installer fails
   */
  async installPackage(env: Environment, spec: PackageSpec, options: LeaseOption = {}): Promise<void> {
    resolveScope(env.scope, this.scopeEnv, { access: 'write' });
    await this.guarded(env.name, env.scope, options.lease, () => this.installer.install(env, spec));
  }

  /**
   * Upgrade a package in place. A failure leaves the previous installation untouched.
   *
   * @throws InstallError when the installer fails
   */
  async upgradePackage(env: Environment, spec: PackageSpec, options: LeaseOption = {}): Promise<void> {
    resolveScope(env.scope, this.scopeEnv, { access: 'write' });
    await this.guarded(env.name, env.scope, options.lease, () =>
      this.installer.install(env, spec, { upgrade: true })
    );
  }

  /**
   * Name and version of the distribution an environment was created for.
   * Environments named after a URL fall back to the top-level distribution.
   *
   * @throws MetadataError for damaged or empty environments
   */
  async queryDistribution(env: Environment): Promise<DistributionInfo> {
    if (!(await exists(env.installer))) {
      throw new MetadataError('damaged (no inner installer)', { path: env.path });
    }
    if (!(await exists(env.interpreter))) {
      throw new MetadataError('damaged (interpreter not found)', { path: env.path });
    }

    const shown = await this.installer.show(env, env.name);
    if (shown) {
      return shown;
    }

    const [topLevel] = await this.installer.listTopLevel(env);
    if (topLevel) {
      return topLevel;
    }
    throw new MetadataError('empty (no package installed)', { path: env.path });
  }

  private async guarded<T>(
    name: string,
    scope: InstallScope,
    lease: PackageLease | undefined,
    fn: () => Promise<T>
  ): Promise<T> {
    if (!lease) {
      return this.locks.withLock(name, scope, () => fn());
    }
    if (!lease.isActive() || lease.name !== name || lease.scope !== scope) {
      throw new Error(
        `Lease for ${lockKey(lease.name, lease.scope)} does not cover ${lockKey(name, scope)}`
      );
    }
    return fn();
  }
}
