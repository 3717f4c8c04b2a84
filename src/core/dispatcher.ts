/**
 * Command Dispatcher
 *
 * Sequences the environment manager, the link reconciler and the registry into
 * the install, remove, update and list operations. Each mutating operation holds
 * the package's lock from its first check to its last write.
 */

import type { Environment, InstallScope, PackageSpec, ScopeRoots, ToolRunner } from '../types/index.js';
import { INSTALL_SCOPES, VenvboxError } from '../types/index.js';
import { AlreadyInstalledError, MetadataError, NotInstalledError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { parsePackageSpec } from '../utils/package-spec.js';
import { EnvironmentManager } from './environment/environment-manager.js';
import type { ToolchainSettings } from './environment/installer-client.js';
import { discoverExecutables } from './links/executable-discovery.js';
import { reconcileLinks, unlinkAll } from './links/link-reconciler.js';
import { LockManager, type LockOptions, type PackageLease } from './locks.js';
import { PackageRegistry, type PackageSummary } from './registry/package-registry.js';
import { isLinkDirOnPath, resolveScope, type ScopeEnvironment } from './scope-resolution.js';

export interface DispatcherOptions {
  scopeEnv: ScopeEnvironment;
  runTool?: ToolRunner;
  toolchain?: Partial<ToolchainSettings>;
  lockOptions?: LockOptions;
}

export interface InstallRequest {
  scope: InstallScope;
  /** Remove an existing installation first instead of failing */
  reinstall?: boolean;
  /** Replace stale links into removed environments that occupy an executable's name */
  forceLinks?: boolean;
  /** Directory local path specs resolve against */
  cwd?: string;
}

export interface UpdateRequest {
  scope: InstallScope;
  forceLinks?: boolean;
  cwd?: string;
}

export interface RemoveRequest {
  scope: InstallScope;
  cwd?: string;
}

export interface LinkTarget {
  /** Directory the links live in */
  linkDir: string;
  /** Whether linkDir is on the user's PATH */
  onPath: boolean;
}

export interface InstallOutcome extends LinkTarget {
  name: string;
  scope: InstallScope;
  environment: string;
  version?: string;
  executables: string[];
  linksAdded: string[];
  reinstalled: boolean;
}

export interface UpdateOutcome extends LinkTarget {
  name: string;
  scope: InstallScope;
  version?: string;
  executables: string[];
  linksAdded: string[];
  linksRemoved: string[];
}

export interface RemoveOutcome {
  name: string;
  scope: InstallScope;
  environment: string;
  linksRemoved: string[];
}

export type ListedPackage = PackageSummary & {
  /** The same name is installed in another scope too */
  shadowed: boolean;
};

export interface ListOutcome {
  packages: ListedPackage[];
  warnings: string[];
}

/** World-readable files for system-wide environments. */
const SYSTEM_UMASK = 0o022;

async function withScopeUmask<T>(scope: InstallScope, fn: () => Promise<T>): Promise<T> {
  if (scope !== 'system') {
    return fn();
  }
  const previous = process.umask(SYSTEM_UMASK);
  try {
    return await fn();
  } finally {
    process.umask(previous);
  }
}

export class Dispatcher {
  readonly manager: EnvironmentManager;
  readonly registry: PackageRegistry;
  private readonly scopeEnv: ScopeEnvironment;

  constructor(options: DispatcherOptions) {
    this.scopeEnv = options.scopeEnv;
    this.manager = new EnvironmentManager({
      scopeEnv: options.scopeEnv,
      runTool: options.runTool,
      toolchain: options.toolchain,
      locks: new LockManager(options.scopeEnv, options.lockOptions)
    });
    this.registry = new PackageRegistry(this.manager);
  }

  private linkTarget(roots: ScopeRoots): LinkTarget {
    return { linkDir: roots.linkDir, onPath: isLinkDirOnPath(roots, this.scopeEnv) };
  }

  private toSpec(input: string | PackageSpec, cwd?: string): PackageSpec {
    return typeof input === 'string' ? parsePackageSpec(input, cwd) : input;
  }

  private async installedVersion(env: Environment): Promise<string | undefined> {
    try {
      return (await this.manager.queryDistribution(env)).version;
    } catch (error) {
      if (error instanceof MetadataError) {
        logger.debug(`Could not read the installed version in ${env.path}: ${error.message}`);
        return undefined;
      }
      throw error;
    }
  }

  private async teardown(env: Environment, roots: ScopeRoots, lease: PackageLease, mustExist: boolean): Promise<string[]> {
    const removed = await unlinkAll(env, roots.linkDir);
    await this.manager.destroy(env.name, env.scope, { lease, mustExist });
    return removed;
  }

  /**
   * Provision an environment, install the package and link its executables.
   * Any failure after the environment was created destroys it again.
   */
  async install(input: string | PackageSpec, request: InstallRequest): Promise<InstallOutcome> {
    const spec = this.toSpec(input, request.cwd);
    const { scope } = request;
    const roots = resolveScope(scope, this.scopeEnv);

    return withScopeUmask(scope, () =>
      this.manager.locks.withLock(spec.name, scope, async lease => {
        let reinstalled = false;
        if (await this.registry.exists(spec.name, scope)) {
          if (!request.reinstall) {
            throw new AlreadyInstalledError(spec.name, scope);
          }
          logger.info(`Removing existing installation of ${spec.name} before reinstalling`);
          await this.teardown(this.manager.getEnvironment(spec.name, scope, 'write'), roots, lease, false);
          reinstalled = true;
        }

        const env = await this.manager.create(spec.name, scope, { lease });
        try {
          await this.manager.installPackage(env, spec, { lease });
          const executables = await discoverExecutables(env);
          const { added } = await reconcileLinks(env, executables, roots.linkDir, { force: request.forceLinks });
          return {
            name: spec.name,
            scope,
            environment: env.path,
            version: await this.installedVersion(env),
            executables,
            linksAdded: added,
            reinstalled,
            ...this.linkTarget(roots)
          };
        } catch (error) {
          logger.debug(`Installing ${spec.name} failed, rolling back ${env.path}`);
          await this.rollback(env, roots, lease, error);
          throw error;
        }
      })
    );
  }

  private async rollback(env: Environment, roots: ScopeRoots, lease: PackageLease, cause: unknown): Promise<void> {
    try {
      await this.teardown(env, roots, lease, false);
    } catch (rollbackError) {
      logger.error(`Rollback of ${env.path} failed; remove it by hand`, {
        cause: cause instanceof Error ? cause.message : String(cause),
        error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError)
      });
    }
  }

  /**
   * Unlink every executable of the package, then destroy its environment.
   */
  async remove(input: string, request: RemoveRequest): Promise<RemoveOutcome> {
    const { name } = this.toSpec(input, request.cwd);
    const { scope } = request;
    const roots = resolveScope(scope, this.scopeEnv);

    return this.manager.locks.withLock(name, scope, async lease => {
      if (!(await this.registry.exists(name, scope))) {
        throw new NotInstalledError(name, scope);
      }
      const env = this.manager.getEnvironment(name, scope, 'write');
      const linksRemoved = await this.teardown(env, roots, lease, true);
      return { name, scope, environment: env.path, linksRemoved };
    });
  }

  /**
   * Upgrade in place and re-link. A failed upgrade leaves environment and links as they were.
   */
  async update(input: string | PackageSpec, request: UpdateRequest): Promise<UpdateOutcome> {
    const spec = this.toSpec(input, request.cwd);
    const { scope } = request;
    const roots = resolveScope(scope, this.scopeEnv);

    return withScopeUmask(scope, () =>
      this.manager.locks.withLock(spec.name, scope, async lease => {
        if (!(await this.registry.exists(spec.name, scope))) {
          throw new NotInstalledError(spec.name, scope);
        }
        const env = this.manager.getEnvironment(spec.name, scope, 'write');
        await this.manager.upgradePackage(env, spec, { lease });

        const executables = await discoverExecutables(env);
        const { added, removed } = await reconcileLinks(env, executables, roots.linkDir, {
          force: request.forceLinks
        });
        return {
          name: spec.name,
          scope,
          version: await this.installedVersion(env),
          executables,
          linksAdded: added,
          linksRemoved: removed,
          ...this.linkTarget(roots)
        };
      })
    );
  }

  /**
   * Installed packages across scopes. A scope that cannot be read becomes a warning.
   */
  async list(options: { scopes?: readonly InstallScope[] } = {}): Promise<ListOutcome> {
    const scopes = options.scopes ?? INSTALL_SCOPES;
    const summaries: PackageSummary[] = [];
    const warnings: string[] = [];

    for (const scope of scopes) {
      try {
        for await (const summary of this.registry.list(scope)) {
          summaries.push(summary);
        }
      } catch (error) {
        if (!(error instanceof VenvboxError)) {
          throw error;
        }
        warnings.push(`Could not read ${scope} packages: ${error.message}`);
      }
    }

    const scopesByName = new Map<string, Set<InstallScope>>();
    for (const summary of summaries) {
      const seen = scopesByName.get(summary.name) ?? new Set<InstallScope>();
      seen.add(summary.scope);
      scopesByName.set(summary.name, seen);
    }

    return {
      packages: summaries.map(summary => ({
        ...summary,
        shadowed: (scopesByName.get(summary.name)?.size ?? 0) > 1
      })),
      warnings
    };
  }
}
