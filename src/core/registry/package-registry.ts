/**
 * Package Registry
 *
 * Answers "what is installed" by scanning the scope's environment root on every
 * call. Nothing is cached between calls and nothing is persisted.
 */

import type { InstallScope } from '../../types/index.js';
import { listDirectories } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import type { EnvironmentManager } from '../environment/environment-manager.js';
import { findOwnedLinks } from '../links/link-reconciler.js';
import { resolveScope } from '../scope-resolution.js';

interface PackageSummaryBase {
  name: string;
  scope: InstallScope;
  /** Environment directory */
  path: string;
  /** Names of links in the scope's link directory owned by this package */
  links: string[];
}

export interface HealthyPackageSummary extends PackageSummaryBase {
  status: 'ok';
  /** Distribution name as the installer reports it */
  distribution: string;
  version: string;
}

export interface DegradedPackageSummary extends PackageSummaryBase {
  status: 'degraded';
  reason: string;
}

export type PackageSummary = HealthyPackageSummary | DegradedPackageSummary;

export class PackageRegistry {
  constructor(private readonly manager: EnvironmentManager) {}

  /**
   * Installed packages of a scope. Lazy: every iteration starts a fresh scan.
   */
  list(scope: InstallScope): AsyncIterable<PackageSummary> {
    return {
      [Symbol.asyncIterator]: () => this.scan(scope)
    };
  }

  /**
   * Directory-existence check; unlocked and best-effort.
   */
  async exists(name: string, scope: InstallScope): Promise<boolean> {
    return this.manager.exists(name, scope);
  }

  private async *scan(scope: InstallScope): AsyncGenerator<PackageSummary> {
    const roots = resolveScope(scope, this.manager.scopeEnv, { access: 'read' });
    const names = (await listDirectories(roots.envRoot))
      .filter(name => !name.startsWith('.'))
      .sort();

    for (const name of names) {
      const env = this.manager.getEnvironment(name, scope);
      const links = (await findOwnedLinks(env, roots.linkDir)).map(link => link.name);
      const base = { name, scope, path: env.path, links };

      let summary: PackageSummary;
      try {
        const info = await this.manager.queryDistribution(env);
        summary = { ...base, status: 'ok', distribution: info.name, version: info.version };
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.debug(`Environment ${env.path} is degraded: ${reason}`);
        summary = { ...base, status: 'degraded', reason };
      }
      yield summary;
    }
  }
}
