/**
 * Executable symlink reconciliation
 *
 * A link in the shared link directory belongs to a package when its target lies
 * under that package's environment bin directory. That test, applied to the
 * directory contents on every run, is the only record of which links a package
 * owns.
 */

import { promises as fs } from 'fs';
import { basename, dirname, join, relative, resolve, sep } from 'path';

import type { Environment } from '../../types/index.js';
import { FileSystemError, NameConflictError, getErrorCode } from '../../utils/errors.js';
import { ensureDir, exists, listEntries, lstatOrNull, unlinkIfExists } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

export interface OwnedLink {
  /** Link name inside the link directory */
  name: string;
  /** Absolute path of the link itself */
  path: string;
  /** Absolute, resolved link target */
  target: string;
}

export interface ReconcileOptions {
  /** Replace stale links into environments that no longer exist */
  force?: boolean;
}

export interface ReconcileResult {
  added: string[];
  removed: string[];
  unchanged: string[];
}

let tempCounter = 0;

/**
 * Ownership test: is this (resolved) link target inside the environment's bin directory?
 */
export function isOwnedBy(env: Environment, target: string): boolean {
  return resolve(target).startsWith(env.binDir + sep);
}

async function readLinkTarget(linkPath: string): Promise<string | null> {
  try {
    const raw = await fs.readlink(linkPath);
    return resolve(dirname(linkPath), raw);
  } catch (error) {
    // EINVAL: not a symlink; ENOENT: removed while scanning
    if (getErrorCode(error) === 'EINVAL' || getErrorCode(error) === 'ENOENT') {
      return null;
    }
    throw new FileSystemError(`Failed to read link: ${linkPath}`, { error });
  }
}

/**
 * Every link in linkDir owned by the environment, sorted by name.
 */
export async function findOwnedLinks(env: Environment, linkDir: string): Promise<OwnedLink[]> {
  const owned: OwnedLink[] = [];
  for (const name of (await listEntries(linkDir)).sort()) {
    const path = join(linkDir, name);
    const target = await readLinkTarget(path);
    if (target !== null && isOwnedBy(env, target)) {
      owned.push({ name, path, target });
    }
  }
  return owned;
}

/**
 * Point linkPath at target, replacing whatever link is there in one rename.
 */
async function replaceSymlink(target: string, linkPath: string): Promise<void> {
  const tempPath = join(dirname(linkPath), `.${basename(linkPath)}.venvbox-${process.pid}-${tempCounter++}`);
  try {
    await fs.symlink(target, tempPath);
    await fs.rename(tempPath, linkPath);
  } catch (error) {
    await unlinkIfExists(tempPath);
    throw new FileSystemError(`Failed to link ${linkPath} -> ${target}`, { error });
  }
}

/**
 * Create a new link, failing if the name got taken since planning.
 */
async function createSymlink(target: string, linkPath: string, linkDir: string): Promise<void> {
  try {
    await fs.symlink(target, linkPath);
  } catch (error) {
    if (getErrorCode(error) === 'EEXIST') {
      throw new NameConflictError([basename(linkPath)], linkDir);
    }
    throw new FileSystemError(`Failed to link ${linkPath} -> ${target}`, { error });
  }
}

/**
 * A link is stale when it points at `<envRoot>/<pkg>/bin/...` of the same scope
 * and `<envRoot>/<pkg>` is gone. Other dangling links belong to someone else.
 */
export async function isStaleEnvironmentLink(linkPath: string, envRoot: string): Promise<boolean> {
  const target = await readLinkTarget(linkPath);
  if (target === null || !target.startsWith(envRoot + sep)) {
    return false;
  }
  const [pkg, bin, ...rest] = relative(envRoot, target).split(sep);
  if (!pkg || bin !== 'bin' || rest.length === 0) {
    return false;
  }
  return !(await exists(join(envRoot, pkg)));
}

/**
 * Make the environment's links in linkDir match the desired executables exactly.
 *
 * Plans the whole change before touching anything: names occupied by entries the
 * environment does not own fail with NameConflictError and nothing changes. With
 * force, links into removed environments of the same root are replaced; nothing
 * else is.
 *
 * @param desired - Absolute paths of executables inside env.binDir
 */
export async function reconcileLinks(
  env: Environment,
  desired: string[],
  linkDir: string,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const desiredByName = new Map<string, string>();
  for (const executable of desired) {
    if (!isOwnedBy(env, executable)) {
      throw new Error(`Executable ${executable} is outside ${env.binDir}`);
    }
    desiredByName.set(basename(executable), resolve(executable));
  }

  const envRoot = dirname(env.path);
  const owned = new Map(
    (await findOwnedLinks(env, linkDir)).map((link): [string, OwnedLink] => [link.name, link])
  );

  const toCreate: Array<[string, string]> = [];
  const toReplace: Array<[string, string]> = [];
  const unchanged: string[] = [];
  const conflicts: string[] = [];

  for (const [name, target] of desiredByName) {
    const current = owned.get(name);
    if (current) {
      if (current.target === target) {
        unchanged.push(name);
      } else {
        toReplace.push([name, target]);
      }
      continue;
    }

    const linkPath = join(linkDir, name);
    if ((await lstatOrNull(linkPath)) === null) {
      toCreate.push([name, target]);
    } else if (options.force && (await isStaleEnvironmentLink(linkPath, envRoot))) {
      logger.debug(`Replacing stale link ${linkPath}`);
      toReplace.push([name, target]);
    } else {
      conflicts.push(name);
    }
  }

  if (conflicts.length > 0) {
    throw new NameConflictError(conflicts, linkDir);
  }

  const removed: string[] = [];
  for (const link of owned.values()) {
    if (desiredByName.has(link.name)) continue;
    logger.debug(`Removing symlink: ${link.path}`);
    if (await unlinkIfExists(link.path)) {
      removed.push(link.name);
    }
  }

  if (toCreate.length > 0 || toReplace.length > 0) {
    await ensureDir(linkDir);
  }

  const added: string[] = [];
  for (const [name, target] of toReplace) {
    logger.debug(`Creating symlink: ${target} -> ${join(linkDir, name)}`);
    await replaceSymlink(target, join(linkDir, name));
    added.push(name);
  }
  for (const [name, target] of toCreate) {
    logger.debug(`Creating symlink: ${target} -> ${join(linkDir, name)}`);
    await createSymlink(target, join(linkDir, name), linkDir);
    added.push(name);
  }

  return { added: added.sort(), removed, unchanged };
}

/**
 * Remove every link the environment owns in linkDir. Returns the removed names.
 */
export async function unlinkAll(env: Environment, linkDir: string): Promise<string[]> {
  const { removed } = await reconcileLinks(env, [], linkDir);
  return removed;
}
