import { promises as fs } from 'fs';
import { join } from 'path';
import { isJunk } from 'junk';

import type { Environment } from '../../types/index.js';
import { FileSystemError, getErrorCode } from '../../utils/errors.js';
import { lstatOrNull } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/**
 * Files every environment carries in its bin directory that belong to the
 * environment itself rather than to the installed package.
 */
const INTERNAL_EXECUTABLES: readonly RegExp[] = [
  /^python(\d+(\.\d+)?)?w?$/,
  /^pip(\d+(\.\d+)?)?$/,
  /^easy_install(-\d+(\.\d+)?)?$/,
  /^wheel$/,
  /^activate(\..+|_this\.py)?$/i,
  /^deactivate(\..+)?$/i
];

const ANY_EXECUTE_BIT = 0o111;

export function isInternalExecutable(name: string): boolean {
  return INTERNAL_EXECUTABLES.some(pattern => pattern.test(name));
}

/**
 * Regular executable files directly inside the environment's bin directory,
 * minus the environment's own tooling. Sorted absolute paths; a missing or
 * empty directory yields an empty list.
 */
export async function discoverExecutables(env: Environment): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(env.binDir);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT' || getErrorCode(error) === 'ENOTDIR') {
      logger.debug(`No bin directory in ${env.path}`);
      return [];
    }
    throw new FileSystemError(`Failed to list executables in ${env.binDir}`, { error });
  }

  const executables: string[] = [];
  for (const name of names.sort()) {
    if (isJunk(name) || isInternalExecutable(name)) {
      continue;
    }
    const path = join(env.binDir, name);
    const stats = await lstatOrNull(path);
    if (stats && stats.isFile() && (stats.mode & ANY_EXECUTE_BIT) !== 0) {
      executables.push(path);
    }
  }

  logger.debug(`Discovered ${executables.length} executable(s) in ${env.binDir}`, { executables });
  return executables;
}
