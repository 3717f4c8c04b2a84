import { promises as fs, constants as fsConstants, Stats } from 'fs';
import { logger } from './logger.js';
import { FileSystemError, getErrorCode } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists (follows symlinks)
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * lstat that maps a missing path to null instead of throwing
 */
export async function lstatOrNull(path: string): Promise<Stats | null> {
  try {
    return await fs.lstat(path);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return null;
    }
    throw new FileSystemError(`Failed to inspect: ${path}`, { path, error });
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string, mode?: number): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true, mode });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text, or null when it does not exist
 */
export async function readTextFileIfExists(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, 'utf8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return null;
    }
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Remove a file, symlink or directory recursively. Missing paths are fine.
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * Unlink a single entry, tolerating its absence. Returns whether something was removed.
 */
export async function unlinkIfExists(path: string): Promise<boolean> {
  try {
    await fs.unlink(path);
    logger.debug(`Unlinked: ${path}`);
    return true;
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return false;
    }
    throw new FileSystemError(`Failed to unlink: ${path}`, { path, error });
  }
}

/**
 * List directories in a directory (non-recursive). A missing directory lists as empty.
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return [];
    }
    throw new FileSystemError(`Failed to list directories in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * List entry names in a directory (non-recursive). A missing directory lists as empty.
 */
export async function listEntries(dirPath: string): Promise<string[]> {
  try {
    return await fs.readdir(dirPath);
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return [];
    }
    throw new FileSystemError(`Failed to list directory: ${dirPath}`, { dirPath, error });
  }
}
