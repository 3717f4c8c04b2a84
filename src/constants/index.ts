/**
 * Shared constants for the venvbox CLI application
 * This file provides a single source of truth for directory names,
 * tool arguments, and other constants used throughout the application.
 */

export const DIR_PATTERNS = {
  VENVBOX: '.venvbox',
  LOCAL_BIN: '.local/bin'
} as const;

export const VENVBOX_DIRS = {
  VENVS: 'venvs',
  LOCKS: '.locks'
} as const;

export const SYSTEM_PATHS = {
  ROOT: '/opt/venvbox',
  BIN: '/usr/local/bin'
} as const;

/**
 * Layout inside a single environment (relative to the environment root).
 */
export const ENVIRONMENT_LAYOUT = {
  BIN: 'bin',
  INTERPRETER: 'python',
  INSTALLER: 'pip'
} as const;

export const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'] as const;

export const ENV_VARS = {
  HOME: 'VENVBOX_HOME',
  BIN_DIR: 'VENVBOX_BIN_DIR',
  SYSTEM_ROOT: 'VENVBOX_SYSTEM_ROOT',
  SYSTEM_BIN_DIR: 'VENVBOX_SYSTEM_BIN_DIR',
  PYTHON: 'VENVBOX_PYTHON',
  VERBOSE: 'VENVBOX_VERBOSE'
} as const;

export const DEFAULTS = {
  PYTHON: 'python3',
  CREATOR: 'venv',
  UPGRADE_INSTALLER: true,
  LOCK_STALE_MS: 10000
} as const;

/** Distributions every fresh environment carries besides the installed package. */
export const BOOTSTRAP_DISTRIBUTIONS = ['pip', 'setuptools', 'wheel'] as const;

/** Number of trailing tool output lines shown when not verbose. */
export const TOOL_OUTPUT_SUMMARY_LINES = 5;

export const LOCK_SUFFIX = '.lock';
