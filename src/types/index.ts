/**
 * Common types and interfaces for the venvbox CLI application
 */

export * from './execution-context.js';

/** Install scope: the invoking user only, or every user of the host. */
export type InstallScope = 'user' | 'system';

export const INSTALL_SCOPES: readonly InstallScope[] = ['user', 'system'];

// Core application types
export interface VenvboxConfig {
  python?: string;
  creator?: EnvironmentCreator;
  upgradeInstaller?: boolean;
  lockStaleMs?: number;
  userBinDir?: string;
  systemRoot?: string;
  systemBinDir?: string;
}

export type EnvironmentCreator = 'venv' | 'virtualenv';

/**
 * Filesystem roots a scope resolves to.
 */
export interface ScopeRoots {
  scope: InstallScope;
  /** Directory holding one environment per package */
  envRoot: string;
  /** Shared directory the executables get linked into */
  linkDir: string;
  /** Directory holding the per-package lock directories */
  lockDir: string;
}

// Package spec types

export interface IndexPackageSpec {
  kind: 'index';
  raw: string;
  name: string;
  version?: string;
}

export interface VcsPackageSpec {
  kind: 'vcs';
  raw: string;
  name: string;
  url: string;
}

export interface PathPackageSpec {
  kind: 'path';
  raw: string;
  name: string;
  /** Absolute directory path */
  path: string;
}

export type PackageSpec = IndexPackageSpec | VcsPackageSpec | PathPackageSpec;

/**
 * An isolated environment owned by exactly one package.
 */
export interface Environment {
  name: string;
  scope: InstallScope;
  path: string;
  binDir: string;
  interpreter: string;
  installer: string;
}

export interface DistributionInfo {
  name: string;
  version: string;
}

export interface ToolResult {
  exitCode: number;
  /** Combined stdout and stderr */
  output: string;
}

export interface ToolInvocation {
  command: string;
  args: string[];
  env?: Record<string, string>;
  cwd?: string;
}

/**
 * Runs an external tool to completion. Never rejects on a non-zero exit code.
 */
export type ToolRunner = (invocation: ToolInvocation) => Promise<ToolResult>;

// Command result types

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class VenvboxError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'VenvboxError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  ALREADY_EXISTS = 'ALREADY_EXISTS',
  ALREADY_INSTALLED = 'ALREADY_INSTALLED',
  NOT_INSTALLED = 'NOT_INSTALLED',
  BUSY = 'BUSY',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  PROVISION_ERROR = 'PROVISION_ERROR',
  INSTALL_ERROR = 'INSTALL_ERROR',
  NAME_CONFLICT = 'NAME_CONFLICT',
  METADATA_ERROR = 'METADATA_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
