import { VenvboxError, ErrorCodes, CommandResult, InstallScope, LogLevel } from '../types/index.js';
import { TOOL_OUTPUT_SUMMARY_LINES } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure modes of environment and link management
 */

export class AlreadyExistsError extends VenvboxError {
  constructor(public readonly path: string) {
    super(
      `Environment directory '${path}' already exists. Remove it first`,
      ErrorCodes.ALREADY_EXISTS,
      { path }
    );
    this.name = 'AlreadyExistsError';
  }
}

export class AlreadyInstalledError extends VenvboxError {
  constructor(packageName: string, scope: InstallScope) {
    super(`Package '${packageName}' is already installed (${scope} scope)`, ErrorCodes.ALREADY_INSTALLED, {
      packageName,
      scope
    });
    this.name = 'AlreadyInstalledError';
  }
}

export class NotInstalledError extends VenvboxError {
  constructor(packageName: string, scope: InstallScope) {
    super(`Package '${packageName}' is not installed (${scope} scope)`, ErrorCodes.NOT_INSTALLED, {
      packageName,
      scope
    });
    this.name = 'NotInstalledError';
  }
}

export class BusyError extends VenvboxError {
  constructor(packageName: string, scope: InstallScope, lockPath: string) {
    super(
      `Another operation on '${packageName}' (${scope} scope) is in progress. Try again once it has finished`,
      ErrorCodes.BUSY,
      { packageName, scope, lockPath }
    );
    this.name = 'BusyError';
  }
}

export class PermissionDeniedError extends VenvboxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Permission denied: ${message}`, ErrorCodes.PERMISSION_DENIED, details);
    this.name = 'PermissionDeniedError';
  }
}

/**
 * Failure of an external tool. Carries its exit code and captured output.
 */
export class ToolError extends VenvboxError {
  public readonly exitCode: number;
  public readonly command: string;
  public readonly output: string;

  constructor(
    summary: string,
    code: ErrorCodes,
    tool: { command: string; exitCode: number; output: string }
  ) {
    super(`${summary}: '${tool.command}' exited with code ${tool.exitCode}`, code, {
      command: tool.command,
      exitCode: tool.exitCode
    });
    this.name = 'ToolError';
    this.exitCode = tool.exitCode;
    this.command = tool.command;
    this.output = tool.output;
  }
}

export class ProvisionError extends ToolError {
  constructor(summary: string, tool: { command: string; exitCode: number; output: string }) {
    super(summary, ErrorCodes.PROVISION_ERROR, tool);
    this.name = 'ProvisionError';
  }
}

export class InstallError extends ToolError {
  constructor(summary: string, tool: { command: string; exitCode: number; output: string }) {
    super(summary, ErrorCodes.INSTALL_ERROR, tool);
    this.name = 'InstallError';
  }
}

export class NameConflictError extends VenvboxError {
  constructor(public readonly names: string[], linkDir: string) {
    super(
      `Cannot link ${names.map(n => `'${n}'`).join(', ')}: already present in ${linkDir} and not owned by this package`,
      ErrorCodes.NAME_CONFLICT,
      { names, linkDir }
    );
    this.name = 'NameConflictError';
  }
}

export class MetadataError extends VenvboxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.METADATA_ERROR, details);
    this.name = 'MetadataError';
  }
}

export class FileSystemError extends VenvboxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends VenvboxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends VenvboxError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Node's system errors carry a string `code` such as ENOENT.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function summarizeToolOutput(output: string): string {
  const lines = output.split('\n').filter(line => line.trim().length > 0);
  return lines.slice(-TOOL_OUTPUT_SUMMARY_LINES).join('\n');
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown, options: { verbose?: boolean } = {}): CommandResult {
  if (error instanceof ToolError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    let message = error.message;
    const output = error.output.trim();
    if (output) {
      message += options.verbose
        ? `\n${output}`
        : `\n${summarizeToolOutput(output)}\nRe-run with --verbose to see the complete output.`;
    }
    return { success: false, error: message };
  } else if (error instanceof VenvboxError) {
    // For CLI UX, avoid noisy error logs by default; surface details only in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return { success: false, error: error.message };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return { success: false, error: error.message };
  }
  logger.debug('Unknown error occurred', { error });
  return { success: false, error: 'An unknown error occurred' };
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      // Cancelled by the user: exit without an error message
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error, { verbose: logger.getLevel() === LogLevel.DEBUG });
      console.error(result.error);
      process.exit(1);
    }
  };
}
