import { execFile } from 'child_process';
import { promisify } from 'util';

import type { ToolInvocation, ToolResult, ToolRunner } from '../types/index.js';
import { logger } from './logger.js';

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/** Exit code shells report for a command that cannot be found. */
const COMMAND_NOT_FOUND = 127;

interface ExecFailure {
  code?: unknown;
  stdout?: unknown;
  stderr?: unknown;
  message?: unknown;
}

function asExecFailure(error: unknown): ExecFailure {
  if (typeof error !== 'object' || error === null) {
    return {};
  }
  return {
    code: 'code' in error ? error.code : undefined,
    stdout: 'stdout' in error ? error.stdout : undefined,
    stderr: 'stderr' in error ? error.stderr : undefined,
    message: 'message' in error ? error.message : undefined
  };
}

function joinOutput(stdout: unknown, stderr: unknown): string {
  return [stdout, stderr]
    .map(stream => (typeof stream === 'string' ? stream : ''))
    .filter(text => text.length > 0)
    .join('\n');
}

/**
 * Render a command line for logs and error messages, quoting parts with spaces.
 */
export function describeCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map(part => (/[\s"']/.test(part) ? `"${part.replace(/"/g, '\\"')}"` : part))
    .join(' ');
}

/**
 * Default ToolRunner: runs the tool with execFile and never rejects on a non-zero exit.
 */
export const runTool: ToolRunner = async (invocation: ToolInvocation): Promise<ToolResult> => {
  const { command, args, env, cwd } = invocation;
  const commandLine = describeCommand(command, args);
  logger.debug(`Running command ${commandLine}`);

  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd,
      env: env ? { ...process.env, ...env } : process.env,
      maxBuffer: MAX_OUTPUT_BYTES,
      encoding: 'utf8'
    });
    return { exitCode: 0, output: joinOutput(stdout, stderr) };
  } catch (error) {
    const failure = asExecFailure(error);
    let exitCode: number;
    let output = joinOutput(failure.stdout, failure.stderr);

    if (typeof failure.code === 'number') {
      exitCode = failure.code;
    } else if (failure.code === 'ENOENT') {
      exitCode = COMMAND_NOT_FOUND;
      output = output || `${command}: command not found`;
    } else {
      exitCode = 1;
      output = output || String(failure.message ?? error);
    }

    logger.debug(`Command ${commandLine} failed with exit code ${exitCode}`);
    if (output) {
      logger.debug(`Complete output from command ${commandLine}:\n${output}`);
    }
    return { exitCode, output };
  }
};
