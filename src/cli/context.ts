/**
 * CLI Context Factory
 *
 * Builds the ExecutionContext every command handler runs with: host facts for
 * scope resolution, the loaded config, and CLI-specific ports (Clack when
 * interactive, plain console otherwise).
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { ConfigManager } from '../core/config.js';
import { consoleOutput, nonInteractivePrompt, type OutputPort, type PromptPort } from '../core/ports/index.js';
import { getUserDataRoot, type ScopeEnvironment } from '../core/scope-resolution.js';
import { LogLevel } from '../types/index.js';
import { getHomeDirectory } from '../utils/home-directory.js';
import { logger } from '../utils/logger.js';
import { createClackOutput } from './clack-output-adapter.js';
import { createClackPrompt } from './clack-prompt-adapter.js';

/** Cached port singletons for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;
let cachedClackPrompt: PromptPort | undefined;

function getCliPorts(isInteractive: boolean): { output: OutputPort; prompt: PromptPort } {
  if (isInteractive) {
    cachedClackOutput ??= createClackOutput();
    cachedClackPrompt ??= createClackPrompt();
    return { output: cachedClackOutput, prompt: cachedClackPrompt };
  }
  return { output: consoleOutput, prompt: nonInteractivePrompt };
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdin.isTTY === true && process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Capture the host facts scope resolution depends on, including the user's config.
 */
export async function loadScopeEnvironment(): Promise<ScopeEnvironment> {
  const base = {
    homeDir: getHomeDirectory(),
    uid: process.geteuid?.(),
    env: { ...process.env }
  };
  const config = await new ConfigManager(getUserDataRoot(base)).load();
  return { ...base, config };
}

export async function createCliExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  if (options.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const interactive = detectInteractive(options.interactive);
  const ctx: ExecutionContext = {
    scope: options.system ? 'system' : 'user',
    assumeYes: options.assumeyes === true,
    interactive,
    scopeEnv: await loadScopeEnvironment(),
    ...getCliPorts(interactive)
  };

  logger.debug('Created execution context', {
    scope: ctx.scope,
    interactive: ctx.interactive,
    assumeYes: ctx.assumeYes
  });
  return ctx;
}

/**
 * Ask a yes/no question unless --assumeyes already answered it.
 */
export async function confirmOrAssume(ctx: ExecutionContext, message: string, initial = false): Promise<boolean> {
  if (ctx.assumeYes) {
    return true;
  }
  return ctx.prompt.confirm(message, initial);
}
