/**
 * Execution Context Types
 *
 * Per-invocation state shared by every command: the target scope,
 * user interaction switches, and the ports used for output and prompts.
 */

import type { InstallScope } from './index.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PromptPort } from '../core/ports/prompt.js';
import type { ScopeEnvironment } from '../core/scope-resolution.js';

export interface ExecutionContext {
  /** Scope mutating commands operate on (--system selects 'system') */
  scope: InstallScope;

  /** --assumeyes: answer yes to every confirmation */
  assumeYes: boolean;

  /** True when prompts can reach a terminal */
  interactive: boolean;

  /** Host facts scope resolution depends on */
  scopeEnv: ScopeEnvironment;

  output: OutputPort;
  prompt: PromptPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  system?: boolean;
  verbose?: boolean;
  assumeyes?: boolean;
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}
