/**
 * Core Ports
 *
 * The boundary between command logic and the terminal.
 */

export type { OutputPort, UnifiedSpinner } from './output.js';
export type { PromptPort } from './prompt.js';
export { consoleOutput } from './console-output.js';
export { nonInteractivePrompt, NonInteractivePromptError } from './console-prompt.js';
