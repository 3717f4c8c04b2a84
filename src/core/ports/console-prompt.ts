/**
 * Non-Interactive Prompt Adapter (Default/CI)
 *
 * PromptPort implementation that throws on any prompt attempt. Used when stdin
 * is not a terminal or CI=true.
 */

import type { PromptPort } from './prompt.js';

export class NonInteractivePromptError extends Error {
  constructor(question: string) {
    super(
      `Cannot ask "${question}" in non-interactive mode. ` +
      `Pass --assumeyes to answer yes to every confirmation.`
    );
    this.name = 'NonInteractivePromptError';
  }
}

export const nonInteractivePrompt: PromptPort = {
  async confirm(message: string): Promise<boolean> {
    throw new NonInteractivePromptError(message);
  }
};
