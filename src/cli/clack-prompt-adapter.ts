/**
 * Clack Prompt Adapter
 *
 * PromptPort implementation backed by @clack/prompts. Ctrl-C on a question
 * becomes a UserCancellationError, which the command wrapper exits 0 on.
 */

import * as clack from '@clack/prompts';
import type { PromptPort } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const result = await clack.confirm({
        message,
        initialValue: initial ?? false
      });
      if (clack.isCancel(result)) {
        clack.cancel('Operation cancelled.');
        throw new UserCancellationError('Operation cancelled by user');
      }
      return result;
    }
  };
}
