/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console implementation of OutputPort, safe for pipes and CI logs.
 * Errors and warnings go to stderr so that stdout stays parseable.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  step(message: string): void {
    console.log(message);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  error(message: string): void {
    console.error(`✗ ${message}`);
  },

  warn(message: string): void {
    console.error(`⚠ ${message}`);
  },

  note(content: string, title?: string): void {
    if (title) {
      console.log(`\n${title}\n${content}`);
    } else {
      console.log(`\n${content}`);
    }
  },

  spinner(): UnifiedSpinner {
    let msg = '';
    return {
      start(message: string) {
        msg = message;
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.log(`✓ ${finalMessage ?? msg}`);
      },
      message(text: string) {
        msg = text;
      }
    };
  }
};
