/**
 * Clack Output Adapter
 *
 * OutputPort implementation that routes to @clack/prompts for interactive
 * terminal sessions.
 */

import { log, note as clackNote, spinner as clackSpinner } from '@clack/prompts';
import type { OutputPort, UnifiedSpinner } from '../core/ports/output.js';

export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        }
      };
    }
  };
}
