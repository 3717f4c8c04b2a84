/**
 * Output Port Interface
 *
 * Contract for all user-facing output. Commands write through this port instead
 * of calling console.log or @clack/prompts directly.
 *
 * Implementations:
 *   - ClackOutputAdapter (CLI, interactive): routes to @clack/prompts
 *   - consoleOutput (default/CI): plain console lines
 */

/**
 * Spinner shared by every output backend.
 */
export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  success(message: string): void;

  error(message: string): void;

  warn(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;

  /** Create a spinner for long-running tool invocations */
  spinner(): UnifiedSpinner;
}
