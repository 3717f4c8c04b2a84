/**
 * Prompt Port Interface
 *
 * Contract for interactive questions. Every question venvbox asks is a yes/no
 * confirmation that --assumeyes can answer up front.
 *
 * Implementations:
 *   - ClackPromptAdapter (CLI): routes to @clack/prompts
 *   - nonInteractivePrompt (CI/default): throws on prompt attempts
 */

export interface PromptPort {
  /** Prompt for a yes/no confirmation */
  confirm(message: string, initial?: boolean): Promise<boolean>;
}
