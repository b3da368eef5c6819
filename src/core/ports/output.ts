/**
 * Output Port Interface
 *
 * Contract for all user-facing output. Core logic reports through this
 * interface instead of writing to the console directly.
 *
 * Implementations:
 *   - consoleOutput: plain console.log (default, CI, pipes)
 *   - createClackOutput (CLI): @clack/prompts log API for terminals
 */
export interface OutputPort {
  /** Display an informational message */
  info(message: string): void;

  /** Display a step/section indicator */
  step(message: string): void;

  /** Display a plain message */
  message(message: string): void;

  /** Display a success message */
  success(message: string): void;

  /** Display an error message */
  error(message: string): void;

  /** Display a warning message */
  warn(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;
}
