/**
 * Raised for bad command-line input: malformed durations, conflicting
 * flags, non-positive quantities. Reported as a single line, exit code 1.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Raised when the terminal cannot provide what a mode needs, such as raw
 * keyboard input on a piped stdin.
 */
export class TerminalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TerminalError';
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isTerminalError(error: unknown): error is TerminalError {
  return error instanceof TerminalError;
}
