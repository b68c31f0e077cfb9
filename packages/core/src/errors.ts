/**
 * Core Error Classes
 *
 * @ontocache/core has no dependencies on other @ontocache packages, so the
 * validation error used by the parsers lives here rather than in utils.
 */

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends Error {
  public readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.context = context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }
}
