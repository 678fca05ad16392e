/**
 * Base error classes for rowtree
 */

/**
 * Base error class for all rowtree errors
 * Provides consistent structure and context handling
 */
export abstract class RowtreeError extends Error {
  /**
   * Module where the error originated
   */
  public readonly module: string;

  /**
   * Operation being performed when error occurred
   */
  public readonly operation?: string | undefined;

  /**
   * Additional context information
   */
  public readonly context?: Record<string, unknown> | undefined;

  public readonly timestamp: Date;

  constructor(
    message: string,
    module: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.module = module;
    this.operation = operation;
    this.context = context;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to a structured object for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      module: this.module,
      operation: this.operation,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Generic error for wrapping unknown errors
 */
class GenericError extends RowtreeError {}

/**
 * Wrap an unknown error with module context. Rowtree errors pass through
 * unchanged.
 */
export function wrapError(
  error: unknown,
  module: string,
  operation: string,
  context?: Record<string, unknown>
): RowtreeError {
  if (error instanceof RowtreeError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new GenericError(message, module, operation, { ...context, cause });
}

/**
 * Type guard to check if an error is a RowtreeError
 */
export function isRowtreeError(error: unknown): error is RowtreeError {
  return error instanceof RowtreeError;
}
