/**
 * Base error class for all comment-sieve errors
 */
export class CommentSieveError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CommentSieveError";
    // Maintains proper stack trace for where error was thrown (V8 only)
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or JSON output
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Raised when a dialect name does not resolve to a registered dialect
 */
export class UnsupportedDialectError extends CommentSieveError {
  constructor(public readonly dialect: string) {
    super(`Unsupported language: ${dialect}`, "UNSUPPORTED_DIALECT", { dialect });
    this.name = "UnsupportedDialectError";
  }
}

/**
 * Error for schema validation failures
 */
export class ValidationError extends CommentSieveError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for unreadable input files
 */
export class ParseError extends CommentSieveError {
  constructor(
    message: string,
    public readonly filePath: string,
    context?: Record<string, unknown>
  ) {
    super(message, "PARSE_ERROR", { ...context, filePath });
    this.name = "ParseError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends CommentSieveError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}
