/**
 * Custom Error Types
 * Structured errors for the answer pipeline and evaluation harness
 */

/**
 * Base error class for all FinRAG errors
 */
export class FinRagError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: unknown;
      context?: Record<string, unknown>;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = "FinRagError";
    this.code = code;
    this.context = options?.context;
    this.retryable = options?.retryable ?? false;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      retryable: this.retryable,
    };
  }
}

/**
 * Malformed rule table, lexicon, benchmark file or environment. Fatal at startup.
 */
export class ConfigError extends FinRagError {
  public readonly source?: string;

  constructor(message: string, options?: { source?: string; cause?: unknown; context?: Record<string, unknown> }) {
    super(message, "CONFIG_ERROR", {
      cause: options?.cause,
      context: { ...options?.context, source: options?.source },
      retryable: false,
    });
    this.name = "ConfigError";
    this.source = options?.source;
  }
}

/**
 * Out-of-range or malformed user profile input
 */
export class InvalidProfileError extends FinRagError {
  public readonly field: string;
  public readonly received?: unknown;

  constructor(message: string, field: string, received?: unknown) {
    super(message, "INVALID_PROFILE", { context: { field, received }, retryable: false });
    this.name = "InvalidProfileError";
    this.field = field;
    this.received = received;
  }
}

/**
 * Vector index could not be reached at all. Distinct from an empty result.
 */
export class IndexUnavailableError extends FinRagError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super(message, "INDEX_UNAVAILABLE", { ...options, retryable: true });
    this.name = "IndexUnavailableError";
  }
}

/**
 * Generation or embedding backend error. The synthesizer converts these into
 * an unanswerable answer after its single retry.
 */
export class BackendFailureError extends FinRagError {
  public readonly backend: string;

  constructor(
    message: string,
    backend: string,
    options?: { cause?: unknown; context?: Record<string, unknown>; retryable?: boolean }
  ) {
    super(message, "BACKEND_FAILURE", { retryable: true, ...options });
    this.name = "BackendFailureError";
    this.backend = backend;
  }
}

/**
 * A bounded external call ran past its deadline
 */
export class TimeoutError extends FinRagError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT", {
      context: { operation, timeoutMs },
      retryable: true,
    });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Payload from an adapter or backend failed schema validation
 */
export class ValidationError extends FinRagError {
  public readonly field?: string;

  constructor(message: string, options?: { field?: string; cause?: unknown; context?: Record<string, unknown> }) {
    super(message, "VALIDATION_ERROR", { cause: options?.cause, context: options?.context, retryable: false });
    this.name = "ValidationError";
    this.field = options?.field;
  }
}

export function isFinRagError(error: unknown): error is FinRagError {
  return error instanceof FinRagError;
}

/**
 * Type guard for retryable errors
 */
export function isRetryableError(error: unknown): boolean {
  if (isFinRagError(error)) {
    return error.retryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("econnreset") ||
      message.includes("econnrefused") ||
      message.includes("rate limit") ||
      message.includes("overloaded")
    );
  }

  return false;
}

/**
 * Wrap an unknown error into a FinRagError
 */
export function wrapError(error: unknown, defaultMessage = "Unknown error"): FinRagError {
  if (isFinRagError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new FinRagError(error.message || defaultMessage, "UNKNOWN_ERROR", {
      cause: error,
    });
  }

  return new FinRagError(typeof error === "string" ? error : defaultMessage, "UNKNOWN_ERROR");
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
