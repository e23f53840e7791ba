/**
 * Error taxonomy for the memory & retrieval engine.
 *
 * Every failure the core surfaces is an AppError with:
 * - a broad category (`type`) used for logging,
 * - a stable machine-readable `code` the HTTP layer forwards to clients,
 * - an HTTP status and optional metadata.
 *
 * Read-path errors are thrown to the caller as-is; write-path errors are
 * absorbed by the persistence queue.
 */
export type AppErrorType =
  | "DomainError"
  | "InfrastructureError"
  | "AppError"
  | "ValidationError";

export type ErrorCode =
  | "INVALID_INPUT"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INDEX_UNAVAILABLE"
  | "INDEX_BUILD_FAILED"
  | "CONTEXT_UNAVAILABLE"
  | "STORE_UNAVAILABLE"
  | "TIMEOUT"
  | "GENERATION_UNAVAILABLE"
  | "INTERNAL_ERROR";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly code: ErrorCode;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata,
    code: ErrorCode = "INTERNAL_ERROR",
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.type = type;
    this.code = code;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class DomainError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata,
    code: ErrorCode = "INTERNAL_ERROR",
    cause?: unknown
  ) {
    super(message, "DomainError", statusCode, metadata, code, cause);
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata,
    code: ErrorCode = "INTERNAL_ERROR",
    cause?: unknown
  ) {
    super(message, "InfrastructureError", statusCode, metadata, code, cause);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata, "VALIDATION_ERROR");
    } else {
      super(message, "ValidationError", 400, statusOrMeta, "VALIDATION_ERROR");
    }
  }
}

/** Empty message, malformed key, unknown role. Rejected before any side effect. */
export class InvalidInputError extends DomainError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, 400, metadata, "INVALID_INPUT");
  }
}

export class NotFoundError extends DomainError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, 404, metadata, "NOT_FOUND");
  }
}

export type IndexUnavailableReason = "not_built" | "empty";

export class IndexUnavailableError extends DomainError {
  public readonly reason: IndexUnavailableReason;

  constructor(reason: IndexUnavailableReason, metadata?: AppErrorMetadata) {
    super(
      reason === "not_built"
        ? "Product index has not been built yet"
        : "Product index is empty",
      503,
      { reason, ...metadata },
      "INDEX_UNAVAILABLE"
    );
    this.reason = reason;
  }
}

/** The only build attempted so far failed, so no generation is live. */
export class IndexBuildFailedError extends DomainError {
  constructor(buildError: string, metadata?: AppErrorMetadata) {
    super(
      "Product index build failed and no previous index is available",
      503,
      { buildError, ...metadata },
      "INDEX_BUILD_FAILED"
    );
  }
}

export class ContextUnavailableError extends DomainError {
  constructor(message: string, cause?: unknown, metadata?: AppErrorMetadata) {
    super(message, 503, metadata, "CONTEXT_UNAVAILABLE", cause);
  }
}

export class StoreUnavailableError extends InfrastructureError {
  constructor(operation: string, cause?: unknown, metadata?: AppErrorMetadata) {
    super(
      `Persistence backend unavailable during ${operation}`,
      503,
      { operation, ...metadata },
      "STORE_UNAVAILABLE",
      cause
    );
  }
}

export class TimeoutError extends InfrastructureError {
  constructor(operation: string, timeoutMs: number) {
    super(
      `${operation} exceeded its ${timeoutMs}ms deadline`,
      504,
      { operation, timeoutMs },
      "TIMEOUT"
    );
  }
}

export class GenerationUnavailableError extends InfrastructureError {
  constructor(message: string, cause?: unknown, metadata?: AppErrorMetadata) {
    super(message, 502, metadata, "GENERATION_UNAVAILABLE", cause);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
