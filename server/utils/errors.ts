/**
 * Error taxonomy for the API.
 *
 * Every failure a route can surface is an {@link AppError}: a machine-readable
 * code, an HTTP status, a caller-facing category and the wrapped cause. The
 * error handler turns these into the standard `{ error, message }` envelope;
 * causes are only written to the operator log.
 */

export type ErrorCategory =
  | "authentication"
  | "authorization"
  | "not-found"
  | "bad-input"
  | "server-side";

export interface AppErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class AppError extends Error {
  readonly details?: Record<string, unknown>;

  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly category: ErrorCategory,
    options: AppErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details;
  }
}

export class UnauthenticatedError extends AppError {
  constructor(message = "Authentication required.", options?: AppErrorOptions) {
    super("UNAUTHORIZED", message, 401, "authentication", options);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = "Insufficient permissions.", options?: AppErrorOptions) {
    super("FORBIDDEN", message, 403, "authorization", options);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: string, options?: AppErrorOptions) {
    super(
      "NOT_FOUND",
      id !== undefined ? `${resource} with id '${id}' not found` : `${resource} not found`,
      404,
      "not-found",
      options
    );
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: AppErrorOptions, code = "VALIDATION_ERROR", statusCode = 400) {
    super(code, message, statusCode, "bad-input", options);
  }
}

export class UnsupportedMediaTypeError extends ValidationError {
  constructor(received: string, allowed: readonly string[]) {
    super(
      `Unsupported media type '${received}'. Allowed: ${allowed.join(", ")}`,
      { details: { received, allowed: [...allowed] } },
      "UNSUPPORTED_MEDIA_TYPE",
      415
    );
  }
}

export class PayloadTooLargeError extends ValidationError {
  constructor(limitBytes: number, options?: AppErrorOptions) {
    super(
      `Upload exceeds the ${limitBytes} byte limit`,
      { ...options, details: { limitBytes } },
      "PAYLOAD_TOO_LARGE",
      413
    );
  }
}

export class ProbeFailure extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("PROBE_FAILED", message, 500, "server-side", options);
  }
}

export class RemuxFailure extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("REMUX_FAILED", message, 500, "server-side", options);
  }
}

export class UploadFailure extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("UPLOAD_FAILED", message, 500, "server-side", options);
  }
}

export class InvalidReferenceFormatError extends AppError {
  constructor(raw: string) {
    super("INVALID_REFERENCE_FORMAT", "Stored video reference is malformed", 500, "server-side", {
      details: { reference: raw },
    });
  }
}

export class SigningFailure extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("SIGNING_FAILED", message, 500, "server-side", options);
  }
}

export class StoreError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super("STORE_ERROR", message, 500, "server-side", options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
