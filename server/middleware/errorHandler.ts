import type { ErrorRequestHandler } from "express";
import multer from "multer";
import { Errors, sendError } from "../utils/apiError";
import { AppError, ValidationError } from "../utils/errors";

interface HttpClientError {
  status: number;
  type: string;
  message: string;
}

/** body-parser failures carry a 4xx `status` and a `type` such as "entity.parse.failed". */
function isHttpClientError(err: unknown): err is HttpClientError {
  return (
    err instanceof Error &&
    "status" in err &&
    typeof err.status === "number" &&
    err.status >= 400 &&
    err.status < 500 &&
    "type" in err &&
    typeof err.type === "string"
  );
}

const SIZE_LIMIT_CODES = new Set<string>(["LIMIT_FILE_SIZE", "LIMIT_FIELD_VALUE"]);

export function toAppError(err: unknown): AppError | undefined {
  if (err instanceof AppError) return err;

  if (err instanceof multer.MulterError) {
    if (SIZE_LIMIT_CODES.has(err.code)) {
      return new ValidationError(err.message, { cause: err, details: { field: err.field } }, "PAYLOAD_TOO_LARGE", 413);
    }
    return new ValidationError(err.message, { cause: err, details: { field: err.field } }, "INVALID_MULTIPART");
  }

  if (isHttpClientError(err)) {
    return new ValidationError(err.message, { cause: err }, "INVALID_BODY", err.status);
  }

  return undefined;
}

/**
 * Maps thrown errors to the `{ error, message, details? }` envelope.
 * Server-side causes go to the request log only.
 */
export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const appError = toAppError(err);

  if (!appError) {
    req.log.error("Unhandled error", { error: err });
    Errors.internal(res);
    return;
  }

  if (appError.category === "server-side") {
    req.log.error("Request failed", { code: appError.code, error: appError, details: appError.details });
    sendError(res, appError.statusCode, appError.code, appError.message);
    return;
  }

  req.log.warn("Request rejected", { code: appError.code, status: appError.statusCode, message: appError.message });
  sendError(res, appError.statusCode, appError.code, appError.message, appError.details);
};
