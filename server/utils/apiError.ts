import type { Response } from "express";

/**
 * Standardized API Error Response
 *
 * All error responses from the server follow this structure:
 *
 *  {
 *    "error":   "MACHINE_READABLE_CODE",        // UPPER_SNAKE_CASE, always present
 *    "message": "Human-readable description.",   // always present
 *    "details": { ... }                          // optional: validation issues, field info, etc.
 *  }
 */
export interface ApiErrorBody {
  error: string;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Send a standardized JSON error response.
 */
export function sendError(
  res: Response,
  status: number,
  error: string,
  message: string,
  details?: Record<string, unknown>
): Response {
  const body: ApiErrorBody = { error, message };
  if (details && Object.keys(details).length > 0) body.details = details;
  return res.status(status).json(body);
}

// ============================================================================
// Convenience helpers
// ============================================================================

export const Errors = {
  /** 400 Validation failed (includes Zod issues in details) */
  validation: (res: Response, issues: unknown, error = "VALIDATION_ERROR", message = "Request validation failed.") =>
    sendError(res, 400, error, message, { issues }),

  /** 404 Unknown route */
  notFound: (res: Response, error = "NOT_FOUND", message = "Resource not found.") =>
    sendError(res, 404, error, message),

  /** 500 Internal Server Error */
  internal: (res: Response, error = "INTERNAL_ERROR", message = "An unexpected error occurred.") =>
    sendError(res, 500, error, message),
} as const;
