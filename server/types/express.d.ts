import type { Video } from "../storage/types";

interface RequestLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  fatal(message: string, context?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): RequestLogger;
}

declare global {
  namespace Express {
    interface Request {
      /** Unique request trace ID (from X-Request-ID header or generated) */
      requestId: string;
      /** Child logger with requestId pre-bound */
      log: RequestLogger;
      /** Subject of the validated bearer token */
      userId?: string;
      /** Video loaded and ownership-checked before an upload body is read */
      video?: Video;
      /** Aborted once a multipart body passes its byte ceiling */
      uploadSignal?: AbortSignal;
    }
  }
}

export {};
