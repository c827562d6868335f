import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "node:crypto";
import { createChildLogger } from "../logger";

const REQUEST_ID_HEADER = "X-Request-ID";

/** Upstream ids are echoed into headers and logs, so only plain tokens pass. */
const UPSTREAM_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

function upstreamRequestId(req: Request): string | undefined {
  const incoming = req.get(REQUEST_ID_HEADER)?.trim();
  return incoming && UPSTREAM_ID_PATTERN.test(incoming) ? incoming : undefined;
}

/**
 * Assign a request id (reusing a well-formed upstream X-Request-ID), bind it
 * into `req.log`, and echo it back in the response header.
 *
 * Completed requests are logged once on `finish`; uploads cut off by the
 * client never finish, so those are logged on `close` instead.
 */
export function requestTracing(req: Request, res: Response, next: NextFunction) {
  const requestId = upstreamRequestId(req) ?? randomUUID();

  req.requestId = requestId;
  req.log = createChildLogger({ requestId });

  res.setHeader(REQUEST_ID_HEADER, requestId);

  const start = Date.now();
  let finished = false;

  res.on("finish", () => {
    finished = true;
    const context = {
      method: req.method,
      url: req.originalUrl,
      status: res.statusCode,
      userId: req.userId,
      durationMs: Date.now() - start,
    };
    if (res.statusCode >= 500) {
      req.log.warn("request completed", context);
    } else {
      req.log.info("request completed", context);
    }
  });

  res.on("close", () => {
    if (finished) return;
    req.log.warn("request aborted by client", {
      method: req.method,
      url: req.originalUrl,
      durationMs: Date.now() - start,
    });
  });

  next();
}
