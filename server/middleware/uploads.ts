/**
 * Multipart parsers
 *
 * Videos stream straight to a staging directory; thumbnails are small enough
 * to buffer. The declared media type is checked before any bytes are stored.
 */

import multer, { type FileFilterCallback } from "multer";
import type { Request, RequestHandler } from "express";
import {
  MAX_FORM_FIELD_BYTES,
  MAX_FORM_FIELDS,
  MAX_PART_HEADER_PAIRS,
  MAX_THUMBNAIL_UPLOAD_BYTES,
  MAX_VIDEO_UPLOAD_BYTES,
  MULTIPART_OVERHEAD_BYTES,
  THUMBNAIL_CONTENT_TYPES,
  THUMBNAIL_FORM_FIELD,
  VIDEO_CONTENT_TYPE,
  VIDEO_FORM_FIELD,
} from "../config/constants";
import { createStagingStorage } from "../services/ingest/staging";
import { PayloadTooLargeError, errorMessage } from "../utils/errors";
import { assertMediaType } from "../utils/mediaType";

function acceptMediaTypes(allowed: readonly string[]) {
  return (_req: Request, file: Express.Multer.File, callback: FileFilterCallback) => {
    let rejection: Error | undefined;
    try {
      assertMediaType(file.mimetype, allowed);
    } catch (err) {
      rejection = err instanceof Error ? err : new Error(errorMessage(err));
    }
    if (rejection) {
      callback(rejection);
    } else {
      callback(null, true);
    }
  };
}

function formLimits(fileSize: number): multer.Options["limits"] {
  return {
    fileSize,
    files: 1,
    fields: MAX_FORM_FIELDS,
    fieldSize: MAX_FORM_FIELD_BYTES,
    parts: MAX_FORM_FIELDS + 1,
    headerPairs: MAX_PART_HEADER_PAIRS,
  };
}

/**
 * Count every byte `parse` reads from the request, chunked bodies included.
 * Past `limitBytes` the parser is cut off, `req.uploadSignal` aborts so
 * staging stops, and the request fails with PayloadTooLargeError. The rest of
 * the body is drained and discarded.
 */
export function limitBodyBytes(limitBytes: number, parse: RequestHandler): RequestHandler {
  return (req, res, next) => {
    const controller = new AbortController();
    req.uploadSignal = controller.signal;

    let received = 0;
    let settled = false;

    const settle = (err?: unknown) => {
      if (settled) return;
      settled = true;
      req.off("data", count);
      next(err);
    };

    const count = (chunk: Buffer) => {
      received += chunk.length;
      if (received <= limitBytes) return;
      const error = new PayloadTooLargeError(limitBytes);
      req.unpipe();
      req.resume();
      controller.abort(error);
      settle(error);
    };

    // Attached in the same tick parse pipes the request, so no chunk is missed
    req.on("data", count);
    parse(req, res, settle);
  };
}

/** Single `video` file, staged to disk. `stagingRoot` defaults to the OS temp dir. */
export function videoUpload(stagingRoot?: string): RequestHandler {
  const parse = multer({
    storage: createStagingStorage(stagingRoot),
    limits: formLimits(MAX_VIDEO_UPLOAD_BYTES),
    fileFilter: acceptMediaTypes([VIDEO_CONTENT_TYPE]),
  }).single(VIDEO_FORM_FIELD);
  return limitBodyBytes(MAX_VIDEO_UPLOAD_BYTES, parse);
}

/** Single `thumbnail` image, buffered in memory. */
export function thumbnailUpload(): RequestHandler {
  const parse = multer({
    storage: multer.memoryStorage(),
    limits: formLimits(MAX_THUMBNAIL_UPLOAD_BYTES),
    fileFilter: acceptMediaTypes(THUMBNAIL_CONTENT_TYPES),
  }).single(THUMBNAIL_FORM_FIELD);
  return limitBodyBytes(MAX_THUMBNAIL_UPLOAD_BYTES + MULTIPART_OVERHEAD_BYTES, parse);
}
