/**
 * Request guards for the video routes.
 *
 * Order on an upload route: video id → bearer token → ownership → body.
 * Every guard runs before multer touches the request stream.
 */

import type { NextFunction, Request, RequestHandler, Response } from "express";
import { z } from "zod";
import type { BearerAuthenticator } from "../auth/bearer";
import type { Video } from "../storage/types";
import { ForbiddenError, PayloadTooLargeError, UnauthenticatedError, ValidationError } from "../utils/errors";

const videoIdSchema = z.string().uuid("Video id must be a UUID");

export type OwnershipCheck = (videoId: string, userId: string) => Promise<Video>;

/** Reject a malformed `:videoId` route parameter. */
export function validateVideoId(req: Request, _res: Response, next: NextFunction) {
  const parsed = videoIdSchema.safeParse(req.params.videoId);
  if (!parsed.success) {
    throw new ValidationError("Invalid video id", {
      details: { issues: parsed.error.errors.map((issue) => issue.message) },
    });
  }
  next();
}

export function requireAuth(authenticator: BearerAuthenticator): RequestHandler {
  return (req, _res, next) => {
    req.userId = authenticator.validateBearerToken(req.get("authorization"));
    next();
  };
}

/**
 * Load `:videoId` and require the authenticated caller to own it.
 * The loaded record is left on `req.video`.
 */
export function authorizeVideoOwner(check: OwnershipCheck): RequestHandler {
  return async (req, _res, next) => {
    req.video = await check(req.params.videoId, currentUserId(req));
    next();
  };
}

/** Fail fast on a declared Content-Length above the ceiling. */
export function rejectOversizedBody(limitBytes: number): RequestHandler {
  return (req, _res, next) => {
    const declared = Number(req.headers["content-length"]);
    if (Number.isFinite(declared) && declared > limitBytes) {
      throw new PayloadTooLargeError(limitBytes);
    }
    next();
  };
}

export function currentUserId(req: Request): string {
  if (!req.userId) {
    throw new UnauthenticatedError();
  }
  return req.userId;
}

export function ownedVideo(req: Request): Video {
  if (!req.video) {
    throw new ForbiddenError("Video ownership has not been verified");
  }
  return req.video;
}
