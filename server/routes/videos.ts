/**
 * Video routes
 *
 *   POST   /api/videos                      create (bearer)
 *   GET    /api/videos                      caller's videos, signed (bearer)
 *   GET    /api/videos/:videoId             one video, signed (public)
 *   DELETE /api/videos/:videoId             delete (bearer + owner)
 *   POST   /api/thumbnail_upload/:videoId   multipart `thumbnail` (bearer + owner)
 *   POST   /api/video_upload/:videoId       multipart `video` (bearer + owner)
 */

import { Router, type Response } from "express";
import { insertVideoSchema } from "@shared/schema";
import type { AppServices } from "../container";
import { MAX_VIDEO_UPLOAD_BYTES, THUMBNAIL_FORM_FIELD, VIDEO_FORM_FIELD } from "../config/constants";
import {
  authorizeVideoOwner,
  currentUserId,
  ownedVideo,
  rejectOversizedBody,
  requireAuth,
  validateVideoId,
} from "../middleware/auth";
import { thumbnailUpload, videoUpload } from "../middleware/uploads";
import { stagedFromMulter } from "../services/ingest/staging";
import { Errors } from "../utils/apiError";
import { ValidationError } from "../utils/errors";

/** Aborts when the client goes away before the response is written. */
export function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

export interface VideosRouterOptions {
  /** Parent directory for upload staging; defaults to the OS temp dir */
  stagingRoot?: string;
}

export function createVideosRouter(services: AppServices, options: VideosRouterOptions = {}): Router {
  const router = Router();
  const authenticate = requireAuth(services.auth);

  router.post("/videos", authenticate, async (req, res) => {
    const parsed = insertVideoSchema.safeParse(req.body);
    if (!parsed.success) {
      Errors.validation(res, parsed.error.flatten());
      return;
    }
    const video = await services.videos.createVideo(currentUserId(req), parsed.data);
    res.status(201).json(video);
  });

  router.get("/videos", authenticate, async (req, res) => {
    const videos = await services.videos.listVideos(currentUserId(req));
    res.json(videos);
  });

  router.get("/videos/:videoId", validateVideoId, async (req, res) => {
    const video = await services.videos.getVideo(req.params.videoId);
    res.json(video);
  });

  router.delete("/videos/:videoId", validateVideoId, authenticate, async (req, res) => {
    await services.videos.deleteVideo(currentUserId(req), req.params.videoId);
    res.status(204).end();
  });

  router.post(
    "/thumbnail_upload/:videoId",
    validateVideoId,
    authenticate,
    authorizeVideoOwner((videoId, userId) => services.thumbnailIngest.authorize(videoId, userId)),
    thumbnailUpload(),
    async (req, res) => {
      if (!req.file?.buffer) {
        throw new ValidationError(`Missing '${THUMBNAIL_FORM_FIELD}' file field`);
      }
      const video = await services.thumbnailIngest.ingest(ownedVideo(req), {
        contentType: req.file.mimetype,
        data: req.file.buffer,
      });
      res.json(video);
    }
  );

  router.post(
    "/video_upload/:videoId",
    validateVideoId,
    authenticate,
    rejectOversizedBody(MAX_VIDEO_UPLOAD_BYTES),
    authorizeVideoOwner((videoId, userId) => services.videoIngest.authorize(videoId, userId)),
    videoUpload(options.stagingRoot),
    async (req, res) => {
      const video = ownedVideo(req);
      const upload = stagedFromMulter(req.file);
      if (!upload) {
        throw new ValidationError(`Missing '${VIDEO_FORM_FIELD}' file field`);
      }
      const published = await services.videoIngest.publish({
        video,
        upload,
        signal: abortOnDisconnect(res),
      });
      res.json(published);
    }
  );

  return router;
}
