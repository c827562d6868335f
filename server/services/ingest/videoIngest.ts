/**
 * Video Ingest Pipeline
 *
 * stage → fast-start rewrite → probe → durable upload → persist reference.
 *
 * Authentication and ownership are settled before the upload is staged
 * (see {@link VideoIngestPipeline.authorize}); {@link VideoIngestPipeline.publish}
 * takes ownership of the staged upload and removes it on every exit path.
 */

import { rm } from "node:fs/promises";
import logger from "../../logger";
import { VIDEO_CONTENT_TYPE } from "../../config/constants";
import type { ObjectReference, ObjectStore, PublicVideo, Video, VideoStore } from "../../storage/types";
import { errorMessage } from "../../utils/errors";
import { assertMediaType } from "../../utils/mediaType";
import { randomName } from "../../utils/random";
import { loadOwnedVideo } from "../videoService";
import type { SignedUrlResolver } from "../signedUrl";
import {
  FileUploadSource,
  getVideoAspectRatio,
  uploadWithRetry,
  type AspectRatioClass,
  type MediaInspector,
  type MediaRewriter,
  type Sleep,
} from "../video";
import { discardStaged, type StagedUpload } from "./staging";

export interface VideoIngestDeps {
  videos: VideoStore;
  objectStore: ObjectStore;
  inspector: MediaInspector;
  rewriter: MediaRewriter;
  resolver: SignedUrlResolver;
  bucket: string;
  sleep?: Sleep;
  randomName?: () => string;
  now?: () => Date;
}

export interface PublishRequest {
  video: Video;
  upload: StagedUpload;
  signal?: AbortSignal;
}

/** Object key: `{aspect ratio}/{random}.mp4`. */
export function videoObjectKey(aspectRatio: AspectRatioClass, name: string): string {
  return `${aspectRatio}/${name}.mp4`;
}

export class VideoIngestPipeline {
  private readonly randomName: () => string;
  private readonly now: () => Date;

  constructor(private readonly deps: VideoIngestDeps) {
    this.randomName = deps.randomName ?? randomName;
    this.now = deps.now ?? (() => new Date());
  }

  /** Load the target video and require the caller to own it. No file I/O. */
  async authorize(videoId: string, userId: string): Promise<Video> {
    return loadOwnedVideo(this.deps.videos, videoId, userId);
  }

  async publish({ video, upload, signal }: PublishRequest): Promise<PublicVideo> {
    const { videos, objectStore, inspector, rewriter, resolver, bucket, sleep } = this.deps;
    let rewrittenPath: string | undefined;

    try {
      assertMediaType(upload.contentType, [VIDEO_CONTENT_TYPE]);

      logger.info("[Ingest] Processing video for fast start", {
        videoId: video.id,
        sizeBytes: upload.size,
      });
      rewrittenPath = await rewriter.rewriteForFastStart(upload.path, { signal });

      const aspectRatio = await getVideoAspectRatio(inspector, rewrittenPath, { signal });
      const key = videoObjectKey(aspectRatio, this.randomName());
      logger.info("[Ingest] Detected aspect ratio", { videoId: video.id, aspectRatio, key });

      await uploadWithRetry({
        store: objectStore,
        source: new FileUploadSource(rewrittenPath),
        bucket,
        key,
        contentType: VIDEO_CONTENT_TYPE,
        sleep,
        signal,
      });

      const videoRef: ObjectReference = { bucket, key };
      const updated: Video = { ...video, videoRef, updatedAt: this.now() };
      await videos.update(updated);
      logger.info("[Ingest] Published video", { videoId: video.id, bucket, key });

      return await resolver.resolveVideo(updated);
    } finally {
      if (rewrittenPath) {
        await rm(rewrittenPath, { force: true }).catch((err: unknown) => {
          logger.error("[Ingest] Failed to remove rewritten file", {
            path: rewrittenPath,
            error: errorMessage(err),
          });
        });
      }
      await discardStaged(upload);
    }
  }
}
