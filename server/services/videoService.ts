/**
 * Video Metadata Service
 *
 * Create, read, list and delete video records. Reads always return the
 * signed form of a video.
 */

import type { CreateVideoInput } from "@shared/schema";
import logger from "../logger";
import type { PublicVideo, Video, VideoStore } from "../storage/types";
import { ForbiddenError } from "../utils/errors";
import type { SignedUrlResolver } from "./signedUrl";

/** Load a video and require `userId` to own it. */
export async function loadOwnedVideo(store: VideoStore, videoId: string, userId: string): Promise<Video> {
  const video = await store.get(videoId);
  if (video.userId !== userId) {
    throw new ForbiddenError("User is not the video owner");
  }
  return video;
}

export class VideoService {
  constructor(
    private readonly store: VideoStore,
    private readonly resolver: SignedUrlResolver
  ) {}

  async createVideo(userId: string, input: CreateVideoInput): Promise<Video> {
    const video = await this.store.create({
      userId,
      title: input.title,
      description: input.description ?? "",
    });
    logger.info("[Videos] Created video", { videoId: video.id, userId });
    return video;
  }

  async getVideo(videoId: string): Promise<PublicVideo> {
    const video = await this.store.get(videoId);
    return this.resolver.resolveVideo(video);
  }

  async listVideos(userId: string): Promise<PublicVideo[]> {
    const videos = await this.store.listByOwner(userId);
    return this.resolver.resolveVideos(videos);
  }

  /**
   * Deletes the record only. Uploaded objects and thumbnails stay in storage.
   */
  async deleteVideo(userId: string, videoId: string): Promise<void> {
    const video = await loadOwnedVideo(this.store, videoId, userId);
    await this.store.delete(videoId);
    // The stored object is left in the bucket
    logger.info("[Videos] Deleted video", { videoId, userId, orphanedObject: video.videoRef ?? undefined });
  }
}
