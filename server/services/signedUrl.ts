import { SIGNED_URL_EXPIRY_MS } from "../config/constants";
import { requireObjectReference } from "../storage/reference";
import type { ObjectStore, PublicVideo, Video } from "../storage/types";
import { SigningFailure } from "../utils/errors";

/**
 * Turns stored object references into time-boxed playback URLs. Only the
 * returned copy carries the URL; the stored record keeps its reference.
 */
export class SignedUrlResolver {
  constructor(
    private readonly objectStore: ObjectStore,
    private readonly expiresInMs: number = SIGNED_URL_EXPIRY_MS
  ) {}

  async resolveVideo(video: Video): Promise<PublicVideo> {
    const { videoRef, ...rest } = video;
    if (!videoRef) {
      return { ...rest, videoUrl: null };
    }
    const { bucket, key } = requireObjectReference(videoRef);

    let videoUrl: string;
    try {
      videoUrl = await this.objectStore.presignGet(bucket, key, this.expiresInMs);
    } catch (err) {
      if (err instanceof SigningFailure) throw err;
      throw new SigningFailure("Failed to generate presigned URL", { cause: err });
    }
    return { ...rest, videoUrl };
  }

  /** Resolves every video; the first failure aborts the batch. */
  async resolveVideos(videos: Video[]): Promise<PublicVideo[]> {
    return Promise.all(videos.map((video) => this.resolveVideo(video)));
  }
}
