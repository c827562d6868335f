/**
 * Thumbnail Ingest
 *
 * Writes a JPEG/PNG under the static assets directory and points the video's
 * thumbnail at its plain (non-expiring) URL.
 */

import { mkdir, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import logger from "../../logger";
import { THUMBNAIL_CONTENT_TYPES, THUMBNAIL_EXTENSIONS } from "../../config/constants";
import type { PublicVideo, Video, VideoStore } from "../../storage/types";
import { errorMessage } from "../../utils/errors";
import { assertMediaType } from "../../utils/mediaType";
import { randomName } from "../../utils/random";
import { loadOwnedVideo } from "../videoService";
import type { SignedUrlResolver } from "../signedUrl";

export interface ThumbnailUpload {
  contentType: string;
  data: Buffer;
}

export interface ThumbnailIngestDeps {
  videos: VideoStore;
  resolver: SignedUrlResolver;
  assetsRoot: string;
  /** Origin the /assets route is served from, e.g. http://localhost:8091 */
  assetsBaseUrl: string;
  randomName?: () => string;
  now?: () => Date;
}

export function thumbnailUrl(baseUrl: string, filename: string): string {
  return new URL(`/assets/${filename}`, baseUrl).toString();
}

export class ThumbnailIngest {
  private readonly randomName: () => string;
  private readonly now: () => Date;

  constructor(private readonly deps: ThumbnailIngestDeps) {
    this.randomName = deps.randomName ?? randomName;
    this.now = deps.now ?? (() => new Date());
  }

  async authorize(videoId: string, userId: string): Promise<Video> {
    return loadOwnedVideo(this.deps.videos, videoId, userId);
  }

  /** Create the static assets directory if it does not exist yet. */
  async ensureAssetsRoot(): Promise<void> {
    await mkdir(this.deps.assetsRoot, { recursive: true });
  }

  async ingest(video: Video, upload: ThumbnailUpload): Promise<PublicVideo> {
    const { videos, resolver, assetsRoot, assetsBaseUrl } = this.deps;

    const mediaType = assertMediaType(upload.contentType, THUMBNAIL_CONTENT_TYPES);
    const filename = `${this.randomName()}${THUMBNAIL_EXTENSIONS[mediaType]}`;
    const filePath = join(assetsRoot, filename);

    await writeFile(filePath, upload.data, { flag: "wx" });

    const updated: Video = {
      ...video,
      thumbnailUrl: thumbnailUrl(assetsBaseUrl, filename),
      updatedAt: this.now(),
    };

    try {
      await videos.update(updated);
    } catch (err) {
      // The file is unreferenced without the metadata write
      await unlink(filePath).catch((unlinkErr: unknown) => {
        logger.error("[Thumbnail] Failed to remove unreferenced thumbnail", {
          filePath,
          error: errorMessage(unlinkErr),
        });
      });
      throw err;
    }

    logger.info("[Thumbnail] Stored thumbnail", { videoId: video.id, filename, bytes: upload.data.length });
    return resolver.resolveVideo(updated);
  }
}
