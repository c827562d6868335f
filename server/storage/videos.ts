import { desc, eq } from "drizzle-orm";
import { videos, type VideoRow } from "@shared/schema";
import type { Database } from "../db";
import { NotFoundError, StoreError } from "../utils/errors";
import { encodeStoredReference, loadStoredReference } from "./reference";
import type { CreateVideo, Video, VideoStore } from "./types";

/**
 * Map a database row to the domain type, decoding the stored reference.
 * A malformed reference loads as such; resolving it is what fails.
 */
export function toVideo(row: VideoRow): Video {
  return {
    id: row.id,
    userId: row.userId,
    title: row.title,
    description: row.description,
    thumbnailUrl: row.thumbnailUrl,
    videoRef: loadStoredReference(row.videoUrl),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

async function withStoreError<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof NotFoundError) throw err;
    throw new StoreError(`Failed to ${operation}`, { cause: err });
  }
}

/** PostgreSQL-backed video metadata. */
export class DrizzleVideoStore implements VideoStore {
  constructor(private readonly db: Database) {}

  async get(id: string): Promise<Video> {
    const [row] = await withStoreError("load video", async () =>
      this.db.select().from(videos).where(eq(videos.id, id)).limit(1)
    );
    if (!row) {
      throw new NotFoundError("Video", id);
    }
    return toVideo(row);
  }

  async create(data: CreateVideo): Promise<Video> {
    const [row] = await withStoreError("create video", async () =>
      this.db
        .insert(videos)
        .values({ userId: data.userId, title: data.title, description: data.description })
        .returning()
    );
    if (!row) {
      throw new StoreError("Insert returned no row");
    }
    return toVideo(row);
  }

  async update(video: Video): Promise<void> {
    await withStoreError("update video", async () =>
      this.db
        .update(videos)
        .set({
          title: video.title,
          description: video.description,
          thumbnailUrl: video.thumbnailUrl,
          videoUrl: video.videoRef ? encodeStoredReference(video.videoRef) : null,
          updatedAt: video.updatedAt,
        })
        .where(eq(videos.id, video.id))
    );
  }

  async delete(id: string): Promise<void> {
    await withStoreError("delete video", async () => this.db.delete(videos).where(eq(videos.id, id)));
  }

  async listByOwner(userId: string): Promise<Video[]> {
    const rows = await withStoreError("list videos", async () =>
      this.db.select().from(videos).where(eq(videos.userId, userId)).orderBy(desc(videos.createdAt))
    );
    return rows.map(toVideo);
  }
}
