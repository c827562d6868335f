import type { Readable } from "node:stream";

/** Location of an object in the object store. */
export interface ObjectReference {
  bucket: string;
  key: string;
}

/**
 * A stored reference that does not decode into bucket and key. It is kept
 * verbatim so the row can still be loaded, re-uploaded over or deleted;
 * only resolving it to a URL fails.
 */
export interface MalformedReference {
  malformed: string;
}

export type StoredReference = ObjectReference | MalformedReference;

export interface Video {
  id: string;
  userId: string;
  title: string;
  description: string;
  thumbnailUrl: string | null;
  videoRef: StoredReference | null;
  createdAt: Date;
  updatedAt: Date;
}

/** A video as returned to callers: the reference replaced by a signed playback URL. */
export interface PublicVideo extends Omit<Video, "videoRef"> {
  videoUrl: string | null;
}

export type CreateVideo = {
  userId: string;
  title: string;
  description: string;
};

export interface VideoStore {
  /** Throws NotFoundError when no row matches. */
  get(id: string): Promise<Video>;
  create(data: CreateVideo): Promise<Video>;
  update(video: Video): Promise<void>;
  delete(id: string): Promise<void>;
  listByOwner(userId: string): Promise<Video[]>;
}

export interface ObjectStore {
  put(bucket: string, key: string, body: Readable, contentType: string): Promise<void>;
  presignGet(bucket: string, key: string, expiresInMs: number): Promise<string>;
}
