/**
 * Storage Service
 *
 * Cloud Storage access for the video pipeline: streams processed uploads into
 * a bucket and signs short-lived read URLs for playback.
 */

import type { Readable, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { ObjectStore } from "../storage/types";
import { SigningFailure } from "../utils/errors";

// Processed media never changes after upload; keys are random per upload.
const MEDIA_CACHE_CONTROL = "private, max-age=31536000, immutable";

/** The slice of a Cloud Storage file handle used here. */
export interface CloudFile {
  createWriteStream(options: {
    resumable: boolean;
    contentType: string;
    metadata: { cacheControl: string };
  }): Writable;
  getSignedUrl(config: { version: "v4"; action: "read"; expires: number }): Promise<[string]>;
}

/** Satisfied by `getStorage()` from firebase-admin/storage. */
export interface CloudStorage {
  bucket(name: string): { file(name: string): CloudFile };
}

export class CloudStorageObjectStore implements ObjectStore {
  constructor(private readonly storage: CloudStorage) {}

  /**
   * Upload a stream to `bucket/key`. Uses a single-request upload so a failed
   * attempt leaves no resumable session behind.
   */
  async put(bucket: string, key: string, body: Readable, contentType: string): Promise<void> {
    const file = this.storage.bucket(bucket).file(key);
    await pipeline(
      body,
      file.createWriteStream({
        resumable: false,
        contentType,
        metadata: { cacheControl: MEDIA_CACHE_CONTROL },
      })
    );
  }

  /**
   * Generate a V4 signed GET URL. The URL carries `X-Goog-Expires`.
   */
  async presignGet(bucket: string, key: string, expiresInMs: number): Promise<string> {
    try {
      const [url] = await this.storage.bucket(bucket).file(key).getSignedUrl({
        version: "v4",
        action: "read",
        expires: Date.now() + expiresInMs,
      });
      return url;
    } catch (err) {
      throw new SigningFailure("Failed to generate presigned URL", { cause: err });
    }
  }
}
