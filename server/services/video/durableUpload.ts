/**
 * Video processing: Durable Upload
 *
 * Puts a local file into the object store with bounded retries. Each attempt
 * starts from byte 0 of a freshly opened stream, so a partially consumed
 * stream from a failed attempt can never produce a truncated object.
 */

import { open } from "node:fs/promises";
import type { Readable } from "node:stream";
import { setTimeout as delay } from "node:timers/promises";
import logger from "../../logger";
import { UPLOAD_BACKOFF_STEP_MS, UPLOAD_MAX_ATTEMPTS } from "../../config/constants";
import type { ObjectStore } from "../../storage/types";
import { UploadFailure, errorMessage } from "../../utils/errors";

export interface UploadSource {
  /** Returns a stream positioned at the start of the content. */
  rewind(): Promise<Readable>;
}

export class FileUploadSource implements UploadSource {
  constructor(readonly path: string) {}

  async rewind(): Promise<Readable> {
    const handle = await open(this.path, "r");
    return handle.createReadStream({ start: 0 });
  }
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface DurableUploadRequest {
  store: ObjectStore;
  source: UploadSource;
  bucket: string;
  key: string;
  contentType: string;
  maxAttempts?: number;
  sleep?: Sleep;
  signal?: AbortSignal;
}

/** Linear backoff: nothing before attempt 1, then (attempt - 1) steps. */
export function backoffBeforeAttempt(attempt: number): number {
  return (attempt - 1) * UPLOAD_BACKOFF_STEP_MS;
}

export async function uploadWithRetry(request: DurableUploadRequest): Promise<void> {
  const {
    store,
    source,
    bucket,
    key,
    contentType,
    maxAttempts = UPLOAD_MAX_ATTEMPTS,
    sleep = defaultSleep,
    signal,
  } = request;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const wait = backoffBeforeAttempt(attempt);
    if (wait > 0) {
      try {
        await sleep(wait, signal);
      } catch (err) {
        throw new UploadFailure("Upload cancelled during backoff", { cause: err });
      }
    }
    if (signal?.aborted) {
      throw new UploadFailure("Upload cancelled", { cause: signal.reason });
    }

    let body: Readable;
    try {
      body = await source.rewind();
    } catch (err) {
      throw new UploadFailure("Failed to rewind upload source", { cause: err });
    }

    try {
      await store.put(bucket, key, body, contentType);
      if (attempt > 1) {
        logger.info("[Upload] Succeeded after retry", { bucket, key, attempt });
      }
      return;
    } catch (err) {
      lastError = err;
      logger.warn("[Upload] Attempt failed", {
        bucket,
        key,
        attempt,
        maxAttempts,
        error: errorMessage(err),
      });
    } finally {
      body.destroy();
    }
  }

  throw new UploadFailure(`Upload failed after ${maxAttempts} attempts`, { cause: lastError });
}
