/**
 * In-process stand-ins for the service's outside collaborators: the metadata
 * store, the object store and the ffmpeg/ffprobe binaries.
 */

import { copyFile } from "node:fs/promises";
import type { Readable } from "node:stream";
import { fastStartOutputPath } from "../../services/video/ffmpeg";
import type { MediaInspector, MediaRewriter, ProbeOutput, ToolOptions } from "../../services/video/types";
import type { CreateVideo, ObjectStore, Video, VideoStore } from "../../storage/types";
import { NotFoundError } from "../../utils/errors";

let idCounter = 0;

/** Deterministic UUIDs: 00000000-0000-4000-8000-000000000001, ... */
export function nextVideoId(): string {
  idCounter += 1;
  return `00000000-0000-4000-8000-${String(idCounter).padStart(12, "0")}`;
}

export function createVideoFixture(overrides: Partial<Video> = {}): Video {
  return {
    id: nextVideoId(),
    userId: "user-1",
    title: "Lecture recording",
    description: "",
    thumbnailUrl: null,
    videoRef: null,
    createdAt: new Date("2026-01-01T00:00:00.000Z"),
    updatedAt: new Date("2026-01-01T00:00:00.000Z"),
    ...overrides,
  };
}

export class InMemoryVideoStore implements VideoStore {
  readonly rows = new Map<string, Video>();
  updateError: Error | undefined;
  updates = 0;

  constructor(seed: Video[] = []) {
    for (const video of seed) this.rows.set(video.id, { ...video });
  }

  async get(id: string): Promise<Video> {
    const row = this.rows.get(id);
    if (!row) throw new NotFoundError("Video", id);
    return { ...row };
  }

  async create(data: CreateVideo): Promise<Video> {
    const video = createVideoFixture({ ...data, id: nextVideoId() });
    this.rows.set(video.id, video);
    return { ...video };
  }

  async update(video: Video): Promise<void> {
    if (this.updateError) throw this.updateError;
    if (!this.rows.has(video.id)) throw new NotFoundError("Video", video.id);
    this.updates += 1;
    this.rows.set(video.id, { ...video });
  }

  async delete(id: string): Promise<void> {
    this.rows.delete(id);
  }

  async listByOwner(userId: string): Promise<Video[]> {
    return [...this.rows.values()]
      .filter((video) => video.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }
}

export interface StoredObject {
  bucket: string;
  key: string;
  contentType: string;
  body: Buffer;
}

async function readAll(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

/**
 * Object store that keeps bodies in memory. `failures` puts fail before
 * consuming the body; `presignError` makes every presign fail.
 */
export class FakeObjectStore implements ObjectStore {
  readonly objects = new Map<string, StoredObject>();
  readonly presigned: Array<{ bucket: string; key: string; expiresInMs: number }> = [];
  putAttempts = 0;
  failures = 0;
  presignError: Error | undefined;

  async put(bucket: string, key: string, body: Readable, contentType: string): Promise<void> {
    this.putAttempts += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      throw new Error("object store unavailable");
    }
    this.objects.set(`${bucket}/${key}`, { bucket, key, contentType, body: await readAll(body) });
  }

  async presignGet(bucket: string, key: string, expiresInMs: number): Promise<string> {
    if (this.presignError) throw this.presignError;
    this.presigned.push({ bucket, key, expiresInMs });
    return `https://signed.example.test/${bucket}/${key}?X-Goog-Expires=${expiresInMs / 1000}`;
  }
}

/** Reports fixed stream geometry and records the paths it was asked about. */
export class FakeInspector implements MediaInspector {
  readonly inspected: string[] = [];
  error: Error | undefined;

  constructor(private readonly output: ProbeOutput = { streams: [{ width: 1280, height: 720, codec_type: "video" }] }) {}

  async inspect(inputPath: string, _options?: ToolOptions): Promise<ProbeOutput> {
    this.inspected.push(inputPath);
    if (this.error) throw this.error;
    return this.output;
  }
}

/** "Rewrites" by copying the input to its fast-start sibling path. */
export class CopyingRewriter implements MediaRewriter {
  readonly rewritten: string[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];
  error: Error | undefined;

  async rewriteForFastStart(inputPath: string, options: ToolOptions = {}): Promise<string> {
    this.signals.push(options.signal);
    if (this.error) throw this.error;
    const outputPath = fastStartOutputPath(inputPath);
    await copyFile(inputPath, outputPath);
    this.rewritten.push(outputPath);
    return outputPath;
  }
}
