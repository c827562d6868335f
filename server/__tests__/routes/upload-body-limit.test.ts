/**
 * @fileoverview Body ceilings on the upload routes, with the video ceiling
 * lowered to 4 KiB so chunked bodies can cross it cheaply.
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from "vitest";
import { once } from "node:events";
import { mkdir, mkdtemp, readdir, rm } from "node:fs/promises";
import type { Server } from "node:http";
import { tmpdir } from "node:os";
import { join } from "node:path";
import jwt from "jsonwebtoken";
import { createApp } from "../../app";
import { JwtAuthenticator } from "../../auth/bearer";
import { parseEnv } from "../../config/env";
import { buildServices } from "../../container";
import { CopyingRewriter, FakeInspector, FakeObjectStore, InMemoryVideoStore, createVideoFixture } from "../helpers/fakes";
import type { Video } from "../../storage/types";

vi.mock("../../config/constants", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../config/constants")>()),
  MAX_VIDEO_UPLOAD_BYTES: 4096,
}));

const SECRET = "test-secret";
const BOUNDARY = "clipvault-test-boundary";

function bearer(userId: string): string {
  return `Bearer ${jwt.sign({}, SECRET, { algorithm: "HS256", subject: userId, expiresIn: "5m" })}`;
}

function videoPart(bytes: number): string {
  return (
    `--${BOUNDARY}\r\n` +
    `Content-Disposition: form-data; name="video"; filename="clip.mp4"\r\n` +
    `Content-Type: video/mp4\r\n\r\n` +
    "v".repeat(bytes) +
    `\r\n--${BOUNDARY}--\r\n`
  );
}

/** A streamed body: sent with Transfer-Encoding: chunked and no Content-Length. */
function chunked(...chunks: string[]): ReadableStream<Uint8Array> {
  return new ReadableStream({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(new TextEncoder().encode(chunk));
      controller.close();
    },
  });
}

describe("upload body ceilings", () => {
  let workDir: string;
  let stagingRoot: string;
  let server: Server;
  let baseUrl: string;
  let videos: InMemoryVideoStore;
  let objectStore: FakeObjectStore;
  let video: Video;

  beforeAll(async () => {
    workDir = await mkdtemp(join(tmpdir(), "body-limit-test-"));
    stagingRoot = join(workDir, "staging");
    const config = parseEnv({
      NODE_ENV: "test",
      DATABASE_URL: "postgres://unused",
      JWT_SECRET: "test-secret-test-secret-test-secret",
      STORAGE_BUCKET: "media",
      ASSETS_ROOT: join(workDir, "assets"),
    });

    videos = new InMemoryVideoStore();
    objectStore = new FakeObjectStore();
    const services = buildServices({
      config,
      auth: new JwtAuthenticator(SECRET),
      store: videos,
      objectStore,
      inspector: new FakeInspector(),
      rewriter: new CopyingRewriter(),
    });
    await mkdir(stagingRoot);

    server = createApp(services, config, { stagingRoot }).listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server did not bind a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.close();
    await once(server, "close");
    await rm(workDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    video = createVideoFixture({ userId: "owner-1" });
    videos.rows.set(video.id, video);
  });

  function upload(body: ReadableStream<Uint8Array> | FormData, contentType?: string) {
    const headers: Record<string, string> = { Authorization: bearer("owner-1") };
    if (contentType) headers["Content-Type"] = contentType;
    return fetch(`${baseUrl}/api/video_upload/${video.id}`, {
      method: "POST",
      headers,
      body,
      duplex: "half",
    });
  }

  it("rejects a chunked body past the ceiling even when the file part is small", async () => {
    // Preamble text before the first boundary is legal and ignored by the parser
    const res = await upload(
      chunked("p".repeat(5000) + "\r\n", videoPart(100)),
      `multipart/form-data; boundary=${BOUNDARY}`
    );

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({
      error: "PAYLOAD_TOO_LARGE",
      message: "Upload exceeds the 4096 byte limit",
      details: { limitBytes: 4096 },
    });
    expect(objectStore.objects.size).toBe(0);
    expect((await videos.get(video.id)).videoRef).toBeNull();
    expect(await readdir(stagingRoot)).toEqual([]);
  });

  it("accepts a chunked body under the ceiling", async () => {
    const res = await upload(chunked(videoPart(100)), `multipart/form-data; boundary=${BOUNDARY}`);

    expect(res.status).toBe(200);
    expect((await videos.get(video.id)).videoRef).toEqual({
      bucket: "media",
      key: expect.stringMatching(/^landscape\//),
    });
    expect(await readdir(stagingRoot)).toEqual([]);
  });

  it("rejects an oversized text field", async () => {
    const form = new FormData();
    form.append("note", "n".repeat(2000));

    const res = await upload(form);

    expect(res.status).toBe(413);
    expect(await res.json()).toMatchObject({ error: "PAYLOAD_TOO_LARGE", details: { field: "note" } });
  });

  it("rejects too many text fields", async () => {
    const form = new FormData();
    for (let i = 0; i < 9; i++) form.append(`field${i}`, "x");

    const res = await upload(form);

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "INVALID_MULTIPART" });
  });
});
