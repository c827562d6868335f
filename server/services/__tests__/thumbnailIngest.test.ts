import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ThumbnailIngest, thumbnailUrl } from "../ingest/thumbnailIngest";
import { SignedUrlResolver } from "../signedUrl";
import {
  FakeObjectStore,
  InMemoryVideoStore,
  createVideoFixture,
} from "../../__tests__/helpers/fakes";
import type { Video } from "../../storage/types";

const NOW = new Date("2026-05-02T08:30:00.000Z");
const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47]);

describe("thumbnailUrl", () => {
  it("joins the assets route onto the base", () => {
    expect(thumbnailUrl("http://localhost:8091", "abc.png")).toBe("http://localhost:8091/assets/abc.png");
  });

  it("ignores any path on the base", () => {
    expect(thumbnailUrl("https://cdn.example.test/ignored/", "abc.jpg")).toBe("https://cdn.example.test/assets/abc.jpg");
  });
});

describe("ThumbnailIngest", () => {
  let assetsRoot: string;
  let videos: InMemoryVideoStore;
  let video: Video;
  let ingest: ThumbnailIngest;

  beforeEach(async () => {
    assetsRoot = await mkdtemp(join(tmpdir(), "thumbnail-test-"));
    video = createVideoFixture({ userId: "owner-1", videoRef: { bucket: "media", key: "landscape/v.mp4" } });
    videos = new InMemoryVideoStore([video]);
    ingest = new ThumbnailIngest({
      videos,
      resolver: new SignedUrlResolver(new FakeObjectStore()),
      assetsRoot,
      assetsBaseUrl: "http://localhost:8091",
      randomName: () => "thumbName",
      now: () => NOW,
    });
  });

  afterEach(async () => {
    await rm(assetsRoot, { recursive: true, force: true });
  });

  it("stores a PNG and points the video at it", async () => {
    const result = await ingest.ingest(video, { contentType: "image/png", data: PNG_BYTES });

    expect(await readFile(join(assetsRoot, "thumbName.png"))).toEqual(PNG_BYTES);
    expect(result.thumbnailUrl).toBe("http://localhost:8091/assets/thumbName.png");
    expect(result.updatedAt).toEqual(NOW);
    expect((await videos.get(video.id)).thumbnailUrl).toBe("http://localhost:8091/assets/thumbName.png");
  });

  it("uses .jpg for JPEG and accepts parameters on the content type", async () => {
    await ingest.ingest(video, { contentType: "Image/JPEG; charset=binary", data: PNG_BYTES });

    expect(await readdir(assetsRoot)).toEqual(["thumbName.jpg"]);
  });

  it("returns the signed video", async () => {
    const result = await ingest.ingest(video, { contentType: "image/png", data: PNG_BYTES });

    expect(result.videoUrl).toBe("https://signed.example.test/media/landscape/v.mp4?X-Goog-Expires=900");
  });

  it("rejects a GIF without writing anything", async () => {
    await expect(ingest.ingest(video, { contentType: "image/gif", data: PNG_BYTES })).rejects.toMatchObject({
      code: "UNSUPPORTED_MEDIA_TYPE",
      statusCode: 415,
      message: "Unsupported media type 'image/gif'. Allowed: image/jpeg, image/png",
    });
    expect(await readdir(assetsRoot)).toEqual([]);
    expect((await videos.get(video.id)).thumbnailUrl).toBeNull();
  });

  it("removes the file when the metadata update fails", async () => {
    videos.updateError = new Error("db down");

    await expect(ingest.ingest(video, { contentType: "image/png", data: PNG_BYTES })).rejects.toThrow("db down");
    expect(await readdir(assetsRoot)).toEqual([]);
  });

  it("ensureAssetsRoot creates nested directories", async () => {
    const nested = new ThumbnailIngest({
      videos,
      resolver: new SignedUrlResolver(new FakeObjectStore()),
      assetsRoot: join(assetsRoot, "a", "b"),
      assetsBaseUrl: "http://localhost:8091",
    });

    await nested.ensureAssetsRoot();

    expect(await readdir(join(assetsRoot, "a"))).toEqual(["b"]);
  });
});
