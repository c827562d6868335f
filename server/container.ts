/**
 * Service container
 *
 * Every collaborator is constructed once here and handed to the routers;
 * nothing below the HTTP layer reads configuration or globals on its own.
 */

import { resolve } from "node:path";
import { getStorage } from "firebase-admin/storage";
import { initFirebaseAdmin } from "./admin";
import { JwtAuthenticator, type BearerAuthenticator } from "./auth/bearer";
import { assetsBaseUrl, type Env } from "./config/env";
import { createDatabase, type Database } from "./db";
import { ThumbnailIngest } from "./services/ingest/thumbnailIngest";
import { VideoIngestPipeline } from "./services/ingest/videoIngest";
import { SignedUrlResolver } from "./services/signedUrl";
import { CloudStorageObjectStore } from "./services/storageService";
import { VideoService } from "./services/videoService";
import { FfmpegRewriter, FfprobeInspector, type MediaInspector, type MediaRewriter } from "./services/video";
import type { ObjectStore, VideoStore } from "./storage/types";
import { DrizzleVideoStore } from "./storage/videos";

export interface AppServices {
  auth: BearerAuthenticator;
  videos: VideoService;
  videoIngest: VideoIngestPipeline;
  thumbnailIngest: ThumbnailIngest;
  assetsRoot: string;
  /** Release pooled connections */
  close(): Promise<void>;
  /** Deep health probes; absent pieces report as unconfigured */
  health: {
    db?: Database;
    binaries: { ffmpeg: string; ffprobe: string };
  };
}

export interface CoreDeps {
  config: Env;
  auth: BearerAuthenticator;
  store: VideoStore;
  objectStore: ObjectStore;
  inspector: MediaInspector;
  rewriter: MediaRewriter;
  db?: Database;
  close?: () => Promise<void>;
}

/** Wire the services from already-built collaborators. */
export function buildServices(deps: CoreDeps): AppServices {
  const { config, store, objectStore } = deps;
  const assetsRoot = resolve(config.ASSETS_ROOT);
  const resolver = new SignedUrlResolver(objectStore);

  return {
    auth: deps.auth,
    videos: new VideoService(store, resolver),
    videoIngest: new VideoIngestPipeline({
      videos: store,
      objectStore,
      inspector: deps.inspector,
      rewriter: deps.rewriter,
      resolver,
      bucket: config.STORAGE_BUCKET,
    }),
    thumbnailIngest: new ThumbnailIngest({
      videos: store,
      resolver,
      assetsRoot,
      assetsBaseUrl: assetsBaseUrl(config),
    }),
    assetsRoot,
    close: deps.close ?? (async () => {}),
    health: {
      db: deps.db,
      binaries: { ffmpeg: config.FFMPEG_PATH, ffprobe: config.FFPROBE_PATH },
    },
  };
}

/** Production wiring: PostgreSQL, Cloud Storage, ffmpeg/ffprobe on the host. */
export function createServices(config: Env): AppServices {
  const { db, pool } = createDatabase(config);
  const firebaseApp = initFirebaseAdmin(config);

  return buildServices({
    config,
    auth: new JwtAuthenticator(config.JWT_SECRET),
    store: new DrizzleVideoStore(db),
    objectStore: new CloudStorageObjectStore(getStorage(firebaseApp)),
    inspector: new FfprobeInspector(config.FFPROBE_PATH),
    rewriter: new FfmpegRewriter(config.FFMPEG_PATH),
    db,
    close: () => pool.end(),
  });
}
