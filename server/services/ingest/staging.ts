/**
 * Upload staging
 *
 * Streams an incoming upload into a private temp directory. The directory is
 * owned by one request and holds both the staged file and any rewritten
 * sibling, so removing it cleans up every intermediate artefact at once.
 */

import { createWriteStream } from "node:fs";
import { mkdtemp, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Request } from "express";
import type { StorageEngine } from "multer";
import logger from "../../logger";
import { STAGING_DIR_PREFIX } from "../../config/constants";
import { errorMessage } from "../../utils/errors";

export interface StagedUpload {
  dir: string;
  path: string;
  contentType: string;
  size: number;
}

const STAGED_FILENAME = "upload.mp4";

export async function stageUpload(
  stream: Readable,
  contentType: string,
  root: string = tmpdir(),
  signal?: AbortSignal
): Promise<StagedUpload> {
  const dir = await mkdtemp(join(root, STAGING_DIR_PREFIX));
  const path = join(dir, STAGED_FILENAME);
  try {
    await pipeline(stream, createWriteStream(path, { flags: "wx" }), { signal });
    const { size } = await stat(path);
    return { dir, path, contentType, size };
  } catch (err) {
    await discardStaged({ dir });
    throw err;
  }
}

/** Remove a staging directory. Safe to call more than once. */
export async function discardStaged(staged: Pick<StagedUpload, "dir">): Promise<void> {
  try {
    await rm(staged.dir, { recursive: true, force: true });
  } catch (err) {
    logger.error("[Staging] Failed to remove staging directory", {
      dir: staged.dir,
      error: errorMessage(err),
    });
  }
}

/**
 * multer storage engine that stages each file with {@link stageUpload}.
 * `file.destination` is the staging directory, `file.path` the staged file.
 * Staging stops (and the directory goes) when `req.uploadSignal` aborts.
 */
export function createStagingStorage(root?: string): StorageEngine {
  return {
    _handleFile(req: Request, file: Express.Multer.File, callback) {
      stageUpload(file.stream, file.mimetype, root, req.uploadSignal).then(
        (staged) => callback(null, { destination: staged.dir, path: staged.path, size: staged.size }),
        (err: unknown) => callback(err)
      );
    },
    _removeFile(_req: Request, file: Express.Multer.File, callback) {
      discardStaged({ dir: file.destination }).then(
        () => callback(null),
        (err: Error) => callback(err)
      );
    },
  };
}

/** The staged upload multer attached to the request, if any. */
export function stagedFromMulter(file: Express.Multer.File | undefined): StagedUpload | undefined {
  if (!file || !file.path || !file.destination) return undefined;
  return { dir: file.destination, path: file.path, contentType: file.mimetype, size: file.size };
}
