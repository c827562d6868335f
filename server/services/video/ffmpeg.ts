/**
 * Video processing: ffmpeg Fast-Start Remux
 *
 * Moves the MP4 index (moov atom) in front of the media payload so playback
 * can begin after a single sequential read. Streams are copied, not re-encoded.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { rm } from "node:fs/promises";
import logger from "../../logger";
import { FAST_START_SUFFIX, FFMPEG_TIMEOUT_MS } from "../../config/constants";
import { RemuxFailure, errorMessage } from "../../utils/errors";
import type { MediaRewriter, ToolOptions } from "./types";

const execFileAsync = promisify(execFile);

export function fastStartOutputPath(inputPath: string): string {
  return `${inputPath}${FAST_START_SUFFIX}`;
}

export class FfmpegRewriter implements MediaRewriter {
  constructor(private readonly binary: string = "ffmpeg") {}

  async rewriteForFastStart(inputPath: string, options: ToolOptions = {}): Promise<string> {
    const outputPath = fastStartOutputPath(inputPath);

    try {
      await execFileAsync(
        this.binary,
        ["-i", inputPath, "-c", "copy", "-movflags", "faststart", "-f", "mp4", outputPath],
        { timeout: FFMPEG_TIMEOUT_MS, signal: options.signal, maxBuffer: 4 * 1024 * 1024 }
      );
    } catch (err) {
      logger.error("[Rewriter] ffmpeg faststart failed", { inputPath, error: errorMessage(err) });
      // Whatever ffmpeg left behind is not a usable file
      await rm(outputPath, { force: true }).catch((rmErr: unknown) => {
        logger.warn("[Rewriter] Failed to remove partial output", {
          outputPath,
          error: errorMessage(rmErr),
        });
      });
      throw new RemuxFailure("ffmpeg faststart failed", { cause: err });
    }

    return outputPath;
  }
}
