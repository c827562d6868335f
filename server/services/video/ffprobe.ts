/**
 * Video processing: ffprobe Inspection & Aspect Ratio
 *
 * Reads stream geometry with ffprobe and buckets it into landscape (16:9),
 * portrait (9:16) or other.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";
import logger from "../../logger";
import { FFPROBE_TIMEOUT_MS } from "../../config/constants";
import { ProbeFailure, errorMessage } from "../../utils/errors";
import type { AspectRatioClass, MediaInspector, ProbeOutput, ToolOptions } from "./types";

const execFileAsync = promisify(execFile);

const LANDSCAPE_RATIO = 16 / 9;
const PORTRAIT_RATIO = 9 / 16;
const RATIO_TOLERANCE = 0.1;

const probeOutputSchema = z.object({
  streams: z.array(
    z
      .object({
        width: z.number().optional(),
        height: z.number().optional(),
        codec_type: z.string().optional(),
      })
      .passthrough()
  ),
});

/** Parse ffprobe's JSON stdout; anything unexpected is a probe failure. */
export function parseProbeOutput(stdout: string): ProbeOutput {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (err) {
    throw new ProbeFailure("Failed to parse ffprobe output", { cause: err });
  }

  const parsed = probeOutputSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProbeFailure("Unexpected ffprobe output shape", { cause: parsed.error });
  }
  return parsed.data;
}

/**
 * Bucket a frame size by its width/height ratio. Tolerance bounds are
 * inclusive; a missing or zero dimension is `other`.
 */
export function classifyAspectRatio(width: number, height: number): AspectRatioClass {
  if (!Number.isFinite(width) || !Number.isFinite(height) || width <= 0 || height <= 0) {
    return "other";
  }

  const ratio = width / height;
  if (Math.abs(ratio - LANDSCAPE_RATIO) <= RATIO_TOLERANCE) {
    return "landscape";
  }
  if (Math.abs(ratio - PORTRAIT_RATIO) <= RATIO_TOLERANCE) {
    return "portrait";
  }
  return "other";
}

export class FfprobeInspector implements MediaInspector {
  constructor(private readonly binary: string = "ffprobe") {}

  async inspect(inputPath: string, options: ToolOptions = {}): Promise<ProbeOutput> {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync(
        this.binary,
        ["-v", "error", "-print_format", "json", "-show_streams", inputPath],
        { timeout: FFPROBE_TIMEOUT_MS, signal: options.signal, maxBuffer: 4 * 1024 * 1024 }
      ));
    } catch (err) {
      logger.error("[Prober] ffprobe failed", { inputPath, error: errorMessage(err) });
      throw new ProbeFailure("ffprobe failed", { cause: err });
    }
    return parseProbeOutput(stdout);
  }
}

/** Classify the first reported stream of a local media file. */
export async function getVideoAspectRatio(
  inspector: MediaInspector,
  inputPath: string,
  options: ToolOptions = {}
): Promise<AspectRatioClass> {
  const { streams } = await inspector.inspect(inputPath, options);
  const [first] = streams;
  if (!first) {
    return "other";
  }
  return classifyAspectRatio(first.width ?? 0, first.height ?? 0);
}
