/**
 * Video Processing
 *
 * Local media handling for the upload pipeline.
 *
 * Prerequisites: ffmpeg and ffprobe must be installed on the host.
 *
 *   1. FfmpegRewriter     : fast-start remux (moov atom first), stream copy
 *   2. FfprobeInspector   : stream geometry via ffprobe
 *   3. classifyAspectRatio: landscape / portrait / other buckets
 *   4. uploadWithRetry    : object-store put with linear backoff
 *
 * @module services/video
 */

export type {
  AspectRatioClass,
  MediaInspector,
  MediaRewriter,
  ProbeOutput,
  ProbeStream,
  ToolOptions,
} from "./types";

export { FfprobeInspector, classifyAspectRatio, getVideoAspectRatio, parseProbeOutput } from "./ffprobe";
export { FfmpegRewriter, fastStartOutputPath } from "./ffmpeg";
export { FileUploadSource, uploadWithRetry, backoffBeforeAttempt, defaultSleep } from "./durableUpload";
export type { UploadSource, Sleep, DurableUploadRequest } from "./durableUpload";
export { checkFfmpegAvailable } from "./utils";
