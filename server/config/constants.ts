/**
 * Application Constants
 *
 * Named constants for the upload pipelines, grouped by feature area.
 */

// ============================================================================
// Video ingest
// ============================================================================

/** Request body ceiling for video uploads (1 GiB) */
export const MAX_VIDEO_UPLOAD_BYTES = 1 << 30;

/** Only progressive MP4 is accepted for playback */
export const VIDEO_CONTENT_TYPE = "video/mp4";

/** Multipart field carrying the video file */
export const VIDEO_FORM_FIELD = "video";

/** Prefix of the per-request staging directory under the OS temp dir */
export const STAGING_DIR_PREFIX = "clipvault-upload-";

/** Suffix appended to the staged file for the fast-start rewrite */
export const FAST_START_SUFFIX = ".processing";

/** Random bytes behind object keys and thumbnail filenames */
export const RANDOM_NAME_BYTES = 32;

// ============================================================================
// Thumbnail ingest
// ============================================================================

/** Thumbnails are parsed in memory up to this size (10 MiB) */
export const MAX_THUMBNAIL_UPLOAD_BYTES = 10 << 20;

// ============================================================================
// Multipart limits
// ============================================================================

/** Text fields tolerated beside the file part */
export const MAX_FORM_FIELDS = 8;

export const MAX_FORM_FIELD_BYTES = 1024;

/** Headers per part */
export const MAX_PART_HEADER_PAIRS = 20;

/** Room for boundaries and part headers around a thumbnail */
export const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

/** Multipart field carrying the thumbnail image */
export const THUMBNAIL_FORM_FIELD = "thumbnail";

export const THUMBNAIL_EXTENSIONS = {
  "image/jpeg": ".jpg",
  "image/png": ".png",
} as const;

export type ThumbnailContentType = keyof typeof THUMBNAIL_EXTENSIONS;

export const THUMBNAIL_CONTENT_TYPES = ["image/jpeg", "image/png"] as const satisfies readonly ThumbnailContentType[];

// ============================================================================
// Durable upload
// ============================================================================

export const UPLOAD_MAX_ATTEMPTS = 3;

/** Linear backoff step: attempt n waits (n - 1) steps */
export const UPLOAD_BACKOFF_STEP_MS = 1000;

// ============================================================================
// Playback
// ============================================================================

/** Lifetime of presigned playback URLs (15 minutes) */
export const SIGNED_URL_EXPIRY_MS = 15 * 60 * 1000;

// ============================================================================
// Logging
// ============================================================================

export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;

// ============================================================================
// External tools
// ============================================================================

export const FFPROBE_TIMEOUT_MS = 15_000;

export const FFMPEG_TIMEOUT_MS = 10 * 60 * 1000;
