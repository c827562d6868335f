import { UnsupportedMediaTypeError, ValidationError } from "./errors";

/**
 * Extract the bare media type from a Content-Type value:
 * `"Image/PNG; charset=binary"` → `"image/png"`.
 */
export function parseMediaType(contentType: string | undefined): string {
  const [essence = ""] = (contentType ?? "").split(";");
  const mediaType = essence.trim().toLowerCase();
  if (!/^[\w.+-]+\/[\w.+-]+$/.test(mediaType)) {
    throw new ValidationError("Invalid content type", { details: { contentType } });
  }
  return mediaType;
}

/** Parse and check a declared content type against an allow-list. */
export function assertMediaType<T extends string>(
  contentType: string | undefined,
  allowed: readonly T[]
): T {
  const mediaType = parseMediaType(contentType);
  const match = allowed.find((candidate) => candidate === mediaType);
  if (match === undefined) {
    throw new UnsupportedMediaTypeError(mediaType, allowed);
  }
  return match;
}
