import { InvalidReferenceFormatError } from "../utils/errors";
import type { MalformedReference, ObjectReference, StoredReference } from "./types";

const SEPARATOR = ",";

/**
 * Persisted form of an object reference: `{bucket},{key}`.
 * The encoding is shared with existing rows and must not change.
 */
export function encodeVideoReference(ref: ObjectReference): string {
  return `${ref.bucket}${SEPARATOR}${ref.key}`;
}

function splitReference(raw: string): ObjectReference | undefined {
  const parts = raw.split(SEPARATOR);
  if (parts.length !== 2) return undefined;
  const [bucket, key] = parts;
  return bucket && key ? { bucket, key } : undefined;
}

/**
 * Decode a stored reference. Absent (null or empty) values decode to null;
 * anything that is not exactly two non-empty parts is an integrity error.
 */
export function parseVideoReference(raw: string | null | undefined): ObjectReference | null {
  if (raw === null || raw === undefined || raw === "") return null;

  const ref = splitReference(raw);
  if (!ref) {
    throw new InvalidReferenceFormatError(raw);
  }
  return ref;
}

export function isMalformedReference(ref: StoredReference): ref is MalformedReference {
  return "malformed" in ref;
}

/** Load-side decode: a malformed value is carried along instead of thrown. */
export function loadStoredReference(raw: string | null | undefined): StoredReference | null {
  if (raw === null || raw === undefined || raw === "") return null;
  return splitReference(raw) ?? { malformed: raw };
}

/** Write-side encode; a malformed value is written back unchanged. */
export function encodeStoredReference(ref: StoredReference): string {
  return isMalformedReference(ref) ? ref.malformed : encodeVideoReference(ref);
}

/** The bucket and key of a stored reference, or InvalidReferenceFormatError. */
export function requireObjectReference(ref: StoredReference): ObjectReference {
  if (isMalformedReference(ref)) {
    throw new InvalidReferenceFormatError(ref.malformed);
  }
  return ref;
}
