import { describe, it, expect } from "vitest";
import {
  encodeStoredReference,
  encodeVideoReference,
  loadStoredReference,
  parseVideoReference,
  requireObjectReference,
} from "../reference";
import { InvalidReferenceFormatError } from "../../utils/errors";

describe("parseVideoReference", () => {
  it("splits bucket and key", () => {
    expect(parseVideoReference("bucket-x,key-y")).toEqual({ bucket: "bucket-x", key: "key-y" });
  });

  it("keeps slashes in the key", () => {
    expect(parseVideoReference("media,landscape/abc.mp4")).toEqual({ bucket: "media", key: "landscape/abc.mp4" });
  });

  it.each([null, undefined, ""])("treats %j as absent", (raw) => {
    expect(parseVideoReference(raw)).toBeNull();
  });

  it.each(["no-separator", "a,b,c", ",key", "bucket,", ","])("rejects %j", (raw) => {
    expect(() => parseVideoReference(raw)).toThrow(InvalidReferenceFormatError);
  });

  it("reports malformed references as server-side integrity errors", () => {
    const err = (() => {
      try {
        parseVideoReference("a,b,c");
      } catch (e) {
        return e;
      }
    })();
    expect(err).toMatchObject({
      code: "INVALID_REFERENCE_FORMAT",
      statusCode: 500,
      category: "server-side",
      details: { reference: "a,b,c" },
    });
  });
});

describe("encodeVideoReference", () => {
  it("joins with a comma", () => {
    expect(encodeVideoReference({ bucket: "media", key: "portrait/x.mp4" })).toBe("media,portrait/x.mp4");
  });
});

describe("loadStoredReference", () => {
  it("decodes a well-formed value", () => {
    expect(loadStoredReference("media,portrait/x.mp4")).toEqual({ bucket: "media", key: "portrait/x.mp4" });
  });

  it.each([null, undefined, ""])("treats %j as absent", (raw) => {
    expect(loadStoredReference(raw)).toBeNull();
  });

  it.each(["media", "a,b,c", ",key"])("carries %j as malformed instead of throwing", (raw) => {
    expect(loadStoredReference(raw)).toEqual({ malformed: raw });
  });
});

describe("encodeStoredReference", () => {
  it("writes a malformed value back unchanged", () => {
    expect(encodeStoredReference({ malformed: "a,b,c" })).toBe("a,b,c");
  });

  it("encodes a well-formed reference", () => {
    expect(encodeStoredReference({ bucket: "media", key: "other/y.mp4" })).toBe("media,other/y.mp4");
  });
});

describe("requireObjectReference", () => {
  it("returns bucket and key", () => {
    expect(requireObjectReference({ bucket: "media", key: "k.mp4" })).toEqual({ bucket: "media", key: "k.mp4" });
  });

  it("raises InvalidReferenceFormatError for a malformed value", () => {
    expect(() => requireObjectReference({ malformed: "media" })).toThrow(InvalidReferenceFormatError);
  });
});
