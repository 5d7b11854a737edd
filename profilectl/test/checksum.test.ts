import { describe, expect, it } from "vitest";
import { createHash } from "node:crypto";
import { ChecksumMismatchError } from "../src/errors.js";
import { digest, matchesDigest, parseDigest, verifyDigest } from "../src/manifest/checksum.js";

const HELLO_HEX = createHash("sha256").update("hello").digest("hex");

describe("checksum", () => {
  it("formats digests as sha256:<lowercase hex>", () => {
    expect(digest("hello")).toBe(`sha256:${HELLO_HEX}`);
    expect(digest(Buffer.from("hello"))).toBe(digest("hello"));
    expect(digest("")).toBe("sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });

  it("parses well-formed digests and rejects the rest", () => {
    expect(parseDigest(`sha256:${HELLO_HEX}`)).toEqual({ algorithm: "sha256", hex: HELLO_HEX });
    expect(parseDigest(HELLO_HEX)).toBeNull();
    expect(parseDigest("sha256:XYZ")).toBeNull();
  });

  it("matches only the same bytes", () => {
    expect(matchesDigest("hello", `sha256:${HELLO_HEX}`)).toBe(true);
    expect(matchesDigest("hellp", `sha256:${HELLO_HEX}`)).toBe(false);
  });

  it("fails unsupported algorithms instead of skipping them", () => {
    expect(matchesDigest("hello", `md5:${"0".repeat(32)}`)).toBe(false);
    expect(matchesDigest("hello", `sha512:${HELLO_HEX}`)).toBe(false);
    expect(matchesDigest("hello", "sha256:abc")).toBe(false);
  });

  it("throws ChecksumMismatch with both digests", () => {
    const expected = digest("original");
    try {
      verifyDigest("slicers/a.json", "tampered", expected);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ChecksumMismatchError);
      if (e instanceof ChecksumMismatchError) {
        expect(e.kind).toBe("ChecksumMismatch");
        expect(e.filePath).toBe("slicers/a.json");
        expect(e.expected).toBe(expected);
        expect(e.actual).toBe(digest("tampered"));
      }
    }
  });
});
