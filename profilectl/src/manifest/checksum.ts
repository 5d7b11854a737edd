import { createHash } from "node:crypto";
import fs from "node:fs";
import { ChecksumMismatchError } from "../errors.js";

/**
 * Wire format for every checksum in a manifest: `sha256:` followed by 64
 * lowercase hex digits of the SHA-256 of the raw file bytes.
 */
export const DIGEST_ALGORITHM = "sha256";

const DIGEST_RE = /^([a-z0-9]+):([a-f0-9]+)$/;

/** Compute the digest string of a string/buffer. */
export function digest(content: string | Buffer | Uint8Array): string {
  return `${DIGEST_ALGORITHM}:${createHash(DIGEST_ALGORITHM).update(content).digest("hex")}`;
}

/** Compute the digest string of a file. */
export function digestFile(filePath: string): string {
  return digest(fs.readFileSync(filePath));
}

/** Split a digest string into algorithm and hex value. Returns null when malformed. */
export function parseDigest(value: string): { algorithm: string; hex: string } | null {
  const m = DIGEST_RE.exec(value);
  if (!m) return null;
  return { algorithm: m[1], hex: m[2] };
}

/**
 * Check bytes against an expected digest. Unknown algorithms and malformed
 * digests never pass.
 */
export function matchesDigest(content: string | Buffer | Uint8Array, expected: string): boolean {
  const parsed = parseDigest(expected);
  if (!parsed || parsed.algorithm !== DIGEST_ALGORITHM || parsed.hex.length !== 64) return false;
  return digest(content) === expected;
}

/** Throw ChecksumMismatch unless the bytes match. */
export function verifyDigest(filePath: string, content: string | Buffer | Uint8Array, expected: string): void {
  if (!matchesDigest(content, expected)) {
    throw new ChecksumMismatchError(filePath, expected, digest(content));
  }
}
