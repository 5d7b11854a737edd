import fs from "node:fs";
import path from "node:path";
import { RepoClient } from "../client/repo-client.js";
import { diag, type Diagnostic } from "../diagnostics.js";
import { digest, matchesDigest } from "../manifest/checksum.js";
import type { ManifestCodec } from "../manifest/codec.js";
import type { ManifestVerifier } from "../signing/signer.js";
import { EXIT } from "./exit-codes.js";
import { failure, type CommandFailure } from "./result.js";

export type VerifyResult = { ok: true; profiles: number; files: number } | CommandFailure;

/**
 * Check a downloaded repository: the manifest signature, then every checksum
 * against the files on disk. All mismatches are reported, not just the first.
 */
export async function verifyRepository(opts: {
  repoRoot: string;
  verifier: ManifestVerifier;
  codec?: ManifestCodec;
}): Promise<VerifyResult> {
  let client: RepoClient;
  try {
    client = await RepoClient.open(opts.repoRoot, opts.verifier, opts.codec);
  } catch (e) {
    return failure(e, EXIT.INTEGRITY_FAILED);
  }

  const manifest = client.getManifest();
  const errors: Diagnostic[] = [];
  for (const [relPath, expected] of Object.entries(manifest.checksums)) {
    const target = path.resolve(opts.repoRoot, relPath);
    if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
      errors.push(diag("error", "FILE_MISSING", `Missing file: ${relPath}`, { path: relPath }));
      continue;
    }
    const content = fs.readFileSync(target);
    if (!matchesDigest(content, expected)) {
      const actual = digest(content);
      errors.push(
        diag("error", "ChecksumMismatch", `Checksum mismatch (${relPath}): manifest=${expected} actual=${actual}`, {
          path: relPath,
          details: { expected, actual },
        }),
      );
    }
  }

  if (errors.length > 0) return { ok: false, exitCode: EXIT.INTEGRITY_FAILED, errors };
  return { ok: true, profiles: manifest.profiles.length, files: Object.keys(manifest.checksums).length };
}
