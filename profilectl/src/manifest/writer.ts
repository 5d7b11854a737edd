import fs from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { ProfileFileMissingError } from "../errors.js";
import { MANIFEST_FILE, PUBLIC_KEY_FILE, SIGNATURE_FILE, type ChecksumMap } from "../types/manifest.js";
import { verifyDigest } from "./checksum.js";

export type PublishInput = {
  repoRoot: string;
  /** Exactly the bytes that were signed. */
  manifestBytes: Buffer;
  signature: Buffer;
  /** Armored public key; skipped when the signer cannot export one. */
  publicKey: string | null;
};

export type PublishedFiles = {
  manifest: string;
  signature: string;
  publicKey: string | null;
};

/**
 * Re-hash every file the manifest covers. A file edited while the build ran
 * makes the snapshot inconsistent, so the build stops.
 */
export function assertFilesUnchanged(repoRoot: string, checksums: ChecksumMap): void {
  const gone: string[] = [];
  for (const [relPath, expected] of Object.entries(checksums)) {
    const abs = path.join(repoRoot, relPath);
    if (!fs.existsSync(abs)) {
      gone.push(relPath);
      continue;
    }
    verifyDigest(relPath, fs.readFileSync(abs), expected);
  }
  if (gone.length > 0) throw new ProfileFileMissingError(gone);
}

/**
 * Write manifest, signature and public key beside each other. Everything goes
 * to temporary files first and the files already published are copied aside,
 * then the temporaries are renamed into place. If any step fails the copies
 * are renamed back, so the previous publication stays as it was as a whole.
 */
export function publishManifest(input: PublishInput): PublishedFiles {
  const stamp = uuidv4();
  const targets: PublishTarget[] = [
    target(path.join(input.repoRoot, MANIFEST_FILE), input.manifestBytes, stamp),
    target(path.join(input.repoRoot, SIGNATURE_FILE), input.signature, stamp),
  ];
  if (input.publicKey !== null) {
    targets.push(target(path.join(input.repoRoot, PUBLIC_KEY_FILE), input.publicKey, stamp));
  }

  try {
    for (const t of targets) fs.writeFileSync(t.temp, t.content);
    for (const t of targets) {
      if (!fs.existsSync(t.final)) continue;
      fs.copyFileSync(t.final, t.backup);
      t.backedUp = true;
    }
    // manifest last: readers that see the new manifest also see its signature
    for (const t of [...targets.slice(1), targets[0]]) {
      fs.renameSync(t.temp, t.final);
      t.placed = true;
    }
  } catch (e) {
    rollBack(targets);
    throw e;
  }

  for (const t of targets) {
    if (t.backedUp) fs.rmSync(t.backup, { force: true });
  }

  return {
    manifest: targets[0].final,
    signature: targets[1].final,
    publicKey: input.publicKey !== null ? path.join(input.repoRoot, PUBLIC_KEY_FILE) : null,
  };
}

type PublishTarget = {
  final: string;
  temp: string;
  backup: string;
  content: Buffer | string;
  backedUp: boolean;
  placed: boolean;
};

function target(final: string, content: Buffer | string, stamp: string): PublishTarget {
  return {
    final,
    temp: `${final}.tmp-${stamp}`,
    backup: `${final}.bak-${stamp}`,
    content,
    backedUp: false,
    placed: false,
  };
}

function rollBack(targets: PublishTarget[]): void {
  for (const t of targets) {
    fs.rmSync(t.temp, { force: true });
    if (t.placed && t.backedUp) {
      fs.renameSync(t.backup, t.final);
    } else if (t.placed) {
      fs.rmSync(t.final, { force: true });
    } else if (t.backedUp) {
      fs.rmSync(t.backup, { force: true });
    }
  }
}

/** Raw manifest and signature bytes, or null when the repository was never published. */
export function readPublished(repoRoot: string): { manifestBytes: Buffer; signature: Buffer | null } | null {
  const manifestPath = path.join(repoRoot, MANIFEST_FILE);
  if (!fs.existsSync(manifestPath)) return null;
  const sigPath = path.join(repoRoot, SIGNATURE_FILE);
  return {
    manifestBytes: fs.readFileSync(manifestPath),
    signature: fs.existsSync(sigPath) ? fs.readFileSync(sigPath) : null,
  };
}
