import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import type { ChecksumMap, Manifest, Profile } from "../types/manifest.js";
import { digest } from "./checksum.js";

export type FileStatus = "new" | "modified" | "unchanged";

export type ScannedFile = {
  /** Relative to the repository root, POSIX separators. */
  path: string;
  /** Relative to the configs directory. */
  configPath: string;
  absPath: string;
  checksum: string;
  /** Profile files get a manifest entry; assets only a checksum. */
  kind: "profile" | "asset";
  status: FileStatus;
  previous: Profile | null;
  previousChecksum: string | null;
};

export type ScanResult = {
  files: ScannedFile[];
  checksums: ChecksumMap;
  /** Previously published profiles whose file is gone. */
  missing: Profile[];
};

export type ScanOptions = {
  configsDir: string;
  profileExtensions: string[];
  ignore: string[];
};

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

function isIgnored(relToConfigs: string, patterns: string[]): boolean {
  return patterns.some((pattern) => minimatch(relToConfigs, pattern, { dot: true }));
}

/** Recursively list files under `dir`, sorted, skipping ignored entries. */
function walk(dir: string, configsRoot: string, patterns: string[], out: string[]): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const abs = path.join(dir, entry.name);
    const rel = toPosix(path.relative(configsRoot, abs));
    if (isIgnored(rel, patterns)) continue;
    if (entry.isDirectory()) {
      walk(abs, configsRoot, patterns, out);
    } else if (entry.isFile()) {
      out.push(abs);
    }
  }
}

/**
 * Scan the configs directory and diff it against the previously published
 * manifest: each file is new, modified (checksum changed) or unchanged.
 */
export function scanRepository(repoRoot: string, previous: Manifest | null, opts: ScanOptions): ScanResult {
  const configsRoot = path.resolve(repoRoot, opts.configsDir);
  const found: string[] = [];
  if (fs.existsSync(configsRoot)) {
    walk(configsRoot, configsRoot, opts.ignore, found);
  }

  const previousByPath = new Map<string, Profile>();
  for (const p of previous?.profiles ?? []) previousByPath.set(p.path, p);
  const previousChecksums = previous?.checksums ?? {};
  const extensions = new Set(opts.profileExtensions.map((e) => e.toLowerCase()));

  const files: ScannedFile[] = [];
  const checksums: ChecksumMap = {};

  for (const absPath of found) {
    const relPath = toPosix(path.relative(repoRoot, absPath));
    const checksum = digest(fs.readFileSync(absPath));
    const prior = previousByPath.get(relPath) ?? null;
    const priorChecksum = Object.hasOwn(previousChecksums, relPath) ? previousChecksums[relPath] : null;
    const kind = extensions.has(path.extname(absPath).toLowerCase()) || prior !== null ? "profile" : "asset";

    let status: FileStatus;
    if (kind === "profile" ? prior === null : priorChecksum === null) {
      status = "new";
    } else {
      status = priorChecksum === checksum ? "unchanged" : "modified";
    }

    checksums[relPath] = checksum;
    files.push({
      path: relPath,
      configPath: toPosix(path.relative(configsRoot, absPath)),
      absPath,
      checksum,
      kind,
      status,
      previous: prior,
      previousChecksum: priorChecksum,
    });
  }

  const seen = new Set(files.map((f) => f.path));
  const missing = (previous?.profiles ?? []).filter((p) => !seen.has(p.path));

  return { files, checksums, missing };
}
