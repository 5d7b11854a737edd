import { v4 as uuidv4 } from "uuid";
import { ManifestInvalidError, ProfileFileMissingError } from "../errors.js";
import type { Manifest, Profile } from "../types/manifest.js";
import type { BuildDecisions } from "./decisions.js";
import type { ScanResult, ScannedFile } from "./scanner.js";
import { INITIAL_VERSION, bumpVersion, parseVersion } from "./version.js";

export type ManifestBuildInput = {
  scan: ScanResult;
  previous: Manifest | null;
  decisions: BuildDecisions;
  specVersion: string;
  /** ISO timestamp stamped on new and changed profiles. */
  now?: string;
  newUuid?: () => string;
};

export type BuildSummary = {
  added: string[];
  updated: { path: string; from: string; to: string }[];
  unchanged: number;
  assets: number;
};

function updatedProfile(file: ScannedFile, prior: Profile, input: ManifestBuildInput, now: string): Profile {
  const kind = input.decisions.bumps.get(file.path);
  if (!kind) {
    throw new ManifestInvalidError(`No version bump decided for modified profile ${file.path}`);
  }
  // everything but the pipeline-owned fields carries forward, notably dependencies
  return { ...prior, path: file.path, version: bumpVersion(prior.version, kind, file.path), last_updated: now };
}

function newProfile(file: ScannedFile, input: ManifestBuildInput, now: string, newUuid: () => string): Profile {
  const meta = input.decisions.newProfiles.get(file.path);
  if (!meta) {
    throw new ManifestInvalidError(`No metadata decided for new profile ${file.path}`);
  }
  return {
    uuid: newUuid(),
    name: meta.name,
    type: meta.type,
    slicer: meta.slicer,
    version: INITIAL_VERSION,
    path: file.path,
    dependencies: [],
    last_updated: now,
  };
}

/**
 * Build the next manifest from a scan and the previous manifest.
 *
 * Previous profiles keep their order; new ones are appended in scan order.
 * Unchanged profiles are copied as they were, so a rebuild without content
 * changes produces the same profile list.
 */
export function buildManifest(input: ManifestBuildInput): { manifest: Manifest; summary: BuildSummary } {
  if (input.scan.missing.length > 0) {
    throw new ProfileFileMissingError(input.scan.missing.map((p) => p.path));
  }

  const now = input.now ?? new Date().toISOString();
  const newUuid = input.newUuid ?? uuidv4;
  const summary: BuildSummary = { added: [], updated: [], unchanged: 0, assets: 0 };
  const byPath = new Map<string, Profile>();
  const appended: Profile[] = [];

  for (const file of input.scan.files) {
    if (file.kind === "asset") {
      summary.assets++;
      continue;
    }
    const prior = file.previous;
    if (prior === null) {
      const created = newProfile(file, input, now, newUuid);
      appended.push(created);
      summary.added.push(file.path);
    } else if (file.status === "modified") {
      const next = updatedProfile(file, prior, input, now);
      byPath.set(file.path, next);
      summary.updated.push({ path: file.path, from: prior.version, to: next.version });
    } else {
      parseVersion(prior.version, file.path);
      byPath.set(file.path, prior);
      summary.unchanged++;
    }
  }

  const profiles: Profile[] = [];
  for (const prior of input.previous?.profiles ?? []) {
    const next = byPath.get(prior.path);
    if (next) profiles.push(next);
  }
  profiles.push(...appended);

  const manifest: Manifest = {
    ...(input.previous ?? {}),
    spec_version: input.specVersion,
    namespace: input.decisions.namespace,
    profiles,
    checksums: { ...input.scan.checksums },
  };
  return { manifest, summary };
}

/** Drop profiles (by uuid or path) from a manifest, with their checksum entries. */
export function unpublishProfiles(manifest: Manifest, selectors: string[]): { manifest: Manifest; removed: Profile[] } {
  const wanted = new Set(selectors);
  const removed = manifest.profiles.filter((p) => wanted.has(p.uuid) || wanted.has(p.path));
  const unknown = selectors.filter((s) => !removed.some((p) => p.uuid === s || p.path === s));
  if (unknown.length > 0) {
    throw new ManifestInvalidError(`Not in manifest: ${unknown.join(", ")}`);
  }
  const gone = new Set(removed.map((p) => p.path));
  const checksums: Record<string, string> = {};
  for (const [file, value] of Object.entries(manifest.checksums)) {
    if (!gone.has(file)) checksums[file] = value;
  }
  return {
    manifest: { ...manifest, profiles: manifest.profiles.filter((p) => !gone.has(p.path)), checksums },
    removed,
  };
}
