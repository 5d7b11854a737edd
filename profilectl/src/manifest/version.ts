import semver, { type SemVer } from "semver";
import { ManifestInvalidError } from "../errors.js";
import type { BumpKind } from "../types/manifest.js";

export const INITIAL_VERSION = "0.1.0";

export const BUMP_KINDS: readonly BumpKind[] = ["major", "minor", "patch"];

export function isBumpKind(value: string): value is BumpKind {
  return BUMP_KINDS.some((k) => k === value);
}

/** Parse a version string from a manifest, rejecting anything that is not semver. */
export function parseVersion(version: string, context: string): SemVer {
  const parsed = semver.parse(version);
  if (!parsed) {
    throw new ManifestInvalidError(`Invalid semantic version for ${context}: ${JSON.stringify(version)}`);
  }
  return parsed;
}

/**
 * Bump a version. Pre-release and build tags are dropped, so `1.2.3-rc.1`
 * patch-bumps to `1.2.3` (which still compares greater).
 */
export function bumpVersion(current: string, kind: BumpKind, context = "profile"): string {
  const parsed = parseVersion(current, context);
  const next = semver.inc(parsed.version, kind);
  if (!next) {
    throw new ManifestInvalidError(`Cannot bump ${kind} version of ${context}: ${current}`);
  }
  assertIncreased(parsed.version, next, context);
  return next;
}

/** Versions must strictly increase whenever content changes. */
export function assertIncreased(previous: string, next: string, context = "profile"): void {
  if (!semver.gt(next, previous)) {
    throw new ManifestInvalidError(`Version of ${context} must increase: ${previous} -> ${next}`);
  }
}
