/** Repository manifest: the signed index over every published file. */
export type ProfileType = "printer" | "filament" | "process" | (string & {});

export type BumpKind = "major" | "minor" | "patch";

export type Profile = {
  uuid: string;
  name: string;
  type: ProfileType;
  slicer: string;
  version: string;
  path: string;
  dependencies: string[];
  last_updated: string;
  /** Fields added by hand are carried forward untouched. */
  [extra: string]: unknown;
};

/** Relative path (POSIX separators) → `sha256:<hex>`. */
export type ChecksumMap = Record<string, string>;

export type Manifest = {
  spec_version: string;
  namespace: string;
  profiles: Profile[];
  checksums: ChecksumMap;
  [extra: string]: unknown;
};

export const MANIFEST_FILE = "manifest.json";
export const SIGNATURE_FILE = "manifest.json.sig";
export const PUBLIC_KEY_FILE = "public-key.asc";
