/**
 * Slicer configuration documents and the tagged value tree they parse into.
 *
 * Documents have no fixed schema, so every value is one of three shapes and the
 * merge rule is written once against those shapes.
 */
export type Scalar = string | number | boolean | null;

export type ConfigValue =
  | { kind: "scalar"; value: Scalar }
  | { kind: "sequence"; items: ConfigValue[] }
  | { kind: "mapping"; entries: Map<string, ConfigValue> };

export type ConfigMapping = Extract<ConfigValue, { kind: "mapping" }>;

export type Scope = "system" | "vendor" | "user";

export const SCOPES: readonly Scope[] = ["system", "vendor", "user"];

export type ConfigRef = {
  slicer: string;
  type: string;
  scope: Scope;
  name: string;
};

export type ConfigDocument = {
  /** Authorship, tags, compatibility. Opaque to the resolver. */
  metadata: ConfigMapping | null;
  config: ConfigMapping;
};

/** A document read through the config store, with the bytes' digest. */
export type LoadedConfig = {
  /** Cache identity, e.g. `system:orcaslicer/filaments/fdm_filament_pla`. */
  key: string;
  name: string;
  /** Path relative to the repository root. */
  path: string;
  checksum: string;
  document: ConfigDocument;
  /**
   * Search candidates ahead of `path` that held no file when it was found.
   * A file appearing at one of them now takes precedence.
   */
  shadowedBy: string[];
};
