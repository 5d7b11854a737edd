import fs from "node:fs";
import path from "node:path";
import { ConfigNotFoundError, InvalidConfigError, errorMessage } from "../errors.js";
import { digest } from "../manifest/checksum.js";
import type { ConfigDocument, ConfigRef, LoadedConfig, Scope } from "../types/config-document.js";
import { mappingFromJson } from "./value.js";

export type ConfigStoreOptions = {
  /** Directory (relative to the repository root) holding `<slicer>/...` trees. */
  slicersDir: string;
  /** Subdirectory name for user-owned bases. */
  userDir: string;
};

/** Read-only access to configuration documents by reference or by path. */
export interface ConfigStore {
  lookup(ref: ConfigRef): LoadedConfig;
  loadPath(slicer: string, type: string, relPath: string): LoadedConfig;
  /** Digest of the bytes currently on disk, or null when the file is gone. */
  currentChecksum(relPath: string): string | null;
}

export function refKey(ref: ConfigRef): string {
  return `${ref.scope}:${ref.slicer}/${ref.type}/${ref.name}`;
}

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

function isFile(abs: string): boolean {
  return fs.existsSync(abs) && fs.statSync(abs).isFile();
}

function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

/** Parse document bytes; malformed JSON or a non-mapping `config` is InvalidConfig. */
export function parseConfigDocument(bytes: Buffer | string, label: string): ConfigDocument {
  let parsed: unknown;
  try {
    parsed = JSON.parse(typeof bytes === "string" ? bytes : bytes.toString("utf8"));
  } catch (e) {
    throw new InvalidConfigError(`Failed to parse ${label}: ${errorMessage(e)}`);
  }
  const root = mappingFromJson(parsed, label);
  const config = root.entries.get("config");
  if (!config || config.kind !== "mapping") {
    throw new InvalidConfigError(`Missing "config" mapping in ${label}`);
  }
  const metadata = root.entries.get("metadata");
  if (metadata !== undefined && metadata.kind !== "mapping") {
    throw new InvalidConfigError(`"metadata" must be a mapping in ${label}`);
  }
  return { config, metadata: metadata ?? null };
}

/**
 * Filesystem config store rooted at a repository.
 *
 * Search paths, first hit wins:
 * - system/vendor: `<slicer>/base`, `<slicer>/<type>/base`, `<slicer>/system`
 * - user: `<slicer>/<userDir>`, `<slicer>/<type>/<userDir>`
 */
export class FsConfigStore implements ConfigStore {
  private readonly slicersRoot: string;

  constructor(
    private readonly repoRoot: string,
    private readonly options: ConfigStoreOptions,
  ) {
    this.slicersRoot = path.resolve(repoRoot, options.slicersDir);
  }

  searchPaths(ref: ConfigRef): string[] {
    const file = `${ref.name}.json`;
    const dirs = this.searchDirs(ref.scope, ref.slicer, ref.type);
    return dirs.map((d) => toPosix(path.join(this.options.slicersDir, d, file)));
  }

  lookup(ref: ConfigRef): LoadedConfig {
    const candidates = this.searchPaths(ref);
    const missed: string[] = [];
    for (const rel of candidates) {
      const abs = path.resolve(this.repoRoot, rel);
      if (!isWithinDir(this.slicersRoot, abs)) continue;
      if (isFile(abs)) {
        return { ...this.read(abs, rel, refKey(ref), ref.name), shadowedBy: missed };
      }
      missed.push(rel);
    }
    throw new ConfigNotFoundError(ref.scope, ref.name, [], candidates);
  }

  loadPath(slicer: string, type: string, relPath: string): LoadedConfig {
    const rel = toPosix(path.join(this.options.slicersDir, slicer, type, relPath));
    const abs = path.resolve(this.repoRoot, rel);
    if (!isWithinDir(this.slicersRoot, abs) || !isFile(abs)) {
      throw new ConfigNotFoundError("path", `${slicer}/${type}/${relPath}`);
    }
    const key = `path:${slicer}/${type}/${toPosix(path.normalize(relPath))}`;
    return this.read(abs, rel, key, null);
  }

  currentChecksum(relPath: string): string | null {
    const abs = path.resolve(this.repoRoot, relPath);
    if (!isFile(abs)) return null;
    return digest(fs.readFileSync(abs));
  }

  private searchDirs(scope: Scope, slicer: string, type: string): string[] {
    if (scope === "user") {
      return [path.join(slicer, this.options.userDir), path.join(slicer, type, this.options.userDir)];
    }
    return [path.join(slicer, "base"), path.join(slicer, type, "base"), path.join(slicer, "system")];
  }

  /** Searched documents are named by their lookup name; path targets by `config.name` or file stem. */
  private read(abs: string, rel: string, key: string, lookupName: string | null): LoadedConfig {
    const bytes = fs.readFileSync(abs);
    const document = parseConfigDocument(bytes, rel);
    const declared = document.config.entries.get("name");
    const name =
      lookupName ??
      (declared?.kind === "scalar" && typeof declared.value === "string" && declared.value !== ""
        ? declared.value
        : path.basename(abs, path.extname(abs)));
    return { key, name, path: rel, checksum: digest(bytes), document, shadowedBy: [] };
  }
}
