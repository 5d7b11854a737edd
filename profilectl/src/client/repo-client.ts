import fs from "node:fs";
import path from "node:path";
import { diag, type Diagnostic } from "../diagnostics.js";
import { ManifestInvalidError, ProfileFileMissingError, SignatureInvalidError } from "../errors.js";
import { verifyDigest } from "../manifest/checksum.js";
import { ManifestCodec } from "../manifest/codec.js";
import { readPublished } from "../manifest/writer.js";
import type { ManifestVerifier } from "../signing/signer.js";
import type { Manifest, Profile } from "../types/manifest.js";

export type InstallResult = {
  /** Absolute paths written under the destination, in dependency-walk order. */
  files: string[];
  profiles: Profile[];
  warnings: Diagnostic[];
};

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/**
 * Client for one published repository, read from a local directory. Nothing is
 * trusted until `update` has checked the manifest signature with the pinned key.
 */
export class RepoClient {
  private manifest: Manifest | null = null;
  private byUuid = new Map<string, Profile>();

  constructor(
    readonly repoRoot: string,
    private readonly verifier: ManifestVerifier,
    private readonly codec: ManifestCodec,
  ) {}

  static async open(repoRoot: string, verifier: ManifestVerifier, codec?: ManifestCodec): Promise<RepoClient> {
    const client = new RepoClient(repoRoot, verifier, codec ?? (await ManifestCodec.create()));
    await client.update();
    return client;
  }

  /** Load and verify `manifest.json` against `manifest.json.sig`. */
  async update(): Promise<Manifest> {
    this.manifest = null;
    this.byUuid.clear();

    const published = readPublished(this.repoRoot);
    if (!published) {
      throw new ManifestInvalidError(`No manifest.json in ${this.repoRoot}`);
    }
    if (!published.signature) {
      throw new SignatureInvalidError(`No manifest.json.sig in ${this.repoRoot}; the repository is untrusted`);
    }
    if (!(await this.verifier.verify(published.manifestBytes, published.signature))) {
      throw new SignatureInvalidError(`Manifest signature verification failed for ${this.repoRoot}; the repository is untrusted`);
    }

    const manifest = this.codec.parse(published.manifestBytes);
    this.manifest = manifest;
    for (const p of manifest.profiles) this.byUuid.set(p.uuid, p);
    return manifest;
  }

  get namespace(): string {
    return this.trusted().namespace;
  }

  getManifest(): Manifest {
    return this.trusted();
  }

  listProfiles(slicer?: string): Profile[] {
    const profiles = this.trusted().profiles;
    return slicer === undefined ? [...profiles] : profiles.filter((p) => p.slicer === slicer);
  }

  findByName(name: string, slicer?: string): Profile | null {
    return this.listProfiles(slicer).find((p) => p.name === name) ?? null;
  }

  getProfile(uuid: string): Profile | null {
    this.trusted();
    return this.byUuid.get(uuid) ?? null;
  }

  /**
   * Copy a profile and its `dependencies` closure to `dest`, keeping each
   * file's repository path. Every checksum is verified before the first
   * write, so a single mismatch installs nothing.
   */
  install(uuid: string, dest: string): InstallResult {
    const manifest = this.trusted();
    if (!this.byUuid.has(uuid)) {
      throw new ManifestInvalidError(`Profile ${uuid} is not in the manifest`);
    }

    const warnings: Diagnostic[] = [];
    const profiles: Profile[] = [];
    const seen = new Set<string>();
    const queue = [uuid];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      const profile = this.byUuid.get(next);
      if (!profile) {
        warnings.push(diag("warn", "DEPENDENCY_UNKNOWN", `Could not find profile with uuid ${next}, skipping`, { details: { uuid: next } }));
        continue;
      }
      profiles.push(profile);
      queue.push(...profile.dependencies);
    }

    const root = path.resolve(dest);
    const staged: { target: string; content: Buffer }[] = [];
    const missing: string[] = [];
    for (const profile of profiles) {
      const expected = manifest.checksums[profile.path];
      if (expected === undefined) {
        throw new ManifestInvalidError(`No checksum for ${profile.path}`);
      }
      const source = path.resolve(this.repoRoot, profile.path);
      const target = path.resolve(root, profile.path);
      if (!isWithinDir(path.resolve(this.repoRoot), source) || !isWithinDir(root, target)) {
        throw new ManifestInvalidError(`Profile path escapes the repository: ${profile.path}`);
      }
      if (!fs.existsSync(source) || !fs.statSync(source).isFile()) {
        missing.push(profile.path);
        continue;
      }
      const content = fs.readFileSync(source);
      verifyDigest(profile.path, content, expected);
      staged.push({ target, content });
    }
    if (missing.length > 0) throw new ProfileFileMissingError(missing);

    for (const { target, content } of staged) {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content);
    }
    return { files: staged.map((s) => s.target), profiles, warnings };
  }

  private trusted(): Manifest {
    if (!this.manifest) {
      throw new SignatureInvalidError(`Repository ${this.repoRoot} has not been verified`);
    }
    return this.manifest;
  }
}

export type ProfileMatch = { client: RepoClient; profile: Profile };

export type FindResult =
  | { found: true; match: ProfileMatch }
  | { found: false; ambiguous: ProfileMatch[] };

/**
 * Look a profile up across several repositories. `namespace/name` targets one
 * repository; a bare name must be unique across all of them.
 */
export function findProfile(clients: RepoClient[], query: string, slicer: string): FindResult {
  const slash = query.indexOf("/");
  if (slash >= 0) {
    const namespace = query.slice(0, slash).trim();
    const name = query.slice(slash + 1).trim();
    for (const client of clients) {
      if (client.namespace !== namespace) continue;
      const profile = client.findByName(name, slicer);
      if (profile) return { found: true, match: { client, profile } };
    }
    return { found: false, ambiguous: [] };
  }

  const matches: ProfileMatch[] = [];
  for (const client of clients) {
    for (const profile of client.listProfiles(slicer)) {
      if (profile.name === query) matches.push({ client, profile });
    }
  }
  if (matches.length === 1) return { found: true, match: matches[0] };
  return { found: false, ambiguous: matches };
}
