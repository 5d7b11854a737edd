import { ManifestInvalidError, ProfileFileMissingError, SignatureInvalidError } from "../errors.js";
import { ManifestCodec } from "../manifest/codec.js";
import { collectDecisions, type DecisionProvider } from "../manifest/decisions.js";
import { buildManifest, unpublishProfiles, type BuildSummary } from "../manifest/manifest-builder.js";
import { scanRepository } from "../manifest/scanner.js";
import { assertFilesUnchanged, publishManifest, readPublished, type PublishedFiles } from "../manifest/writer.js";
import type { ManifestSigner } from "../signing/signer.js";
import type { ProfilectlConfig } from "../types/config.js";
import type { Manifest, Profile } from "../types/manifest.js";
import { EXIT } from "./exit-codes.js";
import { failure, type CommandFailure } from "./result.js";

export type BuildOptions = {
  repoRoot: string;
  config: ProfilectlConfig;
  signer: ManifestSigner;
  decisions: DecisionProvider;
  codec?: ManifestCodec;
  now?: string;
  newUuid?: () => string;
};

export type BuildResult =
  | { ok: true; manifest: Manifest; summary: BuildSummary; published: PublishedFiles | null }
  | CommandFailure;

function loadPrevious(repoRoot: string, codec: ManifestCodec): { manifest: Manifest; bytes: Buffer; signed: boolean } | null {
  const published = readPublished(repoRoot);
  if (!published) return null;
  return {
    manifest: codec.parse(published.manifestBytes),
    bytes: published.manifestBytes,
    signed: published.signature !== null,
  };
}

/** With `rehash`, every covered file is checked again after signing and before anything is written. */
async function signAndPublish(repoRoot: string, signer: ManifestSigner, bytes: Buffer, rehash?: Manifest): Promise<PublishedFiles> {
  const signature = await signer.sign(bytes);
  if (signature.length === 0) {
    throw new SignatureInvalidError("Signer returned an empty signature");
  }
  if (rehash) assertFilesUnchanged(repoRoot, rehash.checksums);
  return publishManifest({ repoRoot, manifestBytes: bytes, signature, publicKey: await signer.publicKey() });
}

/**
 * Scan, decide, build, sign, publish. Nothing is written unless every step
 * succeeded. A rebuild that yields the same bytes as the signed manifest on
 * disk publishes nothing.
 */
export async function build(opts: BuildOptions): Promise<BuildResult> {
  try {
    const codec = opts.codec ?? (await ManifestCodec.create());
    const previous = loadPrevious(opts.repoRoot, codec);
    const scan = scanRepository(opts.repoRoot, previous?.manifest ?? null, {
      configsDir: opts.config.configs_dir,
      profileExtensions: opts.config.profile_extensions,
      ignore: opts.config.ignore,
    });

    // fail before asking anything
    if (scan.missing.length > 0) {
      throw new ProfileFileMissingError(scan.missing.map((p) => p.path));
    }

    const decisions = await collectDecisions(scan, previous?.manifest ?? null, opts.decisions, opts.config.namespace);
    const { manifest, summary } = buildManifest({
      scan,
      previous: previous?.manifest ?? null,
      decisions,
      specVersion: opts.config.spec_version,
      now: opts.now,
      newUuid: opts.newUuid,
    });

    const bytes = codec.serialize(manifest);
    if (previous && previous.signed && previous.bytes.equals(bytes)) {
      return { ok: true, manifest, summary, published: null };
    }

    const published = await signAndPublish(opts.repoRoot, opts.signer, bytes, manifest);
    return { ok: true, manifest, summary, published };
  } catch (e) {
    return failure(e, EXIT.BUILD_FAILED);
  }
}

export type UnpublishResult =
  | { ok: true; manifest: Manifest; removed: Profile[]; published: PublishedFiles }
  | CommandFailure;

/** Remove profiles by uuid or path, then re-sign. */
export async function unpublish(opts: {
  repoRoot: string;
  selectors: string[];
  signer: ManifestSigner;
  codec?: ManifestCodec;
}): Promise<UnpublishResult> {
  try {
    const codec = opts.codec ?? (await ManifestCodec.create());
    const previous = loadPrevious(opts.repoRoot, codec);
    if (!previous) {
      return failure(new ManifestInvalidError(`No published manifest in ${opts.repoRoot}`), EXIT.INVALID_ARGS);
    }
    const { manifest, removed } = unpublishProfiles(previous.manifest, opts.selectors);
    const published = await signAndPublish(opts.repoRoot, opts.signer, codec.serialize(manifest));
    return { ok: true, manifest, removed, published };
  } catch (e) {
    return failure(e, EXIT.BUILD_FAILED);
  }
}
