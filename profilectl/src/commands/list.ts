import { RepoClient } from "../client/repo-client.js";
import type { ManifestCodec } from "../manifest/codec.js";
import type { ManifestVerifier } from "../signing/signer.js";
import type { Profile } from "../types/manifest.js";
import { EXIT } from "./exit-codes.js";
import { failure, type CommandFailure } from "./result.js";

export type ListedProfile = { namespace: string; profile: Profile };

export type ListResult = { ok: true; profiles: ListedProfile[] } | CommandFailure;

/** Every profile of the given repositories, optionally for one slicer. Each manifest is verified first. */
export async function listProfiles(opts: {
  repoRoots: string[];
  slicer?: string;
  verifier: ManifestVerifier;
  codec?: ManifestCodec;
}): Promise<ListResult> {
  try {
    const profiles: ListedProfile[] = [];
    for (const root of opts.repoRoots) {
      const client = await RepoClient.open(root, opts.verifier, opts.codec);
      for (const profile of client.listProfiles(opts.slicer)) profiles.push({ namespace: client.namespace, profile });
    }
    return { ok: true, profiles };
  } catch (e) {
    return failure(e, EXIT.INTEGRITY_FAILED);
  }
}
