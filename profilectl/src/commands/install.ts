import { RepoClient, findProfile, type InstallResult } from "../client/repo-client.js";
import { diag } from "../diagnostics.js";
import type { ManifestCodec } from "../manifest/codec.js";
import type { ManifestVerifier } from "../signing/signer.js";
import { EXIT } from "./exit-codes.js";
import { failure, type CommandFailure } from "./result.js";

export type InstallCommandResult = ({ ok: true } & InstallResult) | CommandFailure;

/** Find a profile by name (or `namespace/name`) across repositories and install it. */
export async function install(opts: {
  repoRoots: string[];
  query: string;
  slicer: string;
  dest: string;
  verifier: ManifestVerifier;
  codec?: ManifestCodec;
}): Promise<InstallCommandResult> {
  try {
    const clients: RepoClient[] = [];
    for (const root of opts.repoRoots) clients.push(await RepoClient.open(root, opts.verifier, opts.codec));

    const found = findProfile(clients, opts.query, opts.slicer);
    if (!found.found) {
      if (found.ambiguous.length > 1) {
        const candidates = found.ambiguous.map((m) => `${m.client.namespace}/${m.profile.name}`);
        return {
          ok: false,
          exitCode: EXIT.INVALID_ARGS,
          errors: [
            diag("error", "PROFILE_AMBIGUOUS", `Profile '${opts.query}' found in several repositories; use one of: ${candidates.join(", ")}`, {
              details: { candidates },
            }),
          ],
        };
      }
      return {
        ok: false,
        exitCode: EXIT.INVALID_ARGS,
        errors: [diag("error", "PROFILE_NOT_FOUND", `Profile '${opts.query}' for slicer '${opts.slicer}' not found`)],
      };
    }

    const { client, profile } = found.match;
    return { ok: true, ...client.install(profile.uuid, opts.dest) };
  } catch (e) {
    return failure(e, EXIT.INTEGRITY_FAILED);
  }
}
