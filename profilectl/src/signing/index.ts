import fs from "node:fs";
import { OpenPgpSigner, OpenPgpVerifier } from "./openpgp.js";
import { GpgSigner, type CommandRunner } from "./gpg.js";
import type { ManifestSigner, ManifestVerifier } from "./signer.js";

export type { ManifestSigner, ManifestVerifier } from "./signer.js";
export { OpenPgpSigner, OpenPgpVerifier } from "./openpgp.js";
export { GpgSigner, type CommandRunner } from "./gpg.js";

export type SigningOptions =
  | { keyFile: string; passphrase?: string }
  | { gpgKeyId: string; run?: CommandRunner };

export async function createSigner(opts: SigningOptions): Promise<ManifestSigner> {
  if ("gpgKeyId" in opts) {
    return new GpgSigner(opts.gpgKeyId, { run: opts.run });
  }
  return OpenPgpSigner.fromArmored(fs.readFileSync(opts.keyFile, "utf8"), opts.passphrase);
}

export async function loadVerifier(publicKeyFile: string): Promise<ManifestVerifier> {
  return OpenPgpVerifier.fromArmored(fs.readFileSync(publicKeyFile, "utf8"));
}
