/** Produces a detached signature over the exact manifest bytes. */
export interface ManifestSigner {
  sign(data: Buffer): Promise<Buffer>;
  /** Armored public key to publish beside the manifest, when the signer can export it. */
  publicKey(): Promise<string | null>;
}

export interface ManifestVerifier {
  /** False for a forged, corrupted or foreign signature; never throws for bad input. */
  verify(data: Buffer, signature: Buffer): Promise<boolean>;
}
