import * as openpgp from "openpgp";
import { SignatureInvalidError, errorMessage } from "../errors.js";
import type { ManifestSigner, ManifestVerifier } from "./signer.js";

/** Detached, ASCII-armored OpenPGP signatures from an armored private key. */
export class OpenPgpSigner implements ManifestSigner {
  private constructor(private readonly key: openpgp.PrivateKey) {}

  static async fromArmored(armoredKey: string, passphrase?: string): Promise<OpenPgpSigner> {
    let key: openpgp.PrivateKey;
    try {
      key = await openpgp.readPrivateKey({ armoredKey });
      if (!key.isDecrypted()) {
        if (passphrase === undefined) {
          throw new Error("private key is encrypted and no passphrase was given");
        }
        key = await openpgp.decryptKey({ privateKey: key, passphrase });
      }
    } catch (e) {
      throw new SignatureInvalidError(`Cannot load signing key: ${errorMessage(e)}`);
    }
    return new OpenPgpSigner(key);
  }

  async sign(data: Buffer): Promise<Buffer> {
    const message = await openpgp.createMessage({ binary: data });
    const armored = await openpgp.sign({ message, signingKeys: this.key, detached: true, format: "armored" });
    return Buffer.from(armored, "utf8");
  }

  async publicKey(): Promise<string> {
    return this.key.toPublic().armor();
  }
}

export class OpenPgpVerifier implements ManifestVerifier {
  private constructor(private readonly key: openpgp.PublicKey) {}

  static async fromArmored(armoredKey: string): Promise<OpenPgpVerifier> {
    try {
      return new OpenPgpVerifier(await openpgp.readKey({ armoredKey }));
    } catch (e) {
      throw new SignatureInvalidError(`Cannot load public key: ${errorMessage(e)}`);
    }
  }

  async verify(data: Buffer, signature: Buffer): Promise<boolean> {
    try {
      const message = await openpgp.createMessage({ binary: data });
      const parsed = await openpgp.readSignature({ armoredSignature: signature.toString("utf8") });
      const result = await openpgp.verify({ message, signature: parsed, verificationKeys: this.key });
      if (result.signatures.length === 0) return false;
      // each `verified` rejects on a bad or foreign signature
      await Promise.all(result.signatures.map((s) => s.verified));
      return true;
    } catch {
      return false;
    }
  }
}
