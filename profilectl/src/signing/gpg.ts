import { execFile } from "node:child_process";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import { SignatureInvalidError, errorMessage } from "../errors.js";
import type { ManifestSigner } from "./signer.js";

const pExecFile = promisify(execFile);

export type CommandRunner = (cmd: string, args: string[]) => Promise<{ stdout: string }>;

const defaultRunner: CommandRunner = async (cmd, args) => {
  const { stdout } = await pExecFile(cmd, args, { encoding: "utf8", maxBuffer: 10 * 1024 * 1024 });
  return { stdout };
};

/** Signs with a key from the local GnuPG keyring (`gpg --detach-sign`). */
export class GpgSigner implements ManifestSigner {
  private readonly run: CommandRunner;
  private readonly gpg: string;

  constructor(
    private readonly keyId: string,
    opts: { run?: CommandRunner; gpgBinary?: string } = {},
  ) {
    this.run = opts.run ?? defaultRunner;
    this.gpg = opts.gpgBinary ?? "gpg";
  }

  async sign(data: Buffer): Promise<Buffer> {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "profilectl-sign-"));
    const input = path.join(dir, "manifest.json");
    const output = `${input}.asc`;
    try {
      fs.writeFileSync(input, data);
      await this.run(this.gpg, [
        "--batch",
        "--yes",
        "--armor",
        "--local-user",
        this.keyId,
        "--output",
        output,
        "--detach-sign",
        input,
      ]);
      if (!fs.existsSync(output)) {
        throw new Error("gpg produced no signature");
      }
      return fs.readFileSync(output);
    } catch (e) {
      throw new SignatureInvalidError(`gpg signing with key ${this.keyId} failed: ${errorMessage(e)}`);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }

  async publicKey(): Promise<string | null> {
    const { stdout } = await this.run(this.gpg, ["--batch", "--armor", "--export", this.keyId]);
    return stdout.trim() === "" ? null : stdout;
  }
}
