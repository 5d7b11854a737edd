import fs from "node:fs";
import path from "node:path";
import { beforeAll, describe, expect, it } from "vitest";
import { SignatureInvalidError } from "../src/errors.js";
import { GpgSigner, OpenPgpSigner, OpenPgpVerifier, createSigner, loadVerifier, type CommandRunner } from "../src/signing/index.js";
import { generateTestKeys, makeTmp, writeFile, type TestKeys } from "./helpers.js";

const DATA = Buffer.from('{"namespace":"test_ns"}\n', "utf8");

describe("OpenPGP signing", () => {
  let keys: TestKeys;
  let other: TestKeys;

  beforeAll(async () => {
    keys = await generateTestKeys();
    other = await generateTestKeys(undefined, "Someone Else");
  });

  it("verifies a detached signature over the exact bytes", async () => {
    const signer = await OpenPgpSigner.fromArmored(keys.privateKey);
    const signature = await signer.sign(DATA);
    expect(signature.toString("utf8")).toMatch(/^-----BEGIN PGP SIGNATURE-----/);

    const verifier = await OpenPgpVerifier.fromArmored(keys.publicKey);
    expect(await verifier.verify(DATA, signature)).toBe(true);
  });

  it("rejects a signature after a one-byte change", async () => {
    const signer = await OpenPgpSigner.fromArmored(keys.privateKey);
    const signature = await signer.sign(DATA);
    const tampered = Buffer.from(DATA);
    tampered[2] = tampered[2] + 1;
    const verifier = await OpenPgpVerifier.fromArmored(keys.publicKey);
    expect(await verifier.verify(tampered, signature)).toBe(false);
  });

  it("rejects a signature made with another key", async () => {
    const signature = await (await OpenPgpSigner.fromArmored(other.privateKey)).sign(DATA);
    const verifier = await OpenPgpVerifier.fromArmored(keys.publicKey);
    expect(await verifier.verify(DATA, signature)).toBe(false);
  });

  it("returns false for garbage instead of throwing", async () => {
    const verifier = await OpenPgpVerifier.fromArmored(keys.publicKey);
    expect(await verifier.verify(DATA, Buffer.from("not a signature"))).toBe(false);
    expect(await verifier.verify(DATA, Buffer.alloc(0))).toBe(false);
  });

  it("exports the public half of the signing key", async () => {
    const signer = await OpenPgpSigner.fromArmored(keys.privateKey);
    const exported = await signer.publicKey();
    expect(exported).toMatch(/^-----BEGIN PGP PUBLIC KEY BLOCK-----/);
    const verifier = await OpenPgpVerifier.fromArmored(exported);
    expect(await verifier.verify(DATA, await signer.sign(DATA))).toBe(true);
  });

  it("unlocks an encrypted key with its passphrase", async () => {
    const locked = await generateTestKeys("test-secret");
    const signer = await OpenPgpSigner.fromArmored(locked.privateKey, "test-secret");
    const verifier = await OpenPgpVerifier.fromArmored(locked.publicKey);
    expect(await verifier.verify(DATA, await signer.sign(DATA))).toBe(true);

    await expect(OpenPgpSigner.fromArmored(locked.privateKey)).rejects.toThrow(
      "Cannot load signing key: private key is encrypted and no passphrase was given",
    );
    await expect(OpenPgpSigner.fromArmored(locked.privateKey, "wrong-secret")).rejects.toBeInstanceOf(SignatureInvalidError);
  });

  it("rejects unreadable key material", async () => {
    await expect(OpenPgpSigner.fromArmored("no key here")).rejects.toThrow(/^Cannot load signing key: /);
    await expect(OpenPgpVerifier.fromArmored("no key here")).rejects.toThrow(/^Cannot load public key: /);
  });

  it("loads signer and verifier from key files", async () => {
    const tmp = makeTmp();
    const keyFile = writeFile(tmp, "signing.asc", keys.privateKey);
    const pubFile = writeFile(tmp, "public.asc", keys.publicKey);
    const signer = await createSigner({ keyFile });
    const verifier = await loadVerifier(pubFile);
    expect(await verifier.verify(DATA, await signer.sign(DATA))).toBe(true);
  });
});

describe("GpgSigner", () => {
  function fakeGpg(calls: string[][]): CommandRunner {
    return async (_cmd, args) => {
      calls.push(args);
      if (args.includes("--detach-sign")) {
        const out = args[args.indexOf("--output") + 1];
        const input = fs.readFileSync(args[args.length - 1], "utf8");
        fs.writeFileSync(out, `SIGNED(${input.trim()})`);
        return { stdout: "" };
      }
      return { stdout: args.includes("ABCD1234") ? "-----BEGIN PGP PUBLIC KEY BLOCK-----\n" : "" };
    };
  }

  it("signs through the gpg command and cleans up its scratch files", async () => {
    const calls: string[][] = [];
    const signer = new GpgSigner("ABCD1234", { run: fakeGpg(calls) });
    const signature = await signer.sign(DATA);
    expect(signature.toString("utf8")).toBe('SIGNED({"namespace":"test_ns"})');
    expect(calls[0].slice(0, 6)).toEqual(["--batch", "--yes", "--armor", "--local-user", "ABCD1234", "--output"]);
    expect(fs.existsSync(path.dirname(calls[0][6]))).toBe(false);
  });

  it("wraps gpg failures", async () => {
    const signer = new GpgSigner("ABCD1234", {
      run: async () => {
        throw new Error("gpg: signing failed: No secret key");
      },
    });
    await expect(signer.sign(DATA)).rejects.toThrow("gpg signing with key ABCD1234 failed: gpg: signing failed: No secret key");
  });

  it("fails when gpg writes no signature", async () => {
    const signer = new GpgSigner("ABCD1234", { run: async () => ({ stdout: "" }) });
    await expect(signer.sign(DATA)).rejects.toThrow("gpg signing with key ABCD1234 failed: gpg produced no signature");
  });

  it("exports the public key, or null for an unknown id", async () => {
    const calls: string[][] = [];
    expect(await new GpgSigner("ABCD1234", { run: fakeGpg(calls) }).publicKey()).toBe("-----BEGIN PGP PUBLIC KEY BLOCK-----\n");
    expect(await new GpgSigner("FFFF0000", { run: fakeGpg(calls) }).publicKey()).toBeNull();
    expect(calls[0]).toEqual(["--batch", "--armor", "--export", "ABCD1234"]);
  });

  it("is chosen by createSigner for a key id", async () => {
    const signer = await createSigner({ gpgKeyId: "ABCD1234", run: fakeGpg([]) });
    expect(signer).toBeInstanceOf(GpgSigner);
  });
});
