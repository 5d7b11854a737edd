import fs from "node:fs";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { ChecksumMismatchError, ProfileFileMissingError } from "../src/errors.js";
import { digest } from "../src/manifest/checksum.js";
import { assertFilesUnchanged, publishManifest, readPublished } from "../src/manifest/writer.js";
import { makeTmp, writeFile } from "./helpers.js";

describe("assertFilesUnchanged", () => {
  it("passes while every file still has its digest", () => {
    const root = makeTmp();
    writeFile(root, "slicers/a.json", "a");
    expect(() => assertFilesUnchanged(root, { "slicers/a.json": digest("a") })).not.toThrow();
  });

  it("detects a file edited during the build", () => {
    const root = makeTmp();
    writeFile(root, "slicers/a.json", "edited");
    expect(() => assertFilesUnchanged(root, { "slicers/a.json": digest("a") })).toThrow(ChecksumMismatchError);
  });

  it("detects a file removed during the build", () => {
    const root = makeTmp();
    expect(() => assertFilesUnchanged(root, { "slicers/a.json": digest("a") })).toThrow(ProfileFileMissingError);
  });
});

describe("publishManifest", () => {
  it("writes manifest, signature and key side by side", () => {
    const root = makeTmp();
    const files = publishManifest({
      repoRoot: root,
      manifestBytes: Buffer.from("{}\n"),
      signature: Buffer.from("sig"),
      publicKey: "key",
    });
    expect(files).toEqual({
      manifest: path.join(root, "manifest.json"),
      signature: path.join(root, "manifest.json.sig"),
      publicKey: path.join(root, "public-key.asc"),
    });
    expect(fs.readdirSync(root).sort()).toEqual(["manifest.json", "manifest.json.sig", "public-key.asc"]);
    expect(readPublished(root)).toEqual({ manifestBytes: Buffer.from("{}\n"), signature: Buffer.from("sig") });
  });

  it("keeps the previous publication when a file cannot be set aside", () => {
    const root = makeTmp();
    writeFile(root, "manifest.json", "old\n");
    writeFile(root, "manifest.json.sig", "old-sig");
    // a directory in the way cannot be copied aside
    fs.mkdirSync(path.join(root, "public-key.asc", "occupied"), { recursive: true });

    expect(() =>
      publishManifest({ repoRoot: root, manifestBytes: Buffer.from("new\n"), signature: Buffer.from("new-sig"), publicKey: "key" }),
    ).toThrow();
    expect(fs.readFileSync(path.join(root, "manifest.json"), "utf8")).toBe("old\n");
    expect(fs.readFileSync(path.join(root, "manifest.json.sig"), "utf8")).toBe("old-sig");
    expect(fs.readdirSync(root).sort()).toEqual(["manifest.json", "manifest.json.sig", "public-key.asc"]);
  });

  it("puts the previous signature back when the manifest rename fails", () => {
    const root = makeTmp();
    writeFile(root, "manifest.json", "old\n");
    writeFile(root, "manifest.json.sig", "old-sig");
    const realRename = fs.renameSync;
    const rename = vi.spyOn(fs, "renameSync").mockImplementation((from, to) => {
      if (String(from).includes(".tmp-") && String(to).endsWith("manifest.json")) throw new Error("rename refused");
      realRename(from, to);
    });
    try {
      expect(() =>
        publishManifest({ repoRoot: root, manifestBytes: Buffer.from("new\n"), signature: Buffer.from("new-sig"), publicKey: "key" }),
      ).toThrow("rename refused");
    } finally {
      rename.mockRestore();
    }
    expect(fs.readFileSync(path.join(root, "manifest.json"), "utf8")).toBe("old\n");
    expect(fs.readFileSync(path.join(root, "manifest.json.sig"), "utf8")).toBe("old-sig");
    expect(fs.readdirSync(root).sort()).toEqual(["manifest.json", "manifest.json.sig"]);
  });

  it("leaves no copies of the previous files after a successful publish", () => {
    const root = makeTmp();
    writeFile(root, "manifest.json", "old\n");
    writeFile(root, "manifest.json.sig", "old-sig");
    publishManifest({ repoRoot: root, manifestBytes: Buffer.from("new\n"), signature: Buffer.from("new-sig"), publicKey: null });
    expect(fs.readdirSync(root).sort()).toEqual(["manifest.json", "manifest.json.sig"]);
    expect(fs.readFileSync(path.join(root, "manifest.json.sig"), "utf8")).toBe("new-sig");
  });

  it("reports an unpublished repository as null", () => {
    expect(readPublished(makeTmp())).toBeNull();
  });
});
