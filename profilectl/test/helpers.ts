import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as openpgp from "openpgp";
import { build } from "../src/commands/build.js";
import { ManifestCodec } from "../src/manifest/codec.js";
import { NonInteractiveDecisions } from "../src/manifest/decisions.js";
import { publishManifest } from "../src/manifest/writer.js";
import { OpenPgpSigner } from "../src/signing/openpgp.js";
import type { ProfilectlConfig } from "../src/types/config.js";
import type { Manifest } from "../src/types/manifest.js";

export const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");
export const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

export const FIXED_NOW = "2026-01-01T00:00:00.000Z";

export function makeTmp(prefix = "profilectl-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(root: string, rel: string, content: string | Buffer): string {
  const abs = path.join(root, rel);
  fs.mkdirSync(path.dirname(abs), { recursive: true });
  fs.writeFileSync(abs, content);
  return abs;
}

/** Write a config document `{metadata?, config}` under the repository root. */
export function writeDoc(root: string, rel: string, config: Record<string, unknown>, metadata?: Record<string, unknown>): string {
  const doc = metadata ? { metadata, config } : { config };
  return writeFile(root, rel, `${JSON.stringify(doc, null, 2)}\n`);
}

export function testConfig(overrides: Partial<ProfilectlConfig> = {}): ProfilectlConfig {
  return {
    schema_version: "1.0.0",
    spec_version: "1.0",
    namespace: "default_namespace",
    configs_dir: "slicers",
    slicers_dir: "slicers",
    profile_extensions: [".json"],
    ignore: [".*", "**/.*", "**/*.md", "**/*.sig"],
    resolver: { max_depth: 32, user_dir: "user" },
    server: { port: 0 },
    ...overrides,
  };
}

/** Sequential v4-shaped uuids: ...0001, ...0002, ... */
export function uuidSequence(): () => string {
  let n = 0;
  return () => {
    n++;
    return `00000000-0000-4000-8000-${n.toString(16).padStart(12, "0")}`;
  };
}

export function testUuid(n: number): string {
  return `00000000-0000-4000-8000-${n.toString(16).padStart(12, "0")}`;
}

/**
 * The filament chain used across tests:
 * fdm_filament_common <- fdm_filament_pla <- Generic PLA
 */
export function writeFilamentChain(root: string): void {
  writeDoc(root, "slicers/orcaslicer/filament/base/fdm_filament_common.json", {
    name: "fdm_filament_common",
    instantiation: "false",
    nozzle_temperature: [200],
    filament_type: ["PLA"],
    cooling: { fan_min: 20, fan_max: 100 },
  });
  writeDoc(root, "slicers/orcaslicer/filament/base/fdm_filament_pla.json", {
    inherits: "fdm_filament_common",
    from: "system",
    nozzle_temperature: [210],
  });
  writeDoc(
    root,
    "slicers/orcaslicer/filament/Generic PLA.json",
    {
      name: "Generic PLA",
      inherits: "fdm_filament_pla",
      instantiation: "true",
      cooling: { fan_max: 80 },
    },
    { author: "Test Author" },
  );
}

export type TestKeys = { privateKey: string; publicKey: string };

export async function generateTestKeys(passphrase?: string, name = "Test Publisher"): Promise<TestKeys> {
  const { privateKey, publicKey } = await openpgp.generateKey({
    type: "ecc",
    curve: "curve25519",
    userIDs: [{ name, email: "publisher@example.com" }],
    passphrase,
    format: "armored",
  });
  return { privateKey, publicKey };
}

/**
 * Lay out the filament chain plus one asset in `root` and publish a signed
 * manifest for it. Uuids follow scan order: Generic PLA, common, pla.
 */
export async function publishTestRepo(root: string, keys: TestKeys, namespace = "test_ns"): Promise<Manifest> {
  writeFilamentChain(root);
  writeFile(root, "slicers/orcaslicer/filament/cover.png", "not really a png");
  const result = await build({
    repoRoot: root,
    config: testConfig(),
    signer: await OpenPgpSigner.fromArmored(keys.privateKey),
    decisions: new NonInteractiveDecisions({ namespace }),
    codec: await ManifestCodec.create(SCHEMA_DIR),
    now: FIXED_NOW,
    newUuid: uuidSequence(),
  });
  if (!result.ok) throw new Error(result.errors.map((e) => e.message).join("; "));
  return result.manifest;
}

/** Sign and publish a hand-edited manifest. */
export async function republish(root: string, keys: TestKeys, manifest: Manifest): Promise<void> {
  const codec = await ManifestCodec.create(SCHEMA_DIR);
  const signer = await OpenPgpSigner.fromArmored(keys.privateKey);
  const bytes = codec.serialize(manifest);
  publishManifest({ repoRoot: root, manifestBytes: bytes, signature: await signer.sign(bytes), publicKey: await signer.publicKey() });
}
