import { ManifestInvalidError, errorMessage } from "../errors.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { AjvValidateFn } from "../schema/ajv.js";
import type { Manifest } from "../types/manifest.js";
import { parseDigest } from "./checksum.js";

/**
 * Manifest (de)serialization. The bytes `serialize` returns are the bytes that
 * get signed and written; nothing ever re-serializes a loaded manifest to check
 * a signature.
 */
export class ManifestCodec {
  private constructor(
    private readonly registry: SchemaRegistry,
    private readonly validate: AjvValidateFn<Manifest>,
  ) {}

  static async create(source?: string | SchemaRegistry): Promise<ManifestCodec> {
    const registry = typeof source === "string" || source === undefined ? await createRegistry(source) : source;
    const validate = await registry.getValidator<Manifest>("manifest");
    return new ManifestCodec(registry, validate);
  }

  serialize(manifest: Manifest): Buffer {
    this.check(manifest);
    return Buffer.from(`${JSON.stringify(manifest, null, 2)}\n`, "utf8");
  }

  parse(bytes: Buffer | string, label = "manifest.json"): Manifest {
    let raw: unknown;
    try {
      raw = JSON.parse(typeof bytes === "string" ? bytes : bytes.toString("utf8"));
    } catch (e) {
      throw new ManifestInvalidError(`${label} is not valid JSON: ${errorMessage(e)}`);
    }
    this.check(raw, label);
    return raw;
  }

  /** Schema plus the cross-field invariants a schema cannot express. */
  check(candidate: unknown, label = "manifest"): asserts candidate is Manifest {
    if (!this.validate(candidate)) {
      throw new ManifestInvalidError(`${label} failed schema validation: ${this.registry.errorsText(this.validate.errors)}`);
    }
    const manifest = candidate;

    const uuids = new Set<string>();
    const paths = new Set<string>();
    for (const profile of manifest.profiles) {
      if (uuids.has(profile.uuid)) {
        throw new ManifestInvalidError(`${label}: duplicate profile uuid ${profile.uuid}`);
      }
      if (paths.has(profile.path)) {
        throw new ManifestInvalidError(`${label}: duplicate profile path ${profile.path}`);
      }
      uuids.add(profile.uuid);
      paths.add(profile.path);
      if (!Object.hasOwn(manifest.checksums, profile.path)) {
        throw new ManifestInvalidError(`${label}: profile ${profile.uuid} has no checksum for ${profile.path}`);
      }
    }
    for (const [file, value] of Object.entries(manifest.checksums)) {
      if (!parseDigest(value)) {
        throw new ManifestInvalidError(`${label}: malformed checksum for ${file}`);
      }
    }
  }
}
