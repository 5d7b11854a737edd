import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export const SCHEMA_NAMES = ["manifest", "config-document", "profilectl-config"] as const;

export type SchemaName = (typeof SCHEMA_NAMES)[number];

export type SchemaEntry = {
  name: SchemaName;
  version: string;
  filePath: string;
  schema: object;
};

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../schemas");

function isSchemaName(value: string): value is SchemaName {
  return SCHEMA_NAMES.some((n) => n === value);
}

/**
 * The manifest, config-document and settings schemas, read from
 * `<name>.schema.json` in one directory and compiled on demand.
 */
export class SchemaRegistry {
  private entries = new Map<SchemaName, SchemaEntry>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Read every known schema; a missing one fails the load. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    for (const file of fs.readdirSync(this.schemaDir)) {
      // "manifest.schema.json" → "manifest"
      const name = file.replace(/\.schema\.json$/, "");
      if (name === file || !isSchemaName(name)) continue;

      const filePath = path.join(this.schemaDir, file);
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      if (!isObject(parsed)) {
        throw new Error(`Schema is not an object: ${filePath}`);
      }
      this.entries.set(name, { name, version: extractVersion(parsed) ?? "1.0.0", filePath, schema: parsed });
    }

    const missing = SCHEMA_NAMES.filter((n) => !this.entries.has(n));
    if (missing.length > 0) {
      throw new Error(`Missing schemas in ${this.schemaDir}: ${missing.map((n) => `${n}.schema.json`).join(", ")}`);
    }

    this.ajv = await loadAjv();
  }

  names(): SchemaName[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version, from each schema's `$id`. */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Compile a validator for the given schema name; ajv caches by schema object. */
  async getValidator<T = unknown>(name: SchemaName): Promise<AjvValidateFn<T>> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const ajv = await this.instance();
    return ajv.compile<T>(entry.schema);
  }

  errorsText(errors: unknown, options?: { separator?: string; dataVar?: string }): string {
    if (!this.ajv) throw new Error("Schema registry not loaded");
    return this.ajv.errorsText(errors, options);
  }

  /** Validate data against a named schema. Returns errors or null. */
  async validate(name: SchemaName, data: unknown): Promise<{ valid: boolean; errors: string | null }> {
    const validate = await this.getValidator(name);
    const valid = validate(data);
    const ajv = await this.instance();

    return {
      valid,
      errors: valid ? null : ajv.errorsText(validate.errors),
    };
  }

  private async instance(): Promise<AjvInstance> {
    if (!this.ajv) {
      this.ajv = await loadAjv();
    }
    return this.ajv;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractVersion(schema: Record<string, unknown>): string | null {
  if (typeof schema.version === "string") return schema.version;

  // "...@1.0.0" in $id
  if (typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }

  return null;
}

export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  await registry.load();
  return registry;
}
