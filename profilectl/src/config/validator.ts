import fs from "node:fs";
import path from "node:path";
import { loadAjv } from "../schema/ajv.js";
import { DEFAULT_SCHEMA_DIR } from "../schema/registry.js";
import type { ProfilectlConfig } from "../types/config.js";
import { loadConfig } from "./loader.js";

export type ConfigValidationResult =
  | { valid: true; config: ProfilectlConfig; errors: null }
  | { valid: false; config: null; errors: string };

/** Validate a loaded config against `profilectl-config.schema.json`. */
export async function validateConfig(config: unknown, schemaDir = DEFAULT_SCHEMA_DIR): Promise<ConfigValidationResult> {
  const schemaPath = path.join(schemaDir, "profilectl-config.schema.json");
  const schema: object = JSON.parse(fs.readFileSync(schemaPath, "utf8"));
  const ajv = await loadAjv();
  const validate = ajv.compile<ProfilectlConfig>(schema);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, config: null, errors: ajv.errorsText(validate.errors) };
}

/** Load and validate in one step; throws with the schema errors on failure. */
export async function loadValidatedConfig(
  opts: { envName?: string; configDir?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<ProfilectlConfig> {
  const res = await validateConfig(loadConfig(opts.envName, opts.configDir, opts.env));
  if (!res.valid) {
    throw new Error(`Invalid profilectl config: ${res.errors}`);
  }
  return res.config;
}
