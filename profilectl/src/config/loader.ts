import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";

export const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

const ENV_PREFIX = "PROFILECTL_";

type Layer = Record<string, unknown>;

function isPlainObject(value: unknown): value is Layer {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val) && isPlainObject(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Apply PROFILECTL_ prefixed environment variable overrides.
 * `__` separates nested keys; values are read as YAML scalars so numbers stay numbers.
 */
function applyEnvOverrides(config: Layer, env: NodeJS.ProcessEnv): Layer {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // PROFILECTL_RESOLVER__MAX_DEPTH → resolver.max_depth
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__");
    let layer: Layer = { [segments[segments.length - 1]]: parseEnvValue(value) };
    for (let i = segments.length - 2; i >= 0; i--) {
      layer = { [segments[i]]: layer };
    }
    result = deepMerge(result, layer);
  }
  return result;
}

function parseEnvValue(value: string): unknown {
  try {
    const parsed: unknown = YAML.parse(value);
    return parsed ?? value;
  } catch {
    return value;
  }
}

/**
 * Load layered config: base.yaml ← env.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig`.
 *
 * @param envName - Loads `config/{envName}.yaml` as override layer (e.g. "ci").
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): Layer {
  const dir = configDir ?? CONFIG_DIR;

  const base = loadYaml(path.join(dir, "base.yaml"));

  let merged = base;
  if (envName) {
    merged = deepMerge(base, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
