import { describe, expect, it } from "vitest";
import { deepMerge, loadConfig } from "../src/config/loader.js";
import { loadValidatedConfig, validateConfig } from "../src/config/validator.js";
import { CONFIG_DIR, SCHEMA_DIR } from "./helpers.js";

describe("config loader", () => {
  it("loads base config with all required fields", () => {
    const config = loadConfig(undefined, CONFIG_DIR, {});
    expect(config.schema_version).toBe("1.0.0");
    expect(config.configs_dir).toBe("slicers");
    expect(config.resolver).toEqual({ max_depth: 32, user_dir: "user" });
    expect(config.server).toEqual({ port: 8080 });
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig("ci", CONFIG_DIR, {});
    expect(config.resolver).toEqual({ max_depth: 16, user_dir: "user" });
    expect(config.server).toEqual({ port: 0 });
    // base fields still present
    expect(config.namespace).toBe("default_namespace");
  });

  it("applies environment variable overrides", () => {
    const config = loadConfig(undefined, CONFIG_DIR, { PROFILECTL_NAMESPACE: "from_env" });
    expect(config.namespace).toBe("from_env");
  });

  it("env vars override env-specific yaml, nested keys keep their type", () => {
    const config = loadConfig("ci", CONFIG_DIR, { PROFILECTL_RESOLVER__MAX_DEPTH: "4", OTHER_VAR: "ignored" });
    expect(config.resolver).toEqual({ max_depth: 4, user_dir: "user" });
  });

  it("returns base config when env yaml does not exist", () => {
    const config = loadConfig("nonexistent-env", CONFIG_DIR, {});
    expect(config.resolver).toEqual({ max_depth: 32, user_dir: "user" });
  });

  it("replaces arrays instead of concatenating", () => {
    expect(deepMerge({ a: [1, 2], b: { c: 1, d: 2 } }, { a: [3], b: { d: 4 } })).toEqual({ a: [3], b: { c: 1, d: 4 } });
  });
});

describe("config validator", () => {
  it("validates a correct base config", async () => {
    const { valid, errors } = await validateConfig(loadConfig(undefined, CONFIG_DIR, {}), SCHEMA_DIR);
    expect(valid).toBe(true);
    expect(errors).toBeNull();
  });

  it("rejects config missing required fields", async () => {
    const { valid, errors } = await validateConfig({ namespace: "x" }, SCHEMA_DIR);
    expect(valid).toBe(false);
    expect(errors).toContain("must have required property 'schema_version'");
  });

  it("rejects a zero max depth", async () => {
    const config = loadConfig(undefined, CONFIG_DIR, { PROFILECTL_RESOLVER__MAX_DEPTH: "0" });
    const { valid, errors } = await validateConfig(config, SCHEMA_DIR);
    expect(valid).toBe(false);
    expect(errors).toBe("data/resolver/max_depth must be >= 1");
  });

  it("throws from loadValidatedConfig on invalid settings", async () => {
    await expect(loadValidatedConfig({ configDir: CONFIG_DIR, env: { PROFILECTL_SERVER__PORT: "70000" } })).rejects.toThrow(
      "Invalid profilectl config: data/server/port must be <= 65535",
    );
    const config = await loadValidatedConfig({ configDir: CONFIG_DIR, envName: "ci", env: {} });
    expect(config.resolver.max_depth).toBe(16);
  });
});
