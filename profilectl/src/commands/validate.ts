import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { diag, type Diagnostic } from "../diagnostics.js";
import { errorMessage } from "../errors.js";
import { digest, matchesDigest } from "../manifest/checksum.js";
import { ManifestCodec } from "../manifest/codec.js";
import { readPublished } from "../manifest/writer.js";
import { parseConfigDocument } from "../resolver/config-store.js";
import { readParentLink } from "../resolver/resolver.js";
import { mappingToJson } from "../resolver/value.js";
import { createRegistry, DEFAULT_SCHEMA_DIR } from "../schema/registry.js";
import type { ProfilectlConfig } from "../types/config.js";

export type ValidateResult =
  | { ok: true; config: ProfilectlConfig; warnings: Diagnostic[] }
  | { ok: false; errors: Diagnostic[] };

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

function listJsonFiles(dir: string, out: string[] = []): string[] {
  if (!fs.existsSync(dir)) return out;
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    if (entry.name.startsWith(".")) continue;
    const abs = path.join(dir, entry.name);
    if (entry.isDirectory()) listJsonFiles(abs, out);
    else if (entry.isFile() && entry.name.endsWith(".json")) out.push(abs);
  }
  return out.sort();
}

/**
 * Validate the layered project config and, with `repoRoot`, every config
 * document and the published manifest's checksums. The signature is not
 * checked here; `verify` does that with a pinned key.
 */
export async function validateAll(opts: {
  configDir: string;
  envName?: string;
  repoRoot?: string;
  schemaDir?: string;
  env?: NodeJS.ProcessEnv;
}): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];
  const configDir = path.resolve(opts.configDir);
  const schemaDir = opts.schemaDir ? path.resolve(opts.schemaDir) : DEFAULT_SCHEMA_DIR;

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }
  if (!fs.existsSync(schemaDir)) {
    return { ok: false, errors: [diag("error", "SCHEMA_DIR_MISSING", `Schema directory not found: ${schemaDir}`)] };
  }

  let config: ProfilectlConfig;
  try {
    const res = await validateConfig(loadConfig(opts.envName, configDir, opts.env ?? process.env), schemaDir);
    if (!res.valid) {
      return { ok: false, errors: [diag("error", "CONFIG_INVALID", `Config invalid (${configDir}): ${res.errors}`, { path: configDir })] };
    }
    config = res.config;
  } catch (e) {
    return { ok: false, errors: [diag("error", "CONFIG_READ_FAILED", `Failed to read config (${configDir}): ${errorMessage(e)}`, { path: configDir })] };
  }

  if (opts.repoRoot) {
    const repoRoot = path.resolve(opts.repoRoot);
    const registry = await createRegistry(schemaDir);
    const validateDocument = await registry.getValidator("config-document");

    for (const file of listJsonFiles(path.join(repoRoot, config.slicers_dir))) {
      const rel = path.relative(repoRoot, file).split(path.sep).join("/");
      try {
        const document = parseConfigDocument(fs.readFileSync(file), rel);
        const raw = { config: mappingToJson(document.config) };
        if (!validateDocument(raw)) {
          errors.push(
            diag("error", "DOCUMENT_INVALID", `Config document invalid (${rel}): ${registry.errorsText(validateDocument.errors)}`, { path: rel }),
          );
          continue;
        }
        readParentLink({ key: rel, name: rel, path: rel, checksum: "", document, shadowedBy: [] });
      } catch (e) {
        errors.push(diag("error", "DOCUMENT_INVALID", errorMessage(e), { path: rel }));
      }
    }

    const published = readPublished(repoRoot);
    if (published) {
      try {
        const codec = await ManifestCodec.create(registry);
        const manifest = codec.parse(published.manifestBytes);
        for (const [relPath, expected] of Object.entries(manifest.checksums)) {
          const target = path.resolve(repoRoot, relPath);
          if (!isWithinDir(repoRoot, target)) {
            errors.push(diag("error", "MANIFEST_PATH_ESCAPES_REPO", `Manifest path escapes repository: ${relPath}`, { path: relPath }));
            continue;
          }
          if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
            errors.push(diag("error", "FILE_MISSING", `Missing file: ${relPath}`, { path: relPath }));
            continue;
          }
          const content = fs.readFileSync(target);
          if (!matchesDigest(content, expected)) {
            errors.push(
              diag("warn", "FILE_CHANGED", `Changed since last build (${relPath}): manifest=${expected} actual=${digest(content)}`, {
                path: relPath,
              }),
            );
          }
        }
      } catch (e) {
        errors.push(diag("error", "MANIFEST_INVALID", errorMessage(e), { path: "manifest.json" }));
      }
    }
  }

  if (errors.some((e) => e.level === "error")) return { ok: false, errors };
  return { ok: true, config, warnings: errors };
}
