export * from "./errors.js";
export * from "./diagnostics.js";
export * from "./types/manifest.js";
export * from "./types/config.js";
export * from "./types/config-document.js";
export * from "./types/resolution.js";

export { digest, digestFile, parseDigest, matchesDigest, verifyDigest, DIGEST_ALGORITHM } from "./manifest/checksum.js";
export { INITIAL_VERSION, BUMP_KINDS, isBumpKind, bumpVersion, assertIncreased, parseVersion } from "./manifest/version.js";
export { scanRepository, type ScanResult, type ScannedFile, type ScanOptions, type FileStatus } from "./manifest/scanner.js";
export {
  collectDecisions,
  guessProfileMeta,
  NonInteractiveDecisions,
  PromptDecisions,
  type DecisionProvider,
  type BuildDecisions,
  type NewProfileMeta,
} from "./manifest/decisions.js";
export { buildManifest, unpublishProfiles, type ManifestBuildInput, type BuildSummary } from "./manifest/manifest-builder.js";
export { ManifestCodec } from "./manifest/codec.js";
export { publishManifest, assertFilesUnchanged, readPublished } from "./manifest/writer.js";

export * from "./signing/index.js";

export { DependencyResolver, readParentLink, type ResolverOptions } from "./resolver/resolver.js";
export { FsConfigStore, parseConfigDocument, refKey, type ConfigStore, type ConfigStoreOptions } from "./resolver/config-store.js";
export { ResolutionCache, type ResolvedEntry } from "./resolver/cache.js";
export { mergeValues, mergeMappings, mergeWithSourceMap, fromJson, toJson, mappingFromJson, mappingToJson } from "./resolver/value.js";
export { validateResolved } from "./resolver/validate.js";

export { RepoClient, findProfile, type InstallResult, type FindResult } from "./client/repo-client.js";
export { createApp, startServer, type ServerOptions } from "./api/server.js";
export { createApiRouter, type ApiDeps } from "./api/routes.js";

export { loadConfig, deepMerge, CONFIG_DIR } from "./config/loader.js";
export { validateConfig, loadValidatedConfig } from "./config/validator.js";
export { SchemaRegistry, createRegistry, DEFAULT_SCHEMA_DIR } from "./schema/registry.js";
export { build, unpublish } from "./commands/build.js";
export { verifyRepository } from "./commands/verify.js";
export { install } from "./commands/install.js";
export { listProfiles, type ListedProfile } from "./commands/list.js";
export { openResolver, resolveTarget, listDependencies } from "./commands/resolve.js";
export { validateAll } from "./commands/validate.js";
export { EXIT } from "./commands/exit-codes.js";
export { createProgram, type CliIO } from "./program.js";
