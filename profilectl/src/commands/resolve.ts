import { FsConfigStore } from "../resolver/config-store.js";
import { DependencyResolver } from "../resolver/resolver.js";
import type { ProfilectlConfig } from "../types/config.js";
import type { DependencyReport, ResolutionResult } from "../types/resolution.js";
import { EXIT } from "./exit-codes.js";
import { failure, type CommandFailure } from "./result.js";

export function openResolver(repoRoot: string, config: ProfilectlConfig): DependencyResolver {
  const store = new FsConfigStore(repoRoot, { slicersDir: config.slicers_dir, userDir: config.resolver.user_dir });
  return new DependencyResolver(store, { maxDepth: config.resolver.max_depth });
}

export type TargetOptions = { slicer: string; type: string; path: string };

export type ResolveResult = ({ ok: true } & ResolutionResult) | CommandFailure;

export function resolveTarget(resolver: DependencyResolver, target: TargetOptions): ResolveResult {
  try {
    return { ok: true, ...resolver.resolvePath(target.slicer, target.type, target.path) };
  } catch (e) {
    return failure(e, EXIT.RESOLUTION_FAILED);
  }
}

export type DepsResult = ({ ok: true } & DependencyReport) | CommandFailure;

export function listDependencies(
  resolver: DependencyResolver,
  target: TargetOptions,
  opts: { depth?: number; tree?: boolean; includeMetadata?: boolean } = {},
): DepsResult {
  try {
    return { ok: true, ...resolver.dependencies(target.slicer, target.type, target.path, opts) };
  } catch (e) {
    return failure(e, EXIT.RESOLUTION_FAILED);
  }
}
