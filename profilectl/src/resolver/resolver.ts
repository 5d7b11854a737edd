import {
  CircularDependencyError,
  ConfigNotFoundError,
  DepthExceededError,
  InvalidInheritanceError,
} from "../errors.js";
import { SCOPES, type ConfigMapping, type ConfigRef, type LoadedConfig, type Scope } from "../types/config-document.js";
import type {
  DependencyEntry,
  DependencyReport,
  DependencyTreeNode,
  ResolutionResult,
} from "../types/resolution.js";
import { ResolutionCache, type ResolvedEntry } from "./cache.js";
import { refKey, type ConfigStore } from "./config-store.js";
import { attributeAll, mappingToJson, mergeWithSourceMap } from "./value.js";

export type ResolverOptions = {
  maxDepth: number;
};

/** Fields that wire up inheritance; consumed here, never merged into the result. */
const STRUCTURAL_FIELDS = new Set(["inherits", "from"]);

const DEFAULT_SCOPE: Scope = "system";

/** Per-call traversal state: the keys being visited and their names, in order. */
type Traversal = {
  visiting: Set<string>;
  keys: string[];
  names: string[];
  maxDepth: number;
};

type ParentLink = { inherits: string; from: Scope; declaredFrom: Scope | null };

function isScope(value: string): value is Scope {
  return SCOPES.some((s) => s === value);
}

/**
 * Read `inherits`/`from` off a document. Returns null for a root.
 * Anything other than a non-empty string name and a known scope is malformed.
 */
export function readParentLink(doc: LoadedConfig, chain: string[] = [doc.name]): ParentLink | null {
  const inherits = doc.document.config.entries.get("inherits");
  const from = doc.document.config.entries.get("from");

  // A root may still carry its own "from" tag; only a link needs one.
  if (inherits === undefined || (inherits.kind === "scalar" && (inherits.value === null || inherits.value === ""))) {
    return null;
  }
  if (inherits.kind !== "scalar" || typeof inherits.value !== "string") {
    throw new InvalidInheritanceError(`"inherits" must be a config name in ${doc.path}`, chain);
  }

  let declaredFrom: Scope | null = null;
  if (from !== undefined && !(from.kind === "scalar" && from.value === null)) {
    if (from.kind !== "scalar" || typeof from.value !== "string" || !isScope(from.value)) {
      throw new InvalidInheritanceError(
        `"from" must be one of ${SCOPES.join("|")} in ${doc.path}`,
        chain,
      );
    }
    declaredFrom = from.value;
  }

  return { inherits: inherits.value, from: declaredFrom ?? DEFAULT_SCOPE, declaredFrom };
}

function ownFields(config: ConfigMapping): ConfigMapping {
  const entries = new Map(config.entries);
  for (const field of STRUCTURAL_FIELDS) entries.delete(field);
  return { kind: "mapping", entries };
}

/** `instantiation: false` (or the string "false") on the document itself. */
function isInstantiable(config: ConfigMapping): boolean {
  const v = config.entries.get("instantiation");
  if (v === undefined || v.kind !== "scalar") return true;
  return v.value !== false && v.value !== "false";
}

/** Cached ancestors skip the traversal, so the finished chain is checked as well. */
function withinDepth(entry: ResolvedEntry, maxDepth: number): ResolvedEntry {
  if (entry.chain.length > maxDepth) {
    throw new DepthExceededError(maxDepth, [...entry.chain]);
  }
  return entry;
}

function toResult(entry: ResolvedEntry): ResolutionResult {
  return {
    resolved_config: mappingToJson(entry.value),
    source_map: { ...entry.sourceMap },
    inheritance_chain: [...entry.chain],
    instantiable: entry.instantiable,
  };
}

/**
 * Dependency resolver: walks `inherits`/`from` links up to a root and merges
 * root to leaf. Results are memoized per lookup key so siblings share one
 * parent resolution.
 *
 * Everything runs synchronously, so concurrent callers on the event loop never
 * observe a half-populated cache entry.
 */
export class DependencyResolver {
  constructor(
    private readonly store: ConfigStore,
    private readonly options: ResolverOptions,
    private readonly cache: ResolutionCache = new ResolutionCache(),
  ) {}

  /** Resolve a config by scope and name. */
  resolve(ref: ConfigRef, maxDepth: number = this.options.maxDepth): ResolutionResult {
    return toResult(withinDepth(this.resolveRef(ref, this.traversal(maxDepth)), maxDepth));
  }

  /** Resolve a config addressed by its path under `<slicer>/<type>/`. */
  resolvePath(slicer: string, type: string, relPath: string, maxDepth: number = this.options.maxDepth): ResolutionResult {
    return toResult(this.resolvePathEntry(slicer, type, relPath, maxDepth));
  }

  /**
   * List the ancestors of a config, root first. `depth` keeps only the N
   * nearest ancestors.
   */
  dependencies(
    slicer: string,
    type: string,
    relPath: string,
    opts: { depth?: number; tree?: boolean; includeMetadata?: boolean } = {},
  ): DependencyReport {
    const entry = this.resolvePathEntry(slicer, type, relPath, this.options.maxDepth);
    const describe = (doc: LoadedConfig): DependencyEntry => {
      const link = readParentLink(doc);
      const out: DependencyEntry = {
        name: doc.name,
        path: doc.path,
        inherits: link?.inherits ?? null,
        from: link?.declaredFrom ?? null,
      };
      if (opts.includeMetadata) {
        out.metadata = doc.document.metadata ? mappingToJson(doc.document.metadata) : null;
      }
      return out;
    };

    const target = entry.documents[entry.documents.length - 1];
    let ancestors = entry.documents.slice(0, -1);
    let truncated = false;
    if (opts.depth !== undefined && ancestors.length > opts.depth) {
      ancestors = opts.depth === 0 ? [] : ancestors.slice(-opts.depth);
      truncated = true;
    }

    const report: DependencyReport = {
      target: describe(target),
      dependencies: ancestors.map(describe),
      resolution_order: ancestors.map((d) => d.name),
    };
    if (opts.tree) {
      // target at the top, each node's single child is its parent config
      let node: DependencyTreeNode | null = null;
      for (const doc of ancestors) {
        node = { name: doc.name, children: node ? [node] : [] };
      }
      report.dependency_tree = { name: target.name, children: node ? [node] : [] };
    }
    if (truncated) report.truncated = true;
    return report;
  }

  /** Drop cached results that depend on `relPath` (all of them when omitted). */
  invalidate(relPath?: string): number {
    return this.cache.invalidate(relPath);
  }

  private traversal(maxDepth: number): Traversal {
    return { visiting: new Set(), keys: [], names: [], maxDepth };
  }

  private current = (relPath: string): string | null => this.store.currentChecksum(relPath);

  private resolvePathEntry(slicer: string, type: string, relPath: string, maxDepth: number): ResolvedEntry {
    const doc = this.store.loadPath(slicer, type, relPath);
    const entry = this.cache.get(doc.key, this.current) ?? this.resolveDocument(doc, { slicer, type }, this.traversal(maxDepth));
    return withinDepth(entry, maxDepth);
  }

  private resolveRef(ref: ConfigRef, t: Traversal): ResolvedEntry {
    const key = refKey(ref);

    if (t.visiting.has(key)) {
      const from = t.keys.indexOf(key);
      throw new CircularDependencyError([...t.names.slice(from), ref.name]);
    }

    const cached = this.cache.get(key, this.current);
    if (cached) return cached;

    let doc: LoadedConfig;
    try {
      doc = this.store.lookup(ref);
    } catch (e) {
      if (e instanceof ConfigNotFoundError) {
        throw new ConfigNotFoundError(e.scope, e.configName, [...t.names, ref.name], e.searched);
      }
      throw e;
    }
    return this.resolveDocument(doc, { slicer: ref.slicer, type: ref.type }, t);
  }

  private resolveDocument(doc: LoadedConfig, ctx: { slicer: string; type: string }, t: Traversal): ResolvedEntry {
    t.visiting.add(doc.key);
    t.keys.push(doc.key);
    t.names.push(doc.name);

    try {
      if (t.names.length > t.maxDepth) {
        throw new DepthExceededError(t.maxDepth, [...t.names]);
      }

      const link = readParentLink(doc, [...t.names]);
      const own = ownFields(doc.document.config);
      const instantiable = isInstantiable(doc.document.config);

      let entry: ResolvedEntry;
      if (!link) {
        entry = {
          key: doc.key,
          name: doc.name,
          value: own,
          sourceMap: attributeAll(own, doc.name),
          chain: [doc.name],
          documents: [doc],
          instantiable,
        };
      } else {
        const parent = this.resolveRef({ ...ctx, scope: link.from, name: link.inherits }, t);
        const merged = mergeWithSourceMap(parent.value, parent.sourceMap, own, doc.name);
        entry = {
          key: doc.key,
          name: doc.name,
          value: merged.value,
          sourceMap: merged.sourceMap,
          chain: [...parent.chain, doc.name],
          documents: [...parent.documents, doc],
          instantiable,
        };
      }

      this.cache.set(entry);
      return entry;
    } finally {
      t.visiting.delete(doc.key);
      t.keys.pop();
      t.names.pop();
    }
  }
}
