import type { Scope } from "./config-document.js";

/** Leaf field path (dot-joined mapping keys) → name of the config that set it. */
export type SourceMap = Record<string, string>;

export type ResolutionResult = {
  resolved_config: Record<string, unknown>;
  source_map: SourceMap;
  /** Root to leaf. */
  inheritance_chain: string[];
  instantiable: boolean;
};

export type DependencyEntry = {
  name: string;
  path: string;
  inherits: string | null;
  from: Scope | null;
  metadata?: unknown;
};

export type DependencyTreeNode = {
  name: string;
  children: DependencyTreeNode[];
};

export type DependencyReport = {
  target: DependencyEntry;
  /** Ancestors, root first. */
  dependencies: DependencyEntry[];
  resolution_order: string[];
  dependency_tree?: DependencyTreeNode;
  truncated?: boolean;
};
