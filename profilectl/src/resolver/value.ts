import { InvalidConfigError } from "../errors.js";
import type { ConfigMapping, ConfigValue, Scalar } from "../types/config-document.js";
import type { SourceMap } from "../types/resolution.js";

export function scalar(value: Scalar): ConfigValue {
  return { kind: "scalar", value };
}

export function sequence(items: ConfigValue[]): ConfigValue {
  return { kind: "sequence", items };
}

export function mapping(entries: Iterable<[string, ConfigValue]> = []): ConfigMapping {
  return { kind: "mapping", entries: new Map(entries) };
}

/** Convert parsed JSON/YAML into the tagged tree. */
export function fromJson(input: unknown, at = "$"): ConfigValue {
  if (input === null || typeof input === "string" || typeof input === "boolean") {
    return scalar(input);
  }
  if (typeof input === "number") {
    if (!Number.isFinite(input)) throw new InvalidConfigError(`Non-finite number at ${at}`);
    return scalar(input);
  }
  if (Array.isArray(input)) {
    return sequence(input.map((item, i) => fromJson(item, `${at}[${i}]`)));
  }
  if (typeof input === "object") {
    return mapping(Object.entries(input).map(([k, v]): [string, ConfigValue] => [k, fromJson(v, `${at}.${k}`)]));
  }
  throw new InvalidConfigError(`Unsupported value (${typeof input}) at ${at}`);
}

/** Like fromJson, but the top level must be a mapping. */
export function mappingFromJson(input: unknown, at = "$"): ConfigMapping {
  const value = fromJson(input, at);
  if (value.kind !== "mapping") {
    throw new InvalidConfigError(`Expected a mapping at ${at}, got ${value.kind}`);
  }
  return value;
}

export function toJson(value: ConfigValue): unknown {
  switch (value.kind) {
    case "scalar":
      return value.value;
    case "sequence":
      return value.items.map(toJson);
    case "mapping":
      return mappingToJson(value);
  }
}

export function mappingToJson(value: ConfigMapping): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of value.entries) out[k] = toJson(v);
  return out;
}

/** A field path as its key segments; keys may themselves contain dots. */
export type FieldPath = readonly string[];

/** Source map key of a field path. */
export function joinPath(path: FieldPath): string {
  return path.join(".");
}

/**
 * Leaf field paths of a value. Scalars, sequences and empty mappings are leaves;
 * sequences are never descended into because they are only ever replaced whole.
 */
export function leafPaths(value: ConfigValue, prefix: FieldPath): FieldPath[] {
  if (value.kind !== "mapping" || value.entries.size === 0) return [prefix];
  const out: FieldPath[] = [];
  for (const [k, v] of value.entries) out.push(...leafPaths(v, [...prefix, k]));
  return out;
}

/** Source map for a root config: every leaf attributed to `name`. */
export function attributeAll(value: ConfigMapping, name: string): SourceMap {
  const map: SourceMap = {};
  for (const p of leafPaths(value, [])) {
    if (p.length > 0) map[joinPath(p)] = name;
  }
  return map;
}

/** Receives every field path the child overwrites. */
export type MergeVisitor = {
  replaced(path: FieldPath, value: ConfigValue): void;
};

/**
 * Child-over-parent merge:
 * - scalars are replaced outright;
 * - sequences are replaced outright (never concatenated);
 * - mappings are merged key by key with this same rule.
 *
 * Neither input is mutated; untouched subtrees are shared with the parent.
 */
export function mergeValues(parent: ConfigValue, child: ConfigValue, visitor?: MergeVisitor, at: FieldPath = []): ConfigValue {
  if (parent.kind === "mapping" && child.kind === "mapping") {
    return mergeMappings(parent, child, visitor, at);
  }
  visitor?.replaced(at, child);
  return child;
}

export function mergeMappings(parent: ConfigMapping, child: ConfigMapping, visitor?: MergeVisitor, at: FieldPath = []): ConfigMapping {
  const entries = new Map(parent.entries);
  for (const [key, childValue] of child.entries) {
    const fieldPath = [...at, key];
    const parentValue = entries.get(key);
    if (parentValue === undefined) {
      visitor?.replaced(fieldPath, childValue);
      entries.set(key, childValue);
    } else {
      entries.set(key, mergeValues(parentValue, childValue, visitor, fieldPath));
    }
  }
  return { kind: "mapping", entries };
}

function startsWith(path: FieldPath, prefix: FieldPath): boolean {
  return prefix.length <= path.length && prefix.every((segment, i) => path[i] === segment);
}

/**
 * Merge `child` over `parent` and produce the child's source map from the
 * parent's: every field the child supplies now points at `childName`, the rest
 * keep their previous attribution. Ownership is decided on key segments, so a
 * key containing a dot is never taken for a nested field.
 */
export function mergeWithSourceMap(
  parent: ConfigMapping,
  parentSources: SourceMap,
  child: ConfigMapping,
  childName: string,
): { value: ConfigMapping; sourceMap: SourceMap } {
  const supplied: FieldPath[] = [];
  const value = mergeMappings(parent, child, {
    replaced(fieldPath) {
      supplied.push(fieldPath);
    },
  });

  const sourceMap: SourceMap = {};
  for (const leaf of leafPaths(value, [])) {
    if (leaf.length === 0) continue;
    const key = joinPath(leaf);
    const inherited = parentSources[key];
    sourceMap[key] = supplied.some((p) => startsWith(leaf, p)) || inherited === undefined ? childName : inherited;
  }
  return { value, sourceMap };
}

/** Structural equality of two trees. */
export function valuesEqual(a: ConfigValue, b: ConfigValue): boolean {
  if (a.kind === "scalar" && b.kind === "scalar") return a.value === b.value;
  if (a.kind === "sequence" && b.kind === "sequence") {
    return a.items.length === b.items.length && a.items.every((item, i) => valuesEqual(item, b.items[i]));
  }
  if (a.kind === "mapping" && b.kind === "mapping") {
    if (a.entries.size !== b.entries.size) return false;
    for (const [k, v] of a.entries) {
      const other = b.entries.get(k);
      if (other === undefined || !valuesEqual(v, other)) return false;
    }
    return true;
  }
  return false;
}
