import { describe, expect, it } from "vitest";
import { InvalidConfigError } from "../src/errors.js";
import {
  attributeAll,
  fromJson,
  mappingFromJson,
  mappingToJson,
  mergeMappings,
  mergeWithSourceMap,
  toJson,
  valuesEqual,
} from "../src/resolver/value.js";

const m = (input: Record<string, unknown>) => mappingFromJson(input);

describe("config value tree", () => {
  it("converts JSON both ways", () => {
    const input = { a: 1, b: [true, null, "x"], c: { d: { e: 2.5 } } };
    expect(toJson(fromJson(input))).toEqual(input);
  });

  it("rejects a non-mapping top level", () => {
    expect(() => mappingFromJson([1, 2])).toThrow(InvalidConfigError);
  });
});

describe("merge", () => {
  it("replaces scalars and sequences, merges mappings", () => {
    const parent = m({ temp: 200, list: [1, 2, 3], nested: { a: 1, b: 2 } });
    const child = m({ temp: 210, list: [9], nested: { b: 3, c: 4 } });
    expect(mappingToJson(mergeMappings(parent, child))).toEqual({
      temp: 210,
      list: [9],
      nested: { a: 1, b: 3, c: 4 },
    });
  });

  it("never concatenates sequences", () => {
    const merged = mergeMappings(m({ xs: ["a", "b"] }), m({ xs: ["c"] }));
    expect(mappingToJson(merged).xs).toEqual(["c"]);
  });

  it("lets a scalar replace a mapping and the reverse", () => {
    const merged = mergeMappings(m({ a: { x: 1 }, b: 5 }), m({ a: "flat", b: { y: 2 } }));
    expect(mappingToJson(merged)).toEqual({ a: "flat", b: { y: 2 } });
  });

  it("does not mutate its inputs", () => {
    const parent = m({ nested: { a: 1 } });
    const child = m({ nested: { b: 2 } });
    mergeMappings(parent, child);
    expect(mappingToJson(parent)).toEqual({ nested: { a: 1 } });
    expect(mappingToJson(child)).toEqual({ nested: { b: 2 } });
  });

  it("is associative: (A <- B) <- C equals A <- (B <- C)", () => {
    const a = m({ t: 1, s: [1], n: { x: 1, y: { p: 1 } }, only_a: true });
    const b = m({ t: 2, n: { y: { q: 2 } }, s: [2, 2] });
    const c = m({ n: { x: 3, y: { p: 3 } }, only_c: "c" });
    const left = mergeMappings(mergeMappings(a, b), c);
    const right = mergeMappings(a, mergeMappings(b, c));
    expect(valuesEqual(left, right)).toBe(true);
    expect(mappingToJson(left)).toEqual({
      t: 2,
      s: [2, 2],
      n: { x: 3, y: { p: 3, q: 2 } },
      only_a: true,
      only_c: "c",
    });
  });
});

describe("source map", () => {
  it("attributes every leaf of a root to the root", () => {
    expect(attributeAll(m({ a: 1, b: { c: [1], d: {} } }), "root")).toEqual({
      a: "root",
      "b.c": "root",
      "b.d": "root",
    });
  });

  it("points supplied fields at the child and keeps the rest", () => {
    const parent = m({ temp: 200, cooling: { fan_min: 20, fan_max: 100 } });
    const { value, sourceMap } = mergeWithSourceMap(parent, attributeAll(parent, "base"), m({ cooling: { fan_max: 80 } }), "child");
    expect(mappingToJson(value)).toEqual({ temp: 200, cooling: { fan_min: 20, fan_max: 80 } });
    expect(sourceMap).toEqual({ temp: "base", "cooling.fan_min": "base", "cooling.fan_max": "child" });
  });

  it("drops nested entries when a child replaces a mapping with a scalar", () => {
    const parent = m({ cooling: { fan_min: 20, fan_max: 100 } });
    const { sourceMap } = mergeWithSourceMap(parent, attributeAll(parent, "base"), m({ cooling: "off" }), "child");
    expect(sourceMap).toEqual({ cooling: "child" });
  });

  it("replaces an empty-mapping leaf the child fills in", () => {
    const parent = m({ extras: {} });
    const { sourceMap } = mergeWithSourceMap(parent, attributeAll(parent, "base"), m({ extras: { k: 1 } }), "child");
    expect(sourceMap).toEqual({ "extras.k": "child" });
  });

  it("keeps a dotted key apart from the mapping it resembles", () => {
    const parent = m({ "a.b": 1, a: { c: 1 } });
    const { value, sourceMap } = mergeWithSourceMap(parent, attributeAll(parent, "base"), m({ a: 5 }), "child");
    expect(mappingToJson(value)).toEqual({ "a.b": 1, a: 5 });
    expect(sourceMap).toEqual({ "a.b": "base", a: "child" });
  });

  it("leaves a parent's dotted key attributed when the child fills the mapping", () => {
    const parent = m({ "cooling.fan": 30, cooling: {} });
    const { sourceMap } = mergeWithSourceMap(parent, attributeAll(parent, "base"), m({ cooling: { fan_max: 80 } }), "child");
    expect(sourceMap).toEqual({ "cooling.fan": "base", "cooling.fan_max": "child" });
  });
});
