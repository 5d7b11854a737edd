import { describe, expect, it } from "vitest";
import { ManifestInvalidError } from "../src/errors.js";
import { INITIAL_VERSION, assertIncreased, bumpVersion, isBumpKind, parseVersion } from "../src/manifest/version.js";

describe("version manager", () => {
  it("starts new profiles at 0.1.0", () => {
    expect(INITIAL_VERSION).toBe("0.1.0");
  });

  it("bumps each component and resets the lower ones", () => {
    expect(bumpVersion("1.2.3", "patch")).toBe("1.2.4");
    expect(bumpVersion("1.2.3", "minor")).toBe("1.3.0");
    expect(bumpVersion("1.2.3", "major")).toBe("2.0.0");
  });

  it("drops a pre-release tag on patch", () => {
    expect(bumpVersion("1.2.3-rc.1", "patch")).toBe("1.2.3");
  });

  it("rejects versions that are not semver", () => {
    expect(() => bumpVersion("1.2", "patch", "x.json")).toThrow(ManifestInvalidError);
    expect(() => parseVersion("v-one", "x.json")).toThrow(/Invalid semantic version for x\.json/);
  });

  it("requires strictly increasing versions", () => {
    expect(() => assertIncreased("1.0.0", "1.0.1")).not.toThrow();
    expect(() => assertIncreased("1.0.0", "1.0.0")).toThrow(ManifestInvalidError);
    expect(() => assertIncreased("1.1.0", "1.0.9")).toThrow(ManifestInvalidError);
  });

  it("recognizes bump kinds", () => {
    expect(isBumpKind("minor")).toBe(true);
    expect(isBumpKind("micro")).toBe(false);
  });
});
