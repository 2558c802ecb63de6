import { describe, it, expect } from "vitest";
import { PatternCache } from "../cache.js";
import { DIALECT_PRESETS } from "../dialect.js";
import { InternalExpansionInvariantError } from "../errors.js";

const profile = DIALECT_PRESETS.ecmascript;

describe("PatternCache", () => {
  it("computes a value once per key", () => {
    const cache = new PatternCache<string>();
    let calls = 0;
    const compute = (): string => `value ${++calls}`;

    expect(cache.getOrCompute("k", compute)).toBe("value 1");
    expect(cache.getOrCompute("k", compute)).toBe("value 1");
    expect(calls).toBe(1);
    expect(cache.stats).toEqual({ hits: 1, misses: 1 });
    expect(cache.size).toBe(1);
  });

  it("stores nothing when the computation throws", () => {
    const cache = new PatternCache<string>();
    expect(() =>
      cache.getOrCompute("k", () => {
        throw new Error("boom");
      })
    ).toThrow("boom");
    expect(cache.get("k")).toBeUndefined();
    expect(cache.getOrCompute("k", () => "ok")).toBe("ok");
    expect(cache.stats.misses).toBe(2);
  });

  it("treats re-entrant population as an internal fault", () => {
    const cache = new PatternCache<string>();
    expect(() => cache.getOrCompute("k", () => cache.getOrCompute("k", () => "inner"))).toThrow(
      InternalExpansionInvariantError
    );
    expect(cache.size).toBe(0);
  });

  it("clears entries and statistics", () => {
    const cache = new PatternCache<number>();
    cache.getOrCompute("a", () => 1);
    cache.getOrCompute("a", () => 1);
    cache.clear();
    expect(cache.size).toBe(0);
    expect(cache.stats).toEqual({ hits: 0, misses: 0 });
  });

  describe("computeKey", () => {
    const cache = new PatternCache<string>();

    it("ignores the order and repetition of nonCapturing names", () => {
      expect(cache.computeKey("A", profile, { nonCapturing: ["b", "a", "b"] })).toBe(
        cache.computeKey("A", profile, { nonCapturing: ["a", "b"] })
      );
    });

    it("separates profiles and disambiguation", () => {
      const base = cache.computeKey("A", profile);
      expect(cache.computeKey("A", DIALECT_PRESETS.pcre)).not.toBe(base);
      expect(cache.computeKey("A", profile, { autoDisambiguate: true })).not.toBe(base);
    });

    it("leaves allowInternal out of the key", () => {
      expect(cache.computeKey("A", profile, { allowInternal: true })).toBe(cache.computeKey("A", profile));
    });
  });
});
