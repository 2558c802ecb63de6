import { describe, it, expect } from "vitest";
import { adaptPattern, variableLengthEvidence } from "../adapt.js";
import { DIALECT_PRESETS, createDialectProfile } from "../dialect.js";
import { DuplicateGroupNameError, UnsupportedConstructError } from "../errors.js";

const { ecmascript, pcre, oniguruma, legacy } = DIALECT_PRESETS;
const explicit = DIALECT_PRESETS["dotnet-explicit"];

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error("expected a throw");
}

// ---------------------------------------------------------------------------
// Named captures
// ---------------------------------------------------------------------------

describe("named captures", () => {
  it("keeps names when the dialect supports them", () => {
    const pattern = adaptPattern("P", "(a)(?<n>b)", ecmascript);
    expect(pattern.finalText).toBe("(a)(?<n>b)");
    expect([...pattern.groupNameToIndex]).toEqual([["n", 2]]);
    expect(pattern.captureCount).toBe(2);
    expect(pattern.captureNames).toEqual(["n"]);
  });

  it("turns names into plain groups without name support", () => {
    const pattern = adaptPattern("P", "(?<a>x)(?P<b>y)(?'c'z)", legacy);
    expect(pattern.finalText).toBe("(x)(y)(z)");
    expect([...pattern.groupNameToIndex]).toEqual([
      ["a", 1],
      ["b", 2],
      ["c", 3],
    ]);
    expect(pattern.captureNames).toEqual([]);
  });

  it("makes listed names non-capturing", () => {
    expect(adaptPattern("P", "(?<a>x)(?<b>y)", ecmascript, { nonCapturing: ["a"] }).finalText).toBe("(?:x)(?<b>y)");

    const pattern = adaptPattern("P", "(?<a>x)(?<b>y)", legacy, { nonCapturing: ["a"] });
    expect(pattern.finalText).toBe("(?:x)(y)");
    expect([...pattern.groupNameToIndex]).toEqual([["b", 1]]);
  });

  it("ignores group-like text inside classes and escapes", () => {
    const pattern = adaptPattern("P", "[(?<x>]\\(?<y>z", legacy);
    expect(pattern.finalText).toBe("[(?<x>]\\(?<y>z");
    expect(pattern.captureCount).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Duplicate names
// ---------------------------------------------------------------------------

describe("duplicate capture names", () => {
  const text = "(?<G>\\d+)|(?<G>\\d+)";

  it("fails with every occurrence when duplicates are not allowed", () => {
    const error = thrown(() => adaptPattern("D", text, pcre));
    expect(error).toBeInstanceOf(DuplicateGroupNameError);
    if (error instanceof DuplicateGroupNameError) {
      expect(error.occurrences).toEqual([0, 10]);
      expect(error.diagnostic.notes).toEqual(["occurrences at offsets 0, 10"]);
    }
  });

  it("reports occurrences as offsets in the adapted text", () => {
    const error = thrown(() => adaptPattern("D", "(?<G>a)(?<G>b)", legacy));
    expect(error).toBeInstanceOf(DuplicateGroupNameError);
    if (error instanceof DuplicateGroupNameError) {
      expect(error.occurrences).toEqual([0, 3]);
    }
  });

  it("keeps duplicates where the dialect allows them", () => {
    const pattern = adaptPattern("D", text, oniguruma);
    expect(pattern.finalText).toBe(text);
    expect(pattern.groupNameToIndex.get("G")).toBe(1);
    expect(pattern.captureNames).toEqual(["G", "G"]);
  });

  it("renames later occurrences on request", () => {
    const pattern = adaptPattern("D", text, ecmascript, { autoDisambiguate: true });
    expect(pattern.finalText).toBe("(?<G>\\d+)|(?<G_2>\\d+)");
    expect([...pattern.groupNameToIndex]).toEqual([
      ["G", 1],
      ["G_2", 2],
    ]);
    expect(new RegExp(pattern.finalText).exec("42")?.groups).toEqual({ G: "42", G_2: undefined });
  });

  it("skips generated names that are already taken", () => {
    const pattern = adaptPattern("D", "(?<G>a)(?<G_2>b)(?<G>c)", ecmascript, { autoDisambiguate: true });
    expect(pattern.finalText).toBe("(?<G>a)(?<G_2>b)(?<G_3>c)");
    expect(pattern.groupNameToIndex.get("G_3")).toBe(3);
  });

  it("does not count groups made non-capturing", () => {
    expect(adaptPattern("D", text, ecmascript, { nonCapturing: ["G"] }).finalText).toBe("(?:\\d+)|(?:\\d+)");
  });
});

// ---------------------------------------------------------------------------
// Lookbehind
// ---------------------------------------------------------------------------

describe("lookbehind", () => {
  it("rejects variable-length lookbehind where unsupported", () => {
    const error = thrown(() => adaptPattern("L", "x(?<=a+)b", pcre));
    expect(error).toBeInstanceOf(UnsupportedConstructError);
    if (error instanceof UnsupportedConstructError) {
      expect(error.construct).toBe("lookbehind `(?<=a+)`");
      expect(error.reason).toBe("variable-length content (`+` quantifier)");
      expect(error.offset).toBe(1);
    }
  });

  it("checks negative lookbehind too", () => {
    expect(() => adaptPattern("L", "(?<![a-z]*)x", pcre)).toThrow(UnsupportedConstructError);
  });

  it("accepts fixed-length lookbehind", () => {
    expect(adaptPattern("L", "(?<=ab{2})c", pcre).finalText).toBe("(?<=ab{2})c");
    expect(adaptPattern("L", "(?<=(?:ab))c", pcre).finalText).toBe("(?<=(?:ab))c");
  });

  it("accepts anything where variable length is supported", () => {
    expect(adaptPattern("L", "(?<=a+)b", ecmascript).finalText).toBe("(?<=a+)b");
  });

  it("describes the first variable-length construct", () => {
    expect(variableLengthEvidence("a{2,3}")).toBe("`{2,3}` repetition");
    expect(variableLengthEvidence("a{2,}")).toBe("`{2,}` repetition");
    expect(variableLengthEvidence("a{2,2}")).toBeUndefined();
    expect(variableLengthEvidence("ab?")).toBe("`?` quantifier");
    expect(variableLengthEvidence("[*+?]\\*")).toBeUndefined();
  });

  it("treats `?` and `+` after a fixed repetition as modifiers", () => {
    expect(variableLengthEvidence("a{3}?")).toBeUndefined();
    expect(variableLengthEvidence("a{3}+")).toBeUndefined();
    expect(variableLengthEvidence("a{2,2}?b")).toBeUndefined();
    expect(variableLengthEvidence("a{3}??")).toBe("`?` quantifier");
    expect(variableLengthEvidence("a{2,3}?")).toBe("`{2,3}` repetition");
    expect(adaptPattern("L", "(?<=a{3}?)b", pcre).finalText).toBe("(?<=a{3}?)b");
  });
});

// ---------------------------------------------------------------------------
// Explicit capture and back-references
// ---------------------------------------------------------------------------

describe("explicit capture", () => {
  it("makes unnamed groups non-capturing", () => {
    const pattern = adaptPattern("E", "(a)(?<n>b)(c)", explicit);
    expect(pattern.finalText).toBe("(?:a)(?<n>b)(?:c)");
    expect([...pattern.groupNameToIndex]).toEqual([["n", 1]]);
    expect(pattern.captureCount).toBe(1);
  });

  it("renumbers numbered back-references", () => {
    expect(adaptPattern("E", "(a)(?<n>b)\\2", explicit).finalText).toBe("(?:a)(?<n>b)\\1");
  });

  it("rejects a back-reference to a group that stops capturing", () => {
    const error = thrown(() => adaptPattern("E", "(a)\\1", explicit));
    expect(error).toBeInstanceOf(UnsupportedConstructError);
    if (error instanceof UnsupportedConstructError) {
      expect(error.construct).toBe("back-reference `\\1`");
      expect(error.offset).toBe(3);
    }
  });
});

describe("named back-references", () => {
  it("rewrites them as numbers without name support", () => {
    const pattern = adaptPattern("Q", "(?<q>['\"])x\\k<q>", legacy);
    expect(pattern.finalText).toBe("(['\"])x\\1");
    expect(new RegExp(pattern.finalText).test("'x'")).toBe(true);
  });

  it("wraps the number when a digit follows", () => {
    expect(adaptPattern("Q", "(?<d>a)\\k<d>1", legacy).finalText).toBe("(a)(?:\\1)1");
  });

  it("handles the (?P=name) form", () => {
    expect(adaptPattern("Q", "(?P<w>\\w)(?P=w)", legacy).finalText).toBe("(\\w)\\1");
  });

  it("rejects a reference to a name made non-capturing", () => {
    const error = thrown(() => adaptPattern("Q", "(?<q>a)\\k<q>", legacy, { nonCapturing: ["q"] }));
    expect(error).toBeInstanceOf(UnsupportedConstructError);
    if (error instanceof UnsupportedConstructError) expect(error.reason).toBe("group `q` was made non-capturing");
  });

  it("leaves them alone when names are supported", () => {
    expect(adaptPattern("Q", "(?<q>a)\\k<q>", ecmascript).finalText).toBe("(?<q>a)\\k<q>");
  });
});

describe("group structure", () => {
  it("rejects an unclosed group", () => {
    const error = thrown(() => adaptPattern("U", "x(a", ecmascript));
    expect(error).toBeInstanceOf(UnsupportedConstructError);
    if (error instanceof UnsupportedConstructError) {
      expect(error.construct).toBe("group structure");
      expect(error.reason).toBe("unclosed '('");
      expect(error.offset).toBe(1);
    }
  });

  it("rejects a stray closing parenthesis", () => {
    expect(() => adaptPattern("U", "a)", ecmascript)).toThrow(UnsupportedConstructError);
  });

  it("records the profile it adapted for", () => {
    const profile = createDialectProfile({ namedCaptureSupport: false });
    expect(adaptPattern("P", "a", profile).profile).toBe(profile);
  });
});
