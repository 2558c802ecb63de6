import { describe, it, expect } from "vitest";
import { InternalExpansionInvariantError } from "../errors.js";
import { scanPattern } from "../regex-scan.js";
import { validatePattern } from "../validate.js";

describe("scanPattern", () => {
  it("classifies group kinds", () => {
    const scan = scanPattern("(a)(?:b)(?=c)(?!d)(?<=e)(?<!f)(?>g)(?<n>h)(?P<p>i)(?'q'j)(?i:k)");
    expect(scan.ok && scan.groups.map((g) => g.kind)).toEqual([
      "capture",
      "noncapture",
      "lookahead",
      "negativeLookahead",
      "lookbehind",
      "negativeLookbehind",
      "atomic",
      "named",
      "named",
      "named",
      "noncapture",
    ]);
  });

  it("records group extents in opening order", () => {
    const scan = scanPattern("((a)b)");
    expect(scan.ok && scan.groups.map((g) => [g.open, g.headerEnd, g.close])).toEqual([
      [0, 1, 5],
      [1, 2, 3],
    ]);
  });

  it("skips escapes, classes, inline flags and comments", () => {
    const scan = scanPattern("\\(a[(]\\)(?i)(?#note)(x)");
    expect(scan.ok && scan.groups.map((g) => g.open)).toEqual([20]);
  });

  it("treats \\Q...\\E as literal text", () => {
    const scan = scanPattern("\\Q(\\E(a)");
    expect(scan.ok && scan.groups.map((g) => g.open)).toEqual([5]);
  });

  it("collects back-references", () => {
    const scan = scanPattern("(?<a>x)\\k<a>\\k'a'(?P=a)\\1");
    expect(scan.ok && scan.backrefs.map((r) => [r.name, r.start, r.end])).toEqual([
      ["a", 7, 12],
      ["a", 12, 17],
      ["a", 17, 23],
    ]);
    expect(scan.ok && scan.numberedBackrefs).toEqual([{ index: 1, start: 23, end: 25 }]);
  });

  it("reports structural problems", () => {
    expect(scanPattern(")a")).toEqual({ ok: false, offset: 0, reason: "unbalanced ')'" });
    expect(scanPattern("a[bc")).toEqual({ ok: false, offset: 1, reason: "unterminated character class" });
    expect(scanPattern("(a(b)")).toEqual({ ok: false, offset: 0, reason: "unclosed '('" });
  });
});

describe("validatePattern", () => {
  it("counts captures and lists names", () => {
    expect(validatePattern("V", "(a)(?<n>b)(?:c)(?=d)")).toEqual({ captureCount: 2, captureNames: ["n"] });
  });

  it("reports malformed output as an internal fault", () => {
    expect(() => validatePattern("V", "(a")).toThrow(InternalExpansionInvariantError);
  });

  it("reads `$(` as an end anchor before a group", () => {
    expect(validatePattern("V", "a$(b)")).toEqual({ captureCount: 1, captureNames: [] });
  });
});
