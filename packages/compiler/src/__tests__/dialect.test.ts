import { describe, it, expect } from "vitest";
import { DIALECT_PRESETS, createDialectProfile, isDialectPresetName, profileKey, resolveDialect } from "../dialect.js";
import { DialectProfileError } from "../errors.js";

describe("createDialectProfile", () => {
  it("defaults to ECMAScript", () => {
    expect(createDialectProfile()).toEqual(DIALECT_PRESETS.ecmascript);
  });

  it("applies partial options over a base", () => {
    expect(createDialectProfile({ explicitCaptureOnly: true }, DIALECT_PRESETS.pcre)).toEqual({
      namedCaptureSupport: true,
      duplicateNamedGroupsAllowed: false,
      variableLengthLookbehindSupport: false,
      explicitCaptureOnly: true,
    });
  });

  it("returns a frozen profile", () => {
    expect(Object.isFrozen(createDialectProfile({ namedCaptureSupport: false }))).toBe(true);
  });

  it("rejects unknown options", () => {
    expect(() => createDialectProfile({ namedCaptures: true })).toThrow(DialectProfileError);
    expect(() => createDialectProfile({ namedCaptures: true })).toThrow('unknown option "namedCaptures"');
  });

  it("rejects non-boolean values", () => {
    expect(() => createDialectProfile({ namedCaptureSupport: "yes" })).toThrow(
      'option "namedCaptureSupport" must be a boolean, got string'
    );
  });

  it("rejects explicit capture without named groups", () => {
    expect(() => createDialectProfile({ namedCaptureSupport: false, explicitCaptureOnly: true })).toThrow(
      DialectProfileError
    );
  });
});

describe("presets", () => {
  it("encodes each preset as a four-digit key", () => {
    expect(Object.keys(DIALECT_PRESETS).map((name) => [name, profileKey(resolveDialect(name))])).toEqual([
      ["ecmascript", "1010"],
      ["pcre", "1000"],
      ["oniguruma", "1100"],
      ["dotnet", "1110"],
      ["dotnet-explicit", "1111"],
      ["legacy", "0000"],
    ]);
  });

  it("resolves preset names and option objects", () => {
    expect(resolveDialect("pcre")).toBe(DIALECT_PRESETS.pcre);
    expect(resolveDialect({ namedCaptureSupport: false })).toEqual({
      ...DIALECT_PRESETS.ecmascript,
      namedCaptureSupport: false,
    });
  });

  it("rejects unknown preset names", () => {
    expect(() => resolveDialect("perl")).toThrow(DialectProfileError);
    expect(isDialectPresetName("perl")).toBe(false);
    expect(isDialectPresetName("toString")).toBe(false);
  });
});
