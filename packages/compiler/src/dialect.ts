/**
 * Dialect profiles: construction, validation and presets.
 */

import type { DialectSetting } from "@rxmacro/core";
import { DialectProfileError } from "./errors.js";
import type { DialectProfile } from "./types.js";

const PROFILE_KEYS = [
  "namedCaptureSupport",
  "duplicateNamedGroupsAllowed",
  "variableLengthLookbehindSupport",
  "explicitCaptureOnly",
] as const satisfies ReadonlyArray<keyof DialectProfile>;

type ProfileKey = (typeof PROFILE_KEYS)[number];

function isProfileKey(key: string): key is ProfileKey {
  return PROFILE_KEYS.some((k) => k === key);
}

function profile(
  namedCaptureSupport: boolean,
  duplicateNamedGroupsAllowed: boolean,
  variableLengthLookbehindSupport: boolean,
  explicitCaptureOnly: boolean
): DialectProfile {
  return Object.freeze({
    namedCaptureSupport,
    duplicateNamedGroupsAllowed,
    variableLengthLookbehindSupport,
    explicitCaptureOnly,
  });
}

export const DIALECT_PRESETS = {
  /** JavaScript RegExp as shipped in Node.js 20 */
  ecmascript: profile(true, false, true, false),
  pcre: profile(true, false, false, false),
  oniguruma: profile(true, true, false, false),
  dotnet: profile(true, true, true, false),
  /** .NET with RegexOptions.ExplicitCapture */
  "dotnet-explicit": profile(true, true, true, true),
  /** Engines without named groups, e.g. POSIX ERE */
  legacy: profile(false, false, false, false),
} as const satisfies Record<string, DialectProfile>;

export type DialectPresetName = keyof typeof DIALECT_PRESETS;

export function isDialectPresetName(name: string): name is DialectPresetName {
  return Object.prototype.hasOwnProperty.call(DIALECT_PRESETS, name);
}

/**
 * Build a frozen profile from a partial set of options over `base`
 * (ECMAScript by default). Input may come from a config file, so it is checked
 * key by key: unknown options and non-boolean values are rejected.
 */
export function createDialectProfile(
  options: Readonly<Partial<DialectProfile>> | Readonly<Record<string, unknown>> = {},
  base: DialectProfile = DIALECT_PRESETS.ecmascript
): DialectProfile {
  const resolved: { -readonly [K in ProfileKey]: boolean } = { ...base };
  const entries: Array<[string, unknown]> = Object.entries(options);
  for (const [key, value] of entries) {
    if (!isProfileKey(key)) {
      throw new DialectProfileError(`unknown option "${key}" (expected one of ${PROFILE_KEYS.join(", ")})`);
    }
    if (typeof value !== "boolean") {
      throw new DialectProfileError(`option "${key}" must be a boolean, got ${typeof value}`);
    }
    resolved[key] = value;
  }

  if (resolved.explicitCaptureOnly && !resolved.namedCaptureSupport) {
    throw new DialectProfileError("explicitCaptureOnly requires namedCaptureSupport, or nothing could capture");
  }

  return profile(
    resolved.namedCaptureSupport,
    resolved.duplicateNamedGroupsAllowed,
    resolved.variableLengthLookbehindSupport,
    resolved.explicitCaptureOnly
  );
}

/** Resolve a configured dialect: a preset name or an options object. */
export function resolveDialect(setting: DialectSetting): DialectProfile {
  if (typeof setting === "string") {
    if (!isDialectPresetName(setting)) {
      throw new DialectProfileError(
        `unknown preset "${setting}" (expected one of ${Object.keys(DIALECT_PRESETS).join(", ")})`
      );
    }
    return DIALECT_PRESETS[setting];
  }
  return createDialectProfile(setting);
}

/** Stable four-character key, one digit per option in declaration order. */
export function profileKey(p: DialectProfile): string {
  return PROFILE_KEYS.map((k) => (p[k] ? "1" : "0")).join("");
}
