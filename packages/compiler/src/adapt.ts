/**
 * Dialect adaptation: rewrite an expanded pattern for one target engine.
 *
 * All decisions come from a single resolved DialectProfile plus the caller's
 * AdaptOptions. Rewrites are collected as edits against the expanded text and
 * applied in one pass, so offsets reported in errors always refer to the
 * expanded pattern.
 */

import { invariant } from "@rxmacro/core";
import {
  DuplicateGroupNameError,
  InternalExpansionInvariantError,
  UnsupportedConstructError,
} from "./errors.js";
import { type GroupInfo, type NameSyntax, scanPattern, skipCharacterClass, skipEscape } from "./regex-scan.js";
import type { AdaptOptions, CompiledPattern, DialectProfile } from "./types.js";
import { validatePattern } from "./validate.js";

interface Edit {
  start: number;
  end: number;
  text: string;
}

function applyEdits(text: string, edits: Edit[]): string {
  const sorted = [...edits].sort((a, b) => a.start - b.start);
  const parts: string[] = [];
  let cursor = 0;
  for (const edit of sorted) {
    parts.push(text.slice(cursor, edit.start), edit.text);
    cursor = edit.end;
  }
  parts.push(text.slice(cursor));
  return parts.join("");
}

function namedHeader(name: string, syntax: NameSyntax | undefined): string {
  switch (syntax) {
    case "python":
      return `(?P<${name}>`;
    case "quote":
      return `(?'${name}'`;
    default:
      return `(?<${name}>`;
  }
}

/** `\N`, wrapped when the next character is a digit that would extend the number. */
function numberedRef(index: number, nextChar: string): string {
  return /[0-9]/.test(nextChar) ? `(?:\\${index})` : `\\${index}`;
}

function excerpt(text: string, max = 40): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

// ---------------------------------------------------------------------------
// Duplicate capture names
// ---------------------------------------------------------------------------

interface CaptureNames {
  /** Final capture name per group, parallel to `groups` */
  finalNames: Array<string | undefined>;
  /** First repeated name the caller did not ask to rename, with its group indices */
  collision?: { groupName: string; indices: number[] };
}

/**
 * Decide the capture name of every group. Repeated names are renamed when the
 * caller opted in; otherwise the first repeated name is returned as a collision
 * and reported once the edits are known.
 */
function assignCaptureNames(
  groups: readonly GroupInfo[],
  profile: DialectProfile,
  options: AdaptOptions,
  nonCapturing: ReadonlySet<string>
): CaptureNames {
  const finalNames = groups.map((g) => g.name);
  if (profile.duplicateNamedGroupsAllowed) return { finalNames };

  const occurrences = new Map<string, number[]>();
  groups.forEach((group, index) => {
    if (group.kind !== "named" || group.name === undefined || nonCapturing.has(group.name)) return;
    const list = occurrences.get(group.name);
    if (list) list.push(index);
    else occurrences.set(group.name, [index]);
  });

  const used = new Set(occurrences.keys());
  for (const [groupName, indices] of occurrences) {
    if (indices.length < 2) continue;
    if (!options.autoDisambiguate) {
      return { finalNames, collision: { groupName, indices } };
    }
    let suffix = 2;
    for (const index of indices.slice(1)) {
      let candidate = `${groupName}_${suffix}`;
      while (used.has(candidate)) candidate = `${groupName}_${++suffix}`;
      used.add(candidate);
      finalNames[index] = candidate;
      suffix++;
    }
  }
  return { finalNames };
}

/** Where `offset` of the expanded text lands once `edits` are applied. */
function adaptedOffset(offset: number, edits: readonly Edit[]): number {
  let shift = 0;
  for (const edit of edits) {
    if (edit.start < offset) shift += edit.text.length - (edit.end - edit.start);
  }
  return offset + shift;
}

/** Read-only view over capture ordinals; cached patterns are shared between callers. */
class GroupIndex implements ReadonlyMap<string, number> {
  private readonly entriesByName: Map<string, number>;

  constructor(entries: Iterable<readonly [string, number]>) {
    this.entriesByName = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.entriesByName.size;
  }

  get(name: string): number | undefined {
    return this.entriesByName.get(name);
  }

  has(name: string): boolean {
    return this.entriesByName.has(name);
  }

  forEach(callback: (index: number, name: string, map: ReadonlyMap<string, number>) => void): void {
    this.entriesByName.forEach((index, name) => callback(index, name, this));
  }

  entries() {
    return this.entriesByName.entries();
  }

  keys() {
    return this.entriesByName.keys();
  }

  values() {
    return this.entriesByName.values();
  }

  [Symbol.iterator]() {
    return this.entriesByName[Symbol.iterator]();
  }
}

// ---------------------------------------------------------------------------
// Lookbehind length
// ---------------------------------------------------------------------------

const BOUNDED_REPEAT = /\{(\d+)(?:(,)(\d*))?\}/y;

/**
 * Describe the first construct in `body` that can match text of varying
 * length, or return undefined when the body is fixed-length as far as
 * quantifiers go.
 */
export function variableLengthEvidence(body: string): string | undefined {
  let afterOpenParen = false;
  let afterRepeat = false;
  let i = 0;
  while (i < body.length) {
    const ch = body[i];
    const groupHeader = afterOpenParen;
    const modifiable = afterRepeat;
    afterOpenParen = false;
    afterRepeat = false;

    // Lazy `?` or possessive `+` after a fixed repetition
    if (modifiable && (ch === "?" || ch === "+")) {
      i++;
      continue;
    }

    if (ch === "\\") {
      i = skipEscape(body, i);
      continue;
    }
    if (ch === "[") {
      const end = skipCharacterClass(body, i);
      i = end < 0 ? body.length : end;
      continue;
    }
    if (ch === "(") {
      afterOpenParen = true;
      i++;
      continue;
    }
    if (ch === "*" || ch === "+") {
      return `\`${ch}\` quantifier`;
    }
    if (ch === "?" && !groupHeader) {
      return "`?` quantifier";
    }
    if (ch === "{") {
      BOUNDED_REPEAT.lastIndex = i;
      const m = BOUNDED_REPEAT.exec(body);
      if (m) {
        if (m[2] !== undefined && (m[3] === "" || Number(m[3]) !== Number(m[1]))) {
          return `\`${m[0]}\` repetition`;
        }
        i += m[0].length;
        afterRepeat = true;
        continue;
      }
    }
    i++;
  }
  return undefined;
}

function checkLookbehinds(macroName: string, expanded: string, groups: readonly GroupInfo[]): void {
  for (const group of groups) {
    if (group.kind !== "lookbehind" && group.kind !== "negativeLookbehind") continue;
    const evidence = variableLengthEvidence(expanded.slice(group.headerEnd, group.close));
    if (evidence !== undefined) {
      throw new UnsupportedConstructError(
        macroName,
        `lookbehind \`${excerpt(expanded.slice(group.open, group.close + 1))}\``,
        `variable-length content (${evidence})`,
        group.open
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Adaptation
// ---------------------------------------------------------------------------

/**
 * Adapt one expanded pattern to `profile`.
 *
 * `groupNameToIndex` maps each capture name to its 1-based ordinal among the
 * capturing groups of the final text, whether or not the target keeps names.
 */
export function adaptPattern(
  macroName: string,
  expanded: string,
  profile: DialectProfile,
  options: AdaptOptions = {}
): CompiledPattern {
  const scan = scanPattern(expanded);
  if (!scan.ok) {
    throw new UnsupportedConstructError(macroName, "group structure", scan.reason, scan.offset);
  }
  const { groups, backrefs } = scan;
  const nonCapturing = new Set(options.nonCapturing ?? []);

  const { finalNames, collision } = assignCaptureNames(groups, profile, options, nonCapturing);

  if (!profile.variableLengthLookbehindSupport) {
    checkLookbehinds(macroName, expanded, groups);
  }

  const edits: Edit[] = [];
  const groupNameToIndex = new Map<string, number>();
  const indexBySourceName = new Map<string, number>();
  // Source capture ordinal (1-based) → final ordinal, or null once non-capturing
  const renumbered: Array<number | null> = [null];
  let ordinal = 0;

  groups.forEach((group, index) => {
    const header = { start: group.open, end: group.headerEnd };

    if (group.kind === "named" && group.name !== undefined) {
      if (nonCapturing.has(group.name)) {
        renumbered.push(null);
        edits.push({ ...header, text: "(?:" });
        return;
      }
      const finalName = finalNames[index] ?? group.name;
      ordinal++;
      renumbered.push(ordinal);
      if (!groupNameToIndex.has(finalName)) groupNameToIndex.set(finalName, ordinal);
      if (!indexBySourceName.has(group.name)) indexBySourceName.set(group.name, ordinal);

      if (!profile.namedCaptureSupport) {
        edits.push({ ...header, text: "(" });
      } else if (finalName !== group.name) {
        edits.push({ ...header, text: namedHeader(finalName, group.nameSyntax) });
      }
    } else if (group.kind === "capture") {
      if (profile.explicitCaptureOnly) {
        renumbered.push(null);
        edits.push({ ...header, text: "(?:" });
      } else {
        ordinal++;
        renumbered.push(ordinal);
      }
    }
  });

  for (const ref of scan.numberedBackrefs) {
    // Beyond the group count the escape is not a back-reference (e.g. an octal escape)
    if (ref.index >= renumbered.length) continue;
    const target = renumbered[ref.index];
    if (target === null) {
      throw new UnsupportedConstructError(
        macroName,
        `back-reference \`${expanded.slice(ref.start, ref.end)}\``,
        "its group is non-capturing in the target dialect",
        ref.start
      );
    }
    if (target !== ref.index) {
      edits.push({ start: ref.start, end: ref.end, text: numberedRef(target, expanded.charAt(ref.end)) });
    }
  }

  if (!profile.namedCaptureSupport) {
    for (const ref of backrefs) {
      const target = indexBySourceName.get(ref.name);
      if (target === undefined) {
        throw new UnsupportedConstructError(
          macroName,
          `back-reference \`${expanded.slice(ref.start, ref.end)}\``,
          nonCapturing.has(ref.name)
            ? `group \`${ref.name}\` was made non-capturing`
            : `no capture group named \`${ref.name}\``,
          ref.start
        );
      }
      edits.push({ start: ref.start, end: ref.end, text: numberedRef(target, expanded.charAt(ref.end)) });
    }
  }

  if (collision) {
    throw new DuplicateGroupNameError(
      macroName,
      collision.groupName,
      collision.indices.map((i) => adaptedOffset(groups[i].open, edits))
    );
  }

  const finalText = applyEdits(expanded, edits);
  const report = validatePattern(macroName, finalText);
  invariant(report.captureCount === ordinal, () =>
    new InternalExpansionInvariantError(
      `capture count mismatch: adapter assigned ${ordinal}, final text has ${report.captureCount}`,
      { macroName }
    )
  );

  return Object.freeze({
    name: macroName,
    finalText,
    groupNameToIndex: new GroupIndex(groupNameToIndex),
    captureCount: report.captureCount,
    captureNames: report.captureNames,
    profile,
  });
}
