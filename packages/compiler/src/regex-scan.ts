/**
 * Structural scan of a regex pattern: groups, their kinds and extents, and
 * back-references by name or number. Escapes, character classes and `\Q...\E` spans are skipped.
 *
 * This is not a regex parser; it only finds what dialect adaptation needs.
 */

export type GroupKind =
  | "capture"
  | "named"
  | "noncapture"
  | "lookahead"
  | "negativeLookahead"
  | "lookbehind"
  | "negativeLookbehind"
  | "atomic"
  | "other";

/** Spelling of a named group header. */
export type NameSyntax = "angle" | "python" | "quote";

export interface GroupInfo {
  readonly kind: GroupKind;
  /** Offset of the opening parenthesis */
  readonly open: number;
  /** Offset just past the group header, e.g. past `(?<name>` */
  readonly headerEnd: number;
  /** Offset of the closing parenthesis */
  readonly close: number;
  readonly name?: string;
  readonly nameSyntax?: NameSyntax;
}

/** `\k<name>`, `\k'name'`, `\k{name}` or `(?P=name)`. */
export interface NamedBackref {
  readonly name: string;
  readonly start: number;
  readonly end: number;
}

/** `\1`, `\12`: a back-reference by group number. */
export interface NumberedBackref {
  readonly index: number;
  readonly start: number;
  readonly end: number;
}

export type ScanResult =
  | {
      ok: true;
      groups: readonly GroupInfo[];
      backrefs: readonly NamedBackref[];
      numberedBackrefs: readonly NumberedBackref[];
    }
  | { ok: false; offset: number; reason: string };

interface OpenGroup {
  kind: GroupKind;
  open: number;
  headerEnd: number;
  name?: string;
  nameSyntax?: NameSyntax;
  index: number;
}

const NAME = "[A-Za-z_][A-Za-z0-9_]*";
const NAMED_HEADERS: ReadonlyArray<{ re: RegExp; syntax: NameSyntax }> = [
  { re: new RegExp(`\\(\\?<(${NAME})>`, "y"), syntax: "angle" },
  { re: new RegExp(`\\(\\?P<(${NAME})>`, "y"), syntax: "python" },
  { re: new RegExp(`\\(\\?'(${NAME})'`, "y"), syntax: "quote" },
];
const BACKREF_ESCAPE = new RegExp(`\\\\k(?:<(${NAME})>|'(${NAME})'|\\{(${NAME})\\})`, "y");
const NUMBERED_BACKREF = /\\([1-9][0-9]*)/y;
const PYTHON_BACKREF = new RegExp(`\\(\\?P=(${NAME})\\)`, "y");
const INLINE_FLAGS = /\(\?[a-zA-Z]*(?:-[a-zA-Z]+)?\)/y;
const FLAGGED_GROUP = /\(\?[a-zA-Z]*(?:-[a-zA-Z]+)?:/y;

const FIXED_HEADERS: ReadonlyArray<[string, GroupKind]> = [
  ["(?<=", "lookbehind"],
  ["(?<!", "negativeLookbehind"],
  ["(?:", "noncapture"],
  ["(?=", "lookahead"],
  ["(?!", "negativeLookahead"],
  ["(?>", "atomic"],
];

function stickyMatch(re: RegExp, text: string, offset: number): RegExpExecArray | null {
  re.lastIndex = offset;
  return re.exec(text);
}

/**
 * Offset just past the character class starting at `start` (which holds `[`),
 * or -1 when the class is never closed.
 */
export function skipCharacterClass(text: string, start: number): number {
  let i = start + 1;
  if (text[i] === "^") i++;
  if (text[i] === "]") i++;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
    } else if (ch === "[" && text[i + 1] === ":") {
      const close = text.indexOf(":]", i + 2);
      i = close >= 0 ? close + 2 : i + 1;
    } else if (ch === "]") {
      return i + 1;
    } else {
      i++;
    }
  }
  return -1;
}

/** Offset just past an escape starting at `start`, treating `\Q...\E` as one unit. */
export function skipEscape(text: string, start: number): number {
  if (text[start + 1] === "Q") {
    const end = text.indexOf("\\E", start + 2);
    return end < 0 ? text.length : end + 2;
  }
  return Math.min(text.length, start + 2);
}

function readHeader(pattern: string, i: number): Omit<OpenGroup, "open" | "index"> | { skipTo: number } {
  if (pattern[i + 1] !== "?") {
    if (pattern[i + 1] === "*") {
      // Backtracking verb such as (*SKIP)
      const close = pattern.indexOf(")", i);
      return { skipTo: close < 0 ? pattern.length : close + 1 };
    }
    return { kind: "capture", headerEnd: i + 1 };
  }

  if (pattern.startsWith("(?#", i)) {
    const close = pattern.indexOf(")", i);
    return { skipTo: close < 0 ? pattern.length : close + 1 };
  }

  for (const [header, kind] of FIXED_HEADERS) {
    if (pattern.startsWith(header, i)) return { kind, headerEnd: i + header.length };
  }

  for (const { re, syntax } of NAMED_HEADERS) {
    const m = stickyMatch(re, pattern, i);
    if (m) return { kind: "named", headerEnd: i + m[0].length, name: m[1], nameSyntax: syntax };
  }

  const flags = stickyMatch(INLINE_FLAGS, pattern, i);
  if (flags) return { skipTo: i + flags[0].length };

  const flagged = stickyMatch(FLAGGED_GROUP, pattern, i);
  if (flagged) return { kind: "noncapture", headerEnd: i + flagged[0].length };

  return { kind: "other", headerEnd: i + 2 };
}

export function scanPattern(pattern: string): ScanResult {
  const groups: Array<GroupInfo | undefined> = [];
  const backrefs: NamedBackref[] = [];
  const numberedBackrefs: NumberedBackref[] = [];
  const stack: OpenGroup[] = [];

  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === "\\") {
      const ref = stickyMatch(BACKREF_ESCAPE, pattern, i);
      if (ref) {
        backrefs.push({ name: ref[1] ?? ref[2] ?? ref[3], start: i, end: i + ref[0].length });
        i += ref[0].length;
        continue;
      }
      const numbered = stickyMatch(NUMBERED_BACKREF, pattern, i);
      if (numbered) {
        numberedBackrefs.push({ index: Number(numbered[1]), start: i, end: i + numbered[0].length });
        i += numbered[0].length;
        continue;
      }
      i = skipEscape(pattern, i);
      continue;
    }

    if (ch === "[") {
      const end = skipCharacterClass(pattern, i);
      if (end < 0) return { ok: false, offset: i, reason: "unterminated character class" };
      i = end;
      continue;
    }

    if (ch === "(") {
      const pyRef = stickyMatch(PYTHON_BACKREF, pattern, i);
      if (pyRef) {
        backrefs.push({ name: pyRef[1], start: i, end: i + pyRef[0].length });
        i += pyRef[0].length;
        continue;
      }
      const header = readHeader(pattern, i);
      if ("skipTo" in header) {
        i = header.skipTo;
        continue;
      }
      stack.push({ ...header, open: i, index: groups.length });
      groups.push(undefined);
      i = header.headerEnd;
      continue;
    }

    if (ch === ")") {
      const top = stack.pop();
      if (!top) return { ok: false, offset: i, reason: "unbalanced ')'" };
      groups[top.index] = {
        kind: top.kind,
        open: top.open,
        headerEnd: top.headerEnd,
        close: i,
        name: top.name,
        nameSyntax: top.nameSyntax,
      };
      i++;
      continue;
    }

    i++;
  }

  const unclosed = stack.pop();
  if (unclosed) return { ok: false, offset: unclosed.open, reason: "unclosed '('" };

  const closed: GroupInfo[] = [];
  for (const group of groups) {
    if (group) closed.push(group);
  }
  return { ok: true, groups: closed, backrefs, numberedBackrefs };
}

/** Whether the group captures text in the final pattern. */
export function isCapturing(group: GroupInfo): boolean {
  return group.kind === "capture" || group.kind === "named";
}
