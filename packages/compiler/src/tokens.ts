/**
 * Lexical rules shared by every stage: identifiers, the visibility marker and
 * `$(name)` reference tokens.
 */

import type { ReferenceToken } from "./types.js";

/** Marker that makes a definition internal: `$(!name)=...` */
export const INTERNAL_MARKER = "!";

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TOKEN_AT = /\$\((!?)([A-Za-z_][A-Za-z0-9_]*)\)/y;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/** True when the character at `offset` is preceded by an odd run of backslashes. */
function isEscaped(text: string, offset: number): boolean {
  let count = 0;
  for (let i = offset - 1; i >= 0 && text[i] === "\\"; i--) count++;
  return count % 2 === 1;
}

/**
 * Find every `$(name)` / `$(!name)` token in `text`, left to right.
 *
 * A `$` escaped with a backslash is a regex literal, not a token.
 */
export function findReferenceTokens(text: string): ReferenceToken[] {
  const tokens: ReferenceToken[] = [];
  let from = 0;
  for (;;) {
    const offset = text.indexOf("$(", from);
    if (offset < 0) break;
    from = offset + 2;
    if (isEscaped(text, offset)) continue;
    TOKEN_AT.lastIndex = offset;
    const match = TOKEN_AT.exec(text);
    if (!match) continue;
    tokens.push({
      name: match[2],
      offset,
      length: match[0].length,
      marked: match[1] === INTERNAL_MARKER,
    });
    from = offset + match[0].length;
  }
  return tokens;
}
