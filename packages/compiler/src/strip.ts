/**
 * Comment removal for grammar text.
 *
 * `//` runs to end of line and `/* ... *\/` ends at the first `*\/`, possibly on a
 * later line. Neither starts a comment inside a character class or after a
 * backslash, since regex bodies use both `/` and `*` as literals.
 */

import { ParseError } from "./errors.js";
import type { StrippedLine } from "./types.js";

/**
 * Remove comments and blank lines, keeping the original 1-based line number of
 * every surviving line. Trailing whitespace is dropped.
 */
export function stripComments(text: string): StrippedLine[] {
  const out: StrippedLine[] = [];
  let line = 1;
  let column = 1;
  let current = "";
  let inClass = false;

  const flush = (): void => {
    const trimmed = current.trimEnd();
    if (trimmed.trim() !== "") out.push({ line, text: trimmed });
    current = "";
  };

  const newline = (): void => {
    flush();
    line++;
    column = 1;
    inClass = false;
  };

  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === "\n") {
      newline();
      i++;
      continue;
    }

    if (ch === "\\") {
      if (next === undefined || next === "\n" || next === "\r") {
        current += ch;
        i++;
        column++;
      } else {
        current += ch + next;
        i += 2;
        column += 2;
      }
      continue;
    }

    if (inClass) {
      if (ch === "[" && next === ":") {
        // POSIX class such as [:alpha:] inside a bracket expression
        const close = text.indexOf(":]", i + 2);
        const lineEnd = text.indexOf("\n", i);
        if (close >= 0 && (lineEnd < 0 || close < lineEnd)) {
          current += text.slice(i, close + 2);
          column += close + 2 - i;
          i = close + 2;
          continue;
        }
      }
      if (ch === "]") inClass = false;
      current += ch;
      i++;
      column++;
      continue;
    }

    if (ch === "[") {
      inClass = true;
      let j = i + 1;
      if (text[j] === "^") j++;
      // A ']' right after '[' or '[^' is a literal member
      if (text[j] === "]") j++;
      current += text.slice(i, j);
      column += j - i;
      i = j;
      continue;
    }

    if (ch === "/" && next === "/") {
      while (i < text.length && text[i] !== "\n") i++;
      continue;
    }

    if (ch === "/" && next === "*") {
      const end = text.indexOf("*/", i + 2);
      if (end < 0) {
        throw new ParseError("unterminated block comment", line, column);
      }
      for (let k = i + 2; k < end; k++) {
        if (text[k] === "\n") {
          flush();
          line++;
        }
      }
      const lastBreak = text.lastIndexOf("\n", end);
      column = lastBreak > i ? end + 2 - lastBreak : column + (end + 2 - i);
      i = end + 2;
      continue;
    }

    current += ch;
    i++;
    column++;
  }

  flush();
  return out;
}
