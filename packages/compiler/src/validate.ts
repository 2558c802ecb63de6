/**
 * Final structural check on an adapted pattern.
 *
 * Every input problem has been reported by an earlier stage by the time a
 * pattern gets here, so any failure is an InternalExpansionInvariantError.
 *
 * References are not looked for here. Expansion replaces every reference
 * segment structurally, and after substitution `$(name)` is ordinary regex
 * text (an end anchor before a group).
 */

import { InternalExpansionInvariantError } from "./errors.js";
import { isCapturing, scanPattern } from "./regex-scan.js";
import type { ValidationReport } from "./types.js";

export function validatePattern(name: string, finalText: string): ValidationReport {
  const scan = scanPattern(finalText);
  if (!scan.ok) {
    throw new InternalExpansionInvariantError(`adapted pattern is malformed: ${scan.reason} at offset ${scan.offset}`, {
      macroName: name,
    });
  }

  const captures = scan.groups.filter(isCapturing);
  const captureNames: string[] = [];
  for (const group of captures) {
    if (group.name !== undefined) captureNames.push(group.name);
  }

  return Object.freeze({
    captureCount: captures.length,
    captureNames: Object.freeze(captureNames),
  });
}
