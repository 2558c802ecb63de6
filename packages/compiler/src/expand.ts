/**
 * Expansion in definition order.
 *
 * Expanded bodies live in an arena indexed by macro id. Each macro is assembled
 * from its segments with one join, reading dependencies straight from the arena,
 * so no expansion is ever computed twice.
 *
 * Every reference segment is replaced by a filled arena slot, so no reference
 * survives. The joined text is not re-scanned: `$(` there may be an end anchor
 * followed by a group.
 */

import type { ResolvedLimits } from "@rxmacro/core";
import { InternalExpansionInvariantError, ResourceLimitExceededError } from "./errors.js";
import type { ResolvedTable } from "./resolve.js";
import type { CompiledMacro } from "./types.js";

export function expandAll(
  resolved: ResolvedTable,
  limits: Pick<ResolvedLimits, "maxExpandedLength">
): readonly CompiledMacro[] {
  const arena: string[] = [];
  const compiled: CompiledMacro[] = [];

  for (const { definition, segments, dependencies } of resolved.macros) {
    const parts = segments.map((segment) => {
      if (segment.kind === "literal") return segment.text;
      const expanded = arena[segment.id];
      if (expanded === undefined) {
        throw new InternalExpansionInvariantError(`\`${segment.token.name}\` used before it was expanded`, {
          macroName: definition.name,
          line: definition.sourceLine,
        });
      }
      return expanded;
    });

    let length = 0;
    for (const part of parts) length += part.length;
    if (length > limits.maxExpandedLength) {
      throw new ResourceLimitExceededError("maxExpandedLength", length, limits.maxExpandedLength, {
        line: definition.sourceLine,
        macroName: definition.name,
      });
    }

    const expandedBody = parts.join("");

    if (definition.id !== arena.length) {
      throw new InternalExpansionInvariantError(`macro #${definition.id} expanded out of order`, {
        macroName: definition.name,
      });
    }
    arena.push(expandedBody);

    compiled.push(
      Object.freeze({
        name: definition.name,
        visibility: definition.visibility,
        sourceLine: definition.sourceLine,
        expandedBody,
        dependencies: Object.freeze(dependencies.map((id) => resolved.macros[id].definition.name)),
      })
    );
  }

  return Object.freeze(compiled);
}
