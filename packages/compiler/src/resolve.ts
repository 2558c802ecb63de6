/**
 * Reference resolution.
 *
 * A reference may only name a macro defined on an earlier line. Checking that
 * alone keeps the graph acyclic, so there is no cycle search, only an assertion
 * that every edge points backwards.
 */

import { DiagnosticBuilder, RX2001, RX2002, invariant, type RichDiagnostic } from "@rxmacro/core";
import type { MacroTable } from "./definitions.js";
import { InternalExpansionInvariantError, UndefinedReferenceError } from "./errors.js";
import { findReferenceTokens } from "./tokens.js";
import type { BodySegment, DependencyEdge, MacroDefinition, ResolvedMacro } from "./types.js";

export interface ResolvedTable {
  readonly table: MacroTable;
  /** Indexed by macro id */
  readonly macros: readonly ResolvedMacro[];
  readonly edges: readonly DependencyEdge[];
  /** Lint findings; never fatal */
  readonly warnings: readonly RichDiagnostic[];
}

function splitBody(definition: MacroDefinition, table: MacroTable, warnings: RichDiagnostic[]): ResolvedMacro {
  const { rawBody } = definition;
  const segments: BodySegment[] = [];
  const dependencies: number[] = [];
  let cursor = 0;

  for (const token of findReferenceTokens(rawBody)) {
    const target = table.get(token.name);
    // Only definitions already added at this point of the scan are visible
    if (!target || target.id >= definition.id) {
      throw new UndefinedReferenceError(definition.name, definition.sourceLine, token.name, {
        column: definition.bodyColumn + token.offset,
        definedAt: target?.sourceLine,
      });
    }

    if (token.marked) {
      warnings.push(
        new DiagnosticBuilder(RX2001)
          .at(definition.sourceLine, definition.bodyColumn + token.offset, token.length)
          .forMacro(definition.name)
          .withArgs({ name: token.name })
          .build()
      );
    }

    if (token.offset > cursor) {
      segments.push({ kind: "literal", text: rawBody.slice(cursor, token.offset) });
    }
    segments.push({ kind: "reference", id: target.id, token });
    if (!dependencies.includes(target.id)) dependencies.push(target.id);
    cursor = token.offset + token.length;
  }

  if (cursor < rawBody.length) {
    segments.push({ kind: "literal", text: rawBody.slice(cursor) });
  }

  return { definition, segments, dependencies };
}

/**
 * Split every body into literal and reference segments and build the
 * dependency edges. Throws UndefinedReferenceError on the first reference to a
 * name that is not defined above the referencing line.
 */
export function resolveDependencies(table: MacroTable): ResolvedTable {
  const warnings: RichDiagnostic[] = [];
  const macros: ResolvedMacro[] = [];
  const edges: DependencyEdge[] = [];
  const referenced = new Set<number>();

  for (const definition of table) {
    const resolved = splitBody(definition, table, warnings);
    for (const dep of resolved.dependencies) {
      invariant(dep < definition.id, () =>
        new InternalExpansionInvariantError(`edge ${definition.name} -> #${dep} does not point backwards`, {
          macroName: definition.name,
          line: definition.sourceLine,
        })
      );
      const target = table.at(dep);
      invariant(target !== undefined, () =>
        new InternalExpansionInvariantError(`dangling dependency #${dep}`, { macroName: definition.name })
      );
      edges.push({ from: definition.name, to: target.name });
      referenced.add(dep);
    }
    macros.push(resolved);
  }

  for (const definition of table) {
    if (definition.visibility === "internal" && !referenced.has(definition.id)) {
      warnings.push(
        new DiagnosticBuilder(RX2002)
          .at(definition.sourceLine)
          .forMacro(definition.name)
          .withArgs({ name: definition.name })
          .build()
      );
    }
  }

  return { table, macros, edges, warnings };
}
