/**
 * Definition parsing: one `$(name)=body` per stripped line, collected into an
 * ordered MacroTable.
 */

import type { ResolvedLimits } from "@rxmacro/core";
import {
  DuplicateNameError,
  InternalExpansionInvariantError,
  InvalidIdentifierError,
  ParseError,
  ResourceLimitExceededError,
} from "./errors.js";
import { INTERNAL_MARKER, isIdentifier } from "./tokens.js";
import type { MacroDefinition, StrippedLine, Visibility } from "./types.js";

// ---------------------------------------------------------------------------
// MacroTable
// ---------------------------------------------------------------------------

/**
 * Ordered name → definition mapping. Insertion order is textual order and each
 * definition's `id` is its position, so ids double as arena indices.
 */
export class MacroTable implements Iterable<MacroDefinition> {
  private readonly ordered: MacroDefinition[] = [];
  private readonly byName = new Map<string, MacroDefinition>();
  private frozen = false;

  add(entry: Omit<MacroDefinition, "id">): MacroDefinition {
    if (this.frozen) {
      throw new InternalExpansionInvariantError("definition added to a frozen macro table", {
        macroName: entry.name,
      });
    }
    const definition: MacroDefinition = Object.freeze({ ...entry, id: this.ordered.length });
    this.ordered.push(definition);
    this.byName.set(definition.name, definition);
    return definition;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get(name: string): MacroDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  at(id: number): MacroDefinition | undefined {
    return this.ordered[id];
  }

  get size(): number {
    return this.ordered.length;
  }

  names(): string[] {
    return this.ordered.map((d) => d.name);
  }

  [Symbol.iterator](): Iterator<MacroDefinition> {
    return this.ordered[Symbol.iterator]();
  }
}

// ---------------------------------------------------------------------------
// Line parsing
// ---------------------------------------------------------------------------

/** `$(` head `)` spaces `=` rest; the head is validated separately. */
const DEFINITION_SHAPE = /^(\s*)\$\(([^()]*)\)\s*=\s*(.*)$/;

interface ParsedLine {
  name: string;
  visibility: Visibility;
  rawBody: string;
  bodyColumn: number;
}

function parseLine({ line, text }: StrippedLine): ParsedLine {
  const match = DEFINITION_SHAPE.exec(text);
  if (!match) {
    throw new ParseError("expected a macro definition of the form $(name)=body", line, 1);
  }
  const [, indent, head, rest] = match;
  const marked = head.startsWith(INTERNAL_MARKER);
  const name = marked ? head.slice(INTERNAL_MARKER.length) : head;
  const nameColumn = indent.length + 3 + (marked ? INTERNAL_MARKER.length : 0);

  if (!isIdentifier(name)) {
    throw new InvalidIdentifierError(name, line, nameColumn);
  }

  return {
    name,
    visibility: marked ? "internal" : "public",
    rawBody: rest.trim(),
    bodyColumn: text.length - rest.length + 1,
  };
}

/**
 * Parse stripped lines into a frozen MacroTable.
 *
 * Stops at the first malformed line, invalid name or duplicate; a duplicate is
 * reported on its second occurrence and the first definition is kept.
 */
export function parseDefinitions(
  lines: readonly StrippedLine[],
  limits: Pick<ResolvedLimits, "maxMacros" | "maxTotalBodyLength">
): MacroTable {
  const table = new MacroTable();
  let totalBodyLength = 0;

  for (const stripped of lines) {
    const parsed = parseLine(stripped);

    const existing = table.get(parsed.name);
    if (existing) {
      throw new DuplicateNameError(parsed.name, stripped.line, existing.sourceLine);
    }

    if (table.size + 1 > limits.maxMacros) {
      throw new ResourceLimitExceededError("maxMacros", table.size + 1, limits.maxMacros, {
        line: stripped.line,
        macroName: parsed.name,
      });
    }
    totalBodyLength += parsed.rawBody.length;
    if (totalBodyLength > limits.maxTotalBodyLength) {
      throw new ResourceLimitExceededError("maxTotalBodyLength", totalBodyLength, limits.maxTotalBodyLength, {
        line: stripped.line,
        macroName: parsed.name,
      });
    }

    table.add({
      name: parsed.name,
      visibility: parsed.visibility,
      rawBody: parsed.rawBody,
      sourceLine: stripped.line,
      bodyColumn: parsed.bodyColumn,
    });
  }

  return table.freeze();
}
