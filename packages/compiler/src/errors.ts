/**
 * Error taxonomy for grammar compilation and dialect adaptation.
 *
 * Every error carries a catalog diagnostic from @rxmacro/core, so front ends can
 * render it the same way whether it came from parsing or from adaptation.
 */

import {
  DiagnosticBuilder,
  RX1001,
  RX1002,
  RX1003,
  RX1004,
  RX1005,
  RX3001,
  RX3002,
  RX3003,
  RX3004,
  RX9001,
  type DiagnosticDescriptor,
  type LabeledLine,
  type RichDiagnostic,
} from "@rxmacro/core";

interface ErrorContext {
  line?: number;
  column?: number;
  length?: number;
  macroName?: string;
  labels?: LabeledLine[];
  notes?: string[];
  help?: string;
}

function buildDiagnostic(
  descriptor: DiagnosticDescriptor,
  args: Record<string, string | number | undefined>,
  context: ErrorContext
): RichDiagnostic {
  const builder = new DiagnosticBuilder(descriptor).withArgs(args);
  if (context.line !== undefined) builder.at(context.line, context.column, context.length);
  if (context.macroName !== undefined) builder.forMacro(context.macroName);
  for (const label of context.labels ?? []) builder.label(label.line, label.message);
  for (const note of context.notes ?? []) builder.note(note);
  if (context.help !== undefined) builder.help(context.help);
  return builder.build();
}

/** Base class of everything the compiler throws on purpose. */
export abstract class RxMacroError extends Error {
  readonly code: number;
  readonly line: number | undefined;
  readonly macroName: string | undefined;
  readonly diagnostic: RichDiagnostic;

  protected constructor(
    descriptor: DiagnosticDescriptor,
    args: Record<string, string | number | undefined>,
    context: ErrorContext = {}
  ) {
    const diagnostic = buildDiagnostic(descriptor, args, context);
    super(context.line !== undefined ? `line ${context.line}: ${diagnostic.message}` : diagnostic.message);
    this.name = new.target.name;
    this.code = descriptor.code;
    this.line = context.line;
    this.macroName = context.macroName;
    this.diagnostic = diagnostic;
  }

  toDiagnostic(): RichDiagnostic {
    return this.diagnostic;
  }
}

// ---------------------------------------------------------------------------
// Compilation errors: the grammar text is at fault
// ---------------------------------------------------------------------------

export abstract class GrammarError extends RxMacroError {}

export class ParseError extends GrammarError {
  constructor(detail: string, line: number, column?: number) {
    super(RX1001, { detail }, { line, column });
  }
}

export class InvalidIdentifierError extends GrammarError {
  constructor(
    readonly invalidName: string,
    line: number,
    column?: number
  ) {
    super(RX1002, { name: invalidName }, { line, column, length: Math.max(1, invalidName.length) });
  }
}

export class DuplicateNameError extends GrammarError {
  constructor(
    name: string,
    line: number,
    readonly firstLine: number
  ) {
    super(
      RX1003,
      { name },
      {
        line,
        macroName: name,
        labels: [{ line: firstLine, message: "first defined here" }],
        help: `Rename or remove the definition on line ${line}`,
      }
    );
  }
}

export class UndefinedReferenceError extends GrammarError {
  constructor(
    macroName: string,
    line: number,
    readonly missingName: string,
    options: { column?: number; definedAt?: number } = {}
  ) {
    super(
      RX1004,
      { macro: macroName, missing: missingName },
      {
        line,
        column: options.column,
        length: missingName.length + 3,
        macroName,
        help:
          options.definedAt === undefined
            ? `Define \`${missingName}\` above line ${line}`
            : `\`${missingName}\` is defined on line ${options.definedAt}; move it above line ${line}`,
      }
    );
  }
}

export type LimitName = "maxMacros" | "maxTotalBodyLength" | "maxExpandedLength";

export class ResourceLimitExceededError extends GrammarError {
  constructor(
    readonly limit: LimitName,
    readonly actual: number,
    readonly max: number,
    context: { line?: number; macroName?: string } = {}
  ) {
    super(RX1005, { limit, actual, max }, context);
  }
}

// ---------------------------------------------------------------------------
// Dialect errors: scoped to one (macro, profile) request
// ---------------------------------------------------------------------------

export abstract class DialectError extends RxMacroError {}

export class UnsupportedConstructError extends DialectError {
  constructor(
    macroName: string,
    readonly construct: string,
    readonly reason: string,
    readonly offset: number
  ) {
    super(RX3001, { macro: macroName, construct, reason }, { macroName, notes: [`at offset ${offset} of the expanded pattern`] });
  }
}

export class DuplicateGroupNameError extends DialectError {
  constructor(
    macroName: string,
    readonly groupName: string,
    /** Offsets of each occurrence in the adapted text, where group headers may have been rewritten */
    readonly occurrences: readonly number[]
  ) {
    super(
      RX3002,
      { macro: macroName, group: groupName, count: occurrences.length },
      {
        macroName,
        notes: [`occurrences at offsets ${occurrences.join(", ")}`],
        help: "Pass autoDisambiguate to rename later occurrences",
      }
    );
  }
}

export class DialectProfileError extends DialectError {
  constructor(detail: string) {
    super(RX3003, { detail });
  }
}

export class UnknownMacroError extends DialectError {
  constructor(
    name: string,
    readonly reason: "undefined" | "internal"
  ) {
    super(
      RX3004,
      {
        detail:
          reason === "undefined"
            ? `no macro named \`${name}\` in this grammar`
            : `\`${name}\` is an internal macro; pass allowInternal to adapt it`,
      },
      { macroName: name }
    );
  }
}

// ---------------------------------------------------------------------------
// Internal faults
// ---------------------------------------------------------------------------

/** An invariant earlier stages guarantee did not hold. Never an input error. */
export class InternalExpansionInvariantError extends RxMacroError {
  constructor(detail: string, context: { macroName?: string; line?: number } = {}) {
    super(RX9001, { detail }, context);
  }
}
