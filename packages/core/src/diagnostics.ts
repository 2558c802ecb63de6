/**
 * Diagnostics System for rxmacro
 *
 * Provides structured, Rust-style error messages for grammar compilation:
 * - Stable error codes (RX1001-RX9999) grouped by category
 * - Rich diagnostics pointing at grammar lines, with labels, notes and help
 * - A CLI renderer that shows the offending grammar line in context
 *
 * @example
 * ```typescript
 * const diagnostic = new DiagnosticBuilder(RX1004)
 *   .at(12)
 *   .withArgs({ macro: "Header", missing: "Ident" })
 *   .help("Move the definition of Ident above line 12")
 *   .build();
 *
 * console.error(renderDiagnosticCLI(diagnostic, { source, fileName: "cpp.rxm" }));
 * ```
 */

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Syntax = "syntax",
  Reference = "reference",
  Limits = "limits",
  Lint = "lint",
  Dialect = "dialect",
  Internal = "internal",
}

export type Severity = "error" | "warning" | "info";

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code, rendered as RX<code> */
  readonly code: number;

  /** Default severity */
  readonly severity: Severity;

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for --explain */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

/** A position in the grammar text. Lines and columns are 1-based. */
export interface GrammarSpan {
  line: number;
  column?: number;
  length?: number;
}

/** A secondary annotation such as "first defined here". */
export interface LabeledLine {
  line: number;
  message: string;
}

/**
 * Structured diagnostic. Renders to CLI output or serializes to JSON.
 */
export interface RichDiagnostic {
  code: number;
  severity: Severity;
  category: DiagnosticCategory;

  /** Primary message (with placeholders interpolated) */
  message: string;

  /** Main error location in the grammar text */
  span?: GrammarSpan;

  /** Macro the diagnostic is about, when there is one */
  macroName?: string;

  labels: LabeledLine[];
  notes: string[];
  help?: string;
  explanation?: string;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string> = {};

  constructor(private readonly descriptor: DiagnosticDescriptor) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      labels: [],
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Set the primary span for this diagnostic.
   */
  at(line: number, column?: number, length?: number): this {
    this.diagnostic.span = { line, column, length };
    return this;
  }

  forMacro(name: string): this {
    this.diagnostic.macroName = name;
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Record<string, string | number | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  label(line: number, message: string): this {
    this.diagnostic.labels.push({ line, message });
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  private interpolateMessage(): string {
    let message = this.descriptor.messageTemplate;
    for (const [key, value] of Object.entries(this.args)) {
      message = message.split(`{${key}}`).join(value);
    }
    return message;
  }

  build(): RichDiagnostic {
    return {
      ...this.diagnostic,
      message: this.interpolateMessage(),
      labels: [...this.diagnostic.labels],
      notes: [...this.diagnostic.notes],
    };
  }
}

// ============================================================================
// Error Catalog: Grammar Syntax (1001-1099)
// ============================================================================

export const RX1001: DiagnosticDescriptor = {
  code: 1001,
  severity: "error",
  category: DiagnosticCategory.Syntax,
  messageTemplate: "{detail}",
  explanation: `Every non-comment line of a grammar must be a single macro definition:

  $(Name)=body        public macro
  $(!Name)=body       internal macro, meant only for composition

Block comments must be closed with */ before the end of the file.`,
};

export const RX1002: DiagnosticDescriptor = {
  code: 1002,
  severity: "error",
  category: DiagnosticCategory.Syntax,
  messageTemplate: "`{name}` is not a valid macro name",
  explanation: `Macro names start with a letter or underscore, followed by letters,
digits or underscores.

Correct:
  $(class_head)=...
  $(!Ident2)=...

Incorrect:
  $(2nd)=...
  $(class-head)=...`,
};

export const RX1003: DiagnosticDescriptor = {
  code: 1003,
  severity: "error",
  category: DiagnosticCategory.Syntax,
  messageTemplate: "macro `{name}` is defined more than once",
  explanation: `A macro name may be defined only once. The first definition is kept and
every later definition of the same name is rejected.`,
};

// ============================================================================
// Error Catalog: References (1004)
// ============================================================================

export const RX1004: DiagnosticDescriptor = {
  code: 1004,
  severity: "error",
  category: DiagnosticCategory.Reference,
  messageTemplate: "macro `{macro}` references `{missing}`, which is not defined above it",
  explanation: `A macro may only reference macros defined on earlier lines. Forward
references and self references are rejected, which keeps every grammar free of cycles.

Move the referenced definition above the macro that uses it.`,
};

// ============================================================================
// Error Catalog: Resource Limits (1005)
// ============================================================================

export const RX1005: DiagnosticDescriptor = {
  code: 1005,
  severity: "error",
  category: DiagnosticCategory.Limits,
  messageTemplate: "{limit} exceeded: {actual} > {max}",
  explanation: `Compilation stops when a grammar grows past the configured ceilings:

  limits.maxMacros            number of definitions
  limits.maxTotalBodyLength   sum of the raw body lengths
  limits.maxExpandedLength    length of any single expanded macro

Raise the ceiling in the rxmacro configuration if the grammar is legitimately large.`,
};

// ============================================================================
// Error Catalog: Lint (2001-2099)
// ============================================================================

export const RX2001: DiagnosticDescriptor = {
  code: 2001,
  severity: "warning",
  category: DiagnosticCategory.Lint,
  messageTemplate: "visibility marker on reference to `{name}` has no effect",
  explanation: `The ! marker only means something where a macro is defined. At a
reference site it is ignored: $(!Name) and $(Name) refer to the same macro.`,
};

export const RX2002: DiagnosticDescriptor = {
  code: 2002,
  severity: "warning",
  category: DiagnosticCategory.Lint,
  messageTemplate: "internal macro `{name}` is never referenced",
  explanation: `Internal macros exist only to be composed into other macros. One that no
macro references is dead; remove it or make it public.`,
};

// ============================================================================
// Error Catalog: Dialect Adaptation (3001-3099)
// ============================================================================

export const RX3001: DiagnosticDescriptor = {
  code: 3001,
  severity: "error",
  category: DiagnosticCategory.Dialect,
  messageTemplate: "{construct} in `{macro}` is not supported by the target dialect: {reason}",
  explanation: `The pattern uses a construct the target regex engine cannot run, such as
a lookbehind with variable-length content on an engine that only accepts
fixed-length lookbehind. These constructs are reported rather than rewritten.`,
};

export const RX3002: DiagnosticDescriptor = {
  code: 3002,
  severity: "error",
  category: DiagnosticCategory.Dialect,
  messageTemplate: "capture group `{group}` appears {count} times in `{macro}`",
  explanation: `The target dialect does not allow two capture groups with the same name.
This usually happens when a macro containing a named group is referenced twice.

Pass autoDisambiguate to rename later occurrences (name_2, name_3, ...), or
restructure the grammar so the group occurs once.`,
};

export const RX3003: DiagnosticDescriptor = {
  code: 3003,
  severity: "error",
  category: DiagnosticCategory.Dialect,
  messageTemplate: "invalid dialect profile: {detail}",
  explanation: `A dialect profile has exactly four boolean options:

  namedCaptureSupport
  duplicateNamedGroupsAllowed
  variableLengthLookbehindSupport
  explicitCaptureOnly

Unknown options are rejected, and explicitCaptureOnly requires namedCaptureSupport.`,
};

export const RX3004: DiagnosticDescriptor = {
  code: 3004,
  severity: "error",
  category: DiagnosticCategory.Dialect,
  messageTemplate: "{detail}",
  explanation: `Patterns can be requested for any public macro of the grammar. Internal
macros are composition fragments and need allowInternal to be adapted directly.`,
};

// ============================================================================
// Error Catalog: Internal (9001)
// ============================================================================

export const RX9001: DiagnosticDescriptor = {
  code: 9001,
  severity: "error",
  category: DiagnosticCategory.Internal,
  messageTemplate: "internal invariant violated: {detail}",
  explanation: `The compiler reached a state its earlier checks should have ruled out.
This is a bug in rxmacro, not in the grammar.`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

export const DIAGNOSTIC_CATALOG: ReadonlyMap<number, DiagnosticDescriptor> = new Map(
  [RX1001, RX1002, RX1003, RX1004, RX1005, RX2001, RX2002, RX3001, RX3002, RX3003, RX3004, RX9001].map(
    (d) => [d.code, d] as const
  )
);

export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

export function getDiagnosticsByCategory(category: DiagnosticCategory): DiagnosticDescriptor[] {
  return Array.from(DIAGNOSTIC_CATALOG.values()).filter((d) => d.category === category);
}

// ============================================================================
// CLI Renderer: Rust-Style Error Output
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or RXMACRO_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type Style = keyof typeof COLORS;

function colorsEnabled(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.RXMACRO_NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: Severity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

export interface CLIRenderOptions {
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Grammar text, for showing the offending line */
  source?: string;
  /** File name shown in the location line */
  fileName?: string;
  /** Lines of context around the primary line (default: 1) */
  contextLines?: number;
  showExplanation?: boolean;
}

export function formatCode(code: number): string {
  return `RX${code}`;
}

/**
 * Render a RichDiagnostic to CLI output.
 *
 * @example Output:
 * ```
 * error[RX1004]: macro `X` references `Y`, which is not defined above it
 *   --> grammar.rxm:1:6
 *    |
 *  1 | $(X)=$(Y)
 *    |      ^^^^
 *    |
 *    = help: `Y` is defined on line 2; move it above line 1
 * ```
 */
export function renderDiagnosticCLI(diagnostic: RichDiagnostic, options: CLIRenderOptions = {}): string {
  const { contextLines = 1, showExplanation = false } = options;
  const useColor = options.colors ?? colorsEnabled();
  const color = (text: string, ...styles: Style[]): string =>
    useColor ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);

  lines.push(
    `${color(diagnostic.severity, "bold", severityClr)}${color(`[${formatCode(diagnostic.code)}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`
  );

  const span = diagnostic.span;
  if (span) {
    const where = span.column !== undefined ? `${span.line}:${span.column}` : `${span.line}`;
    lines.push(`  ${color("-->", "blue")} ${options.fileName ?? "<grammar>"}:${where}`);
  }

  if (span && options.source !== undefined) {
    const sourceLines = options.source.split("\n");
    const minLine = Math.max(1, span.line - contextLines);
    const maxLine = Math.min(sourceLines.length, span.line + contextLines);
    const numWidth = Math.max(2, String(maxLine).length);
    const gutter = " ".repeat(numWidth);
    const bar = color("|", "blue");

    lines.push(` ${gutter} ${bar}`);
    for (let lineNum = minLine; lineNum <= maxLine; lineNum++) {
      const lineText = (sourceLines[lineNum - 1] ?? "").replace(/\r$/, "");
      lines.push(` ${color(String(lineNum).padStart(numWidth, " "), "blue")} ${bar} ${lineText}`);
      if (lineNum === span.line) {
        const startCol = span.column ?? 1;
        const length = span.length ?? Math.max(1, lineText.length - startCol + 1);
        const underline = " ".repeat(startCol - 1) + "^".repeat(Math.max(1, length));
        lines.push(` ${gutter} ${bar} ${color(underline, severityClr)}`);
      }
    }

    for (const label of diagnostic.labels) {
      const labelText = (sourceLines[label.line - 1] ?? "").replace(/\r$/, "");
      lines.push(` ${gutter} ${bar}`);
      lines.push(` ${color(String(label.line).padStart(numWidth, " "), "blue")} ${bar} ${labelText}`);
      lines.push(` ${gutter} ${bar} ${color("-".repeat(Math.max(1, labelText.length)), "blue")} ${color(label.message, "blue")}`);
    }
    lines.push(` ${gutter} ${bar}`);
  } else {
    for (const label of diagnostic.labels) {
      lines.push(`   ${color("= note:", "bold")} line ${label.line}: ${label.message}`);
    }
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(diagnostics: RichDiagnostic[], options: CLIRenderOptions = {}): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const lines: string[] = [];
  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) {
    parts.push(`${errorCount} error${errorCount > 1 ? "s" : ""}`);
  }
  if (warnCount > 0) {
    parts.push(`${warnCount} warning${warnCount > 1 ? "s" : ""}`);
  }
  if (parts.length > 0) {
    lines.push(`${parts.join(", ")} generated`);
  }

  return lines.join("\n");
}
