/**
 * Core types for @rxmacro/compiler
 *
 * Definition records, the resolved dependency form, expansion results and the
 * per-dialect compiled pattern.
 */

/** Whether a macro is meant for consumers or only for composition. */
export type Visibility = "internal" | "public";

/** A comment-free grammar line. `line` is 1-based. */
export interface StrippedLine {
  readonly line: number;
  readonly text: string;
}

/** One `$(name)=body` line. `id` is the definition ordinal. */
export interface MacroDefinition {
  readonly id: number;
  readonly name: string;
  readonly visibility: Visibility;
  readonly rawBody: string;
  readonly sourceLine: number;
  /** 1-based column where the body starts on its line */
  readonly bodyColumn: number;
}

/** A `$(name)` occurrence inside a body. */
export interface ReferenceToken {
  readonly name: string;
  /** Offset of the `$` in the scanned text */
  readonly offset: number;
  readonly length: number;
  /** Whether the token carried the internal-visibility marker */
  readonly marked: boolean;
}

export type BodySegment =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "reference"; readonly id: number; readonly token: ReferenceToken };

export interface DependencyEdge {
  readonly from: string;
  readonly to: string;
}

/** A definition with its body split into literal text and resolved references. */
export interface ResolvedMacro {
  readonly definition: MacroDefinition;
  readonly segments: readonly BodySegment[];
  /** Ids of referenced macros, unique, in first-reference order */
  readonly dependencies: readonly number[];
}

/** A fully substituted macro. */
export interface CompiledMacro {
  readonly name: string;
  readonly visibility: Visibility;
  readonly sourceLine: number;
  readonly expandedBody: string;
  /** Names of directly referenced macros */
  readonly dependencies: readonly string[];
}

/** Capability descriptor for a target regex engine. */
export interface DialectProfile {
  readonly namedCaptureSupport: boolean;
  readonly duplicateNamedGroupsAllowed: boolean;
  readonly variableLengthLookbehindSupport: boolean;
  readonly explicitCaptureOnly: boolean;
}

/** Caller choices that are not engine capabilities. */
export interface AdaptOptions {
  /** Rename repeated capture names to name_2, name_3, ... instead of failing */
  autoDisambiguate?: boolean;
  /** Capture names whose groups should become non-capturing */
  nonCapturing?: readonly string[];
  /** Allow adapting internal (composition-only) macros */
  allowInternal?: boolean;
}

export interface CompiledPattern {
  readonly name: string;
  readonly finalText: string;
  /** 1-based ordinal among capturing groups of `finalText`, by capture name */
  readonly groupNameToIndex: ReadonlyMap<string, number>;
  readonly captureCount: number;
  /** Names of the named groups left in `finalText`, in order */
  readonly captureNames: readonly string[];
  readonly profile: DialectProfile;
}

export interface ValidationReport {
  readonly captureCount: number;
  readonly captureNames: readonly string[];
}
