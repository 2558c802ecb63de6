/**
 * @rxmacro/compiler
 *
 * Compiles grammars of named, composable regex fragments into engine-ready
 * regular expressions.
 *
 * Pipeline: stripComments → parseDefinitions → resolveDependencies → expandAll,
 * then per request adaptPattern → validatePattern.
 *
 * @module
 */

// Core types
export type {
  Visibility,
  StrippedLine,
  MacroDefinition,
  ReferenceToken,
  BodySegment,
  DependencyEdge,
  ResolvedMacro,
  CompiledMacro,
  DialectProfile,
  AdaptOptions,
  CompiledPattern,
  ValidationReport,
} from "./types.js";

// Errors
export {
  RxMacroError,
  GrammarError,
  DialectError,
  ParseError,
  InvalidIdentifierError,
  DuplicateNameError,
  UndefinedReferenceError,
  ResourceLimitExceededError,
  UnsupportedConstructError,
  DuplicateGroupNameError,
  DialectProfileError,
  UnknownMacroError,
  InternalExpansionInvariantError,
  type LimitName,
} from "./errors.js";

// Pipeline stages
export { stripComments } from "./strip.js";
export { MacroTable, parseDefinitions } from "./definitions.js";
export { resolveDependencies, type ResolvedTable } from "./resolve.js";
export { expandAll } from "./expand.js";
export { adaptPattern, variableLengthEvidence } from "./adapt.js";
export { validatePattern } from "./validate.js";
export { scanPattern, type GroupInfo, type GroupKind, type ScanResult } from "./regex-scan.js";
export { findReferenceTokens, isIdentifier, INTERNAL_MARKER } from "./tokens.js";

// Dialects
export {
  DIALECT_PRESETS,
  createDialectProfile,
  resolveDialect,
  profileKey,
  isDialectPresetName,
  type DialectPresetName,
} from "./dialect.js";

// Entry point
export { compile, CompiledGrammar, type CompileOptions } from "./grammar.js";
export { PatternCache, type CacheStats } from "./cache.js";
