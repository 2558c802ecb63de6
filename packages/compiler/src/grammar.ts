/**
 * Grammar compilation entry point.
 *
 * `compile()` runs comment stripping, definition parsing, reference resolution
 * and expansion, failing on the first structural error. The returned
 * CompiledGrammar is immutable; per-dialect patterns are adapted lazily and
 * cached by (macro, profile, options).
 */

import { DEFAULT_LIMITS, createLogger, type Logger, type ResolvedLimits, type RichDiagnostic } from "@rxmacro/core";
import { adaptPattern } from "./adapt.js";
import { PatternCache, type CacheStats } from "./cache.js";
import { parseDefinitions } from "./definitions.js";
import { createDialectProfile, profileKey } from "./dialect.js";
import { UnknownMacroError } from "./errors.js";
import { expandAll } from "./expand.js";
import { resolveDependencies, type ResolvedTable } from "./resolve.js";
import { stripComments } from "./strip.js";
import type {
  AdaptOptions,
  CompiledMacro,
  CompiledPattern,
  DependencyEdge,
  DialectProfile,
  MacroDefinition,
} from "./types.js";

export interface CompileOptions {
  /** Resource ceilings; unspecified ones use DEFAULT_LIMITS */
  limits?: Partial<ResolvedLimits>;
  /** Log stage timings */
  verbose?: boolean;
  logger?: Logger;
}

export class CompiledGrammar {
  private readonly byName: ReadonlyMap<string, CompiledMacro>;
  private readonly cache = new PatternCache<CompiledPattern>();
  private readonly logger: Logger;

  constructor(
    private readonly resolved: ResolvedTable,
    private readonly compiled: readonly CompiledMacro[],
    logger: Logger
  ) {
    this.byName = new Map(compiled.map((m) => [m.name, m]));
    this.logger = logger;
  }

  /** Lint findings from compilation (visibility markers at references, unused internals). */
  get warnings(): readonly RichDiagnostic[] {
    return this.resolved.warnings;
  }

  get edges(): readonly DependencyEdge[] {
    return this.resolved.edges;
  }

  get cacheStats(): Readonly<CacheStats> {
    return { ...this.cache.stats };
  }

  /** All macro names in definition order. */
  names(): string[] {
    return this.compiled.map((m) => m.name);
  }

  publicNames(): string[] {
    return this.compiled.filter((m) => m.visibility === "public").map((m) => m.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  macro(name: string): CompiledMacro | undefined {
    return this.byName.get(name);
  }

  definition(name: string): MacroDefinition | undefined {
    return this.resolved.table.get(name);
  }

  /** Direct dependencies of `name`, in first-reference order. */
  dependencies(name: string): readonly string[] {
    return this.byName.get(name)?.dependencies ?? [];
  }

  /**
   * Adapt macro `name` to `profile`. Errors are scoped to this request and are
   * not cached; the grammar stays usable.
   */
  pattern(name: string, profile: DialectProfile, options: AdaptOptions = {}): CompiledPattern {
    const compiledMacro = this.byName.get(name);
    if (!compiledMacro) {
      throw new UnknownMacroError(name, "undefined");
    }
    if (compiledMacro.visibility === "internal" && !options.allowInternal) {
      throw new UnknownMacroError(name, "internal");
    }

    const checked = createDialectProfile(profile);
    const key = this.cache.computeKey(name, checked, options);
    return this.cache.getOrCompute(key, () =>
      this.logger.time(`adapt ${name} [${profileKey(checked)}]`, () =>
        adaptPattern(name, compiledMacro.expandedBody, checked, options)
      )
    );
  }
}

/**
 * Compile grammar text. Throws a GrammarError subclass on the first
 * structural problem; never returns a partial grammar.
 */
export function compile(grammarText: string, options: CompileOptions = {}): CompiledGrammar {
  const limits: ResolvedLimits = { ...DEFAULT_LIMITS, ...options.limits };
  const logger = options.logger ?? createLogger("compile", { verbose: options.verbose ?? false });

  const lines = logger.time("strip comments", () => stripComments(grammarText));
  const table = logger.time("parse definitions", () => parseDefinitions(lines, limits));
  const resolved = logger.time("resolve references", () => resolveDependencies(table));
  const compiled = logger.time("expand", () => expandAll(resolved, limits));

  logger.debug(`${compiled.length} macros, ${resolved.edges.length} references, ${resolved.warnings.length} warnings`);
  return new CompiledGrammar(resolved, compiled, logger);
}
