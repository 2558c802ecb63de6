/**
 * rxmacro CLI -- check, list and expand regex macro grammars
 *
 * Usage:
 *   rxmacro check <grammar>
 *   rxmacro list <grammar> [--json]
 *   rxmacro expand <grammar> [--macro <name>]... [--dialect <preset>] [--json]
 */

import * as fs from "node:fs";
import * as path from "node:path";
import {
  ConfigError,
  config,
  createLogger,
  renderDiagnosticCLI,
  renderDiagnosticsCLI,
  type CLIRenderOptions,
  unreachable,
  type LogLevel,
} from "@rxmacro/core";
import {
  RxMacroError,
  compile,
  createDialectProfile,
  resolveDialect,
  type CompiledGrammar,
  type DialectProfile,
} from "@rxmacro/compiler";

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  env: NodeJS.ProcessEnv;
  /** Force colored diagnostics on or off (default: auto-detect) */
  colors?: boolean;
}

type Command = "check" | "list" | "expand";
const COMMANDS: readonly Command[] = ["check", "list", "expand"];

type ProfileOverrides = { -readonly [K in keyof DialectProfile]?: boolean };

interface CliOptions {
  command: Command;
  file: string;
  macros: string[];
  dialect?: string;
  overrides: ProfileOverrides;
  autoDisambiguate: boolean;
  json: boolean;
  verbose: boolean;
}

class UsageError extends Error {}

const USAGE = "Usage: rxmacro <check|list|expand> <grammar> [options]";

const HELP = `
rxmacro - Regex macro grammars

USAGE:
  rxmacro <command> <grammar> [options]

COMMANDS:
  check    Compile the grammar and report problems
  list     List macros with their visibility and line
  expand   Print adapted patterns (public macros unless --macro is given)

OPTIONS:
  --macro <name>             Expand only this macro; repeatable, allows internal macros
  --dialect <preset>         ecmascript, pcre, oniguruma, dotnet, dotnet-explicit or legacy
  --no-named-captures        Target has no named groups
  --allow-duplicate-groups   Target accepts repeated group names
  --no-variable-lookbehind   Target needs fixed-length lookbehind
  --explicit-capture         Only named groups capture
  --auto-disambiguate        Rename repeated group names instead of failing
  --json                     Machine-readable output (list, expand)
  -v, --verbose              Log stage timings
  -h, --help                 Show this help message

EXAMPLES:
  rxmacro check lexer.rxm
  rxmacro expand lexer.rxm --dialect pcre
  rxmacro expand lexer.rxm --macro Ident --no-named-captures --json
`;

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseArgs(args: string[]): CliOptions | "help" {
  if (args.includes("--help") || args.includes("-h")) return "help";

  const command = args[0] ?? "";
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command || "(none)"}`);
  }

  let file: string | undefined;
  const macros: string[] = [];
  let dialect: string | undefined;
  const overrides: ProfileOverrides = {};
  let autoDisambiguate = false;
  let json = false;
  let verbose = false;

  const valueOf = (flag: string, value: string | undefined): string => {
    if (value === undefined || value.startsWith("-")) {
      throw new UsageError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--macro") {
      macros.push(valueOf(arg, args[++i]));
    } else if (arg === "--dialect") {
      dialect = valueOf(arg, args[++i]);
    } else if (arg === "--no-named-captures") {
      overrides.namedCaptureSupport = false;
    } else if (arg === "--allow-duplicate-groups") {
      overrides.duplicateNamedGroupsAllowed = true;
    } else if (arg === "--no-variable-lookbehind") {
      overrides.variableLengthLookbehindSupport = false;
    } else if (arg === "--explicit-capture") {
      overrides.explicitCaptureOnly = true;
    } else if (arg === "--auto-disambiguate") {
      autoDisambiguate = true;
    } else if (arg === "--json") {
      json = true;
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (file === undefined) {
      file = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (file === undefined) {
    throw new UsageError(`${command} needs a grammar file`);
  }

  return { command, file, macros, dialect, overrides, autoDisambiguate, json, verbose };
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function runCheck(grammar: CompiledGrammar, options: CliOptions, io: CliIO): number {
  const total = grammar.names().length;
  const publicCount = grammar.publicNames().length;
  io.stdout(`${options.file}: ${total} macros (${publicCount} public), ${grammar.warnings.length} warnings`);
  return 0;
}

function runList(grammar: CompiledGrammar, options: CliOptions, io: CliIO): number {
  const rows = grammar.names().flatMap((name) => {
    const macro = grammar.macro(name);
    return macro ? [macro] : [];
  });

  if (options.json) {
    io.stdout(
      JSON.stringify(
        rows.map((m) => ({ name: m.name, visibility: m.visibility, line: m.sourceLine, dependencies: m.dependencies })),
        null,
        2
      )
    );
  } else {
    for (const m of rows) io.stdout(`${m.name}\t${m.visibility}\tline ${m.sourceLine}`);
  }
  return 0;
}

function runExpand(grammar: CompiledGrammar, options: CliOptions, io: CliIO, render: CLIRenderOptions): number {
  const base = resolveDialect(options.dialect ?? config.getDialect());
  const profile = createDialectProfile(options.overrides, base);
  const explicit = options.macros.length > 0;
  const targets = explicit ? options.macros : grammar.publicNames();

  let failed = false;
  const results: Array<{ name: string; pattern: string; groups: Record<string, number> }> = [];
  for (const name of targets) {
    try {
      const pattern = grammar.pattern(name, profile, {
        autoDisambiguate: options.autoDisambiguate,
        allowInternal: explicit,
      });
      results.push({ name, pattern: pattern.finalText, groups: Object.fromEntries(pattern.groupNameToIndex) });
    } catch (error) {
      if (!(error instanceof RxMacroError)) throw error;
      failed = true;
      io.stderr(renderDiagnosticCLI(error.toDiagnostic(), render));
    }
  }

  if (options.json) {
    io.stdout(JSON.stringify(results, null, 2));
  } else {
    for (const r of results) io.stdout(`${r.name}\t${r.pattern}`);
  }
  return failed ? 1 : 0;
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Run the CLI against `argv` (without the node and script entries) and return
 * the exit code.
 */
export function runCli(argv: string[], io: CliIO): number {
  let options: CliOptions | "help";
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.stderr(`${error.message}\n${USAGE}`);
    return 1;
  }
  if (options === "help") {
    io.stdout(HELP);
    return 0;
  }

  const filePath = path.resolve(options.file);
  let source: string;
  try {
    source = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    io.stderr(`error: cannot read ${options.file}: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }

  const render: CLIRenderOptions = { colors: io.colors, source, fileName: options.file };
  try {
    config.load(path.dirname(filePath), io.env);
    const logger = createLogger("cli", {
      verbose: options.verbose || config.isDebug(),
      sink: (_level: LogLevel, line: string) => io.stderr(line),
    });
    logger.debug(`config: ${config.getConfigFilePath() ?? "(defaults)"}`);

    const grammar = compile(source, { limits: config.getLimits(), logger });
    if (grammar.warnings.length > 0) {
      io.stderr(renderDiagnosticsCLI([...grammar.warnings], render));
    }

    switch (options.command) {
      case "check":
        return runCheck(grammar, options, io);
      case "list":
        return runList(grammar, options, io);
      case "expand":
        return runExpand(grammar, options, io, render);
      default:
        return unreachable(options.command, "command");
    }
  } catch (error) {
    if (error instanceof RxMacroError) {
      io.stderr(renderDiagnosticCLI(error.toDiagnostic(), render));
      return 1;
    }
    if (error instanceof ConfigError) {
      io.stderr(`error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
