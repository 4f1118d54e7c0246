import { AstValidationError, validateProgram } from "../ast/validate.ts";
import { EmitterDefect, formatDiagnostic, Severity } from "../errors/index.ts";
import { compileProgram } from "../ir/lowering.ts";
import { printIr } from "../ir/printer.ts";

export const VERSION = "0.1.0";

const KNOWN_FLAGS = new Set(["--ir", "--check", "--module", "--help", "-h", "--version", "-V"]);

/** Where the driver reads from and writes to. Writes are raw, newlines included. */
export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(path: string): Promise<string>;
}

interface CliOptions {
  file: string | null;
  flags: Set<string>;
  moduleName: string | undefined;
}

// ─── Argument parsing ────────────────────────────────────────────────────────

function parseArgs(args: string[]): CliOptions | string {
  const flags = new Set<string>();
  let file: string | null = null;
  let moduleName: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (!arg.startsWith("-")) {
      if (file !== null) return `unexpected argument '${arg}'`;
      file = arg;
      continue;
    }
    if (!KNOWN_FLAGS.has(arg)) return `unknown flag '${arg}'`;
    if (arg === "--module") {
      const name = args[++i];
      if (name === undefined || name.startsWith("-")) return "'--module' needs a name";
      moduleName = name;
    }
    flags.add(arg);
  }

  return { file, flags, moduleName };
}

function helpText(): string {
  return `ksc ${VERSION}: lowers KSC programs to SSA IR

Usage: ksc <program.json> [options]

The input is a KSC program AST serialized as JSON.

Options:
  --ir             Print the IR (the default)
  --check          Lower and verify only; print nothing on success
  --module <name>  Name of the produced module (default: main)
  --help, -h       Show this help message
  --version, -V    Show the compiler version

Examples:
  ksc gcd.json              Print the IR for gcd.json
  ksc gcd.json --check      Check that gcd.json lowers cleanly
`;
}

// ─── Driver ──────────────────────────────────────────────────────────────────

/** Runs the command line `args` and returns the process exit code. */
export async function runCli(args: string[], io: CliIo): Promise<number> {
  const parsed = parseArgs(args);
  if (typeof parsed === "string") {
    io.stderr(`error: ${parsed}\nRun with --help to see available options.\n`);
    return 1;
  }
  const { file, flags, moduleName } = parsed;

  if (flags.has("--help") || flags.has("-h")) {
    io.stdout(helpText());
    return 0;
  }
  if (flags.has("--version") || flags.has("-V")) {
    io.stdout(`ksc ${VERSION}\n`);
    return 0;
  }
  if (file === null) {
    io.stderr(`error: no input file provided\n\n${helpText()}`);
    return 1;
  }

  let content: string;
  try {
    content = await io.readFile(file);
  } catch {
    io.stderr(`error: could not read file '${file}'\n`);
    return 1;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    io.stderr(`${file}: error: invalid JSON: ${reason}\n`);
    return 1;
  }

  let result: ReturnType<typeof compileProgram>;
  try {
    result = compileProgram(validateProgram(json), { moduleName });
  } catch (e) {
    if (e instanceof AstValidationError) {
      io.stderr(`${file}: error: malformed AST at ${e.message}\n`);
      return 1;
    }
    if (e instanceof EmitterDefect) {
      io.stderr(`${file}: internal error: ${e.message}\n`);
      return 1;
    }
    throw e;
  }

  let errorCount = 0;
  for (const diag of result.diagnostics) {
    io.stderr(`${formatDiagnostic(diag, file)}\n`);
    if (diag.severity === Severity.Error) errorCount++;
  }
  if (!result.ok) {
    io.stderr(`\n${errorCount} error${errorCount !== 1 ? "s" : ""} emitted\n`);
    return 1;
  }

  if (!flags.has("--check")) io.stdout(printIr(result.module));
  return 0;
}
