/**
 * lineshape-derive -- generate shape modules from annotated interfaces
 *
 * Usage:
 *   lineshape-derive <file.ts> [--out <file>] [--runtime <module>] [--verbose]
 */

import * as fs from "fs";
import * as path from "path";
import { config, debugLog } from "@lineshape/core";
import { describeShapes, type DeriveDiagnostic } from "./describe.js";
import { emitShapeModule } from "./emit.js";

export interface CliOptions {
  file?: string;
  out?: string;
  runtime?: string;
  verbose: boolean;
  help: boolean;
}

/** Where `run` writes its messages. */
export interface CliIO {
  log(message: string): void;
  error(message: string): void;
}

const USAGE =
  "Usage: lineshape-derive <file.ts> " +
  "[--out <file>] [--runtime <module>] [--verbose]";

export function parseArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { verbose: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--out" || arg === "-o") {
      options.out = args[++i];
    } else if (arg === "--runtime") {
      options.runtime = args[++i];
    } else if (arg === "--verbose" || arg === "-v") {
      options.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (!arg.startsWith("-") && !options.file) {
      options.file = arg;
    }
  }

  return options;
}

/** Default output path: `foo.ts` → `foo.shapes.ts`. */
export function defaultOutPath(file: string): string {
  const ext = path.extname(file);
  const base = ext === "" ? file : file.slice(0, -ext.length);
  return `${base}.shapes.ts`;
}

/** Relative ESM import specifier from `outFile` to `sourceFile`. */
export function importSpecifier(outFile: string, sourceFile: string): string {
  let rel = path
    .relative(path.dirname(outFile), sourceFile)
    .split(path.sep)
    .join("/");
  rel = rel.replace(
    /\.(m|c)?tsx?$/,
    (_m: string, kind: string | undefined) => `.${kind ?? ""}js`
  );
  return rel.startsWith(".") ? rel : `./${rel}`;
}

function formatDiagnostic(file: string, d: DeriveDiagnostic): string {
  const where = d.line !== undefined ? `${file}:${d.line}` : file;
  const subject = d.field !== undefined ? `${d.shape}.${d.field}` : d.shape;
  return `${where}: ${subject}: ${d.message}`;
}

/**
 * Run the generator. Returns the process exit code.
 */
export function run(args: readonly string[], io: CliIO = console): number {
  const options = parseArgs(args);

  if (options.help) {
    io.log(USAGE);
    return 0;
  }
  if (!options.file) {
    io.error(USAGE);
    return 1;
  }
  if (options.verbose) {
    config.set({ debug: true });
  }

  const file = options.file;
  let source: string;
  try {
    source = fs.readFileSync(file, "utf8");
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    io.error(`Cannot read ${file}: ${reason}`);
    return 1;
  }

  const described = describeShapes(source, file);
  if (described.diagnostics.length > 0) {
    for (const d of described.diagnostics) {
      io.error(formatDiagnostic(file, d));
    }
    return 1;
  }
  if (described.shapes.length === 0) {
    io.error(`${file}: no interfaces annotated with @pattern`);
    return 1;
  }

  const out = options.out ?? defaultOutPath(file);
  const emitted = emitShapeModule(described.shapes, {
    sourceImport: importSpecifier(out, file),
    runtimeModule: options.runtime,
  });
  if (emitted.diagnostics.length > 0) {
    for (const d of emitted.diagnostics) io.error(formatDiagnostic(file, d));
    return 1;
  }

  fs.writeFileSync(out, emitted.text);
  debugLog(`Wrote ${described.shapes.length} shape(s) to ${out}`);
  io.log(`${out}: ${described.shapes.map((s) => s.name).join(", ")}`);
  return 0;
}
