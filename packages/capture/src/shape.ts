/**
 * Record shapes: a pattern plus the fields it fills, registered once and
 * used to decode any number of inputs.
 *
 * Registration compiles the pattern and checks that fields and named groups
 * line up, so a mismatched shape fails when it is defined rather than on
 * the first line it sees.
 *
 * ```ts
 * const LogEntry = defineShape<{ foo: number; bar: boolean; baz: string }>({
 *   name: "LogEntry",
 *   pattern: String.raw`(?P<foo>\d+)\s+(?P<bar>true|false)\s+(?P<baz>\S+)`,
 *   fields: [
 *     { name: "foo", type: scalar("integer") },
 *     { name: "bar", type: scalar("boolean") },
 *     { name: "baz", type: scalar("string") },
 *   ],
 * });
 *
 * LogEntry.parse("1 true hello"); // { foo: 1, bar: true, baz: "hello" }
 * ```
 */

import { config, debugLog } from "@lineshape/core";
import { decodeCompiled, decodeFields } from "./decoder.js";
import type {
  DecodeError,
  NoMatchError,
  ShapeValidationError,
} from "./errors.js";
import { ShapeDefinitionError } from "./errors.js";
import { excerpt, extract, isMatch } from "./extractor.js";
import type { PatternCache } from "./pattern-cache.js";
import { getDefaultPatternCache } from "./pattern-cache.js";
import type {
  CompiledPattern,
  DecodedRecord,
  DecodeResult,
  FieldSpec,
  NestedShape,
  Pattern,
  Result,
  ShapeDescriptor,
} from "./types.js";
import {
  CaptureValueSource,
  RecordValueSource,
  snapshot,
} from "./value-source.js";

/** Everything needed to register a shape. */
export interface ShapeDefinition {
  readonly name: string;
  readonly pattern: Pattern;
  readonly fields: readonly FieldSpec[];
}

export interface ShapeOptions {
  /** Defaults to the process-wide cache. */
  cache?: PatternCache;
  /** Maximum input characters quoted in errors. Defaults to configuration. */
  excerptLength?: number;
}

/** A line that matched the pattern but failed field decoding. */
export interface LineError {
  /** 1-based line number. */
  readonly line: number;
  readonly error: DecodeError;
}

export interface ParsedLines<T> {
  readonly records: T[];
  readonly errors: LineError[];
}

/**
 * Check a shape definition against its compiled pattern, returning every
 * problem found.
 */
export function validateShape(
  definition: ShapeDefinition,
  compiled: CompiledPattern,
  cache: PatternCache
): ShapeValidationError[] {
  const errors: ShapeValidationError[] = [];
  const groups = new Set(compiled.groupNames);
  const fieldNames = new Set<string>();
  const claimed = new Map<string, string>();

  if (compiled.groupNames.length === 0) {
    errors.push({ message: "pattern declares no named capture groups" });
  }

  for (const field of definition.fields) {
    if (fieldNames.has(field.name)) {
      errors.push({
        field: field.name,
        message: "field is declared more than once",
      });
    }
    fieldNames.add(field.name);

    const capture = field.capture ?? field.name;
    const owner = claimed.get(capture);
    if (owner !== undefined) {
      errors.push({
        field: field.name,
        message: `capture "${capture}" is already read by field "${owner}"`,
      });
    } else {
      claimed.set(capture, field.name);
    }

    if (!groups.has(capture)) {
      errors.push({
        field: field.name,
        message: `pattern has no named capture group "${capture}"`,
      });
    }

    for (const delimiter of delimitersOf(field.type)) {
      const result = cache.compileOrGet(delimiter);
      if (!result.ok) {
        errors.push({
          field: field.name,
          message: `invalid list delimiter: ${result.error.syntaxMessage}`,
        });
      }
    }
  }

  for (const group of compiled.groupNames) {
    if (!claimed.has(group)) {
      errors.push({
        message: `capture group "${group}" is not read by any field`,
      });
    }
  }

  return errors;
}

function delimitersOf(type: ShapeDescriptor): Pattern[] {
  switch (type.kind) {
    case "list":
      return [type.delimiter, ...delimitersOf(type.inner)];
    case "optional":
      return delimitersOf(type.inner);
    case "scalar":
    case "struct":
      return [];
  }
}

/**
 * A registered shape decoding inputs into records of type `T`.
 */
export class RecordShape<T = DecodedRecord> implements NestedShape<T> {
  readonly name: string;
  readonly pattern: Pattern;
  readonly fields: readonly FieldSpec[];
  readonly compiled: CompiledPattern;
  private readonly cache: PatternCache;
  private readonly excerptLength: number | undefined;

  /**
   * @throws CompileError if the pattern does not compile
   * @throws ShapeDefinitionError if fields and named groups disagree
   */
  constructor(definition: ShapeDefinition, options: ShapeOptions = {}) {
    this.name = definition.name;
    this.pattern = definition.pattern;
    this.fields = Object.freeze([...definition.fields]);
    this.cache = options.cache ?? getDefaultPatternCache();
    this.excerptLength = options.excerptLength;

    const compiled = this.cache.compileOrGet(definition.pattern);
    if (!compiled.ok) throw compiled.error;
    this.compiled = compiled.value;

    const problems = validateShape(definition, this.compiled, this.cache);
    if (problems.length > 0) {
      throw new ShapeDefinitionError(definition.name, problems);
    }

    debugLog(
      () => `Registered shape ${this.name} (${this.fields.length} fields)`
    );
  }

  /** True when `text` contains a match for this shape's pattern. */
  isMatch(text: string): boolean {
    return isMatch(this.compiled, text);
  }

  decode(text: string): DecodeResult<T> {
    const result = decodeCompiled(this.compiled, this.fields, text, {
      cache: this.cache,
      excerptLength: this.excerptLength,
    });
    return this.typed(result);
  }

  /**
   * Decode `text`, throwing the `DecodeError` on failure.
   */
  parse(text: string): T {
    const result = this.decode(text);
    if (!result.ok) throw result.error;
    return result.value;
  }

  /**
   * Decode from a string record instead of a match, e.g. key/value pairs
   * read from another format. Keys are looked up by capture name.
   */
  fromValues(
    values: Readonly<Record<string, string | undefined>>
  ): DecodeResult<T> {
    const quoted = JSON.stringify(values);
    const result = decodeFields(
      new RecordValueSource(values),
      this.fields,
      {
        pattern: this.pattern,
        excerpt: excerpt(quoted, this.resolvedExcerptLength()),
      },
      { cache: this.cache }
    );
    return this.typed(result);
  }

  /**
   * The raw captures for `text`, without coercion. Useful when working out
   * why a field fails.
   */
  inspect(
    text: string
  ): Result<Record<string, string | undefined>, NoMatchError> {
    const extracted = extract(this.compiled, text, {
      excerptLength: this.resolvedExcerptLength(),
    });
    if (!extracted.ok) return extracted;
    const captures = new CaptureValueSource(extracted.value);
    return { ok: true, value: snapshot(captures) };
  }

  /**
   * Decode every line of `text` that matches the pattern. Lines that don't
   * match are skipped; lines that match but fail field decoding are
   * reported with their line number.
   */
  parseLines(text: string): ParsedLines<T> {
    const records: T[] = [];
    const errors: LineError[] = [];

    text.split(/\r?\n/).forEach((line, index) => {
      if (!this.isMatch(line)) return;
      const result = this.decode(line);
      if (result.ok) {
        records.push(result.value);
      } else {
        errors.push({ line: index + 1, error: result.error });
      }
    });

    return { records, errors };
  }

  private resolvedExcerptLength(): number {
    return this.excerptLength ?? config.get("excerptLength");
  }

  private typed(result: DecodeResult<DecodedRecord>): DecodeResult<T> {
    if (!result.ok) return result;
    // The field list was declared for T, so the assembled record is a T.
    return { ok: true, value: result.value as T };
  }
}

/**
 * Register a shape from a descriptor table.
 */
export function defineShape<T = DecodedRecord>(
  definition: ShapeDefinition,
  options?: ShapeOptions
): RecordShape<T> {
  return new RecordShape<T>(definition, options);
}
