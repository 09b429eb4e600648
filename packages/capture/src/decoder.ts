/**
 * Decode Driver
 *
 * Compile → Extract → Coerce each field → Assemble. Linear and
 * all-or-nothing: the first failure is returned and no partial record is
 * produced.
 *
 * @example
 * ```typescript
 * const result = decode(
 *   String.raw`(?P<foo>\d+)\s+(?P<bar>true|false)`,
 *   [
 *     { name: "foo", type: scalar("integer") },
 *     { name: "bar", type: scalar("boolean") },
 *   ],
 *   "1 true",
 * );
 * // result → { ok: true, value: { foo: 1, bar: true } }
 * ```
 */

import { config } from "@lineshape/core";
import { coerce } from "./coercion.js";
import { CompileError, FieldError } from "./errors.js";
import { excerpt, extract } from "./extractor.js";
import type { PatternCache } from "./pattern-cache.js";
import { getDefaultPatternCache } from "./pattern-cache.js";
import type {
  CompiledPattern,
  DecodedRecord,
  DecodeResult,
  FieldSpec,
  Pattern,
} from "./types.js";
import { CaptureValueSource, type ValueSource } from "./value-source.js";

export interface DecodeOptions {
  /**
   * Cache for the pattern and any list delimiters. Defaults to the
   * process-wide cache.
   */
  cache?: PatternCache;
  /**
   * Maximum input characters quoted in errors. Defaults to
   * `config.get("excerptLength")`.
   */
  excerptLength?: number;
}

/** Pattern and input excerpt attached to field errors. */
export interface DecodeContext {
  readonly pattern: Pattern;
  readonly excerpt: string;
}

/**
 * Decode `input` into a record with the given fields.
 */
export function decode(
  pattern: Pattern,
  fields: readonly FieldSpec[],
  input: string,
  options: DecodeOptions = {}
): DecodeResult<DecodedRecord> {
  const cache = options.cache ?? getDefaultPatternCache();
  const compiled = cache.compileOrGet(pattern);
  if (!compiled.ok) return compiled;
  return decodeCompiled(compiled.value, fields, input, { ...options, cache });
}

/**
 * Decode with an already compiled pattern.
 */
export function decodeCompiled(
  compiled: CompiledPattern,
  fields: readonly FieldSpec[],
  input: string,
  options: DecodeOptions = {}
): DecodeResult<DecodedRecord> {
  const excerptLength = options.excerptLength ?? config.get("excerptLength");
  const extracted = extract(compiled, input, { excerptLength });
  if (!extracted.ok) return extracted;

  return decodeFields(
    new CaptureValueSource(extracted.value),
    fields,
    { pattern: compiled.source, excerpt: excerpt(input, excerptLength) },
    options
  );
}

/**
 * The field stage on its own: look up each field in `source` by its capture
 * name, in declaration order, and coerce it.
 */
export function decodeFields(
  source: ValueSource,
  fields: readonly FieldSpec[],
  context: DecodeContext,
  options: DecodeOptions = {}
): DecodeResult<DecodedRecord> {
  const entries: Array<[string, unknown]> = [];

  for (const field of fields) {
    const capture = field.capture ?? field.name;
    const raw = source.getScalar(capture);

    if (raw === undefined && field.defaultValue !== undefined) {
      // each record gets its own copy of a mutable default
      entries.push([field.name, structuredClone(field.defaultValue)]);
      continue;
    }

    const coerced = coerce(raw, field.type, { cache: options.cache });
    if (!coerced.ok) {
      if (coerced.error instanceof CompileError) {
        return { ok: false, error: coerced.error };
      }
      return {
        ok: false,
        error: new FieldError(coerced.error, {
          field: field.name,
          capture,
          ...context,
        }),
      };
    }
    entries.push([field.name, coerced.value]);
  }

  // fromEntries defines own properties, so a field named `__proto__` stays data
  return { ok: true, value: Object.fromEntries(entries) };
}
