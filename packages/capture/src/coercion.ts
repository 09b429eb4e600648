/**
 * Scalar Coercion Rules
 *
 * Turns a raw captured substring into a value of the declared type. Pure:
 * the same (raw, type) pair always yields the same outcome.
 *
 * | type    | accepted text                                             |
 * |---------|-----------------------------------------------------------|
 * | string  | anything, verbatim                                        |
 * | boolean | `true`, `false`                                           |
 * | integer | optional sign and decimal digits, within the safe range   |
 * | bigint  | optional sign and decimal digits                          |
 * | float   | decimal with optional fraction/exponent, `inf`, `nan`     |
 */

import { unreachable } from "@lineshape/core";
import { CompileError } from "./errors.js";
import type { PatternCache } from "./pattern-cache.js";
import { getDefaultPatternCache } from "./pattern-cache.js";
import { typeName } from "./descriptors.js";
import type {
  CoercionResult,
  CompiledPattern,
  ListDescriptor,
  ScalarType,
  ShapeDescriptor,
  StructDescriptor,
} from "./types.js";

const INTEGER = /^[+-]?[0-9]+$/;
const FLOAT = /^[+-]?(?:[0-9]+(?:\.[0-9]*)?|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;
const FLOAT_SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;

export interface CoercionOptions {
  /** Cache used to compile list delimiters. */
  cache?: PatternCache;
}

/**
 * Coerce `raw` (absent when `undefined`) to `type`.
 */
export function coerce(
  raw: string | undefined,
  type: ShapeDescriptor,
  options: CoercionOptions = {}
): CoercionResult {
  if (raw === undefined) {
    return type.kind === "optional"
      ? { ok: true, value: undefined }
      : { ok: false, error: { reason: "missing" } };
  }

  switch (type.kind) {
    case "scalar":
      return coerceScalar(raw, type.type);
    case "optional":
      return coerce(raw, type.inner, options);
    case "list":
      return coerceList(raw, type, options);
    case "struct":
      return coerceStruct(raw, type);
    default:
      return unreachable(type);
  }
}

function coerceScalar(raw: string, type: ScalarType): CoercionResult {
  switch (type) {
    case "string":
      return { ok: true, value: raw };

    case "boolean":
      if (raw === "true") return { ok: true, value: true };
      if (raw === "false") return { ok: true, value: false };
      break;

    case "integer":
      if (INTEGER.test(raw)) {
        const value = Number(raw);
        // `-0` reads back as 0
        if (Number.isSafeInteger(value)) {
          return { ok: true, value: value === 0 ? 0 : value };
        }
      }
      break;

    case "bigint":
      if (INTEGER.test(raw)) return { ok: true, value: BigInt(raw) };
      break;

    case "float": {
      if (FLOAT.test(raw)) return { ok: true, value: Number(raw) };
      const special = FLOAT_SPECIAL.exec(raw);
      if (special) {
        if (special[2].toLowerCase() === "nan") return { ok: true, value: NaN };
        return { ok: true, value: special[1] === "-" ? -Infinity : Infinity };
      }
      break;
    }

    default:
      return unreachable(type);
  }

  return { ok: false, error: { reason: "type_mismatch", expected: type, raw } };
}

function coerceList(
  raw: string,
  type: ListDescriptor<ShapeDescriptor>,
  options: CoercionOptions
): CoercionResult {
  if (raw === "") return { ok: true, value: [] };

  const cache = options.cache ?? getDefaultPatternCache();
  const delimiter = cache.compileOrGet(type.delimiter);
  if (!delimiter.ok) return delimiter;

  const values: unknown[] = [];
  for (const piece of splitOn(raw, delimiter.value)) {
    const element = coerce(piece, type.inner, options);
    if (!element.ok) {
      if (element.error instanceof CompileError) return element;
      return {
        ok: false,
        error: { reason: "type_mismatch", expected: typeName(type), raw },
      };
    }
    values.push(element.value);
  }
  return { ok: true, value: values };
}

function coerceStruct(
  raw: string,
  type: StructDescriptor<unknown>
): CoercionResult {
  const decoded = type.shape.decode(raw);
  if (decoded.ok) return decoded;
  return {
    ok: false,
    error: {
      reason: "invalid_nested",
      expected: type.shape.name,
      raw,
      cause: decoded.error,
    },
  };
}

/**
 * Split `text` on every non-empty match of `delimiter`. Capture groups in
 * the delimiter are not included in the pieces.
 */
function splitOn(text: string, delimiter: CompiledPattern): string[] {
  const rx = new RegExp(delimiter.expression, `${delimiter.flags}g`);
  const pieces: string[] = [];
  let start = 0;
  let match: RegExpExecArray | null;
  while ((match = rx.exec(text)) !== null) {
    if (match[0].length === 0) {
      rx.lastIndex++;
      continue;
    }
    pieces.push(text.slice(start, match.index));
    start = match.index + match[0].length;
  }
  pieces.push(text.slice(start));
  return pieces;
}
