import type { CompileError, DecodeError, NoMatchError } from "./errors.js";

/**
 * Pattern text with named capture groups. Its identity is the exact text,
 * inline flags included.
 */
export type Pattern = string;

/** Semantic types a captured substring can be coerced to. */
export type ScalarType = "string" | "boolean" | "integer" | "float" | "bigint";

// ============================================================================
// Shape descriptors
// ============================================================================

/** A single scalar value. */
export interface ScalarDescriptor<S extends ScalarType = ScalarType> {
  readonly kind: "scalar";
  readonly type: S;
}

/** A value that may be absent from the match. */
export interface OptionalDescriptor<D extends ShapeDescriptor> {
  readonly kind: "optional";
  readonly inner: D;
}

/** A capture holding several values separated by a delimiter pattern. */
export interface ListDescriptor<D extends ShapeDescriptor> {
  readonly kind: "list";
  readonly inner: D;
  readonly delimiter: Pattern;
}

/** A capture decoded by another shape's own pattern. */
export interface StructDescriptor<T> {
  readonly kind: "struct";
  readonly shape: NestedShape<T>;
}

/** The closed set of target shapes a field can declare. */
export type ShapeDescriptor =
  | ScalarDescriptor
  | OptionalDescriptor<ShapeDescriptor>
  | ListDescriptor<ShapeDescriptor>
  | StructDescriptor<unknown>;

type ScalarValue<S extends ScalarType> = S extends "string"
  ? string
  : S extends "boolean"
    ? boolean
    : S extends "integer" | "float"
      ? number
      : S extends "bigint"
        ? bigint
        : never;

/** The TypeScript type a descriptor decodes to. */
export type Infer<D> =
  D extends ScalarDescriptor<infer S extends ScalarType>
    ? ScalarValue<S>
    : D extends OptionalDescriptor<infer I>
      ? Infer<I> | undefined
      : D extends ListDescriptor<infer I>
        ? Infer<I>[]
        : D extends StructDescriptor<infer T>
          ? T
          : never;

/** Anything that can decode a captured substring on its own. */
export interface NestedShape<T> {
  readonly name: string;
  decode(text: string): DecodeResult<T>;
}

// ============================================================================
// Fields and records
// ============================================================================

/** Declaration of one target field. */
export interface FieldSpec {
  /** Property name on the decoded record. */
  readonly name: string;
  readonly type: ShapeDescriptor;
  /** Capture group feeding this field, when it differs from `name`. */
  readonly capture?: string;
  /** Used instead of failing when the capture group did not participate. */
  readonly defaultValue?: unknown;
}

export type DecodedRecord = Record<string, unknown>;

// ============================================================================
// Compiled patterns and captures
// ============================================================================

export interface CompiledPattern {
  /** The pattern text exactly as registered. */
  readonly source: Pattern;
  /** The translated JavaScript expression. */
  readonly expression: string;
  /** JavaScript flags taken from the leading inline flag group. */
  readonly flags: string;
  /** Never global or sticky, so it carries no `lastIndex` state. */
  readonly regex: RegExp;
  /** Named groups in declaration order. */
  readonly groupNames: readonly string[];
}

/**
 * Capture-group name → matched text, in declaration order.
 * `undefined` means the group did not take part in the match.
 */
export type CaptureSet = ReadonlyMap<string, string | undefined>;

// ============================================================================
// Results
// ============================================================================

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export type CompileResult = Result<CompiledPattern, CompileError>;

export type ExtractResult = Result<CaptureSet, NoMatchError>;

export type DecodeResult<T> = Result<T, DecodeError>;

/** Why a single field could not be coerced, before context is attached. */
export type FieldFailure =
  | { readonly reason: "missing" }
  | {
      readonly reason: "type_mismatch";
      readonly expected: string;
      readonly raw: string;
    }
  | {
      readonly reason: "invalid_nested";
      readonly expected: string;
      readonly raw: string;
      readonly cause: DecodeError;
    };

export type CoercionResult = Result<unknown, FieldFailure | CompileError>;
