/**
 * @lineshape/capture: decode named regex capture groups into typed records.
 *
 * Register a shape (pattern + fields) once, then decode lines of loosely
 * structured text with it. Failures name the stage and, for fields, the
 * offending field and captured text.
 *
 * @packageDocumentation
 */

export type {
  Pattern,
  ScalarType,
  ScalarDescriptor,
  OptionalDescriptor,
  ListDescriptor,
  StructDescriptor,
  ShapeDescriptor,
  Infer,
  NestedShape,
  FieldSpec,
  DecodedRecord,
  CompiledPattern,
  CaptureSet,
  Result,
  CompileResult,
  ExtractResult,
  DecodeResult,
  FieldFailure,
  CoercionResult,
} from "./types.js";

export {
  DecodeError,
  CompileError,
  NoMatchError,
  FieldError,
  ShapeDefinitionError,
  type DecodeErrorKind,
  type FieldErrorReason,
  type FieldErrorContext,
  type ShapeValidationError,
} from "./errors.js";

export {
  translatePattern,
  compilePattern,
  type TranslatedPattern,
} from "./pattern.js";

export { PatternCache, getDefaultPatternCache } from "./pattern-cache.js";

export { extract, isMatch, excerpt, type ExtractOptions } from "./extractor.js";

export {
  CaptureValueSource,
  RecordValueSource,
  snapshot,
  type ValueSource,
} from "./value-source.js";

export { scalar, optional, list, nested, typeName } from "./descriptors.js";

export { coerce, type CoercionOptions } from "./coercion.js";

export {
  decode,
  decodeCompiled,
  decodeFields,
  type DecodeOptions,
  type DecodeContext,
} from "./decoder.js";

export {
  RecordShape,
  defineShape,
  validateShape,
  type ShapeDefinition,
  type ShapeOptions,
  type LineError,
  type ParsedLines,
} from "./shape.js";

export { ShapeBuilder, shape, type FieldOptions } from "./builder.js";
