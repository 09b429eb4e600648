/**
 * Decode Error Types
 *
 * Every failure of a decode call is one of these. `kind` discriminates the
 * stage that failed; `FieldError.reason` narrows field failures further.
 */

import type { FieldFailure, Pattern } from "./types.js";

/** Stage at which a decode call failed. */
export type DecodeErrorKind = "compile" | "no_match" | "field";

/**
 * Base class for everything a decode call can fail with.
 */
export abstract class DecodeError extends Error {
  abstract readonly kind: DecodeErrorKind;

  constructor(
    message: string,
    readonly pattern: Pattern,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DecodeError";
  }
}

/**
 * The pattern text is not a valid regular expression. Fatal for every use
 * of that pattern; compiling again fails the same way.
 */
export class CompileError extends DecodeError {
  readonly kind = "compile";

  constructor(
    pattern: Pattern,
    /** Message reported by the regular-expression engine. */
    readonly syntaxMessage: string,
    cause?: unknown
  ) {
    super(
      `Invalid pattern ${JSON.stringify(pattern)}: ${syntaxMessage}`,
      pattern,
      { cause }
    );
    this.name = "CompileError";
  }
}

/**
 * The input does not satisfy the pattern. Callers usually skip the line.
 */
export class NoMatchError extends DecodeError {
  readonly kind = "no_match";

  constructor(
    pattern: Pattern,
    /** The input, truncated for diagnostics. */
    readonly excerpt: string
  ) {
    super(
      `No match for pattern ${JSON.stringify(pattern)} ` +
        `in input ${JSON.stringify(excerpt)}`,
      pattern
    );
    this.name = "NoMatchError";
  }
}

/** Reason codes for field failures. */
export type FieldErrorReason = FieldFailure["reason"];

/** Where a field failure happened. */
export interface FieldErrorContext {
  /** Record field name. */
  readonly field: string;
  /** Capture group (or value key) the field reads from. */
  readonly capture: string;
  readonly pattern: Pattern;
  readonly excerpt: string;
}

/**
 * A matched input whose captures could not fill a field.
 */
export class FieldError extends DecodeError {
  readonly kind = "field";
  readonly reason: FieldErrorReason;
  readonly field: string;
  readonly capture: string;
  readonly excerpt: string;
  /** Declared type name, for `type_mismatch` and `invalid_nested`. */
  readonly expected?: string;
  /** Captured text, for `type_mismatch` and `invalid_nested`. */
  readonly raw?: string;

  constructor(failure: FieldFailure, context: FieldErrorContext) {
    super(
      describeFailure(failure, context),
      context.pattern,
      failure.reason === "invalid_nested" ? { cause: failure.cause } : undefined
    );
    this.name = "FieldError";
    this.reason = failure.reason;
    this.field = context.field;
    this.capture = context.capture;
    this.excerpt = context.excerpt;
    if (failure.reason !== "missing") {
      this.expected = failure.expected;
      this.raw = failure.raw;
    }
  }
}

function describeFailure(
  failure: FieldFailure,
  context: FieldErrorContext
): string {
  const field = `"${context.field}"`;
  switch (failure.reason) {
    case "missing":
      return (
        `Missing field ${field}: capture "${context.capture}" ` +
        "did not participate in the match"
      );
    case "type_mismatch":
      return (
        `Field ${field}: expected ${failure.expected}, ` +
        `got ${JSON.stringify(failure.raw)}`
      );
    case "invalid_nested":
      return (
        `Field ${field}: could not decode ${JSON.stringify(failure.raw)} ` +
        `as ${failure.expected}: ${failure.cause.message}`
      );
  }
}

/** A single problem found while registering a shape. */
export interface ShapeValidationError {
  /** The field involved, when the problem concerns one. */
  readonly field?: string;
  readonly message: string;
}

/**
 * Thrown at registration time when a shape's fields and pattern disagree.
 */
export class ShapeDefinitionError extends Error {
  constructor(
    readonly shapeName: string,
    readonly problems: readonly ShapeValidationError[]
  ) {
    const lines = problems.map((p) =>
      p.field ? `  ${p.field}: ${p.message}` : `  ${p.message}`
    );
    super(`Shape "${shapeName}" validation failed:\n${lines.join("\n")}`);
    this.name = "ShapeDefinitionError";
  }
}
