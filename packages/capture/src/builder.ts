import { defineShape, type RecordShape, type ShapeOptions } from "./shape.js";
import type { FieldSpec, Infer, Pattern, ShapeDescriptor } from "./types.js";

/** Per-field options accepted by `ShapeBuilder.field`. */
export interface FieldOptions<V> {
  /** Capture group name, when it differs from the field name. */
  capture?: string;
  /** Value used when the capture group does not take part in the match. */
  defaultValue?: V;
}

type Simplify<T> = { [K in keyof T]: T[K] };

/**
 * Fluent builder for record shapes. Each `.field()` call returns a new
 * builder whose record type includes the added field, so partial builders
 * can be shared and extended.
 *
 * ```ts
 * const Request = shape(
 *   "Request",
 *   String.raw`(?P<method>[A-Z]+) (?P<path>\S+) (?P<status>\d{3})`
 * )
 *   .field("method", scalar("string"))
 *   .field("path", scalar("string"))
 *   .field("status", scalar("integer"))
 *   .build();
 *
 * const req = Request.parse("GET /index.html 200");
 * //    ^? { method: string; path: string; status: number }
 * ```
 */
export class ShapeBuilder<T extends object> {
  private constructor(
    private readonly _name: string,
    private readonly _pattern: Pattern,
    private readonly _fields: readonly FieldSpec[]
  ) {}

  /** Start a builder for `name` decoding with `pattern`. */
  static create(
    name: string,
    pattern: Pattern
  ): ShapeBuilder<Record<never, never>> {
    return new ShapeBuilder(name, pattern, []);
  }

  /**
   * Add a field read from the capture group of the same name (or
   * `options.capture`).
   */
  field<K extends string, D extends ShapeDescriptor>(
    name: K,
    type: D,
    options: FieldOptions<Infer<D>> = {}
  ): ShapeBuilder<T & { [P in K]: Infer<D> }> {
    const spec: FieldSpec = { name, type, ...options };
    return new ShapeBuilder<T & { [P in K]: Infer<D> }>(
      this._name,
      this._pattern,
      [...this._fields, spec]
    );
  }

  /** The field list accumulated so far. */
  fields(): readonly FieldSpec[] {
    return this._fields;
  }

  /**
   * Register the shape.
   *
   * @throws CompileError if the pattern does not compile
   * @throws ShapeDefinitionError if fields and named groups disagree
   */
  build(options?: ShapeOptions): RecordShape<Simplify<T>> {
    return defineShape<Simplify<T>>(
      { name: this._name, pattern: this._pattern, fields: this._fields },
      options
    );
  }
}

/** Create a new shape builder. */
export function shape(
  name: string,
  pattern: Pattern
): ShapeBuilder<Record<never, never>> {
  return ShapeBuilder.create(name, pattern);
}
