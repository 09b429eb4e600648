import type {
  ListDescriptor,
  NestedShape,
  OptionalDescriptor,
  Pattern,
  ScalarDescriptor,
  ScalarType,
  ShapeDescriptor,
  StructDescriptor,
} from "./types.js";

/** A scalar field: `scalar("integer")`, `scalar("string")`, ... */
export function scalar<S extends ScalarType>(type: S): ScalarDescriptor<S> {
  return { kind: "scalar", type };
}

/** A field whose capture group may not take part in the match. */
export function optional<D extends ShapeDescriptor>(
  inner: D
): OptionalDescriptor<D> {
  return { kind: "optional", inner };
}

/**
 * A field holding several values, split on `delimiter` (a pattern, `,` by
 * default). An empty capture decodes to an empty list.
 */
export function list<D extends ShapeDescriptor>(
  inner: D,
  delimiter: Pattern = ","
): ListDescriptor<D> {
  return { kind: "list", inner, delimiter };
}

/** A field whose capture is decoded by another shape. */
export function nested<T>(shape: NestedShape<T>): StructDescriptor<T> {
  return { kind: "struct", shape };
}

/** Human-readable type name used in error messages. */
export function typeName(type: ShapeDescriptor): string {
  switch (type.kind) {
    case "scalar":
      return type.type;
    case "optional":
      return `optional<${typeName(type.inner)}>`;
    case "list":
      return `list<${typeName(type.inner)}>`;
    case "struct":
      return type.shape.name;
  }
}
