/**
 * Render described shapes as a TypeScript module of `defineShape` calls.
 */

import type {
  DeriveDiagnostic,
  DerivedShape,
  DerivedType,
} from "./describe.js";

export interface EmitOptions {
  /**
   * Import specifier of the module declaring the interfaces, e.g.
   * `"./log-entry.js"`.
   */
  sourceImport: string;
  /** Module the descriptor helpers come from. */
  runtimeModule?: string;
}

export interface EmitResult {
  readonly text: string;
  readonly diagnostics: DeriveDiagnostic[];
}

const DEFAULT_RUNTIME_MODULE = "@lineshape/capture";

/** Name of the exported constant holding the shape for interface `name`. */
export function shapeConstName(name: string): string {
  return `${name}Shape`;
}

/**
 * Order shapes so every nested shape is declared before the shapes that
 * use it. Cycles and references to undescribed shapes are reported.
 */
export function orderShapes(shapes: readonly DerivedShape[]): {
  ordered: DerivedShape[];
  diagnostics: DeriveDiagnostic[];
} {
  const byName = new Map(shapes.map((s) => [s.name, s]));
  const ordered: DerivedShape[] = [];
  const diagnostics: DeriveDiagnostic[] = [];
  const state = new Map<string, "visiting" | "done">();

  const visit = (shape: DerivedShape, path: string[]): boolean => {
    const seen = state.get(shape.name);
    if (seen === "done") return true;
    if (seen === "visiting") {
      const cycle = [...path.slice(path.indexOf(shape.name)), shape.name];
      diagnostics.push({
        shape: shape.name,
        message: `shapes nest in a cycle: ${cycle.join(" -> ")}`,
      });
      return false;
    }

    state.set(shape.name, "visiting");
    let ok = true;
    for (const field of shape.fields) {
      for (const ref of nestedRefs(field.type)) {
        const target = byName.get(ref);
        if (!target) {
          diagnostics.push({
            shape: shape.name,
            field: field.name,
            message: `unknown nested shape "${ref}"`,
          });
          ok = false;
          continue;
        }
        if (!visit(target, [...path, shape.name])) ok = false;
      }
    }
    state.set(shape.name, "done");
    if (ok) ordered.push(shape);
    return ok;
  };

  for (const shape of shapes) visit(shape, []);
  return { ordered, diagnostics };
}

function nestedRefs(type: DerivedType): string[] {
  switch (type.kind) {
    case "struct":
      return [type.shape];
    case "optional":
    case "list":
      return nestedRefs(type.inner);
    case "scalar":
      return [];
  }
}

/**
 * Emit one `export const <Name>Shape = defineShape<Name>(...)` per shape.
 * Text is empty when any diagnostic was produced.
 */
export function emitShapeModule(
  shapes: readonly DerivedShape[],
  options: EmitOptions
): EmitResult {
  const { ordered, diagnostics } = orderShapes(shapes);
  if (diagnostics.length > 0) {
    return { text: "", diagnostics };
  }

  const helpers = new Set<string>(["defineShape"]);
  const blocks = ordered.map((shape) => renderShape(shape, helpers));
  const runtimeModule = options.runtimeModule ?? DEFAULT_RUNTIME_MODULE;
  const typeNames = ordered.map((s) => s.name);

  const helperList = [...helpers].sort().join(", ");
  const lines = [
    `// Generated by lineshape-derive from ${options.sourceImport}. ` +
      "Do not edit.",
    `import { ${helperList} } from ${JSON.stringify(runtimeModule)};`,
    `import type { ${typeNames.join(", ")} } ` +
      `from ${JSON.stringify(options.sourceImport)};`,
    "",
    blocks.join("\n\n"),
    "",
  ];
  return { text: lines.join("\n"), diagnostics: [] };
}

function renderShape(shape: DerivedShape, helpers: Set<string>): string {
  const fields = shape.fields.map((field) => {
    const capture =
      field.capture !== undefined
        ? ` capture: ${JSON.stringify(field.capture)},`
        : "";
    const type = renderType(field.type, helpers);
    const name = JSON.stringify(field.name);
    return `    { name: ${name},${capture} type: ${type} },`;
  });

  return [
    `export const ${shapeConstName(shape.name)} = ` +
      `defineShape<${shape.name}>({`,
    `  name: ${JSON.stringify(shape.name)},`,
    `  pattern: ${JSON.stringify(shape.pattern)},`,
    "  fields: [",
    ...fields,
    "  ],",
    "});",
  ].join("\n");
}

function renderType(type: DerivedType, helpers: Set<string>): string {
  switch (type.kind) {
    case "scalar":
      helpers.add("scalar");
      return `scalar(${JSON.stringify(type.type)})`;
    case "optional":
      helpers.add("optional");
      return `optional(${renderType(type.inner, helpers)})`;
    case "list": {
      helpers.add("list");
      const inner = renderType(type.inner, helpers);
      return type.delimiter === ","
        ? `list(${inner})`
        : `list(${inner}, ${JSON.stringify(type.delimiter)})`;
    }
    case "struct":
      helpers.add("nested");
      return `nested(${shapeConstName(type.shape)})`;
  }
}
