/**
 * @lineshape/derive
 *
 * Generates `defineShape` modules from interfaces annotated with `@pattern`,
 * so record types and their descriptors are written once.
 */

export {
  describeShapes,
  type DeriveDiagnostic,
  type DerivedField,
  type DerivedShape,
  type DerivedType,
  type DescribeResult,
} from "./describe.js";
export {
  emitShapeModule,
  orderShapes,
  shapeConstName,
  type EmitOptions,
  type EmitResult,
} from "./emit.js";
export {
  defaultOutPath,
  importSpecifier,
  parseArgs,
  run,
  type CliIO,
  type CliOptions,
} from "./cli.js";
