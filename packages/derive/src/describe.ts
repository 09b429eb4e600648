/**
 * Read shape descriptions out of TypeScript source.
 *
 * An interface opts in with a `@pattern` JSDoc tag; its properties become
 * fields. Property types map onto descriptors:
 *
 * | property type               | descriptor                          |
 * |-----------------------------|-------------------------------------|
 * | `string`                    | `scalar("string")`                  |
 * | `boolean`                   | `scalar("boolean")`                 |
 * | `bigint`                    | `scalar("bigint")`                  |
 * | `number`                    | `scalar("float")`                   |
 * | `number` with `@integer`    | `scalar("integer")`                 |
 * | `x?: T`, `T \| undefined`   | `optional(T)`                       |
 * | `T[]`, `Array<T>`           | `list(T)`, split on `@delimiter`    |
 * | a `@pattern` interface      | `nested(Shape)`                     |
 *
 * Nested interfaces must be declared in the same file. A `@pattern` may
 * continue over several comment lines, up to the next tag.
 *
 * `@capture <name>` on a property reads it from a differently named group.
 *
 * @example
 * ```typescript
 * /**
 *  * @pattern (?P<foo>\d+)\s+(?P<bar>true|false)
 *  *\/
 * export interface LogEntry {
 *   /** @integer *\/
 *   foo: number;
 *   bar: boolean;
 * }
 * ```
 */

import * as ts from "typescript";
import { debugLog } from "@lineshape/core";
import { compilePattern, type ScalarType } from "@lineshape/capture";

export type DerivedType =
  | { readonly kind: "scalar"; readonly type: ScalarType }
  | { readonly kind: "optional"; readonly inner: DerivedType }
  | {
      readonly kind: "list";
      readonly inner: DerivedType;
      readonly delimiter: string;
    }
  | { readonly kind: "struct"; readonly shape: string };

export interface DerivedField {
  readonly name: string;
  readonly capture?: string;
  readonly type: DerivedType;
}

export interface DerivedShape {
  readonly name: string;
  readonly pattern: string;
  readonly fields: readonly DerivedField[];
}

/** A problem found while describing or emitting shapes. */
export interface DeriveDiagnostic {
  readonly shape: string;
  readonly field?: string;
  readonly message: string;
  /** 1-based line of the offending declaration, when known. */
  readonly line?: number;
}

export interface DescribeResult {
  readonly shapes: DerivedShape[];
  readonly diagnostics: DeriveDiagnostic[];
}

const DEFAULT_DELIMITER = ",";

/**
 * Collect every `@pattern` interface declared at the top level of a file.
 */
export function describeShapes(
  sourceText: string,
  fileName: string
): DescribeResult {
  debugLog(`Describing shapes in ${fileName}`);

  const sourceFile = ts.createSourceFile(
    fileName,
    sourceText,
    ts.ScriptTarget.Latest,
    true
  );
  const diagnostics: DeriveDiagnostic[] = [];
  const lineOf = (node: ts.Node): number => {
    const start = node.getStart(sourceFile);
    return sourceFile.getLineAndCharacterOfPosition(start).line + 1;
  };

  const candidates: Array<{
    decl: ts.InterfaceDeclaration;
    pattern: string;
  }> = [];
  for (const statement of sourceFile.statements) {
    if (!ts.isInterfaceDeclaration(statement)) continue;
    const pattern = tagText(statement, "pattern");
    if (pattern === undefined) continue;
    candidates.push({ decl: statement, pattern });
  }

  const known = new Set(candidates.map((c) => c.decl.name.text));
  const shapes: DerivedShape[] = [];

  for (const { decl, pattern } of candidates) {
    const name = decl.name.text;
    const report = (
      message: string,
      node: ts.Node,
      field?: string
    ): void => {
      diagnostics.push({ shape: name, field, message, line: lineOf(node) });
    };

    if (pattern === "") {
      report("@pattern tag is empty", decl);
      continue;
    }
    if (decl.typeParameters && decl.typeParameters.length > 0) {
      report("generic interfaces cannot be described", decl);
      continue;
    }
    if (decl.heritageClauses && decl.heritageClauses.length > 0) {
      report("interfaces that extend others cannot be described", decl);
      continue;
    }

    const reported = diagnostics.length;
    const fields: DerivedField[] = [];
    for (const member of decl.members) {
      if (!ts.isPropertySignature(member)) {
        report("only property signatures can be described", member);
        continue;
      }
      const fieldName = propertyName(member.name);
      if (fieldName === undefined) {
        report("computed property names cannot be described", member);
        continue;
      }
      if (!member.type) {
        report("property needs a type annotation", member, fieldName);
        continue;
      }

      const mapped = mapType(member.type, {
        integer: hasTag(member, "integer"),
        delimiter: tagText(member, "delimiter") || DEFAULT_DELIMITER,
        known,
      });
      if (typeof mapped === "string") {
        report(mapped, member, fieldName);
        continue;
      }

      const type: DerivedType =
        member.questionToken && mapped.kind !== "optional"
          ? { kind: "optional", inner: mapped }
          : mapped;
      const capture = tagText(member, "capture");
      fields.push(
        capture ? { name: fieldName, capture, type } : { name: fieldName, type }
      );
    }

    if (diagnostics.length > reported) continue;

    const compiled = compilePattern(pattern);
    if (!compiled.ok) {
      report(`invalid @pattern: ${compiled.error.syntaxMessage}`, decl);
      continue;
    }
    const groups = compiled.value.groupNames;
    const captures = fields.map((f) => f.capture ?? f.name);
    const agree =
      groups.length === captures.length &&
      captures.every((c) => groups.includes(c));
    if (!agree) {
      report(
        `expected named capture groups [${captures.join(", ")}] ` +
          `but the pattern declares [${groups.join(", ")}]`,
        decl
      );
      continue;
    }

    shapes.push({ name, pattern, fields });
  }

  return { shapes, diagnostics };
}

interface MapContext {
  readonly integer: boolean;
  readonly delimiter: string;
  readonly known: ReadonlySet<string>;
}

/** Map a type node to a descriptor, or explain why it can't be. */
function mapType(node: ts.TypeNode, ctx: MapContext): DerivedType | string {
  if (ts.isParenthesizedTypeNode(node)) {
    return mapType(node.type, ctx);
  }

  switch (node.kind) {
    case ts.SyntaxKind.StringKeyword:
      return { kind: "scalar", type: "string" };
    case ts.SyntaxKind.BooleanKeyword:
      return { kind: "scalar", type: "boolean" };
    case ts.SyntaxKind.BigIntKeyword:
      return { kind: "scalar", type: "bigint" };
    case ts.SyntaxKind.NumberKeyword:
      return { kind: "scalar", type: ctx.integer ? "integer" : "float" };
  }

  if (ts.isUnionTypeNode(node)) {
    const members = node.types.filter(
      (t) => t.kind !== ts.SyntaxKind.UndefinedKeyword
    );
    if (members.length === 1 && members.length < node.types.length) {
      const inner = mapType(members[0], ctx);
      return typeof inner === "string" ? inner : { kind: "optional", inner };
    }
    return `unsupported union type \`${node.getText()}\``;
  }

  if (ts.isArrayTypeNode(node)) {
    return listOf(node.elementType, ctx);
  }

  if (ts.isTypeReferenceNode(node) && ts.isIdentifier(node.typeName)) {
    const ref = node.typeName.text;
    if (ref === "Array" && node.typeArguments?.length === 1) {
      return listOf(node.typeArguments[0], ctx);
    }
    if (ctx.known.has(ref) && !node.typeArguments) {
      return { kind: "struct", shape: ref };
    }
    return (
      `type \`${ref}\` is not a scalar ` +
      "or an interface with @pattern in this file"
    );
  }

  return `unsupported type \`${node.getText()}\``;
}

function listOf(
  element: ts.TypeNode,
  ctx: MapContext
): DerivedType | string {
  const inner = mapType(element, ctx);
  if (typeof inner === "string") return inner;
  return { kind: "list", inner, delimiter: ctx.delimiter };
}

function propertyName(name: ts.PropertyName): string | undefined {
  if (
    ts.isIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return undefined;
}

function hasTag(node: ts.Node, tagName: string): boolean {
  return ts.getJSDocTags(node).some((tag) => tag.tagName.text === tagName);
}

/**
 * Trimmed text of the first `@tagName` on `node`, or undefined if absent.
 *
 * Read from the comment source rather than the parsed tag comment, which
 * ends at any ` @` inside a pattern. The text runs to the next line that
 * starts a tag, or to the end of the comment.
 */
function tagText(node: ts.Node, tagName: string): string | undefined {
  const tag = ts.getJSDocTags(node).find((t) => t.tagName.text === tagName);
  if (!tag) return undefined;

  // `tag.parent.end` is just past the closing `*/`
  const end = ts.isJSDoc(tag.parent) ? tag.parent.end - 2 : tag.end;
  const raw = node.getSourceFile().text.slice(tag.tagName.end, end);
  const [first, ...rest] = raw.split(/\r?\n/);
  const lines = [first];
  for (const line of rest) {
    const content = line.replace(/^\s*\*?/, "");
    if (/^\s*@[A-Za-z]/.test(content)) break;
    lines.push(content);
  }
  return lines.join("\n").trim();
}
