/**
 * Pattern translation and compilation.
 *
 * Patterns are written in JavaScript `RegExp` syntax with two additions
 * commonly found in log-parsing patterns elsewhere:
 *
 * - `(?P<name>...)` is accepted as a synonym for `(?<name>...)`
 * - a single leading inline flag group such as `(?x)` or `(?is)` sets flags;
 *   `x` (extended mode) drops unescaped whitespace and `#` comments outside
 *   character classes
 *
 * ```ts
 * compilePattern(String.raw`(?x)
 *   (?P<level>[A-Z]+)  # severity
 *   \s+
 *   (?P<message>.*)
 * `);
 * ```
 */

import { CompileError } from "./errors.js";
import type { CompiledPattern, CompileResult, Pattern } from "./types.js";

const INLINE_FLAG_GROUP = /^\(\?([imsxu]+)\)/;

/** Flags forwarded to `RegExp`, in its canonical order. */
const REGEXP_FLAGS = ["i", "m", "s", "u"] as const;

export interface TranslatedPattern {
  readonly expression: string;
  readonly flags: string;
  readonly groupNames: readonly string[];
}

/**
 * Rewrite pattern text into a JavaScript expression and flags, collecting
 * named groups in declaration order. Syntax errors are left for `RegExp`
 * to report.
 */
export function translatePattern(text: Pattern): TranslatedPattern {
  let body = text;
  let inlineFlags = "";
  const inline = INLINE_FLAG_GROUP.exec(text);
  if (inline) {
    inlineFlags = inline[1];
    body = text.slice(inline[0].length);
  }

  const extended = inlineFlags.includes("x");
  const flags = REGEXP_FLAGS.filter((f) => inlineFlags.includes(f)).join("");

  let expression = "";
  const groupNames: string[] = [];
  let inClass = false;

  for (let i = 0; i < body.length; i++) {
    const ch = body[i];

    if (ch === "\\") {
      if (i + 1 >= body.length) {
        expression += ch;
        continue;
      }
      const next = body[i + 1];
      // In extended mode an escaped space or `#` stands for itself.
      if (extended && !inClass && (next === "#" || /\s/.test(next))) {
        expression += next;
      } else {
        expression += ch + next;
      }
      i++;
      continue;
    }

    if (inClass) {
      if (ch === "]") inClass = false;
      expression += ch;
      continue;
    }

    if (ch === "[") {
      inClass = true;
      expression += ch;
      continue;
    }

    if (extended) {
      if (/\s/.test(ch)) continue;
      if (ch === "#") {
        while (i < body.length && body[i] !== "\n") i++;
        continue;
      }
    }

    const nameStart = namedGroupStart(body, i);
    if (nameStart !== -1) {
      const nameEnd = body.indexOf(">", nameStart);
      if (nameEnd === -1) {
        expression += body.slice(i);
        break;
      }
      const name = body.slice(nameStart, nameEnd);
      groupNames.push(name);
      expression += `(?<${name}>`;
      i = nameEnd;
      continue;
    }

    expression += ch;
  }

  return { expression, flags, groupNames };
}

/**
 * Index of the first name character when a named group opens at `i`,
 * otherwise -1. Lookbehinds `(?<=` and `(?<!` are not groups.
 */
function namedGroupStart(body: string, i: number): number {
  if (body[i] !== "(" || body[i + 1] !== "?") return -1;
  if (body.startsWith("P<", i + 2)) return i + 4;
  const lookbehind = body[i + 3] === "=" || body[i + 3] === "!";
  if (body[i + 2] === "<" && !lookbehind) return i + 3;
  return -1;
}

/**
 * Translate and compile a pattern. Compilation is deterministic: a pattern
 * that fails once fails every time.
 */
export function compilePattern(text: Pattern): CompileResult {
  const translated = translatePattern(text);

  let regex: RegExp;
  try {
    regex = new RegExp(translated.expression, translated.flags);
  } catch (e) {
    if (e instanceof SyntaxError) {
      return { ok: false, error: new CompileError(text, e.message, e) };
    }
    throw e;
  }

  const compiled: CompiledPattern = Object.freeze({
    source: text,
    expression: translated.expression,
    flags: translated.flags,
    regex,
    groupNames: Object.freeze([...translated.groupNames]),
  });
  return { ok: true, value: compiled };
}
