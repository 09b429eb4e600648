import { config } from "@lineshape/core";
import { NoMatchError } from "./errors.js";
import type { CaptureSet, CompiledPattern, ExtractResult } from "./types.js";

export interface ExtractOptions {
  /** Maximum input characters quoted in a `NoMatchError`. */
  excerptLength?: number;
}

/**
 * Run a compiled pattern against `input` with search semantics: the match
 * may start anywhere unless the pattern anchors itself.
 *
 * Every named group of the pattern gets an entry, in declaration order;
 * groups that did not take part in the match map to `undefined`.
 */
export function extract(
  compiled: CompiledPattern,
  input: string,
  options: ExtractOptions = {}
): ExtractResult {
  const match = compiled.regex.exec(input);
  if (!match) {
    const length = options.excerptLength ?? config.get("excerptLength");
    return {
      ok: false,
      error: new NoMatchError(compiled.source, excerpt(input, length)),
    };
  }

  const groups = match.groups ?? {};
  const captures = new Map<string, string | undefined>();
  for (const name of compiled.groupNames) {
    captures.set(name, groups[name]);
  }
  const captureSet: CaptureSet = captures;
  return { ok: true, value: captureSet };
}

/** True when `input` contains a match for the pattern. */
export function isMatch(compiled: CompiledPattern, input: string): boolean {
  return compiled.regex.test(input);
}

/**
 * Shorten `input` to at most `maxLength` UTF-16 code units, marking the cut.
 * A surrogate pair is never split.
 */
export function excerpt(input: string, maxLength: number): string {
  if (input.length <= maxLength) return input;
  let end = maxLength;
  const last = input.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end--;
  return `${input.slice(0, end)}…`;
}
