import { describe, expect, it } from "vitest";
import {
  compilePattern,
  excerpt,
  extract,
  isMatch,
  NoMatchError,
  type CompiledPattern,
} from "../src/index.js";

function compiled(text: string): CompiledPattern {
  const result = compilePattern(text);
  if (!result.ok) throw result.error;
  return result.value;
}

describe("extract", () => {
  it("should list captures in declaration order", () => {
    const result = extract(compiled(String.raw`(?P<b>\w+)=(?P<a>\d+)`), "x=1");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect([...result.value.entries()]).toEqual([
      ["b", "x"],
      ["a", "1"],
    ]);
  });

  it("should keep groups that did not participate as undefined entries", () => {
    const pattern = String.raw`^(?P<foo>\d+)\s+(?:(?P<bar>\d+)|-)$`;
    const result = extract(compiled(pattern), "1 -");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.has("bar")).toBe(true);
    expect(result.value.get("bar")).toBeUndefined();
    expect(result.value.get("foo")).toBe("1");
  });

  it("should tell an empty capture apart from an absent one", () => {
    const result = extract(compiled(String.raw`(?P<a>\d*):(?P<b>x)?`), ":");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.get("a")).toBe("");
    expect(result.value.get("b")).toBeUndefined();
  });

  it("should search anywhere in the input", () => {
    const result = extract(compiled(String.raw`(?P<n>\d+)`), "abc 42 def");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.get("n")).toBe("42");
  });

  it("should report a NoMatchError with a truncated excerpt", () => {
    const text = String.raw`^(?P<n>\d+)$`;
    const result = extract(compiled(text), "abcdefgh", { excerptLength: 5 });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NoMatchError);
    expect(result.error.kind).toBe("no_match");
    expect(result.error.excerpt).toBe("abcde…");
    expect(result.error.message).toBe(
      `No match for pattern ${JSON.stringify(text)} in input "abcde…"`
    );
  });
});

describe("isMatch", () => {
  it("should answer without extracting", () => {
    const p = compiled(String.raw`^(?P<n>\d+)$`);
    expect(isMatch(p, "42")).toBe(true);
    expect(isMatch(p, "x42")).toBe(false);
  });
});

describe("excerpt", () => {
  it("should keep short input whole", () => {
    expect(excerpt("short", 10)).toBe("short");
  });

  it("should cut long input and mark the cut", () => {
    expect(excerpt("abcdef", 3)).toBe("abc…");
  });

  it("should not split a surrogate pair at the cut", () => {
    expect(excerpt("a\u{1F600}b", 2)).toBe("a…");
    expect(excerpt("a\u{1F600}b", 3)).toBe("a\u{1F600}…");
  });
});
