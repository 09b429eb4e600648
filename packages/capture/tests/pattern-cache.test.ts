import { afterEach, describe, expect, it, vi } from "vitest";
import { config } from "@lineshape/core";
import { PatternCache, getDefaultPatternCache } from "../src/index.js";

const PATTERN = String.raw`(?P<id>\d+)`;

describe("PatternCache", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    config.reset();
  });

  it("should compile each pattern once", () => {
    const cache = new PatternCache();
    const first = cache.compileOrGet(PATTERN);
    const second = cache.compileOrGet(PATTERN);

    expect(first.ok && second.ok).toBe(true);
    if (!first.ok || !second.ok) return;
    expect(second.value).toBe(first.value);
    expect(cache.stats).toEqual({ hits: 1, misses: 1, failures: 0 });
    expect(cache.size).toBe(1);
  });

  it("should key entries on the exact text, flags included", () => {
    const cache = new PatternCache();
    const plain = cache.compileOrGet("(?<a>x)");
    const folded = cache.compileOrGet("(?i)(?<a>x)");

    expect(cache.size).toBe(2);
    if (!plain.ok || !folded.ok) {
      throw new Error("expected both patterns to compile");
    }
    expect(folded.value).not.toBe(plain.value);
  });

  it("should not store failures", () => {
    const cache = new PatternCache();
    const first = cache.compileOrGet("(?<a>");
    const second = cache.compileOrGet("(?<a>");

    expect(first.ok).toBe(false);
    expect(second.ok).toBe(false);
    expect(cache.has("(?<a>")).toBe(false);
    expect(cache.stats).toEqual({ hits: 0, misses: 2, failures: 2 });
  });

  it("should keep separate caches independent", () => {
    const a = new PatternCache();
    const b = new PatternCache();
    a.compileOrGet(PATTERN);

    expect(a.has(PATTERN)).toBe(true);
    expect(b.has(PATTERN)).toBe(false);
  });

  it("should hand concurrent callers the same compiled pattern", async () => {
    const cache = new PatternCache();
    const results = await Promise.all(
      Array.from({ length: 10 }, () =>
        Promise.resolve().then(() => cache.compileOrGet(PATTERN))
      )
    );

    const values = results.map((r) => (r.ok ? r.value : undefined));
    expect(new Set(values).size).toBe(1);
    expect(values[0]).toBeDefined();
    expect(cache.stats.misses).toBe(1);
  });

  it("should log compilations when debug is on", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    config.set({ debug: true });

    new PatternCache().compileOrGet("(?<a>x)");

    expect(log).toHaveBeenCalledWith(
      '[lineshape] Compiled pattern "(?<a>x)" (1 named groups)'
    );
  });
});

describe("getDefaultPatternCache", () => {
  it("should return the same cache every time", () => {
    expect(getDefaultPatternCache()).toBe(getDefaultPatternCache());
  });
});
