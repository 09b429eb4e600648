/**
 * Pattern Cache
 *
 * Maps pattern text to its compiled form so that each distinct pattern is
 * compiled at most once, however many inputs are decoded with it.
 *
 * Entries are frozen on insertion and never replaced or evicted: the set of
 * patterns in a program is fixed by the shapes it registers, not by input
 * volume. Lookups and inserts run to completion on the isolate's single
 * thread, so a text can never end up with two different compiled forms;
 * each worker thread holds its own default cache.
 *
 * @example
 * ```typescript
 * const cache = new PatternCache();
 * const result = cache.compileOrGet(String.raw`(?P<id>\d+)`);
 * if (result.ok) result.value.groupNames; // ["id"]
 * ```
 */

import { debugLog } from "@lineshape/core";
import { compilePattern } from "./pattern.js";
import type { CompiledPattern, CompileResult, Pattern } from "./types.js";

export class PatternCache {
  private readonly entries = new Map<Pattern, CompiledPattern>();

  /** Statistics for cache monitoring */
  public readonly stats = {
    hits: 0,
    misses: 0,
    failures: 0,
  };

  /**
   * Return the compiled form of `pattern`, compiling and storing it on first
   * request. A pattern that fails to compile is not stored.
   */
  compileOrGet(pattern: Pattern): CompileResult {
    const cached = this.entries.get(pattern);
    if (cached) {
      this.stats.hits++;
      return { ok: true, value: cached };
    }

    this.stats.misses++;
    const result = compilePattern(pattern);
    if (!result.ok) {
      this.stats.failures++;
      debugLog(
        () => `Pattern failed to compile: ${result.error.syntaxMessage}`
      );
      return result;
    }

    this.entries.set(pattern, result.value);
    debugLog(
      () =>
        `Compiled pattern ${JSON.stringify(pattern)} ` +
        `(${result.value.groupNames.length} named groups)`
    );
    return result;
  }

  has(pattern: Pattern): boolean {
    return this.entries.has(pattern);
  }

  get size(): number {
    return this.entries.size;
  }
}

let defaultCache: PatternCache | undefined;

/**
 * The process-wide cache used whenever no explicit cache is supplied.
 * Created on first use and kept for the life of the process.
 */
export function getDefaultPatternCache(): PatternCache {
  if (!defaultCache) {
    defaultCache = new PatternCache();
  }
  return defaultCache;
}
