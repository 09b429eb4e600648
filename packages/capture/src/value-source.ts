/**
 * Value sources feed the field decoder with raw strings.
 *
 * The decoder only sees this interface, so the same field list decodes from
 * regex captures or from any other string map without knowing where the
 * strings came from. Type interpretation happens later, in coercion.
 */

import type { CaptureSet } from "./types.js";

export interface ValueSource {
  /** Available value names, in source order. */
  fieldNames(): readonly string[];
  /**
   * Raw text for `name`. `undefined` means absent; an empty string is a
   * present value that matched zero characters.
   */
  getScalar(name: string): string | undefined;
}

/**
 * Exposes the captures of one match.
 */
export class CaptureValueSource implements ValueSource {
  constructor(private readonly captures: CaptureSet) {}

  fieldNames(): readonly string[] {
    return [...this.captures.keys()];
  }

  getScalar(name: string): string | undefined {
    return this.captures.get(name);
  }
}

/**
 * Exposes a plain string record, e.g. key/value pairs parsed elsewhere.
 * Only own properties are visible.
 */
export class RecordValueSource implements ValueSource {
  private readonly values: ReadonlyMap<string, string | undefined>;

  constructor(values: Readonly<Record<string, string | undefined>>) {
    this.values = new Map(Object.entries(values));
  }

  fieldNames(): readonly string[] {
    return [...this.values.keys()];
  }

  getScalar(name: string): string | undefined {
    return this.values.get(name);
  }
}

/** Copy a source into a plain object, for diagnostics. */
export function snapshot(
  source: ValueSource
): Record<string, string | undefined> {
  return Object.fromEntries(
    source.fieldNames().map((name) => [name, source.getScalar(name)])
  );
}
