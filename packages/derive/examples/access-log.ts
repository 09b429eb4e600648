/**
 * Interfaces for `npm run derive -- packages/derive/examples/access-log.ts`,
 * which writes `access-log.shapes.ts` next to this file.
 */

/**
 * A `key=value` pair such as `user=alice`.
 *
 * @pattern (?P<key>\w+)=(?P<value>\S+)
 */
export interface Pair {
  key: string;
  value: string;
}

/**
 * One access-log line, e.g. `GET /index.html 200 0.012 user=alice tags=a;b`
 *
 * @pattern (?x)
 *   (?P<method>[A-Z]+) \s+ (?P<path>\S+) \s+ (?P<status>\d\d\d) \s+
 *   (?P<seconds>\S+)
 *   (?:\s+ (?P<who>\w+=\S+))?
 *   (?:\s+ tags=(?P<tags>\S*))?
 */
export interface AccessLine {
  method: string;
  path: string;
  /** @integer */
  status: number;
  seconds: number;
  who?: Pair;
  /** @delimiter ; */
  tags?: string[];
}
