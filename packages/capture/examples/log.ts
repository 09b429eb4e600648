/**
 * Decode a small log, skipping lines that don't look like entries.
 *
 * Run: npx tsx packages/capture/examples/log.ts
 */

import { optional, scalar, shape } from "../src/index.js";

const LogEntry = shape(
  "LogEntry",
  String.raw`(?x)
    (?P<foo>\d+)
    \s+
    (?P<bar>true|false)
    \s+
    (?P<baz>\S+)
    (?:\s+\#(?P<tag>\w+))?
  `
)
  .field("foo", scalar("integer"))
  .field("bar", scalar("boolean"))
  .field("baz", scalar("string"))
  .field("tag", optional(scalar("string")))
  .build();

const logs = `1 true hello
  -- rotated --
  2 false world #boot`;

const { records, errors } = LogEntry.parseLines(logs);

for (const entry of records) {
  console.log(entry.foo, entry.bar, entry.baz, entry.tag ?? "(untagged)");
}
for (const { line, error } of errors) {
  console.error(`line ${line}: ${error.message}`);
}
