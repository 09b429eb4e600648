import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { config } from "@lineshape/core";
import {
  defaultOutPath,
  describeShapes,
  emitShapeModule,
  importSpecifier,
  parseArgs,
  run,
  type CliIO,
} from "../src/index.js";

const SOURCE = String.raw`/** @pattern (?P<foo>\w+):(?P<bar>\d+) */
export interface Inner {
  foo: string;
  /** @integer */
  bar: number;
}
`;

function capture(): CliIO & { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    log: (message: string) => logs.push(message),
    error: (message: string) => errors.push(message),
  };
}

describe("parseArgs", () => {
  it("should read the file and flags", () => {
    expect(parseArgs(["records.ts", "--out", "gen.ts", "-v"])).toEqual({
      file: "records.ts",
      out: "gen.ts",
      verbose: true,
      help: false,
    });
  });

  it("should read --runtime and --help", () => {
    expect(parseArgs(["--runtime", "my-runtime", "-h"])).toEqual({
      runtime: "my-runtime",
      verbose: false,
      help: true,
    });
  });
});

describe("defaultOutPath", () => {
  it("should write next to the source", () => {
    expect(defaultOutPath("src/records.ts")).toBe("src/records.shapes.ts");
  });
});

describe("importSpecifier", () => {
  it("should import a sibling with a .js extension", () => {
    expect(importSpecifier("/a/b/records.shapes.ts", "/a/b/records.ts")).toBe(
      "./records.js"
    );
  });

  it("should climb directories and keep module flavours", () => {
    expect(importSpecifier("/a/gen/out.ts", "/a/src/records.mts")).toBe(
      "../src/records.mjs"
    );
  });
});

describe("run", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "lineshape-derive-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    config.reset();
  });

  it("should write the generated module beside the source", () => {
    const file = path.join(dir, "records.ts");
    fs.writeFileSync(file, SOURCE);
    const io = capture();

    expect(run([file], io)).toBe(0);

    const out = path.join(dir, "records.shapes.ts");
    const expected = emitShapeModule(describeShapes(SOURCE, file).shapes, {
      sourceImport: "./records.js",
    });
    expect(fs.readFileSync(out, "utf8")).toBe(expected.text);
    expect(io.logs).toEqual([`${out}: Inner`]);
    expect(io.errors).toEqual([]);
  });

  it("should honour --out", () => {
    const file = path.join(dir, "records.ts");
    const out = path.join(dir, "gen", "shapes.ts");
    fs.mkdirSync(path.dirname(out));
    fs.writeFileSync(file, SOURCE);

    expect(run([file, "--out", out], capture())).toBe(0);
    expect(fs.readFileSync(out, "utf8")).toContain(
      'import type { Inner } from "../records.js";'
    );
  });

  it("should fail with diagnostics and write nothing", () => {
    const file = path.join(dir, "event.ts");
    fs.writeFileSync(
      file,
      "/** @pattern (?P<when>\\S+) */\ninterface Event {\n  when: Date;\n}\n"
    );
    const io = capture();

    expect(run([file], io)).toBe(1);
    expect(io.errors).toEqual([
      `${file}:3: Event.when: type \`Date\` is not a scalar ` +
        "or an interface with @pattern in this file",
    ]);
    expect(fs.existsSync(path.join(dir, "event.shapes.ts"))).toBe(false);
  });

  it("should fail when no interface is annotated", () => {
    const file = path.join(dir, "plain.ts");
    fs.writeFileSync(file, "export interface Plain { a: string }\n");
    const io = capture();

    expect(run([file], io)).toBe(1);
    expect(io.errors).toEqual([
      `${file}: no interfaces annotated with @pattern`,
    ]);
  });

  it("should print usage without a file", () => {
    const io = capture();

    expect(run([], io)).toBe(1);
    expect(io.errors).toEqual([
      "Usage: lineshape-derive <file.ts> " +
        "[--out <file>] [--runtime <module>] [--verbose]",
    ]);
  });

  it("should report a file it cannot read", () => {
    const io = capture();

    const missing = path.join(dir, "missing.ts");

    expect(run([missing], io)).toBe(1);
    expect(io.errors).toHaveLength(1);
    expect(io.errors[0].startsWith(`Cannot read ${missing}: `)).toBe(true);
  });
});
