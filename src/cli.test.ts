/**
 * CLI tests.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { USAGE, UsageError, main, parseArgs } from "./cli.js";
import { VERSION } from "./version.js";

describe("parseArgs", () => {
  it("should start the REPL without arguments", () => {
    expect(parseArgs([])).toEqual({ kind: "repl" });
  });

  it("should parse run and eval", () => {
    expect(parseArgs(["prog.tl"])).toEqual({ kind: "run", file: "prog.tl" });
    expect(parseArgs(["prog.tbc"])).toEqual({ kind: "run", file: "prog.tbc" });
    expect(parseArgs(["-e", "print 1;"])).toEqual({ kind: "eval", code: "print 1;" });
  });

  it("should parse compile options", () => {
    expect(parseArgs(["compile", "-o", "out.tbc", "-v", "-d", "-O0", "prog.tl"])).toEqual({
      kind: "compile",
      input: "prog.tl",
      options: { output: "out.tbc", verbose: true, disassemble: true, optimize: false },
    });
    expect(parseArgs(["compile", "prog.tl"])).toEqual({ kind: "compile", input: "prog.tl", options: {} });
  });

  it("should parse disasm", () => {
    expect(parseArgs(["disasm", "prog.tbc"])).toEqual({ kind: "disasm", file: "prog.tbc", optimize: true });
    expect(parseArgs(["disasm", "-O0", "prog.tl"])).toEqual({ kind: "disasm", file: "prog.tl", optimize: false });
  });

  it("should reject bad command lines", () => {
    expect(() => parseArgs(["-x"])).toThrow(new UsageError("unknown option: -x"));
    expect(() => parseArgs(["-e"])).toThrow("-e requires an argument");
    expect(() => parseArgs(["a.tl", "b.tl"])).toThrow("unexpected argument: b.tl");
    expect(() => parseArgs(["compile"])).toThrow("no input file");
    expect(() => parseArgs(["compile", "-o"])).toThrow("-o requires an output filename");
    expect(() => parseArgs(["compile", "a.tl", "b.tl"])).toThrow("multiple input files are not supported");
    expect(() => parseArgs(["disasm", "--flow", "a.tbc"])).toThrow("unknown option: --flow");
  });
});

describe("main", () => {
  let dir: string;
  let out: string[];
  let err: string[];
  const sinks = () => ({ stdout: (t: string) => out.push(t), stderr: (t: string) => err.push(t) });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tinylang-cli-"));
    out = [];
    err = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should print help and version", async () => {
    expect(await main(["--help"], sinks())).toBe(0);
    expect(await main(["--version"], sinks())).toBe(0);
    expect(out).toEqual([USAGE, `tinylang ${VERSION}`]);
  });

  it("should exit 64 on usage errors", async () => {
    expect(await main(["-x"], sinks())).toBe(64);
    expect(err).toEqual(["error: unknown option: -x", USAGE]);
  });

  it("should evaluate code", async () => {
    expect(await main(["-e", "print 6 * 7;"], sinks())).toBe(0);
    expect(out).toEqual(["42"]);
  });

  it("should exit 65 on compile errors and 70 on runtime errors", async () => {
    expect(await main(["-e", "let = 1;"], sinks())).toBe(65);
    expect(await main(["-e", "print(1/0);"], sinks())).toBe(70);
    expect(out).toEqual([]);
  });

  it("should exit 74 when the file is missing", async () => {
    const file = path.join(dir, "missing.tl");
    expect(await main([file], sinks())).toBe(74);
    expect(err).toEqual([`file not found: ${file}`]);
  });

  it("should compile a file and run the bytecode", async () => {
    const input = path.join(dir, "hello.tl");
    const output = path.join(dir, "hello.tbc");
    fs.writeFileSync(input, 'print "hello";\n');

    expect(await main(["compile", "-o", output, input], sinks())).toBe(0);
    expect(await main([output], sinks())).toBe(0);
    expect(out).toEqual(["hello"]);
  });

  it("should exit 65 on a corrupt bytecode file", async () => {
    const file = path.join(dir, "bad.tbc");
    fs.writeFileSync(file, Buffer.from("TBC"));
    expect(await main(["disasm", file], sinks())).toBe(65);
    expect(err).toHaveLength(1);
    expect(err[0].startsWith(`invalid bytecode file ${file}: `)).toBe(true);
  });
});
