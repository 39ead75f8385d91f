/**
 * REPL tests.
 */

import { PassThrough, Readable } from "stream";
import { describe, it, expect } from "vitest";
import { CONTINUE_PROMPT, PROMPT, ReplSession, handleCommand, isComplete, startRepl } from "./repl.js";
import { VM } from "./vm/vm.js";
import { VERSION } from "./version.js";

function setup() {
  const out: string[] = [];
  const err: string[] = [];
  const vm = new VM({ stdout: (t) => out.push(t), stderr: (t) => err.push(t) });
  const session = new ReplSession(vm, (t) => out.push(t));
  return { out, err, vm, session };
}

describe("isComplete", () => {
  it("should accept balanced input", () => {
    expect(isComplete("print 1;")).toBe(true);
    expect(isComplete("fn f() { return 1; }")).toBe(true);
    expect(isComplete("")).toBe(true);
  });

  it("should wait for closing braces and parentheses", () => {
    expect(isComplete("fn f() {")).toBe(false);
    expect(isComplete("print(1,")).toBe(false);
    expect(isComplete("while (true) {\n  if (x) {\n  }")).toBe(false);
  });

  it("should ignore brackets in strings and comments", () => {
    expect(isComplete('print "{";')).toBe(true);
    expect(isComplete("print 'a\\'{';")).toBe(true);
    expect(isComplete("print 1; // {")).toBe(true);
    expect(isComplete("/* { */ print 1;")).toBe(true);
  });

  it("should wait for a block comment to close", () => {
    expect(isComplete("/* still")).toBe(false);
  });

  it("should treat an unterminated string as complete", () => {
    expect(isComplete('print "{')).toBe(true);
  });
});

describe("handleCommand", () => {
  it("should list user globals by name", () => {
    const { vm, out } = setup();
    vm.interpret('var b = "x"; let a = 1;');
    expect(handleCommand(vm, "/globals", (t) => out.push(t))).toBe("continue");
    expect(out).toEqual(["a = 1\nb = x"]);
  });

  it("should report when there are no globals", () => {
    const { vm, out } = setup();
    handleCommand(vm, "/globals", (t) => out.push(t));
    expect(out).toEqual(["(no globals)"]);
  });

  it("should show an empty stack between inputs", () => {
    const { vm, out } = setup();
    vm.interpret("print 1;");
    handleCommand(vm, "/stack", (t) => out.push(t));
    expect(out).toEqual(["1", "(empty stack)"]);
  });

  it("should collect garbage", () => {
    const { vm, out } = setup();
    vm.interpret("fn f() {}");
    handleCommand(vm, "/gc", (t) => out.push(t));
    expect(out[0]).toMatch(/^gc: freed 2 objects, \d+ bytes in use$/);
  });

  it("should show statistics", () => {
    const { vm, out } = setup();
    vm.interpret("print 1;");
    handleCommand(vm, "/stats", (t) => out.push(t));
    expect(out[1].split("\n")[0]).toBe("instructions: 4");
    expect(out[1].split("\n")[2]).toBe("collections: 0, 0 objects freed");
  });

  it("should quit on /quit and :quit", () => {
    const { vm } = setup();
    expect(handleCommand(vm, "/quit", () => undefined)).toBe("quit");
    expect(handleCommand(vm, " :quit ", () => undefined)).toBe("quit");
  });

  it("should reject unknown commands", () => {
    const { vm, out } = setup();
    expect(handleCommand(vm, "/foo bar", (t) => out.push(t))).toBe("continue");
    expect(out).toEqual(["unknown command: /foo (type /help)"]);
  });
});

describe("ReplSession", () => {
  it("should keep globals across inputs", () => {
    const { session, out } = setup();
    expect(session.feed("let a = 2;")).toBe(true);
    expect(session.feed("print a * 3;")).toBe(true);
    expect(out).toEqual(["6"]);
  });

  it("should buffer multi-line input", () => {
    const { session, out } = setup();
    expect(session.prompt).toBe(PROMPT);
    session.feed("fn add(a, b) {");
    expect(session.prompt).toBe(CONTINUE_PROMPT);
    session.feed("  return a + b;");
    session.feed("}");
    expect(session.prompt).toBe(PROMPT);
    session.feed("print add(2, 3);");
    expect(out).toEqual(["5"]);
  });

  it("should keep going after errors", () => {
    const { session, out, err } = setup();
    session.feed("print 1 / 0;");
    session.feed("let = ;");
    session.feed("print 4;");
    expect(err).toHaveLength(2);
    expect(err[0]).toBe("[RUNTIME ERROR] division by zero\n  at <script> (line 1)");
    expect(out).toEqual(["4"]);
  });

  it("should end on the quit command", () => {
    const { session } = setup();
    expect(session.feed("")).toBe(true);
    expect(session.feed(":quit")).toBe(false);
  });

  it("should treat a line comment as code", () => {
    const { session, out } = setup();
    expect(session.feed("// nothing here")).toBe(true);
    expect(out).toEqual([]);
  });
});

describe("startRepl", () => {
  it("should read lines until quit", async () => {
    const out: string[] = [];
    const input = Readable.from([Buffer.from("let a = 2;\nprint a * 3;\n/quit\n")]);
    await startRepl({ input, output: new PassThrough(), stdout: (t) => out.push(t), stderr: (t) => out.push(t) });
    expect(out).toEqual([`TinyLang ${VERSION} - type /help for commands, /quit to exit`, "6", "Goodbye!"]);
  });

  it("should finish when the input ends", async () => {
    const out: string[] = [];
    const input = Readable.from([Buffer.from("print 1;\n")]);
    await startRepl({ input, output: new PassThrough(), stdout: (t) => out.push(t) });
    expect(out).toEqual([`TinyLang ${VERSION} - type /help for commands, /quit to exit`, "1", "Goodbye!"]);
  });
});
