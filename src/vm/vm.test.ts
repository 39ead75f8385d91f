/**
 * VM tests.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect } from "vitest";
import { VM, InterpretResult, type VMConfig } from "./vm.js";

interface Run {
  vm: VM;
  result: InterpretResult;
  out: string[];
  err: string[];
}

function run(source: string, config: VMConfig = {}): Run {
  const out: string[] = [];
  const err: string[] = [];
  const vm = new VM({ stdout: (t) => out.push(t), stderr: (t) => err.push(t), ...config });
  const result = vm.interpret(source);
  return { vm, result, out, err };
}

function output(source: string, config: VMConfig = {}): string[] {
  const { result, out, err } = run(source, config);
  expect(err).toEqual([]);
  expect(result).toBe(InterpretResult.Ok);
  return out;
}

function runtimeError(source: string): string {
  const { vm, result } = run(source);
  expect(result).toBe(InterpretResult.RuntimeError);
  return vm.lastError?.message ?? "";
}

const COUNTER = `
fn make_counter() {
  let count = 0;
  fn counter() {
    count = count + 1;
    return count;
  }
  return counter;
}
let c = make_counter();
print(c());
print(c());
`;

describe("VM", () => {
  describe("scoping", () => {
    it("should restore shadowed variables when a block ends", () => {
      expect(output("let x = 1; { let x = 2; print(x); } print(x);")).toEqual(["2", "1"]);
    });

    it("should keep closure state between calls", () => {
      expect(output(COUNTER)).toEqual(["1", "2"]);
    });

    it("should keep state in an anonymous closure", () => {
      const source = `
        fn make_counter() { let count = 0; return fn() { count = count + 1; return count; }; }
        let c = make_counter();
        print(c());
        print(c());
      `;
      expect(output(source)).toEqual(["1", "2"]);
    });

    it("should accept a return value closed by a brace without a semicolon", () => {
      const source =
        "fn make_counter() { let count = 0; return fn() { count = count + 1; return count; } } " +
        "let c = make_counter(); print(c()); print(c());";
      expect(output(source)).toEqual(["1", "2"]);
    });

    it("should let two closures share a captured variable", () => {
      const source = `
        var get; var set;
        fn make() {
          let v = 0;
          fn g() { return v; }
          fn s(x) { v = x; }
          get = g;
          set = s;
        }
        make();
        set(5);
        print(get());
      `;
      expect(output(source)).toEqual(["5"]);
    });

    it("should write through an open upvalue to the stack slot", () => {
      expect(output("fn f() { let v = 1; fn s() { v = 2; } s(); print v; } f();")).toEqual(["2"]);
    });

    it("should close captured loop locals on break", () => {
      const source = "var f; while (true) { let x = 42; fn g() { return x; } f = g; break; } print f();";
      expect(output(source)).toEqual(["42"]);
    });
  });

  describe("control flow", () => {
    it("should compute fib(10) recursively", () => {
      const source = "fn fib(n) { if (n < 2) return n; return fib(n - 1) + fib(n - 2); } print fib(10);";
      expect(output(source)).toEqual(["55"]);
    });

    it("should support break and continue in for loops", () => {
      const source = `
        var s = 0;
        for (var i = 0; i < 10; i = i + 1) {
          if (i == 5) break;
          if (i % 2 == 0) continue;
          s = s + i;
        }
        print s;
      `;
      expect(output(source)).toEqual(["4"]);
    });

    it("should break out of while loops", () => {
      expect(output("var n = 0; while (true) { n = n + 1; if (n >= 3) break; } print n;")).toEqual(["3"]);
    });

    it("should short-circuit logical operators", () => {
      expect(output('print nil || "x"; print 0 && 1; print 1 && 2;')).toEqual(["x", "0", "2"]);
    });

    it("should compare strings at run time", () => {
      expect(output('let a = "a"; print a < "b"; print a == "a";')).toEqual(["true", "true"]);
    });

    it("should give the same output without the optimizer", () => {
      expect(output(COUNTER, { optimize: false, foldConstants: false })).toEqual(["1", "2"]);
    });

    it("should call builtins", () => {
      expect(output('print(len("abc"), toString(12), range(3));')).toEqual(["3 12 [0, 1, 2]"]);
    });
  });

  describe("runtime errors", () => {
    it("should fail on division by zero without output", () => {
      const { result, out, err } = run("print(1/0);");
      expect(result).toBe(InterpretResult.RuntimeError);
      expect(out).toEqual([]);
      expect(err).toEqual(["[RUNTIME ERROR] division by zero\n  at <script> (line 1)"]);
    });

    it("should trace every active frame, innermost first", () => {
      const source = ["fn inner() {", "  return 1 / 0;", "}", "fn outer() {", "  return inner();", "}", "outer();"].join(
        "\n"
      );
      const { err } = run(source);
      expect(err).toEqual([
        "[RUNTIME ERROR] division by zero\n  at inner (line 2)\n  at outer (line 5)\n  at <script> (line 7)",
      ]);
    });

    it("should report stack overflow at the frame limit", () => {
      const { vm, result } = run("fn f() { return f(); } f();");
      expect(result).toBe(InterpretResult.RuntimeError);
      expect(vm.lastError?.message).toBe("stack overflow");
      expect(vm.lastError?.trace).toHaveLength(64);
      expect(vm.lastError?.trace[0]).toEqual({ name: "f", line: 1 });
      expect(vm.lastError?.trace[63]).toEqual({ name: "<script>", line: 1 });
    });

    it("should honor a custom frame limit", () => {
      const { vm } = run("fn f(n) { if (n == 0) return 0; return f(n - 1); } print f(5);", { maxFrames: 4 });
      expect(vm.lastError?.message).toBe("stack overflow");
    });

    it("should report type mismatches", () => {
      expect(runtimeError('print "a" - 1;')).toBe("cannot subtract string and number");
      expect(runtimeError('print 1 + "a";')).toBe("cannot add number and string");
      expect(runtimeError("print -nil;")).toBe("cannot negate nil");
      expect(runtimeError('print 1 < "a";')).toBe("cannot compare number and string");
      expect(runtimeError("let m = 1; print m % 0;")).toBe("modulo by zero");
    });

    it("should report undefined globals", () => {
      expect(runtimeError("print y;")).toBe("undefined variable 'y'");
      expect(runtimeError("y = 1;")).toBe("undefined variable 'y'");
    });

    it("should check call arity and callability", () => {
      expect(runtimeError("fn f(a) {} f();")).toBe("expected 1 arguments but got 0");
      expect(runtimeError("let x = 1; x();")).toBe("cannot call number");
      expect(runtimeError("clock(1);")).toBe("clock() expected 0 arguments but got 1");
    });

    it("should run the next program normally after an error", () => {
      const out: string[] = [];
      const vm = new VM({ stdout: (t) => out.push(t), stderr: () => undefined });
      expect(vm.interpret("let a = 5;")).toBe(InterpretResult.Ok);
      expect(vm.interpret("print(1/0);")).toBe(InterpretResult.RuntimeError);
      expect(vm.interpret("print(a + 1);")).toBe(InterpretResult.Ok);
      expect(out).toEqual(["6"]);
      expect(vm.lastError).toBeNull();
    });

    it("should close captured variables of a failed run", () => {
      const out: string[] = [];
      const vm = new VM({ stdout: (t) => out.push(t), stderr: () => undefined });
      const failing = "var g = nil; fn f() { let x = 42; g = fn() { return x; }; return 1/0; } f();";
      expect(vm.interpret(failing)).toBe(InterpretResult.RuntimeError);
      expect(vm.interpret("let pad = 0; print(g());")).toBe(InterpretResult.Ok);
      expect(out).toEqual(["42"]);
    });

    it("should report compile errors without running", () => {
      const { result, out, err } = run("print 1;\nlet = 2;");
      expect(result).toBe(InterpretResult.CompileError);
      expect(out).toEqual([]);
      expect(err).toEqual(["[SYNTAX ERROR] at line 2, column 5: expected identifier after 'let', got '='\nlet = 2;\n    ^"]);
    });
  });

  describe("introspection", () => {
    it("should count executed instructions", () => {
      const { vm } = run("print 1;");
      expect(vm.instructionCount).toBe(4);
    });

    it("should expose globals and an empty stack after a run", () => {
      const { vm } = run("let a = 1;");
      const globals = vm.globalsSnapshot();
      expect(globals.get("a")?.inspect()).toBe("1");
      expect(globals.get("print")?.inspect()).toBe("<native fn print>");
      expect(vm.stackSnapshot()).toEqual([]);
    });

    it("should free unreachable functions and closures", () => {
      const { vm } = run("fn f() {} f = nil;");
      expect(vm.memoryUsage).toBeGreaterThan(0);
      expect(vm.collectGarbage()).toBe(4);
      expect(vm.memoryUsage).toBe(0);
    });

    it("should keep functions reachable from globals", () => {
      const { vm, out } = run("fn g() { print 7; }");
      expect(vm.collectGarbage()).toBe(2);
      expect(vm.interpret("g();")).toBe(InterpretResult.Ok);
      expect(out).toEqual(["7"]);
    });

    it("should run correctly when collecting on every allocation", () => {
      expect(output(COUNTER, { gc: { stressMode: true } })).toEqual(["1", "2"]);
    });
  });

  describe("files", () => {
    it("should run a source file", () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "tinylang-vm-"));
      const file = path.join(dir, "main.tl");
      fs.writeFileSync(file, "print 7;\n");
      try {
        const out: string[] = [];
        const vm = new VM({ stdout: (t) => out.push(t) });
        expect(vm.interpretFile(file)).toBe(InterpretResult.Ok);
        expect(out).toEqual(["7"]);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });

    it("should report a missing file", () => {
      const err: string[] = [];
      const vm = new VM({ stderr: (t) => err.push(t) });
      const missing = path.join(os.tmpdir(), "tinylang-missing", "none.tl");
      expect(vm.interpretFile(missing)).toBe(InterpretResult.IoError);
      expect(err).toEqual([`file not found: ${missing}`]);
    });
  });
});
