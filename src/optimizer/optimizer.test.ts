import { describe, it, expect } from "vitest";
import { optimizeChunk, optimizeFunction, formatStats, reductionRatio } from "./optimizer.js";
import { Chunk } from "../bytecode/chunk.js";
import { Op, opName } from "../bytecode/opcode.js";
import { compile } from "../compiler/compiler.js";
import { Heap } from "../gc/heap.js";
import { TRUE, ValueType, newNumber, newString, type FunctionValue } from "../value/value.js";

function listing(chunk: Chunk): string[] {
  return chunk.instructions().map((ins) => (ins.size === 1 ? opName(ins.op) : `${opName(ins.op)} ${ins.operand}`));
}

function compiled(source: string, foldConstants = true): { heap: Heap; fn: FunctionValue; chunk: Chunk } {
  const heap = new Heap();
  const fn = compile(source, { heap, foldConstants });
  return { heap, fn, chunk: heap.getFunction(fn.handle).chunk };
}

describe("optimizer", () => {
  it("should pre-fold constant arithmetic left by the compiler", () => {
    const { chunk } = compiled("print(1+2);", false);
    const stats = optimizeChunk(chunk);

    expect(listing(chunk)).toEqual(["GET_GLOBAL 0", "CONSTANT 3", "CALL 1", "POP", "NIL", "RETURN"]);
    expect(chunk.constants[3].inspect()).toBe("3");
    expect(chunk.instructions().filter((ins) => ins.op === Op.Constant)).toHaveLength(1);
    expect(chunk.instructions().some((ins) => ins.op === Op.Add)).toBe(false);

    expect(stats).toEqual({
      passes: 2,
      instructionsBefore: 8,
      instructionsRemoved: 2,
      constantsFolded: 1,
      jumpsCollapsed: 0,
      loadsSpecialized: 0,
      bytesBefore: 12,
      bytesAfter: 9,
    });
    expect(reductionRatio(stats)).toBe(0.25);
    expect(formatStats(stats)).toBe(
      "optimizer: 2 passes, 2 instructions removed (25.0%), 1 folded, 0 jumps collapsed, 0 loads specialized, 12 -> 9 bytes"
    );
  });

  it("should be idempotent", () => {
    const { chunk } = compiled(
      "var s = 0; for (var i = 0; i < 10; i = i + 1) { if (i % 2 == 0) continue; s = s + i; } print s;"
    );
    optimizeChunk(chunk);
    const once = [...chunk.code];
    const stats = optimizeChunk(chunk);
    expect(chunk.code).toEqual(once);
    expect(stats.passes).toBe(1);
    expect(stats.instructionsRemoved).toBe(0);
    expect(chunk.verify()).toEqual([]);
  });

  it("should remove side-effect-free pushes that are popped", () => {
    const { chunk } = compiled("{ let a = 1; a; }");
    optimizeChunk(chunk);
    expect(listing(chunk)).toEqual(["NIL", "RETURN"]);
  });

  it("should merge consecutive pops", () => {
    const chunk = new Chunk();
    const x = chunk.addConstant(newString("x"));
    for (let i = 0; i < 3; i++) {
      chunk.emit1(Op.GetGlobal, x, 1);
    }
    chunk.emit(Op.Pop, 1);
    chunk.emit(Op.Pop, 1);
    chunk.emit(Op.Pop, 1);
    chunk.emit(Op.Nil, 1);
    chunk.emit(Op.Return, 1);

    optimizeChunk(chunk);
    expect(listing(chunk)).toEqual(["GET_GLOBAL 0", "GET_GLOBAL 0", "GET_GLOBAL 0", "POP_N 3", "NIL", "RETURN"]);
  });

  it("should not grow POP_N past 255", () => {
    const chunk = new Chunk();
    chunk.emit1(Op.PopN, 255, 1);
    chunk.emit(Op.Pop, 1);
    chunk.emit(Op.Return, 1);
    optimizeChunk(chunk);
    expect(listing(chunk)).toEqual(["POP_N 255", "POP", "RETURN"]);
  });

  it("should not rewrite across a jump target", () => {
    const chunk = new Chunk();
    chunk.emit(Op.True, 1);
    chunk.emit2(Op.JumpIfFalse, 1, 1);
    chunk.emit(Op.Nil, 1);
    chunk.emit(Op.Pop, 1);
    chunk.emit(Op.Return, 1);

    optimizeChunk(chunk);
    expect(listing(chunk)).toEqual(["TRUE", "JUMP_IF_FALSE 1", "NIL", "POP", "RETURN"]);
  });

  it("should collapse jumps to jumps", () => {
    const chunk = new Chunk();
    chunk.emit(Op.True, 1);
    chunk.emit2(Op.JumpIfFalse, 0, 1);
    chunk.emit2(Op.Jump, 1, 1);
    chunk.emit(Op.Nil, 1);
    chunk.emit(Op.Return, 1);

    const stats = optimizeChunk(chunk);
    expect(listing(chunk)).toEqual(["TRUE", "JUMP_IF_FALSE 4", "JUMP 1", "NIL", "RETURN"]);
    expect(stats.jumpsCollapsed).toBe(1);
  });

  it("should drop jumps to the next instruction", () => {
    const chunk = new Chunk();
    chunk.emit(Op.Nil, 1);
    chunk.emit2(Op.Jump, 0, 1);
    chunk.emit(Op.Return, 1);

    optimizeChunk(chunk);
    expect(listing(chunk)).toEqual(["NIL", "RETURN"]);
  });

  it("should specialize nil and boolean constant loads", () => {
    const chunk = new Chunk();
    chunk.emit1(Op.Constant, chunk.addConstant(TRUE), 1);
    chunk.emit(Op.Print, 1);
    chunk.emit(Op.Return, 1);

    const stats = optimizeChunk(chunk);
    expect(listing(chunk)).toEqual(["TRUE", "PRINT", "RETURN"]);
    expect(stats.loadsSpecialized).toBe(1);
  });

  it("should fold negation and string concatenation", () => {
    const negated = new Chunk();
    negated.emit1(Op.Constant, negated.addConstant(newNumber(5)), 1);
    negated.emit(Op.Negate, 1);
    negated.emit(Op.Print, 1);
    optimizeChunk(negated);
    expect(listing(negated)).toEqual(["CONSTANT 1", "PRINT"]);
    expect(negated.constants[1].inspect()).toBe("-5");

    const joined = new Chunk();
    joined.emit1(Op.Constant, joined.addConstant(newString("a")), 1);
    joined.emit1(Op.Constant, joined.addConstant(newString("b")), 1);
    joined.emit(Op.Add, 1);
    joined.emit(Op.Print, 1);
    optimizeChunk(joined);
    expect(listing(joined)).toEqual(["CONSTANT 2", "PRINT"]);
    expect(joined.constants[2].inspect()).toBe("ab");
  });

  it("should leave division by zero for the VM", () => {
    const chunk = new Chunk();
    chunk.emit1(Op.Constant, chunk.addConstant(newNumber(1)), 1);
    chunk.emit1(Op.Constant, chunk.addConstant(newNumber(0)), 1);
    chunk.emit(Op.Divide, 1);
    chunk.emit(Op.Print, 1);
    optimizeChunk(chunk);
    expect(listing(chunk)).toEqual(["CONSTANT 0", "CONSTANT 1", "DIVIDE", "PRINT"]);
  });

  it("should optimize nested functions", () => {
    const { heap, fn, chunk } = compiled("fn f() { return 1 + 2; }", false);
    const stats = optimizeFunction(heap, fn);

    const f = chunk.constants[0];
    expect(f.type).toBe(ValueType.Function);
    if (f.type !== ValueType.Function) return;
    expect(listing(heap.getFunction(f.handle).chunk)).toEqual(["CONSTANT 2", "RETURN", "NIL", "RETURN"]);
    expect(stats.constantsFolded).toBe(1);
  });
});
