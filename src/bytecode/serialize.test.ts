import { describe, it, expect } from "vitest";
import {
  writeChunk,
  readChunk,
  readFunction,
  BytecodeFormatError,
  PLACEHOLDER_NAME,
} from "./serialize.js";
import { Chunk } from "./chunk.js";
import { Op } from "./opcode.js";
import { Heap } from "../gc/heap.js";
import { FunctionObject } from "../gc/objects.js";
import { NIL, TRUE, ValueType, newNumber, newString } from "../value/value.js";

function header(codeLength: number): number[] {
  return [0x54, 0x42, 0x43, 1, codeLength, 0, 0, 0];
}

describe("bytecode format", () => {
  it("should encode the exact layout", () => {
    const chunk = new Chunk();
    chunk.emit(Op.Nil, 1);
    chunk.emit(Op.Return, 1);
    expect([...writeChunk(chunk)]).toEqual([
      ...header(2),
      Op.Nil,
      Op.Return,
      2, 0, 0, 0,
      1, 0, 0, 0,
      1, 0, 0, 0,
      0, 0, 0, 0,
    ]);
  });

  it("should encode each constant tag", () => {
    const chunk = new Chunk();
    chunk.addConstant(NIL);
    chunk.addConstant(TRUE);
    chunk.addConstant(newString("é"));
    const bytes = [...writeChunk(chunk)];
    expect(bytes.slice(16)).toEqual([0, 1, 1, 3, 2, 0, 0, 0, 0xc3, 0xa9]);
  });

  it("should round-trip code, lines and constants", () => {
    const heap = new Heap();
    const chunk = new Chunk();
    chunk.emit1(Op.Constant, chunk.addConstant(newNumber(1.5)), 1);
    chunk.emit1(Op.Constant, chunk.addConstant(newString("hé llo")), 2);
    chunk.emit(Op.Add, 2);
    chunk.emit1(Op.Constant, chunk.addConstant(TRUE), 3);
    chunk.emit2(Op.JumpIfFalse, 0, 3);
    chunk.emit(Op.Return, 4);

    const back = readChunk(writeChunk(chunk), heap);
    expect(back.code).toEqual(chunk.code);
    expect(back.lines).toEqual(chunk.lines);
    expect(back.constants.map((c) => c.inspect())).toEqual(["1.5", "hé llo", "true"]);
    expect(back.constants.every((c, i) => c.equals(chunk.constants[i]))).toBe(true);
  });

  it("should read function constants back as placeholders", () => {
    const heap = new Heap();
    const chunk = new Chunk();
    chunk.constants.push(heap.allocateFunction(new FunctionObject("a", 1)));
    chunk.constants.push(heap.allocateFunction(new FunctionObject("b", 2)));

    const back = readChunk(writeChunk(chunk), heap);
    const [first, second] = back.constants;
    expect(first.type).toBe(ValueType.Function);
    expect(first.inspect()).toBe(`<fn ${PLACEHOLDER_NAME}>`);
    expect(first.equals(second)).toBe(true);
    if (first.type !== ValueType.Function) return;
    const placeholder = heap.getFunction(first.handle);
    expect(placeholder.chunk.code).toEqual([]);
    expect(placeholder.arity).toBe(0);
  });

  it("should wrap a chunk in a top-level function", () => {
    const heap = new Heap();
    const chunk = new Chunk();
    chunk.emit(Op.Nil, 1);
    chunk.emit(Op.Return, 1);
    const fn = readFunction(writeChunk(chunk), heap);
    expect(fn.name).toBe("");
    expect(heap.getFunction(fn.handle).chunk.code).toEqual([Op.Nil, Op.Return]);
  });

  describe("rejects", () => {
    const heap = new Heap();
    const valid = (): Buffer => {
      const chunk = new Chunk();
      chunk.emit1(Op.Constant, chunk.addConstant(newNumber(7)), 1);
      chunk.emit(Op.Return, 1);
      return writeChunk(chunk);
    };

    it("a bad magic", () => {
      const bytes = valid();
      bytes[0] = 0x58;
      expect(() => readChunk(bytes, heap)).toThrow("bad magic: not a bytecode file");
    });

    it("an unknown version", () => {
      const bytes = valid();
      bytes[3] = 2;
      expect(() => readChunk(bytes, heap)).toThrow("unsupported bytecode version 2");
    });

    it("truncated input", () => {
      const bytes = valid();
      expect(() => readChunk(bytes.subarray(0, bytes.length - 1), heap)).toThrow(BytecodeFormatError);
      expect(() => readChunk(bytes.subarray(0, 2), heap)).toThrow("truncated bytecode: expected magic at offset 0");
    });

    it("trailing bytes", () => {
      const bytes = Buffer.concat([valid(), Buffer.from([0, 0])]);
      expect(() => readChunk(bytes, heap)).toThrow("2 trailing bytes after constants");
    });

    it("an unknown constant tag", () => {
      const bytes = Buffer.from([...header(0), 0, 0, 0, 0, 1, 0, 0, 0, 9]);
      expect(() => readChunk(bytes, heap)).toThrow("unknown constant tag 9");
    });

    it("a line table that does not match the code", () => {
      const bytes = Buffer.from([...header(1), Op.Return, 0, 0, 0, 0, 0, 0, 0, 0]);
      expect(() => readChunk(bytes, heap)).toThrow("line table has 0 entries for 1 bytes");
    });
  });
});
