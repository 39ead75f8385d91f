/**
 * Call frame management for the TinyLang VM.
 */

import type { Chunk } from "../bytecode/chunk.js";
import type { FunctionObject, UpvalueCell } from "../gc/objects.js";
import type { ClosureValue } from "../value/value.js";

/**
 * A call frame representing a closure invocation.
 */
export class Frame {
  /** Instruction pointer - current position in bytecode. */
  ip: number = 0;

  /**
   * @param base - stack index of slot 0; the callee sits just below it
   */
  constructor(
    readonly closure: ClosureValue,
    readonly fn: FunctionObject,
    readonly upvalues: UpvalueCell[],
    readonly base: number
  ) {}

  get chunk(): Chunk {
    return this.fn.chunk;
  }

  /**
   * Check if we've reached the end of the bytecode.
   */
  isAtEnd(): boolean {
    return this.ip >= this.fn.chunk.code.length;
  }

  readByte(): number {
    return this.fn.chunk.code[this.ip++];
  }

  /**
   * Read a two-byte little-endian operand.
   */
  readU16(): number {
    const value = this.fn.chunk.readU16(this.ip);
    this.ip += 2;
    return value;
  }

  /**
   * Source line of the instruction being executed.
   */
  currentLine(): number {
    return this.fn.chunk.lines[Math.max(0, this.ip - 1)] ?? 0;
  }

  /**
   * Name shown in stack traces.
   */
  displayName(): string {
    return this.fn.name === "" ? "<script>" : this.fn.name;
  }
}
