/**
 * Bytecode chunk: the code, line table and constant pool of one function.
 */

import { Op, isJump, isOpcode, instructionSize, opName, operandWidth, usesConstant } from "./opcode.js";
import { ValueType, type Value } from "../value/value.js";

/** Constant pool entries addressable by a one-byte operand. */
export const MAX_CONSTANTS = 256;

/** Largest jump distance a two-byte operand can hold. */
export const MAX_JUMP = 0xffff;

/**
 * Raised for malformed chunks and impossible edits.
 */
export class ChunkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChunkError";
  }
}

/**
 * A decoded instruction.
 */
export interface Instruction {
  /** Byte offset of the opcode. */
  offset: number;
  op: Op;
  /** Operand value; 0 when the opcode has none. */
  operand: number;
  /** Source line of the opcode byte. */
  line: number;
  /** Size in bytes, opcode included. */
  size: number;
}

/**
 * Instruction form used while editing: jumps refer to the index of the
 * instruction they land on (or to the end sentinel, `list.length`).
 */
interface EditInstruction {
  op: Op;
  operand: number;
  line: number;
  target: number;
}

/**
 * Compiled bytecode for one function.
 */
export class Chunk {
  /** Instruction bytes. */
  code: number[] = [];
  /** Source line for every byte of `code`, 1-based. */
  lines: number[] = [];
  /** Constant pool. */
  constants: Value[] = [];

  get length(): number {
    return this.code.length;
  }

  // =========================================================================
  // Writing
  // =========================================================================

  /**
   * Append one byte.
   */
  write(byte: number, line: number): void {
    this.code.push(byte & 0xff);
    this.lines.push(line);
  }

  /**
   * Append an opcode with no operand. Returns the opcode's offset.
   */
  emit(op: Op, line: number): number {
    const offset = this.code.length;
    this.write(op, line);
    return offset;
  }

  /**
   * Append an opcode with a one-byte operand. Returns the opcode's offset.
   */
  emit1(op: Op, operand: number, line: number): number {
    if (!Number.isInteger(operand) || operand < 0 || operand > 0xff) {
      throw new ChunkError(`operand ${operand} does not fit in one byte`);
    }
    const offset = this.code.length;
    this.write(op, line);
    this.write(operand, line);
    return offset;
  }

  /**
   * Append an opcode with a two-byte little-endian operand. Returns the
   * opcode's offset.
   */
  emit2(op: Op, operand: number, line: number): number {
    if (!Number.isInteger(operand) || operand < 0 || operand > MAX_JUMP) {
      throw new ChunkError(`operand ${operand} does not fit in two bytes`);
    }
    const offset = this.code.length;
    this.write(op, line);
    this.write(operand & 0xff, line);
    this.write(operand >> 8, line);
    return offset;
  }

  /**
   * Overwrite the two-byte operand starting at `offset`.
   */
  patchJump(offset: number, distance: number): void {
    if (distance < 0 || distance > MAX_JUMP) {
      throw new ChunkError("jump distance too large");
    }
    if (offset < 0 || offset + 1 >= this.code.length) {
      throw new ChunkError(`no jump operand at offset ${offset}`);
    }
    this.code[offset] = distance & 0xff;
    this.code[offset + 1] = distance >> 8;
  }

  readU16(offset: number): number {
    return this.code[offset] | (this.code[offset + 1] << 8);
  }

  // =========================================================================
  // Constants
  // =========================================================================

  /**
   * Add a constant and return its pool index. Nil, booleans, numbers and
   * strings already in the pool are reused.
   */
  addConstant(value: Value): number {
    const existing = this.findConstant(value);
    if (existing >= 0) {
      return existing;
    }
    if (this.constants.length >= MAX_CONSTANTS) {
      throw new ChunkError("too many constants in one chunk");
    }
    this.constants.push(value);
    return this.constants.length - 1;
  }

  /**
   * Index of an equal primitive constant, or -1. Numbers match with
   * Object.is, so 0 and -0 are distinct entries.
   */
  findConstant(value: Value): number {
    return this.constants.findIndex((c) => sameConstant(c, value));
  }

  // =========================================================================
  // Decoding
  // =========================================================================

  /**
   * Decode the code into instruction records.
   */
  instructions(): Instruction[] {
    const out: Instruction[] = [];
    let offset = 0;
    while (offset < this.code.length) {
      const ins = this.decodeAt(offset);
      out.push(ins);
      offset += ins.size;
    }
    return out;
  }

  private decodeAt(offset: number): Instruction {
    const byte = this.code[offset];
    if (!isOpcode(byte)) {
      throw new ChunkError(`unknown opcode ${byte} at offset ${offset}`);
    }
    const size = instructionSize(byte);
    if (offset + size > this.code.length) {
      throw new ChunkError(`truncated ${opName(byte)} at offset ${offset}`);
    }
    let operand = 0;
    const width = operandWidth(byte);
    if (width === 1) {
      operand = this.code[offset + 1];
    } else if (width === 2) {
      operand = this.readU16(offset + 1);
    }
    return { offset, op: byte, operand, line: this.lines[offset] ?? 0, size };
  }

  /**
   * Byte offset a jump instruction lands on.
   */
  static jumpTarget(ins: Instruction): number {
    const next = ins.offset + ins.size;
    return ins.op === Op.Loop ? next - ins.operand : next + ins.operand;
  }

  /**
   * Check the chunk's structure and return the problems found.
   */
  verify(): string[] {
    const problems: string[] = [];
    if (this.lines.length !== this.code.length) {
      problems.push(`line table has ${this.lines.length} entries for ${this.code.length} bytes`);
    }

    const decoded: Instruction[] = [];
    let offset = 0;
    while (offset < this.code.length) {
      let ins: Instruction;
      try {
        ins = this.decodeAt(offset);
      } catch (err) {
        problems.push(err instanceof Error ? err.message : String(err));
        return problems;
      }
      decoded.push(ins);
      offset += ins.size;
    }

    const boundaries = new Set(decoded.map((ins) => ins.offset));
    boundaries.add(this.code.length);
    for (const ins of decoded) {
      if (usesConstant(ins.op) && ins.operand >= this.constants.length) {
        problems.push(`constant index ${ins.operand} out of range at offset ${ins.offset}`);
      }
      if (isJump(ins.op)) {
        const target = Chunk.jumpTarget(ins);
        if (!boundaries.has(target)) {
          problems.push(`${opName(ins.op)} at offset ${ins.offset} targets ${target}, which is not an instruction boundary`);
        }
      }
    }
    return problems;
  }

  /**
   * Deep copy of the code, lines and constant arrays.
   */
  clone(): Chunk {
    const copy = new Chunk();
    copy.code = [...this.code];
    copy.lines = [...this.lines];
    copy.constants = [...this.constants];
    return copy;
  }

  // =========================================================================
  // Structural Edits
  // =========================================================================

  /**
   * Remove the instruction at `offset`. Jumps that landed on it land on the
   * instruction that followed it.
   */
  removeInstruction(offset: number): void {
    const list = this.toEditList();
    const index = this.indexAt(offset);
    list.splice(index, 1);
    for (const ins of list) {
      if (isJump(ins.op) && ins.target > index) {
        ins.target--;
      }
    }
    this.encode(list);
  }

  /**
   * Insert an instruction before the one at `offset` (or at the end). Only
   * fall-through reaches it: jumps keep landing on the instruction that was
   * at `offset`. An inserted jump's operand is measured from `offset`.
   */
  insertInstruction(offset: number, op: Op, operand: number, line: number): void {
    const list = this.toEditList();
    const index = offset === this.code.length ? list.length : this.indexAt(offset);
    const target = isJump(op) ? this.resolveTarget(op, offset, operand) : 0;
    for (const ins of list) {
      if (isJump(ins.op) && ins.target >= index) {
        ins.target++;
      }
    }
    list.splice(index, 0, {
      op,
      operand,
      line,
      target: target >= index && isJump(op) ? target + 1 : target,
    });
    this.encode(list);
  }

  /**
   * Replace the instruction at `offset`. A jump operand is measured from the
   * end of the instruction being replaced.
   */
  replaceInstruction(offset: number, op: Op, operand: number, line?: number): void {
    const list = this.toEditList();
    const index = this.indexAt(offset);
    const old = list[index];
    const end = offset + instructionSize(old.op);
    const target = isJump(op) ? this.resolveTarget(op, end, operand) : 0;
    list[index] = { op, operand, line: line ?? old.line, target };
    this.encode(list);
  }

  /**
   * Index of the instruction starting at `offset`.
   */
  private indexAt(offset: number): number {
    const index = this.instructions().findIndex((ins) => ins.offset === offset);
    if (index < 0) {
      throw new ChunkError(`offset ${offset} is not an instruction boundary`);
    }
    return index;
  }

  /**
   * Instruction index of the jump target `distance` bytes from `from` in
   * the current layout.
   */
  private resolveTarget(op: Op, from: number, distance: number): number {
    const dest = op === Op.Loop ? from - distance : from + distance;
    if (dest === this.code.length) {
      return this.instructions().length;
    }
    const index = this.instructions().findIndex((ins) => ins.offset === dest);
    if (index < 0) {
      throw new ChunkError(`jump target ${dest} is not an instruction boundary`);
    }
    return index;
  }

  private toEditList(): EditInstruction[] {
    const decoded = this.instructions();
    const indexByOffset = new Map<number, number>();
    decoded.forEach((ins, i) => indexByOffset.set(ins.offset, i));
    indexByOffset.set(this.code.length, decoded.length);

    return decoded.map((ins) => {
      let target = 0;
      if (isJump(ins.op)) {
        const dest = Chunk.jumpTarget(ins);
        const index = indexByOffset.get(dest);
        if (index === undefined) {
          throw new ChunkError(`${opName(ins.op)} at offset ${ins.offset} targets ${dest}, which is not an instruction boundary`);
        }
        target = index;
      }
      return { op: ins.op, operand: ins.operand, line: ins.line, target };
    });
  }

  /**
   * Re-encode an edit list, recomputing every jump operand and the line
   * table from the new layout.
   */
  private encode(list: EditInstruction[]): void {
    const offsets: number[] = [];
    let offset = 0;
    for (const ins of list) {
      offsets.push(offset);
      offset += instructionSize(ins.op);
    }
    offsets.push(offset);

    const code: number[] = [];
    const lines: number[] = [];
    list.forEach((ins, i) => {
      let operand = ins.operand;
      if (isJump(ins.op)) {
        const next = offsets[i] + instructionSize(ins.op);
        const dest = offsets[ins.target];
        operand = ins.op === Op.Loop ? next - dest : dest - next;
        if (operand < 0) {
          throw new ChunkError(`${opName(ins.op)} at offset ${offsets[i]} cannot reach ${dest}`);
        }
        if (operand > MAX_JUMP) {
          throw new ChunkError("jump distance too large");
        }
      }
      const size = instructionSize(ins.op);
      code.push(ins.op);
      if (size === 2) {
        code.push(operand & 0xff);
      } else if (size === 3) {
        code.push(operand & 0xff, operand >> 8);
      }
      for (let b = 0; b < size; b++) {
        lines.push(ins.line);
      }
    });

    this.code = code;
    this.lines = lines;
  }
}

function sameConstant(a: Value, b: Value): boolean {
  switch (a.type) {
    case ValueType.Nil:
      return b.type === ValueType.Nil;
    case ValueType.Bool:
      return b.type === ValueType.Bool && a.value === b.value;
    case ValueType.Number:
      return b.type === ValueType.Number && Object.is(a.value, b.value);
    case ValueType.String:
      return b.type === ValueType.String && a.value === b.value;
    default:
      return false;
  }
}
