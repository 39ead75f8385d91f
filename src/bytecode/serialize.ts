/**
 * Persisted bytecode format.
 *
 * Layout (all integers little-endian):
 *
 *   "TBC" | version u8 | code length u32 | code bytes
 *         | line count u32 | lines u32...
 *         | constant count u32 | constants...
 *
 * Each constant is a tag byte followed by its payload. Function constants
 * are written as a bare tag; reading one back yields a placeholder function
 * with an empty chunk.
 */

import { Chunk } from "./chunk.js";
import { FunctionObject } from "../gc/objects.js";
import type { Heap } from "../gc/heap.js";
import {
  NIL,
  ValueType,
  newNumber,
  newString,
  toBool,
  type FunctionValue,
  type Value,
} from "../value/value.js";

export const MAGIC = "TBC";
export const FORMAT_VERSION = 1;

/** Name given to functions read back from tag 4. */
export const PLACEHOLDER_NAME = "<placeholder>";

export const enum ConstantTag {
  Nil = 0,
  Bool = 1,
  Number = 2,
  String = 3,
  Function = 4,
}

/**
 * Raised for input that is not a valid bytecode file.
 */
export class BytecodeFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BytecodeFormatError";
  }
}

// ============================================================================
// Writing
// ============================================================================

class ByteWriter {
  private parts: Buffer[] = [];

  u8(value: number): void {
    const buf = Buffer.alloc(1);
    buf.writeUInt8(value);
    this.parts.push(buf);
  }

  u32(value: number): void {
    const buf = Buffer.alloc(4);
    buf.writeUInt32LE(value);
    this.parts.push(buf);
  }

  f64(value: number): void {
    const buf = Buffer.alloc(8);
    buf.writeDoubleLE(value);
    this.parts.push(buf);
  }

  bytes(data: Uint8Array): void {
    this.parts.push(Buffer.from(data));
  }

  finish(): Buffer {
    return Buffer.concat(this.parts);
  }
}

/**
 * Encode a chunk.
 */
export function writeChunk(chunk: Chunk): Buffer {
  const w = new ByteWriter();
  w.bytes(Buffer.from(MAGIC, "latin1"));
  w.u8(FORMAT_VERSION);

  w.u32(chunk.code.length);
  w.bytes(Uint8Array.from(chunk.code));

  w.u32(chunk.lines.length);
  for (const line of chunk.lines) {
    w.u32(line);
  }

  w.u32(chunk.constants.length);
  for (const constant of chunk.constants) {
    writeConstant(w, constant);
  }
  return w.finish();
}

function writeConstant(w: ByteWriter, value: Value): void {
  switch (value.type) {
    case ValueType.Nil:
      w.u8(ConstantTag.Nil);
      break;
    case ValueType.Bool:
      w.u8(ConstantTag.Bool);
      w.u8(value.value ? 1 : 0);
      break;
    case ValueType.Number:
      w.u8(ConstantTag.Number);
      w.f64(value.value);
      break;
    case ValueType.String: {
      const data = Buffer.from(value.value, "utf8");
      w.u8(ConstantTag.String);
      w.u32(data.length);
      w.bytes(data);
      break;
    }
    case ValueType.Function:
    case ValueType.Closure:
    case ValueType.Native:
      w.u8(ConstantTag.Function);
      break;
  }
}

// ============================================================================
// Reading
// ============================================================================

class ByteReader {
  private offset = 0;

  constructor(private readonly buf: Buffer) {}

  private need(n: number, what: string): void {
    if (this.offset + n > this.buf.length) {
      throw new BytecodeFormatError(`truncated bytecode: expected ${what} at offset ${this.offset}`);
    }
  }

  u8(what: string): number {
    this.need(1, what);
    const value = this.buf.readUInt8(this.offset);
    this.offset += 1;
    return value;
  }

  u32(what: string): number {
    this.need(4, what);
    const value = this.buf.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  f64(what: string): number {
    this.need(8, what);
    const value = this.buf.readDoubleLE(this.offset);
    this.offset += 8;
    return value;
  }

  bytes(n: number, what: string): Buffer {
    this.need(n, what);
    const value = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return value;
  }

  get remaining(): number {
    return this.buf.length - this.offset;
  }
}

/**
 * Decode a chunk. Function constants become placeholder functions
 * allocated in `heap`.
 */
export function readChunk(data: Uint8Array, heap: Heap): Chunk {
  const r = new ByteReader(Buffer.from(data.buffer, data.byteOffset, data.byteLength));

  const magic = r.bytes(MAGIC.length, "magic").toString("latin1");
  if (magic !== MAGIC) {
    throw new BytecodeFormatError("bad magic: not a bytecode file");
  }
  const version = r.u8("version");
  if (version !== FORMAT_VERSION) {
    throw new BytecodeFormatError(`unsupported bytecode version ${version}`);
  }

  const chunk = new Chunk();
  const codeLength = r.u32("code length");
  chunk.code = [...r.bytes(codeLength, "code")];

  const lineCount = r.u32("line count");
  if (lineCount !== codeLength) {
    throw new BytecodeFormatError(`line table has ${lineCount} entries for ${codeLength} bytes`);
  }
  for (let i = 0; i < lineCount; i++) {
    chunk.lines.push(r.u32("line"));
  }

  const constantCount = r.u32("constant count");
  let placeholder: FunctionValue | null = null;
  for (let i = 0; i < constantCount; i++) {
    const tag = r.u8("constant tag");
    switch (tag) {
      case ConstantTag.Nil:
        chunk.constants.push(NIL);
        break;
      case ConstantTag.Bool:
        chunk.constants.push(toBool(r.u8("bool") !== 0));
        break;
      case ConstantTag.Number:
        chunk.constants.push(newNumber(r.f64("number")));
        break;
      case ConstantTag.String: {
        const length = r.u32("string length");
        chunk.constants.push(newString(r.bytes(length, "string").toString("utf8")));
        break;
      }
      case ConstantTag.Function:
        placeholder ??= heap.allocateFunction(new FunctionObject(PLACEHOLDER_NAME, 0));
        chunk.constants.push(placeholder);
        break;
      default:
        throw new BytecodeFormatError(`unknown constant tag ${tag}`);
    }
  }

  if (r.remaining > 0) {
    throw new BytecodeFormatError(`${r.remaining} trailing bytes after constants`);
  }
  return chunk;
}

/**
 * Decode a chunk and wrap it in an allocated top-level function.
 */
export function readFunction(data: Uint8Array, heap: Heap, name: string = ""): FunctionValue {
  const chunk = readChunk(data, heap);
  return heap.allocateFunction(new FunctionObject(name, 0, chunk));
}
