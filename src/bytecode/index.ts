/**
 * Bytecode module exports.
 */

export { Op, MAX_OPCODE, operandWidth, instructionSize, isJump, isOpcode, opName, usesConstant } from "./opcode.js";

export { Chunk, ChunkError, MAX_CONSTANTS, MAX_JUMP } from "./chunk.js";
export type { Instruction } from "./chunk.js";

export {
  writeChunk,
  readChunk,
  readFunction,
  BytecodeFormatError,
  ConstantTag,
  MAGIC,
  FORMAT_VERSION,
  PLACEHOLDER_NAME,
} from "./serialize.js";

export { disassembleChunk, disassembleFunction, formatConstantTable, formatLineTable } from "./disassemble.js";
