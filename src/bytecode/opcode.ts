/**
 * TinyLang bytecode opcode definitions.
 *
 * Each instruction is one opcode byte followed by a fixed-width operand of
 * 0, 1 or 2 bytes. Two-byte operands are little-endian.
 */

/**
 * Bytecode opcodes for the TinyLang VM.
 */
export const enum Op {
  // =========================================================================
  // Constants and Literals
  // =========================================================================
  Constant = 0, // Push constant [index]
  Nil = 1, // Push nil
  True = 2, // Push true
  False = 3, // Push false

  // =========================================================================
  // Arithmetic
  // =========================================================================
  Add = 4,
  Subtract = 5,
  Multiply = 6,
  Divide = 7,
  Modulo = 8,
  Negate = 9,

  // =========================================================================
  // Comparison and Logic
  // =========================================================================
  Equal = 10,
  NotEqual = 11,
  Less = 12,
  LessEqual = 13,
  Greater = 14,
  GreaterEqual = 15,
  Not = 16,

  // =========================================================================
  // Variables
  // =========================================================================
  GetLocal = 17, // Push frame slot [slot]
  SetLocal = 18, // Store top into frame slot [slot], keep it on the stack
  GetGlobal = 19, // Push global named by constant [index]
  SetGlobal = 20, // Assign existing global named by constant [index]
  DefineGlobal = 21, // Pop and bind global named by constant [index]
  GetUpvalue = 22, // Push captured variable [index]
  SetUpvalue = 23, // Store top into captured variable [index]

  // =========================================================================
  // Control Flow
  // =========================================================================
  Jump = 24, // Forward jump [u16 offset]
  JumpIfFalse = 25, // Forward jump if top is falsy, top is kept [u16 offset]
  Loop = 26, // Backward jump [u16 offset]

  // =========================================================================
  // Functions
  // =========================================================================
  Call = 27, // Call callee below [argc] arguments
  Closure = 28, // Wrap function constant [index] in a closure
  CloseUpvalue = 29, // Close the upvalue for the top slot, then pop
  Return = 30, // Return top of stack from the current frame

  // =========================================================================
  // Stack
  // =========================================================================
  Pop = 31, // Discard top of stack
  PopN = 32, // Discard [count] values

  // =========================================================================
  // Output
  // =========================================================================
  Print = 33, // Pop and print
}

/** Highest assigned opcode value. */
export const MAX_OPCODE = Op.Print;

/**
 * Get the operand width of an opcode in bytes.
 */
export function operandWidth(op: Op): number {
  switch (op) {
    case Op.Constant:
    case Op.GetLocal:
    case Op.SetLocal:
    case Op.GetGlobal:
    case Op.SetGlobal:
    case Op.DefineGlobal:
    case Op.GetUpvalue:
    case Op.SetUpvalue:
    case Op.Call:
    case Op.Closure:
    case Op.PopN:
      return 1;
    case Op.Jump:
    case Op.JumpIfFalse:
    case Op.Loop:
      return 2;
    default:
      return 0;
  }
}

/**
 * Total instruction size in bytes, opcode included.
 */
export function instructionSize(op: Op): number {
  return 1 + operandWidth(op);
}

/**
 * Whether the opcode's operand is a relative jump offset.
 */
export function isJump(op: Op): boolean {
  return op === Op.Jump || op === Op.JumpIfFalse || op === Op.Loop;
}

/**
 * Whether the opcode's operand indexes the constant pool.
 */
export function usesConstant(op: Op): boolean {
  switch (op) {
    case Op.Constant:
    case Op.GetGlobal:
    case Op.SetGlobal:
    case Op.DefineGlobal:
    case Op.Closure:
      return true;
    default:
      return false;
  }
}

const opNames: readonly string[] = [
  "CONSTANT",
  "NIL",
  "TRUE",
  "FALSE",
  "ADD",
  "SUBTRACT",
  "MULTIPLY",
  "DIVIDE",
  "MODULO",
  "NEGATE",
  "EQUAL",
  "NOT_EQUAL",
  "LESS",
  "LESS_EQUAL",
  "GREATER",
  "GREATER_EQUAL",
  "NOT",
  "GET_LOCAL",
  "SET_LOCAL",
  "GET_GLOBAL",
  "SET_GLOBAL",
  "DEFINE_GLOBAL",
  "GET_UPVALUE",
  "SET_UPVALUE",
  "JUMP",
  "JUMP_IF_FALSE",
  "LOOP",
  "CALL",
  "CLOSURE",
  "CLOSE_UPVALUE",
  "RETURN",
  "POP",
  "POP_N",
  "PRINT",
];

/**
 * Whether a raw byte is a known opcode.
 */
export function isOpcode(byte: number): byte is Op {
  return Number.isInteger(byte) && byte >= 0 && byte <= MAX_OPCODE;
}

/**
 * Get the display name of an opcode.
 */
export function opName(op: number): string {
  return opNames[op] ?? `UNKNOWN(${op})`;
}
