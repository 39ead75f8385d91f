/**
 * Peephole optimizer for compiled chunks.
 *
 * Repeats passes over the decoded instructions until one changes nothing.
 * Every rewrite either removes an instruction, turns a constant load into
 * a dedicated opcode or moves a jump target forward, so the loop ends.
 */

import { Chunk, ChunkError, type Instruction } from "../bytecode/chunk.js";
import { Op } from "../bytecode/opcode.js";
import { foldArithmetic } from "../compiler/compiler.js";
import type { Heap } from "../gc/heap.js";
import { ValueType, newNumber, type FunctionValue, type Value } from "../value/value.js";

/** Largest count a PopN operand holds. */
const MAX_POP_N = 0xff;

/**
 * What one optimizer run did.
 */
export interface OptimizerStats {
  /** Full passes, including the final pass that changed nothing. */
  passes: number;
  instructionsBefore: number;
  instructionsRemoved: number;
  constantsFolded: number;
  jumpsCollapsed: number;
  loadsSpecialized: number;
  bytesBefore: number;
  bytesAfter: number;
}

export function emptyStats(): OptimizerStats {
  return {
    passes: 0,
    instructionsBefore: 0,
    instructionsRemoved: 0,
    constantsFolded: 0,
    jumpsCollapsed: 0,
    loadsSpecialized: 0,
    bytesBefore: 0,
    bytesAfter: 0,
  };
}

/**
 * Share of the original instructions that were removed, from 0 to 1.
 */
export function reductionRatio(stats: OptimizerStats): number {
  return stats.instructionsBefore === 0 ? 0 : stats.instructionsRemoved / stats.instructionsBefore;
}

export function formatStats(stats: OptimizerStats): string {
  const percent = (reductionRatio(stats) * 100).toFixed(1);
  return (
    `optimizer: ${stats.passes} passes, ${stats.instructionsRemoved} instructions removed (${percent}%), ` +
    `${stats.constantsFolded} folded, ${stats.jumpsCollapsed} jumps collapsed, ` +
    `${stats.loadsSpecialized} loads specialized, ${stats.bytesBefore} -> ${stats.bytesAfter} bytes`
  );
}

/**
 * Optimize one chunk in place.
 */
export function optimizeChunk(chunk: Chunk): OptimizerStats {
  const stats = emptyStats();
  stats.instructionsBefore = chunk.instructions().length;
  stats.bytesBefore = chunk.length;

  let changed = true;
  while (changed) {
    changed = runPass(chunk, stats);
    stats.passes++;
  }

  stats.instructionsRemoved = stats.instructionsBefore - chunk.instructions().length;
  stats.bytesAfter = chunk.length;
  return stats;
}

/**
 * Optimize a function and every function reachable through its constant
 * pool. Returns the combined statistics.
 */
export function optimizeFunction(heap: Heap, fn: FunctionValue): OptimizerStats {
  const total = emptyStats();
  const seen = new Set<number>();

  const visit = (value: FunctionValue): void => {
    if (seen.has(value.handle)) {
      return;
    }
    seen.add(value.handle);
    const chunk = heap.getFunction(value.handle).chunk;
    const stats = optimizeChunk(chunk);
    total.passes = Math.max(total.passes, stats.passes);
    total.instructionsBefore += stats.instructionsBefore;
    total.instructionsRemoved += stats.instructionsRemoved;
    total.constantsFolded += stats.constantsFolded;
    total.jumpsCollapsed += stats.jumpsCollapsed;
    total.loadsSpecialized += stats.loadsSpecialized;
    total.bytesBefore += stats.bytesBefore;
    total.bytesAfter += stats.bytesAfter;

    for (const constant of chunk.constants) {
      if (constant.type === ValueType.Function) {
        visit(constant);
      }
    }
  };

  visit(fn);
  return total;
}

// ============================================================================
// Passes
// ============================================================================

function runPass(chunk: Chunk, stats: OptimizerStats): boolean {
  let changed = false;
  let list = chunk.instructions();
  let targets = jumpTargets(list);
  let i = 0;

  while (i < list.length) {
    if (rewriteAt(chunk, list, i, targets, stats)) {
      changed = true;
      list = chunk.instructions();
      targets = jumpTargets(list);
      // A rewrite can complete a pattern that starts up to two
      // instructions earlier.
      i = Math.max(0, i - 2);
      continue;
    }
    i++;
  }
  return changed;
}

function jumpTargets(list: Instruction[]): Set<number> {
  const targets = new Set<number>();
  for (const ins of list) {
    if (ins.op === Op.Jump || ins.op === Op.JumpIfFalse || ins.op === Op.Loop) {
      targets.add(Chunk.jumpTarget(ins));
    }
  }
  return targets;
}

/**
 * Try each rewrite on the window starting at `list[i]`.
 */
function rewriteAt(
  chunk: Chunk,
  list: Instruction[],
  i: number,
  targets: Set<number>,
  stats: OptimizerStats
): boolean {
  const ins = list[i];
  // The window may extend only over instructions nothing jumps to.
  const window = (length: number): Instruction[] | null => {
    if (i + length > list.length) {
      return null;
    }
    for (let k = i + 1; k < i + length; k++) {
      if (targets.has(list[k].offset)) {
        return null;
      }
    }
    return list.slice(i, i + length);
  };

  if (ins.op === Op.Constant && specializeLoad(chunk, ins)) {
    stats.loadsSpecialized++;
    return true;
  }

  const pair = window(2);
  if (pair && pair[1].op === Op.Pop) {
    if (isPurePush(ins.op)) {
      chunk.removeInstruction(pair[1].offset);
      chunk.removeInstruction(ins.offset);
      return true;
    }
    if (ins.op === Op.Pop) {
      chunk.removeInstruction(pair[1].offset);
      chunk.replaceInstruction(ins.offset, Op.PopN, 2);
      return true;
    }
    if (ins.op === Op.PopN && ins.operand < MAX_POP_N) {
      chunk.removeInstruction(pair[1].offset);
      chunk.replaceInstruction(ins.offset, Op.PopN, ins.operand + 1);
      return true;
    }
  }

  if (ins.op === Op.Constant && pair && pair[1].op === Op.Negate) {
    const value = chunk.constants[ins.operand];
    if (value.type === ValueType.Number && replaceWithValue(chunk, [ins, pair[1]], newNumber(-value.value))) {
      stats.constantsFolded++;
      return true;
    }
  }

  const triple = window(3);
  if (triple && ins.op === Op.Constant && triple[1].op === Op.Constant) {
    const folded = foldArithmetic(triple[2].op, chunk.constants[ins.operand], chunk.constants[triple[1].operand]);
    if (folded && replaceWithValue(chunk, triple, folded)) {
      stats.constantsFolded++;
      return true;
    }
  }

  if (ins.op === Op.Jump || ins.op === Op.JumpIfFalse) {
    const dest = Chunk.jumpTarget(ins);
    const landing = list.find((other) => other.offset === dest);
    if (landing && landing.op === Op.Jump) {
      const final = Chunk.jumpTarget(landing);
      chunk.replaceInstruction(ins.offset, ins.op, final - (ins.offset + ins.size));
      stats.jumpsCollapsed++;
      return true;
    }
    if (ins.op === Op.Jump && ins.operand === 0) {
      chunk.removeInstruction(ins.offset);
      stats.jumpsCollapsed++;
      return true;
    }
  }

  return false;
}

function isPurePush(op: Op): boolean {
  switch (op) {
    case Op.Constant:
    case Op.Nil:
    case Op.True:
    case Op.False:
    case Op.GetLocal:
    case Op.GetUpvalue:
      return true;
    default:
      return false;
  }
}

/**
 * Turn a load of a nil or boolean constant into its dedicated opcode.
 */
function specializeLoad(chunk: Chunk, ins: Instruction): boolean {
  const value = chunk.constants[ins.operand];
  switch (value.type) {
    case ValueType.Nil:
      chunk.replaceInstruction(ins.offset, Op.Nil, 0);
      return true;
    case ValueType.Bool:
      chunk.replaceInstruction(ins.offset, value.value ? Op.True : Op.False, 0);
      return true;
    default:
      return false;
  }
}

/**
 * Replace a window with a single constant load. Leaves the chunk untouched
 * when the constant pool is full.
 */
function replaceWithValue(chunk: Chunk, window: Instruction[], value: Value): boolean {
  let index: number;
  try {
    index = chunk.addConstant(value);
  } catch (err) {
    if (err instanceof ChunkError) {
      return false;
    }
    throw err;
  }
  for (let k = window.length - 1; k >= 1; k--) {
    chunk.removeInstruction(window[k].offset);
  }
  chunk.replaceInstruction(window[0].offset, Op.Constant, index);
  return true;
}
