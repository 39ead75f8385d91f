/**
 * Human-readable bytecode listings.
 */

import { Chunk, type Instruction } from "./chunk.js";
import { Op, isJump, opName, usesConstant } from "./opcode.js";
import type { Heap } from "../gc/heap.js";
import { ValueType, type FunctionValue, type Value } from "../value/value.js";

/**
 * Render one chunk. With a heap, closure instructions also list the
 * upvalues they capture.
 */
export function disassembleChunk(chunk: Chunk, name: string, heap?: Heap): string {
  const lines = [`== ${name === "" ? "<script>" : name} ==`];
  let prevLine = -1;
  for (const ins of chunk.instructions()) {
    const line = ins.line === prevLine ? "   |" : String(ins.line).padStart(4);
    prevLine = ins.line;
    lines.push(`${String(ins.offset).padStart(4, "0")} ${line} ${formatInstruction(chunk, ins)}`);
    if (ins.op === Op.Closure && heap) {
      lines.push(...closureCaptures(chunk, ins, heap));
    }
  }
  return lines.join("\n");
}

/**
 * Render a function followed by every function nested in its constants,
 * depth first.
 */
export function disassembleFunction(heap: Heap, fn: FunctionValue): string {
  const sections: string[] = [];
  const seen = new Set<number>();
  const visit = (value: FunctionValue): void => {
    if (seen.has(value.handle)) {
      return;
    }
    seen.add(value.handle);
    const object = heap.getFunction(value.handle);
    sections.push(disassembleChunk(object.chunk, object.name, heap));
    for (const constant of object.chunk.constants) {
      if (constant.type === ValueType.Function) {
        visit(constant);
      }
    }
  };
  visit(fn);
  return sections.join("\n\n");
}

function formatInstruction(chunk: Chunk, ins: Instruction): string {
  const name = opName(ins.op);
  if (usesConstant(ins.op)) {
    const constant = chunk.constants[ins.operand];
    const shown = constant === undefined ? "<invalid>" : constant.inspect();
    return `${name.padEnd(16)} ${String(ins.operand).padStart(4)} '${shown}'`;
  }
  if (isJump(ins.op)) {
    return `${name.padEnd(16)} ${String(ins.operand).padStart(4)} -> ${Chunk.jumpTarget(ins)}`;
  }
  if (ins.size === 2) {
    return `${name.padEnd(16)} ${String(ins.operand).padStart(4)}`;
  }
  return name;
}

function closureCaptures(chunk: Chunk, ins: Instruction, heap: Heap): string[] {
  const constant = chunk.constants[ins.operand];
  if (constant === undefined || constant.type !== ValueType.Function || !heap.isLive(constant.handle)) {
    return [];
  }
  return heap.getFunction(constant.handle).upvalues.map(
    (uv) => `${String(ins.offset).padStart(4, "0")}    |                     ${uv.isLocal ? "local" : "upvalue"} ${uv.index}`
  );
}

/**
 * Render the constant pool, one entry per line.
 */
export function formatConstantTable(chunk: Chunk): string {
  const lines = ["constants:"];
  chunk.constants.forEach((value, i) => {
    lines.push(`  ${String(i).padStart(3)}: ${describeConstant(value)}`);
  });
  return lines.join("\n");
}

function describeConstant(value: Value): string {
  switch (value.type) {
    case ValueType.String:
      return `string ${JSON.stringify(value.value)}`;
    case ValueType.Nil:
      return "nil";
    default:
      return `${value.type} ${value.inspect()}`;
  }
}

/**
 * Render the line table compressed into runs of byte offsets.
 */
export function formatLineTable(chunk: Chunk): string {
  const out = ["lines:"];
  let start = 0;
  for (let i = 1; i <= chunk.lines.length; i++) {
    if (i === chunk.lines.length || chunk.lines[i] !== chunk.lines[start]) {
      const range = i - 1 === start ? `${start}` : `${start}-${i - 1}`;
      out.push(`  ${range.padStart(9)}: line ${chunk.lines[start]}`);
      start = i;
    }
  }
  return out.join("\n");
}
