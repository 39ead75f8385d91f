/**
 * Heap-resident objects: compiled functions, closures and the upvalue
 * cells closures share.
 */

import { Chunk } from "../bytecode/chunk.js";
import { NIL, type FunctionValue, type Value } from "../value/value.js";

/**
 * Where a closure finds one captured variable when it is created: a slot
 * of the enclosing frame (`isLocal`) or an upvalue of the enclosing closure.
 */
export interface UpvalueDescriptor {
  isLocal: boolean;
  index: number;
}

/**
 * A compiled function. Immutable once compilation finishes, apart from the
 * optimizer rewriting its chunk in place.
 */
export class FunctionObject {
  readonly kind = "function" as const;

  constructor(
    public readonly name: string,
    public readonly arity: number,
    public readonly chunk: Chunk = new Chunk(),
    public readonly upvalues: UpvalueDescriptor[] = []
  ) {}
}

/**
 * A captured variable. While open it refers to a stack slot; once closed
 * it holds the value itself.
 */
export class UpvalueCell {
  private closedValue: Value = NIL;
  private isOpen = true;

  constructor(public readonly slot: number) {}

  get open(): boolean {
    return this.isOpen;
  }

  /**
   * The value held after closing; nil while the cell is open.
   */
  get closed(): Value {
    return this.closedValue;
  }

  close(value: Value): void {
    this.closedValue = value;
    this.isOpen = false;
  }

  /**
   * Replace the value of a closed cell.
   */
  set(value: Value): void {
    this.closedValue = value;
  }
}

/**
 * A function together with the cells of the variables it captured.
 */
export class ClosureObject {
  readonly kind = "closure" as const;

  constructor(
    public readonly fn: FunctionValue,
    public readonly upvalues: UpvalueCell[] = []
  ) {}
}

export type HeapObject = FunctionObject | ClosureObject;
