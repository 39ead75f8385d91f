/**
 * TinyLang Virtual Machine - bytecode execution engine.
 */

import * as fs from "fs";
import { Op, isOpcode } from "../bytecode/opcode.js";
import { compile, CompileError } from "../compiler/compiler.js";
import { ErrorReporter } from "../errors/reporter.js";
import { Heap, type HeapConfig, type RootMarker } from "../gc/heap.js";
import { ClosureObject, UpvalueCell } from "../gc/objects.js";
import { optimizeFunction } from "../optimizer/optimizer.js";
import { createBuiltins } from "../builtins/builtins.js";
import {
  FALSE,
  NIL,
  TRUE,
  ValueType,
  newNumber,
  newString,
  toBool,
  valuesEqual,
  type ClosureValue,
  type FunctionValue,
  type NativeValue,
  type Value,
} from "../value/value.js";
import { Frame } from "./frame.js";
import { VMError, arityMessage } from "./error.js";

export { VMError } from "./error.js";

/** Default call frame limit. */
const MAX_FRAMES = 64;

/**
 * Outcome of one `interpret` call.
 */
export const enum InterpretResult {
  Ok = "ok",
  CompileError = "compile_error",
  RuntimeError = "runtime_error",
  IoError = "io_error",
}

/**
 * VM configuration options.
 */
export interface VMConfig {
  /** Maximum call depth, the top-level frame included. */
  maxFrames?: number;
  /** Program output. Defaults to console.log. */
  stdout?: (text: string) => void;
  /** Diagnostics and runtime traces. Defaults to console.error. */
  stderr?: (text: string) => void;
  /** Run the peephole optimizer on compiled code. Default true. */
  optimize?: boolean;
  /** Fold constant expressions while compiling. Default true. */
  foldConstants?: boolean;
  /** Name used in diagnostics for `interpret` input. */
  filename?: string;
  /** Collector settings. */
  gc?: HeapConfig;
}

type ArithmeticOp = Op.Subtract | Op.Multiply | Op.Divide | Op.Modulo;
type ComparisonOp = Op.Less | Op.LessEqual | Op.Greater | Op.GreaterEqual;

const arithmeticVerbs: Record<ArithmeticOp, string> = {
  [Op.Subtract]: "subtract",
  [Op.Multiply]: "multiply",
  [Op.Divide]: "divide",
  [Op.Modulo]: "take the modulo of",
};

/**
 * TinyLang Virtual Machine.
 *
 * Globals and the heap persist across `interpret` calls; the stack and the
 * frames are reset by each one.
 */
export class VM {
  /** Operand stack shared by all frames. */
  private stack: Value[] = [];
  /** Call frames. */
  private frames: Frame[] = [];
  /** Global variables by name. */
  private globals = new Map<string, Value>();
  /** Cells still referring to stack slots, ordered by slot. */
  private openUpvalues: UpvalueCell[] = [];

  private readonly heap: Heap;
  private readonly maxFrames: number;
  private readonly stdout: (text: string) => void;
  private readonly stderr: (text: string) => void;
  private readonly optimize: boolean;
  private readonly foldConstants: boolean;
  private readonly filename: string;

  private executed = 0;
  private error: VMError | null = null;

  constructor(config: VMConfig = {}) {
    this.maxFrames = config.maxFrames ?? MAX_FRAMES;
    this.stdout = config.stdout ?? ((text: string) => console.log(text));
    this.stderr = config.stderr ?? ((text: string) => console.error(text));
    this.optimize = config.optimize ?? true;
    this.foldConstants = config.foldConstants ?? true;
    this.filename = config.filename ?? "<input>";
    this.heap = new Heap(config.gc);
    this.heap.addRootProvider((marker) => this.markRoots(marker));

    for (const [name, native] of createBuiltins({ stdout: this.stdout })) {
      this.globals.set(name, native);
    }
  }

  // ===========================================================================
  // Entry Points
  // ===========================================================================

  /**
   * Compile and run source code.
   */
  interpret(source: string, filename: string = this.filename): InterpretResult {
    const reporter = new ErrorReporter(source, filename);
    let fn: FunctionValue;
    try {
      fn = compile(source, { reporter, filename, heap: this.heap, foldConstants: this.foldConstants });
    } catch (err) {
      if (err instanceof CompileError) {
        this.stderr(reporter.formatAll());
        return InterpretResult.CompileError;
      }
      throw err;
    }
    if (this.optimize) {
      optimizeFunction(this.heap, fn);
    }
    return this.runFunction(fn);
  }

  /**
   * Read a source file and run it.
   */
  interpretFile(path: string): InterpretResult {
    let source: string;
    try {
      source = fs.readFileSync(path, "utf-8");
    } catch (err) {
      const code = err instanceof Error && "code" in err ? err.code : undefined;
      this.stderr(code === "ENOENT" ? `file not found: ${path}` : `cannot read ${path}: ${String(err)}`);
      return InterpretResult.IoError;
    }
    return this.interpret(source, path);
  }

  /**
   * Run an already compiled top-level function, such as one read from a
   * bytecode file. It must belong to this VM's heap.
   */
  runFunction(fn: FunctionValue): InterpretResult {
    this.resetStack();
    this.executed = 0;
    this.error = null;

    try {
      // The function stays on the stack while its closure is allocated.
      this.push(fn);
      const closure = this.heap.allocateClosure(new ClosureObject(fn, []));
      this.stack[0] = closure;
      this.frames.push(new Frame(closure, this.heap.getFunction(fn.handle), [], 1));
      this.execute();
      return InterpretResult.Ok;
    } catch (err) {
      const error = this.toVMError(err);
      error.trace = this.frames
        .slice()
        .reverse()
        .map((frame) => ({ name: frame.displayName(), line: frame.currentLine() }));
      this.error = error;
      this.stderr(error.format());
      // Closures that escaped the failed run keep their captured values.
      this.closeUpvalues(0);
      this.resetStack();
      return InterpretResult.RuntimeError;
    }
  }

  // ===========================================================================
  // Introspection
  // ===========================================================================

  /** Instructions executed by the last run. */
  get instructionCount(): number {
    return this.executed;
  }

  /** Bytes currently allocated on the heap. */
  get memoryUsage(): number {
    return this.heap.bytesAllocated;
  }

  /** The error of the last failed run, or null. */
  get lastError(): VMError | null {
    return this.error;
  }

  /** The heap holding this VM's functions and closures. */
  get gcHeap(): Heap {
    return this.heap;
  }

  stackSnapshot(): Value[] {
    return [...this.stack];
  }

  globalsSnapshot(): Map<string, Value> {
    return new Map(this.globals);
  }

  /**
   * Run a full collection now. Returns the number of objects freed.
   */
  collectGarbage(): number {
    return this.heap.collect();
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Main execution loop. Returns when the outermost frame returns.
   */
  private execute(): void {
    for (;;) {
      const frame = this.currentFrame();
      if (frame.isAtEnd()) {
        throw new VMError("unexpected end of bytecode");
      }
      const op = frame.readByte();
      this.executed++;
      if (!isOpcode(op)) {
        throw new VMError(`unknown opcode ${op}`);
      }

      switch (op) {
        // Constants and literals
        case Op.Constant:
          this.push(this.readConstant(frame));
          break;
        case Op.Nil:
          this.push(NIL);
          break;
        case Op.True:
          this.push(TRUE);
          break;
        case Op.False:
          this.push(FALSE);
          break;

        // Arithmetic
        case Op.Add:
          this.opAdd();
          break;
        case Op.Subtract:
        case Op.Multiply:
        case Op.Divide:
        case Op.Modulo:
          this.opArithmetic(op);
          break;
        case Op.Negate: {
          const value = this.pop();
          if (value.type !== ValueType.Number) {
            throw new VMError(`cannot negate ${value.type}`);
          }
          this.push(newNumber(-value.value));
          break;
        }

        // Comparison and logic
        case Op.Equal: {
          const right = this.pop();
          this.push(toBool(valuesEqual(this.pop(), right)));
          break;
        }
        case Op.NotEqual: {
          const right = this.pop();
          this.push(toBool(!valuesEqual(this.pop(), right)));
          break;
        }
        case Op.Less:
        case Op.LessEqual:
        case Op.Greater:
        case Op.GreaterEqual:
          this.opCompare(op);
          break;
        case Op.Not:
          this.push(toBool(!this.pop().isTruthy()));
          break;

        // Variables
        case Op.GetLocal:
          this.push(this.stack[frame.base + frame.readByte()]);
          break;
        case Op.SetLocal:
          this.stack[frame.base + frame.readByte()] = this.peek();
          break;
        case Op.GetGlobal: {
          const name = this.readName(frame);
          const value = this.globals.get(name);
          if (value === undefined) {
            throw new VMError(`undefined variable '${name}'`);
          }
          this.push(value);
          break;
        }
        case Op.SetGlobal: {
          const name = this.readName(frame);
          if (!this.globals.has(name)) {
            throw new VMError(`undefined variable '${name}'`);
          }
          this.globals.set(name, this.peek());
          break;
        }
        case Op.DefineGlobal:
          this.globals.set(this.readName(frame), this.pop());
          break;
        case Op.GetUpvalue:
          this.push(this.readUpvalue(frame.upvalues[frame.readByte()]));
          break;
        case Op.SetUpvalue:
          this.writeUpvalue(frame.upvalues[frame.readByte()], this.peek());
          break;

        // Control flow
        case Op.Jump: {
          const offset = frame.readU16();
          frame.ip += offset;
          break;
        }
        case Op.JumpIfFalse: {
          const offset = frame.readU16();
          if (!this.peek().isTruthy()) {
            frame.ip += offset;
          }
          break;
        }
        case Op.Loop: {
          const offset = frame.readU16();
          frame.ip -= offset;
          break;
        }

        // Functions
        case Op.Call:
          this.opCall(frame.readByte());
          break;
        case Op.Closure:
          this.opClosure(frame);
          break;
        case Op.CloseUpvalue:
          this.closeUpvalues(this.stack.length - 1);
          this.pop();
          break;
        case Op.Return:
          if (this.opReturn()) {
            return;
          }
          break;

        // Stack
        case Op.Pop:
          this.pop();
          break;
        case Op.PopN: {
          const count = frame.readByte();
          if (count > this.stack.length) {
            throw new VMError("stack underflow");
          }
          this.stack.length -= count;
          break;
        }

        // Output
        case Op.Print:
          this.stdout(this.pop().inspect());
          break;
      }
    }
  }

  private currentFrame(): Frame {
    const frame = this.frames[this.frames.length - 1];
    if (frame === undefined) {
      throw new VMError("no active frame");
    }
    return frame;
  }

  private readConstant(frame: Frame): Value {
    const index = frame.readByte();
    const value = frame.chunk.constants[index];
    if (value === undefined) {
      throw new VMError(`constant index ${index} out of range`);
    }
    return value;
  }

  private readName(frame: Frame): string {
    const value = this.readConstant(frame);
    if (value.type !== ValueType.String) {
      throw new VMError(`expected a variable name constant, got ${value.type}`);
    }
    return value.value;
  }

  // ===========================================================================
  // Stack
  // ===========================================================================

  private push(value: Value): void {
    this.stack.push(value);
  }

  private pop(): Value {
    const value = this.stack.pop();
    if (value === undefined) {
      throw new VMError("stack underflow");
    }
    return value;
  }

  private peek(depth: number = 0): Value {
    const value = this.stack[this.stack.length - 1 - depth];
    if (value === undefined) {
      throw new VMError("stack underflow");
    }
    return value;
  }

  private resetStack(): void {
    this.stack = [];
    this.frames = [];
    this.openUpvalues = [];
  }

  // ===========================================================================
  // Operators
  // ===========================================================================

  private opAdd(): void {
    const right = this.pop();
    const left = this.pop();
    if (left.type === ValueType.Number && right.type === ValueType.Number) {
      this.push(newNumber(left.value + right.value));
    } else if (left.type === ValueType.String && right.type === ValueType.String) {
      this.push(newString(left.value + right.value));
    } else {
      throw new VMError(`cannot add ${left.type} and ${right.type}`);
    }
  }

  private opArithmetic(op: ArithmeticOp): void {
    const right = this.pop();
    const left = this.pop();
    if (left.type !== ValueType.Number || right.type !== ValueType.Number) {
      throw new VMError(`cannot ${arithmeticVerbs[op]} ${left.type} and ${right.type}`);
    }
    const a = left.value;
    const b = right.value;
    switch (op) {
      case Op.Subtract:
        this.push(newNumber(a - b));
        break;
      case Op.Multiply:
        this.push(newNumber(a * b));
        break;
      case Op.Divide:
        if (b === 0) {
          throw new VMError("division by zero");
        }
        this.push(newNumber(a / b));
        break;
      case Op.Modulo:
        if (b === 0) {
          throw new VMError("modulo by zero");
        }
        this.push(newNumber(a % b));
        break;
    }
  }

  private opCompare(op: ComparisonOp): void {
    const right = this.pop();
    const left = this.pop();
    let order: number;
    if (left.type === ValueType.Number && right.type === ValueType.Number) {
      order = compare(left.value, right.value);
    } else if (left.type === ValueType.String && right.type === ValueType.String) {
      order = compare(left.value, right.value);
    } else {
      throw new VMError(`cannot compare ${left.type} and ${right.type}`);
    }
    switch (op) {
      case Op.Less:
        this.push(toBool(order < 0));
        break;
      case Op.LessEqual:
        this.push(toBool(order <= 0));
        break;
      case Op.Greater:
        this.push(toBool(order > 0));
        break;
      case Op.GreaterEqual:
        this.push(toBool(order >= 0));
        break;
    }
  }

  // ===========================================================================
  // Calls and Closures
  // ===========================================================================

  private opCall(argCount: number): void {
    const callee = this.peek(argCount);

    if (callee.type === ValueType.Closure) {
      this.callClosure(callee, argCount);
    } else if (callee.type === ValueType.Native) {
      this.callNative(callee, argCount);
    } else {
      throw new VMError(`cannot call ${callee.type}`);
    }
  }

  private callClosure(callee: ClosureValue, argCount: number): void {
    const closure = this.heap.getClosure(callee.handle);
    const fn = this.heap.getFunction(closure.fn.handle);
    if (argCount !== fn.arity) {
      throw new VMError(arityMessage(fn.arity, fn.arity, argCount));
    }
    if (this.frames.length >= this.maxFrames) {
      throw new VMError("stack overflow");
    }
    this.frames.push(new Frame(callee, fn, closure.upvalues, this.stack.length - argCount));
  }

  private callNative(callee: NativeValue, argCount: number): void {
    if (argCount < callee.minArity || argCount > callee.maxArity) {
      throw new VMError(`${callee.name}() ${arityMessage(callee.minArity, callee.maxArity, argCount)}`);
    }
    const args = this.stack.splice(this.stack.length - argCount, argCount);
    this.pop();
    this.push(callee.fn(args));
  }

  /**
   * Pop the frame and hand its result to the caller. Returns true when the
   * outermost frame returned.
   */
  private opReturn(): boolean {
    const result = this.pop();
    const frame = this.frames.pop();
    if (frame === undefined) {
      throw new VMError("no active frame");
    }
    this.closeUpvalues(frame.base);
    this.stack.length = frame.base - 1;

    if (this.frames.length === 0) {
      return true;
    }
    this.push(result);
    return false;
  }

  private opClosure(frame: Frame): void {
    const constant = this.readConstant(frame);
    if (constant.type !== ValueType.Function) {
      throw new VMError(`cannot make a closure from ${constant.type}`);
    }
    const fn = this.heap.getFunction(constant.handle);
    const cells = fn.upvalues.map((uv) =>
      uv.isLocal ? this.captureUpvalue(frame.base + uv.index) : frame.upvalues[uv.index]
    );
    this.push(this.heap.allocateClosure(new ClosureObject(constant, cells)));
  }

  /**
   * Cell for a stack slot, shared by every closure that captures it while
   * it is open.
   */
  private captureUpvalue(slot: number): UpvalueCell {
    let i = this.openUpvalues.length - 1;
    while (i >= 0 && this.openUpvalues[i].slot > slot) {
      i--;
    }
    if (i >= 0 && this.openUpvalues[i].slot === slot) {
      return this.openUpvalues[i];
    }
    const cell = new UpvalueCell(slot);
    this.openUpvalues.splice(i + 1, 0, cell);
    return cell;
  }

  /**
   * Close every open cell at or above `fromSlot`.
   */
  private closeUpvalues(fromSlot: number): void {
    while (this.openUpvalues.length > 0) {
      const cell = this.openUpvalues[this.openUpvalues.length - 1];
      if (cell.slot < fromSlot) {
        break;
      }
      cell.close(this.stack[cell.slot] ?? NIL);
      this.openUpvalues.pop();
    }
  }

  private readUpvalue(cell: UpvalueCell | undefined): Value {
    if (cell === undefined) {
      throw new VMError("upvalue index out of range");
    }
    return cell.open ? (this.stack[cell.slot] ?? NIL) : cell.closed;
  }

  private writeUpvalue(cell: UpvalueCell | undefined, value: Value): void {
    if (cell === undefined) {
      throw new VMError("upvalue index out of range");
    }
    if (cell.open) {
      this.stack[cell.slot] = value;
    } else {
      cell.set(value);
    }
  }

  // ===========================================================================
  // Garbage Collection
  // ===========================================================================

  private markRoots(marker: RootMarker): void {
    for (const value of this.stack) {
      marker.markValue(value);
    }
    for (const frame of this.frames) {
      marker.markValue(frame.closure);
    }
    for (const value of this.globals.values()) {
      marker.markValue(value);
    }
    for (const cell of this.openUpvalues) {
      const value = this.stack[cell.slot];
      if (value !== undefined) {
        marker.markValue(value);
      }
    }
  }

  private toVMError(err: unknown): VMError {
    if (err instanceof VMError) {
      return err;
    }
    if (err instanceof Error) {
      return new VMError(err.message);
    }
    return new VMError(String(err));
  }
}

function compare<T extends number | string>(a: T, b: T): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return a === b ? 0 : NaN;
}
