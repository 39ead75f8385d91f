/**
 * Single-pass bytecode compiler for TinyLang.
 *
 * Walks the AST once, resolving names as it goes: locals of the current
 * function first, then variables captured from enclosing functions, then
 * globals by name at run time.
 */

import * as ast from "../ast/nodes.js";
import { lineNumber, type Position } from "../token/token.js";
import { Op } from "../bytecode/opcode.js";
import { Chunk, ChunkError, MAX_JUMP } from "../bytecode/chunk.js";
import { ErrorKind, ErrorReporter, type Diagnostic } from "../errors/reporter.js";
import { FunctionObject, type UpvalueDescriptor } from "../gc/objects.js";
import { Heap } from "../gc/heap.js";
import { Lexer } from "../lexer/lexer.js";
import { Parser } from "../parser/parser.js";
import {
  NIL,
  ValueType,
  newNumber,
  newString,
  toBool,
  valuesEqual,
  type FunctionValue,
  type Value,
} from "../value/value.js";

/**
 * Raised by `compile()` when any lexical, syntax or semantic error was
 * reported. Carries every diagnostic of the run.
 */
export class CompileError extends Error {
  constructor(
    message: string,
    public readonly diagnostics: readonly Diagnostic[]
  ) {
    super(message);
    this.name = "CompileError";
  }
}

/**
 * Compiler configuration.
 */
export interface CompilerConfig {
  /** Source code, used when formatting diagnostics. */
  source?: string;
  /** Source filename. */
  filename?: string;
  /** Shared diagnostics sink. A fresh one is created when omitted. */
  reporter?: ErrorReporter;
  /** Heap that receives the compiled functions. */
  heap?: Heap;
  /** Evaluate operations over literal operands at compile time. Default true. */
  foldConstants?: boolean;
}

/** Most locals one function can address with a one-byte slot. */
export const MAX_LOCALS = 256;
/** Most upvalues one function can capture. */
export const MAX_UPVALUES = 256;
/** Most parameters or call arguments. */
export const MAX_ARGS = 255;

/**
 * Placeholder value for forward jumps.
 */
const PLACEHOLDER = 0xffff;

/** Name given to function literals without one. */
export const ANONYMOUS = "anonymous";

interface Local {
  name: string;
  /** Scope depth, or -1 while the initializer is being compiled. */
  depth: number;
  isCaptured: boolean;
}

interface LoopContext {
  /** Scope depth outside the loop body; deeper locals are discarded on exit. */
  depth: number;
  /** Backward target for `continue`, or null when it is patched later. */
  continueTarget: number | null;
  continueJumps: number[];
  breakJumps: number[];
}

type FunctionKind = "script" | "function";

/**
 * Per-function compilation state. States form a chain through `enclosing`
 * while nested functions compile.
 */
class FunctionState {
  readonly chunk = new Chunk();
  readonly locals: Local[] = [];
  readonly upvalues: UpvalueDescriptor[] = [];
  readonly loops: LoopContext[] = [];
  scopeDepth = 0;
  arity = 0;

  constructor(
    readonly enclosing: FunctionState | null,
    readonly kind: FunctionKind,
    readonly name: string
  ) {}
}

/**
 * Bytecode compiler for TinyLang.
 */
export class Compiler {
  private current: FunctionState;
  private readonly reporter: ErrorReporter;
  private readonly heap: Heap;
  private readonly foldConstants: boolean;
  private line = 1;

  constructor(config: CompilerConfig = {}) {
    this.reporter = config.reporter ?? new ErrorReporter(config.source ?? "", config.filename ?? "<input>");
    this.heap = config.heap ?? new Heap();
    this.foldConstants = config.foldConstants ?? true;
    this.current = new FunctionState(null, "script", "");
  }

  /**
   * Compile a program into its top-level function.
   *
   * Throws CompileError when this or an earlier stage reported errors.
   */
  compile(program: ast.Program): FunctionValue {
    // Functions already allocated are reachable only through the constant
    // pools of chunks still being compiled.
    const removeRoots = this.heap.addRootProvider((marker) => {
      for (let state: FunctionState | null = this.current; state; state = state.enclosing) {
        for (const constant of state.chunk.constants) {
          marker.markValue(constant);
        }
      }
    });

    try {
      for (const stmt of program.stmts) {
        this.compileStatement(stmt);
      }
      const script = this.endFunction();
      if (this.reporter.hasErrors()) {
        throw new CompileError(this.reporter.formatAll(), [...this.reporter.errors]);
      }
      return script;
    } finally {
      removeRoots();
    }
  }

  // ===========================================================================
  // Statement Compilation
  // ===========================================================================

  private compileStatement(stmt: ast.Stmt): void {
    this.line = lineNumber(stmt.pos());

    switch (stmt.kind) {
      case "VarStmt":
        this.compileVarStmt(stmt);
        break;
      case "FuncDecl":
        this.compileFuncDecl(stmt);
        break;
      case "ExprStmt":
        this.compileExpr(stmt.expr);
        this.emit(Op.Pop);
        break;
      case "PrintStmt":
        this.compileExpr(stmt.value);
        this.emit(Op.Print);
        break;
      case "Block":
        this.beginScope();
        this.compileBlockBody(stmt);
        this.endScope();
        break;
      case "IfStmt":
        this.compileIfStmt(stmt);
        break;
      case "WhileStmt":
        this.compileWhileStmt(stmt);
        break;
      case "ForStmt":
        this.compileForStmt(stmt);
        break;
      case "BreakStmt":
        this.compileBreak(stmt);
        break;
      case "ContinueStmt":
        this.compileContinue(stmt);
        break;
      case "ReturnStmt":
        this.compileReturnStmt(stmt);
        break;
    }
  }

  private compileBlockBody(block: ast.Block): void {
    for (const stmt of block.stmts) {
      this.compileStatement(stmt);
    }
    this.line = lineNumber(block.rbrace);
  }

  private compileVarStmt(stmt: ast.VarStmt): void {
    const name = stmt.name.name;
    if (this.current.scopeDepth === 0) {
      this.compileInitializer(stmt);
      this.emit1(Op.DefineGlobal, this.identifierConstant(name));
      return;
    }
    this.declareLocal(name, stmt.name.position);
    this.compileInitializer(stmt);
    this.markInitialized();
  }

  private compileInitializer(stmt: ast.VarStmt): void {
    if (stmt.value) {
      this.compileExpr(stmt.value);
    } else {
      this.emit(Op.Nil);
    }
  }

  private compileFuncDecl(stmt: ast.FuncDecl): void {
    const name = stmt.name.name;
    if (this.current.scopeDepth === 0) {
      this.compileFunction(stmt.fn, name);
      this.emit1(Op.DefineGlobal, this.identifierConstant(name));
      return;
    }
    // Initialized up front so the body can refer to itself.
    this.declareLocal(name, stmt.name.position);
    this.markInitialized();
    this.compileFunction(stmt.fn, name);
  }

  private compileIfStmt(stmt: ast.IfStmt): void {
    this.compileExpr(stmt.condition);
    const thenJump = this.emitJump(Op.JumpIfFalse);
    this.emit(Op.Pop);
    this.compileStatement(stmt.consequence);

    const elseJump = this.emitJump(Op.Jump);
    this.patchJump(thenJump);
    this.emit(Op.Pop);
    if (stmt.alternative) {
      this.compileStatement(stmt.alternative);
    }
    this.patchJump(elseJump);
  }

  private compileWhileStmt(stmt: ast.WhileStmt): void {
    const loopStart = this.current.chunk.length;
    const loop = this.pushLoop(loopStart);

    this.compileExpr(stmt.condition);
    const exitJump = this.emitJump(Op.JumpIfFalse);
    this.emit(Op.Pop);
    this.compileStatement(stmt.body);
    this.emitLoop(loopStart);

    this.patchJump(exitJump);
    this.emit(Op.Pop);
    this.popLoop(loop);
  }

  /**
   * `for (init; cond; post) body` runs as a while loop inside its own scope,
   * with `continue` landing on the post expression.
   */
  private compileForStmt(stmt: ast.ForStmt): void {
    this.beginScope();
    if (stmt.init) {
      this.compileStatement(stmt.init);
    }

    const loopStart = this.current.chunk.length;
    const loop = this.pushLoop(null);

    let exitJump = -1;
    if (stmt.condition) {
      this.compileExpr(stmt.condition);
      exitJump = this.emitJump(Op.JumpIfFalse);
      this.emit(Op.Pop);
    }

    this.compileStatement(stmt.body);

    for (const jump of loop.continueJumps) {
      this.patchJump(jump);
    }
    if (stmt.post) {
      this.line = lineNumber(stmt.post.pos());
      this.compileExpr(stmt.post);
      this.emit(Op.Pop);
    }
    this.emitLoop(loopStart);

    if (exitJump >= 0) {
      this.patchJump(exitJump);
      this.emit(Op.Pop);
    }
    this.popLoop(loop);
    this.endScope();
  }

  private compileBreak(stmt: ast.BreakStmt): void {
    const loop = this.currentLoop();
    if (!loop) {
      this.error("'break' outside a loop", stmt.position);
      return;
    }
    this.discardLoopLocals(loop);
    loop.breakJumps.push(this.emitJump(Op.Jump));
  }

  private compileContinue(stmt: ast.ContinueStmt): void {
    const loop = this.currentLoop();
    if (!loop) {
      this.error("'continue' outside a loop", stmt.position);
      return;
    }
    this.discardLoopLocals(loop);
    if (loop.continueTarget === null) {
      loop.continueJumps.push(this.emitJump(Op.Jump));
    } else {
      this.emitLoop(loop.continueTarget);
    }
  }

  private compileReturnStmt(stmt: ast.ReturnStmt): void {
    if (this.current.kind === "script") {
      this.error("cannot return from top-level code", stmt.returnPos);
      return;
    }
    if (stmt.value) {
      this.compileExpr(stmt.value);
    } else {
      this.emit(Op.Nil);
    }
    this.emit(Op.Return);
  }

  // ===========================================================================
  // Expression Compilation
  // ===========================================================================

  private compileExpr(expr: ast.Expr): void {
    this.line = lineNumber(expr.pos());

    switch (expr.kind) {
      case "NumberLit":
        this.emitConstant(newNumber(expr.value));
        break;
      case "StringLit":
        this.emitConstant(newString(expr.value));
        break;
      case "BoolLit":
        this.emit(expr.value ? Op.True : Op.False);
        break;
      case "NilLit":
        this.emit(Op.Nil);
        break;
      case "Ident":
        this.compileIdent(expr);
        break;
      case "PrefixExpr":
        this.compilePrefixExpr(expr);
        break;
      case "InfixExpr":
        this.compileInfixExpr(expr);
        break;
      case "AssignExpr":
        this.compileAssignExpr(expr);
        break;
      case "CallExpr":
        this.compileCallExpr(expr);
        break;
      case "FuncLit":
        this.compileFunction(expr, expr.name ? expr.name.name : ANONYMOUS);
        break;
    }
  }

  private compileIdent(expr: ast.Ident): void {
    const slot = this.resolveLocal(this.current, expr.name, expr.position);
    if (slot >= 0) {
      this.emit1(Op.GetLocal, slot);
      return;
    }
    const upvalue = this.resolveUpvalue(this.current, expr.name, expr.position);
    if (upvalue >= 0) {
      this.emit1(Op.GetUpvalue, upvalue);
      return;
    }
    this.emit1(Op.GetGlobal, this.identifierConstant(expr.name));
  }

  private compileAssignExpr(expr: ast.AssignExpr): void {
    this.compileExpr(expr.value);
    this.line = lineNumber(expr.opPos);

    const name = expr.target.name;
    const slot = this.resolveLocal(this.current, name, expr.target.position);
    if (slot >= 0) {
      this.emit1(Op.SetLocal, slot);
      return;
    }
    const upvalue = this.resolveUpvalue(this.current, name, expr.target.position);
    if (upvalue >= 0) {
      this.emit1(Op.SetUpvalue, upvalue);
      return;
    }
    this.emit1(Op.SetGlobal, this.identifierConstant(name));
  }

  private compilePrefixExpr(expr: ast.PrefixExpr): void {
    if (this.emitFolded(expr)) {
      return;
    }
    this.compileExpr(expr.right);
    this.line = lineNumber(expr.opPos);
    this.emit(expr.op === "-" ? Op.Negate : Op.Not);
  }

  private compileInfixExpr(expr: ast.InfixExpr): void {
    if (expr.op === "&&") {
      this.compileExpr(expr.left);
      this.line = lineNumber(expr.opPos);
      const endJump = this.emitJump(Op.JumpIfFalse);
      this.emit(Op.Pop);
      this.compileExpr(expr.right);
      this.patchJump(endJump);
      return;
    }

    if (expr.op === "||") {
      this.compileExpr(expr.left);
      this.line = lineNumber(expr.opPos);
      const elseJump = this.emitJump(Op.JumpIfFalse);
      const endJump = this.emitJump(Op.Jump);
      this.patchJump(elseJump);
      this.emit(Op.Pop);
      this.compileExpr(expr.right);
      this.patchJump(endJump);
      return;
    }

    if (this.emitFolded(expr)) {
      return;
    }

    this.compileExpr(expr.left);
    this.compileExpr(expr.right);
    this.line = lineNumber(expr.opPos);
    this.emit(binaryOpcode(expr.op));
  }

  private compileCallExpr(expr: ast.CallExpr): void {
    this.compileExpr(expr.fn);
    if (expr.args.length > MAX_ARGS) {
      this.error(`cannot have more than ${MAX_ARGS} arguments`, expr.lparen);
    }
    for (const arg of expr.args) {
      this.compileExpr(arg);
    }
    this.line = lineNumber(expr.lparen);
    this.emit1(Op.Call, Math.min(expr.args.length, MAX_ARGS));
  }

  /**
   * Compile a function body in a nested state and emit the closure that
   * wraps it in the enclosing chunk.
   */
  private compileFunction(fn: ast.FuncLit, name: string): void {
    const line = this.line;
    this.current = new FunctionState(this.current, "function", name);
    this.beginScope();

    if (fn.params.length > MAX_ARGS) {
      this.error(`cannot have more than ${MAX_ARGS} parameters`, fn.params[MAX_ARGS].position);
    }
    this.current.arity = Math.min(fn.params.length, MAX_ARGS);
    for (const param of fn.params) {
      this.declareLocal(param.name, param.position);
      this.markInitialized();
    }

    this.compileBlockBody(fn.body);
    const value = this.endFunction();

    this.line = line;
    this.emit1(Op.Closure, this.makeConstant(value, fn.funcPos));
  }

  /**
   * Finish the current function: append the implicit `return nil`, move it
   * to the heap and restore the enclosing state.
   */
  private endFunction(): FunctionValue {
    this.emit(Op.Nil);
    this.emit(Op.Return);

    const state = this.current;
    const value = this.heap.allocateFunction(
      new FunctionObject(state.name, state.arity, state.chunk, state.upvalues)
    );
    if (state.enclosing) {
      this.current = state.enclosing;
    }
    return value;
  }

  // ===========================================================================
  // Constant Folding
  // ===========================================================================

  /**
   * Emit a single constant for an operation over literal operands. Returns
   * false when folding is off or the operation cannot be folded.
   */
  private emitFolded(expr: ast.PrefixExpr | ast.InfixExpr): boolean {
    if (!this.foldConstants) {
      return false;
    }
    const value = foldExpr(expr);
    if (value === null) {
      return false;
    }
    this.emitConstant(value);
    return true;
  }

  // ===========================================================================
  // Scopes and Variables
  // ===========================================================================

  private beginScope(): void {
    this.current.scopeDepth++;
  }

  /**
   * Leave a scope, discarding its locals innermost first. Captured locals
   * are closed instead of popped.
   */
  private endScope(): void {
    const state = this.current;
    state.scopeDepth--;
    while (state.locals.length > 0 && state.locals[state.locals.length - 1].depth > state.scopeDepth) {
      const local = state.locals.pop();
      this.emit(local?.isCaptured ? Op.CloseUpvalue : Op.Pop);
    }
  }

  private declareLocal(name: string, pos: Position): void {
    const state = this.current;
    for (let i = state.locals.length - 1; i >= 0; i--) {
      const local = state.locals[i];
      if (local.depth !== -1 && local.depth < state.scopeDepth) {
        break;
      }
      if (local.name === name) {
        this.error(`duplicate local '${name}' in this scope`, pos);
        break;
      }
    }
    if (state.locals.length >= MAX_LOCALS) {
      this.error("too many local variables in function", pos);
      return;
    }
    state.locals.push({ name, depth: -1, isCaptured: false });
  }

  private markInitialized(): void {
    const state = this.current;
    if (state.locals.length > 0) {
      state.locals[state.locals.length - 1].depth = state.scopeDepth;
    }
  }

  private resolveLocal(state: FunctionState, name: string, pos: Position): number {
    for (let i = state.locals.length - 1; i >= 0; i--) {
      const local = state.locals[i];
      if (local.name === name) {
        if (local.depth === -1) {
          this.error(`cannot read local variable '${name}' in its own initializer`, pos);
        }
        return i;
      }
    }
    return -1;
  }

  private resolveUpvalue(state: FunctionState, name: string, pos: Position): number {
    const enclosing = state.enclosing;
    if (!enclosing) {
      return -1;
    }
    const local = this.resolveLocal(enclosing, name, pos);
    if (local >= 0) {
      enclosing.locals[local].isCaptured = true;
      return this.addUpvalue(state, local, true, pos);
    }
    const upvalue = this.resolveUpvalue(enclosing, name, pos);
    if (upvalue >= 0) {
      return this.addUpvalue(state, upvalue, false, pos);
    }
    return -1;
  }

  private addUpvalue(state: FunctionState, index: number, isLocal: boolean, pos: Position): number {
    const existing = state.upvalues.findIndex((uv) => uv.index === index && uv.isLocal === isLocal);
    if (existing >= 0) {
      return existing;
    }
    if (state.upvalues.length >= MAX_UPVALUES) {
      this.error("too many captured variables in function", pos);
      return 0;
    }
    state.upvalues.push({ isLocal, index });
    return state.upvalues.length - 1;
  }

  // ===========================================================================
  // Loops
  // ===========================================================================

  private pushLoop(continueTarget: number | null): LoopContext {
    const loop: LoopContext = {
      depth: this.current.scopeDepth,
      continueTarget,
      continueJumps: [],
      breakJumps: [],
    };
    this.current.loops.push(loop);
    return loop;
  }

  private popLoop(loop: LoopContext): void {
    for (const jump of loop.breakJumps) {
      this.patchJump(jump);
    }
    this.current.loops.pop();
  }

  private currentLoop(): LoopContext | undefined {
    const loops = this.current.loops;
    return loops[loops.length - 1];
  }

  /**
   * Emit the pops for locals declared inside the loop, leaving the compile
   * time scope untouched.
   */
  private discardLoopLocals(loop: LoopContext): void {
    const locals = this.current.locals;
    for (let i = locals.length - 1; i >= 0 && locals[i].depth > loop.depth; i--) {
      this.emit(locals[i].isCaptured ? Op.CloseUpvalue : Op.Pop);
    }
  }

  // ===========================================================================
  // Helper Methods
  // ===========================================================================

  private emit(op: Op): number {
    return this.current.chunk.emit(op, this.line);
  }

  private emit1(op: Op, operand: number): number {
    return this.current.chunk.emit1(op, operand, this.line);
  }

  private emitConstant(value: Value): void {
    this.emit1(Op.Constant, this.makeConstant(value));
  }

  private makeConstant(value: Value, pos?: Position): number {
    try {
      return this.current.chunk.addConstant(value);
    } catch (err) {
      if (err instanceof ChunkError) {
        this.error(err.message, pos);
        return 0;
      }
      throw err;
    }
  }

  private identifierConstant(name: string): number {
    return this.makeConstant(newString(name));
  }

  private emitJump(op: Op): number {
    return this.current.chunk.emit2(op, PLACEHOLDER, this.line);
  }

  /**
   * Point the forward jump at `offset` to the next instruction emitted.
   */
  private patchJump(offset: number): void {
    const chunk = this.current.chunk;
    const distance = chunk.length - (offset + 3);
    if (distance > MAX_JUMP) {
      this.error("jump distance too large");
      return;
    }
    chunk.patchJump(offset + 1, distance);
  }

  private emitLoop(loopStart: number): void {
    const distance = this.current.chunk.length + 3 - loopStart;
    if (distance > MAX_JUMP) {
      this.error("loop body too large");
      this.current.chunk.emit2(Op.Loop, 0, this.line);
      return;
    }
    this.current.chunk.emit2(Op.Loop, distance, this.line);
  }

  private error(message: string, pos?: Position): void {
    if (pos) {
      this.reporter.report(ErrorKind.Semantic, message, pos);
      return;
    }
    this.reporter.report(ErrorKind.Semantic, `${message} (line ${this.line})`);
  }
}

function binaryOpcode(op: ast.BinaryOp): Op {
  switch (op) {
    case "+":
      return Op.Add;
    case "-":
      return Op.Subtract;
    case "*":
      return Op.Multiply;
    case "/":
      return Op.Divide;
    case "%":
      return Op.Modulo;
    case "==":
      return Op.Equal;
    case "!=":
      return Op.NotEqual;
    case "<":
      return Op.Less;
    case "<=":
      return Op.LessEqual;
    case ">":
      return Op.Greater;
    case ">=":
      return Op.GreaterEqual;
    case "&&":
    case "||":
      throw new Error(`operator ${op} has no single opcode`);
  }
}

/**
 * Evaluate an expression built only from literals. Returns null when some
 * operand is not constant or the operation would fail at run time.
 */
export function foldExpr(expr: ast.Expr): Value | null {
  switch (expr.kind) {
    case "NumberLit":
      return newNumber(expr.value);
    case "StringLit":
      return newString(expr.value);
    case "BoolLit":
      return toBool(expr.value);
    case "NilLit":
      return NIL;
    case "PrefixExpr": {
      const right = foldExpr(expr.right);
      if (right === null) {
        return null;
      }
      if (expr.op === "!") {
        return toBool(!right.isTruthy());
      }
      return right.type === ValueType.Number ? newNumber(-right.value) : null;
    }
    case "InfixExpr": {
      if (expr.op === "&&" || expr.op === "||") {
        return null;
      }
      const left = foldExpr(expr.left);
      const right = left === null ? null : foldExpr(expr.right);
      if (left === null || right === null) {
        return null;
      }
      return foldBinary(expr.op, left, right);
    }
    default:
      return null;
  }
}

/**
 * Apply an arithmetic operator to two constants the way the VM would.
 * Returns null for type errors and for division or modulo by zero.
 */
export function foldArithmetic(op: Op, left: Value, right: Value): Value | null {
  if (op === Op.Add && left.type === ValueType.String && right.type === ValueType.String) {
    return newString(left.value + right.value);
  }
  if (left.type !== ValueType.Number || right.type !== ValueType.Number) {
    return null;
  }
  const a = left.value;
  const b = right.value;
  switch (op) {
    case Op.Add:
      return newNumber(a + b);
    case Op.Subtract:
      return newNumber(a - b);
    case Op.Multiply:
      return newNumber(a * b);
    case Op.Divide:
      return b === 0 ? null : newNumber(a / b);
    case Op.Modulo:
      return b === 0 ? null : newNumber(a % b);
    default:
      return null;
  }
}

function foldBinary(op: ast.BinaryOp, left: Value, right: Value): Value | null {
  switch (op) {
    case "==":
      return toBool(valuesEqual(left, right));
    case "!=":
      return toBool(!valuesEqual(left, right));
    case "<":
    case "<=":
    case ">":
    case ">=":
      return foldComparison(op, left, right);
    case "&&":
    case "||":
      return null;
    default:
      return foldArithmetic(binaryOpcode(op), left, right);
  }
}

function foldComparison(op: "<" | "<=" | ">" | ">=", left: Value, right: Value): Value | null {
  let order: number;
  if (left.type === ValueType.Number && right.type === ValueType.Number) {
    order = compareOrder(left.value, right.value);
  } else if (left.type === ValueType.String && right.type === ValueType.String) {
    order = compareOrder(left.value, right.value);
  } else {
    return null;
  }
  switch (op) {
    case "<":
      return toBool(order < 0);
    case "<=":
      return toBool(order <= 0);
    case ">":
      return toBool(order > 0);
    case ">=":
      return toBool(order >= 0);
  }
}

/**
 * -1, 0 or 1; NaN when the operands are unordered.
 */
function compareOrder<T extends number | string>(a: T, b: T): number {
  if (a < b) {
    return -1;
  }
  if (a > b) {
    return 1;
  }
  return a === b ? 0 : NaN;
}

/**
 * Parse and compile source code into its top-level function.
 *
 * Lexical, syntax and semantic errors are all collected in one reporter;
 * any of them makes this throw CompileError.
 */
export function compile(source: string, config: CompilerConfig = {}): FunctionValue {
  const reporter = config.reporter ?? new ErrorReporter(source, config.filename ?? "<input>");
  const lexer = new Lexer(source, config.filename, reporter);
  const program = new Parser(lexer, reporter).parse();
  const compiler = new Compiler({ ...config, source, reporter });
  return compiler.compile(program);
}
