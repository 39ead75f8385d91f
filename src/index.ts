/**
 * TinyLang - a small scripting language with a bytecode compiler, a peephole
 * optimizer, a stack VM and a mark-and-sweep collector.
 *
 * @packageDocumentation
 */

// Token exports
export { TokenKind, newToken, newPosition, NoPos, lineNumber, columnNumber, lookupIdentifier } from "./token/token.js";
export type { Token, Position } from "./token/token.js";

// Diagnostics
export { ErrorKind, ErrorReporter } from "./errors/reporter.js";
export type { Diagnostic } from "./errors/reporter.js";

// Lexer exports
export { Lexer, LexerError, tokenize } from "./lexer/lexer.js";

// AST exports
export * from "./ast/nodes.js";

// Parser exports
export { Parser, ParserError, parse } from "./parser/parser.js";
export { Precedence, getPrecedence } from "./parser/precedence.js";

// Values and heap
export * from "./value/value.js";
export { Heap, HeapError } from "./gc/heap.js";
export type { HeapConfig, HeapStats, RootMarker, RootProvider } from "./gc/heap.js";
export { FunctionObject, ClosureObject, UpvalueCell } from "./gc/objects.js";
export type { HeapObject, UpvalueDescriptor } from "./gc/objects.js";

// Bytecode exports
export * from "./bytecode/index.js";

// Compiler exports
export * from "./compiler/index.js";

// Optimizer exports
export { optimizeChunk, optimizeFunction, formatStats, reductionRatio, emptyStats } from "./optimizer/optimizer.js";
export type { OptimizerStats } from "./optimizer/optimizer.js";

// VM exports
export * from "./vm/index.js";

// Builtins exports
export * from "./builtins/index.js";

// Runner exports
export {
  runFile,
  runCode,
  runBytecodeFile,
  compileFile,
  disassembleFile,
  exitCodeFor,
  ExitCode,
  BYTECODE_EXTENSION,
} from "./runner.js";
export type { CompileOptions, OutputSinks } from "./runner.js";

// REPL export
export { startRepl, ReplSession } from "./repl.js";
export type { ReplOptions } from "./repl.js";

export { VERSION } from "./version.js";
