/**
 * TinyLang Runner - run source and bytecode files, compile source to
 * bytecode files and print listings.
 */

import * as fs from "fs";
import * as path from "path";
import { compile, CompileError } from "./compiler/compiler.js";
import { ErrorReporter } from "./errors/reporter.js";
import { Heap } from "./gc/heap.js";
import { optimizeFunction, formatStats } from "./optimizer/optimizer.js";
import { BytecodeFormatError, readFunction, writeChunk } from "./bytecode/serialize.js";
import { disassembleChunk, disassembleFunction, formatConstantTable, formatLineTable } from "./bytecode/disassemble.js";
import { VM, InterpretResult, type VMConfig } from "./vm/vm.js";
import { ValueType, type FunctionValue } from "./value/value.js";

/** Extension of persisted bytecode files. */
export const BYTECODE_EXTENSION = ".tbc";

/**
 * Process exit codes, after BSD sysexits.
 */
export const enum ExitCode {
  Ok = 0,
  Usage = 64,
  DataError = 65,
  Software = 70,
  IoError = 74,
}

/**
 * Where tools write. Both default to the console.
 */
export interface OutputSinks {
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/**
 * Options of the compile command.
 */
export interface CompileOptions extends OutputSinks {
  /** Output path. Defaults to `<stem>.tbc` in the working directory. */
  output?: string;
  /** Report each step and the optimizer statistics. */
  verbose?: boolean;
  /** Print a listing of the compiled code. */
  disassemble?: boolean;
  /** Run the peephole optimizer. Default true. */
  optimize?: boolean;
}

export function exitCodeFor(result: InterpretResult): ExitCode {
  switch (result) {
    case InterpretResult.Ok:
      return ExitCode.Ok;
    case InterpretResult.CompileError:
      return ExitCode.DataError;
    case InterpretResult.RuntimeError:
      return ExitCode.Software;
    case InterpretResult.IoError:
      return ExitCode.IoError;
  }
}

export function isBytecodePath(filepath: string): boolean {
  return path.extname(filepath) === BYTECODE_EXTENSION;
}

/**
 * Default output path of the compile command.
 */
export function defaultOutputPath(input: string): string {
  return `${path.parse(input).name}${BYTECODE_EXTENSION}`;
}

/**
 * Run code given as a string.
 */
export function runCode(code: string, config: VMConfig = {}): InterpretResult {
  return new VM(config).interpret(code, "<eval>");
}

/**
 * Run a source file, or a bytecode file when the path ends in `.tbc`.
 */
export function runFile(filepath: string, config: VMConfig = {}): InterpretResult {
  const vm = new VM(config);
  if (isBytecodePath(filepath)) {
    return runBytecodeFile(vm, filepath, config.stderr);
  }
  return vm.interpretFile(filepath);
}

/**
 * Load a bytecode file into `vm` and run it.
 */
export function runBytecodeFile(
  vm: VM,
  filepath: string,
  stderr: (text: string) => void = (text) => console.error(text)
): InterpretResult {
  const data = readInput(filepath, stderr);
  if (data === null) {
    return InterpretResult.IoError;
  }
  let fn: FunctionValue;
  try {
    fn = readFunction(data, vm.gcHeap);
  } catch (err) {
    if (err instanceof BytecodeFormatError) {
      stderr(`invalid bytecode file ${filepath}: ${err.message}`);
      return InterpretResult.CompileError;
    }
    throw err;
  }
  return vm.runFunction(fn);
}

/**
 * Compile a source file and write its top-level chunk as a bytecode file.
 */
export function compileFile(input: string, options: CompileOptions = {}): ExitCode {
  const stdout = options.stdout ?? ((text: string) => console.log(text));
  const stderr = options.stderr ?? ((text: string) => console.error(text));
  const output = options.output ?? defaultOutputPath(input);

  if (options.verbose) {
    stdout(`compiling ${input} -> ${output}`);
  }
  const data = readInput(input, stderr);
  if (data === null) {
    return ExitCode.IoError;
  }

  const heap = new Heap();
  const fn = compileSource(data.toString("utf-8"), input, heap, stderr);
  if (fn === null) {
    return ExitCode.DataError;
  }
  if (options.optimize ?? true) {
    const stats = optimizeFunction(heap, fn);
    if (options.verbose) {
      stdout(formatStats(stats));
    }
  }
  if (options.disassemble) {
    stdout(disassembleFunction(heap, fn));
  }

  const chunk = heap.getFunction(fn.handle).chunk;
  const nested = chunk.constants.filter((c) => c.type === ValueType.Function).length;
  if (nested > 0) {
    stderr(`warning: ${input}: ${nested} nested function(s) are stored as placeholders and cannot be called`);
  }

  const bytes = writeChunk(chunk);
  try {
    fs.writeFileSync(output, bytes);
  } catch (err) {
    stderr(`cannot write ${output}: ${err instanceof Error ? err.message : String(err)}`);
    return ExitCode.IoError;
  }
  if (options.verbose) {
    stdout(`wrote ${output}: ${bytes.length} bytes, ${chunk.code.length} code bytes, ${chunk.constants.length} constants`);
  }
  return ExitCode.Ok;
}

/**
 * Print a listing of a source file, or of a bytecode file together with
 * its constant and line tables.
 */
export function disassembleFile(filepath: string, options: OutputSinks & { optimize?: boolean } = {}): ExitCode {
  const stdout = options.stdout ?? ((text: string) => console.log(text));
  const stderr = options.stderr ?? ((text: string) => console.error(text));

  const data = readInput(filepath, stderr);
  if (data === null) {
    return ExitCode.IoError;
  }
  const heap = new Heap();

  if (isBytecodePath(filepath)) {
    let fn: FunctionValue;
    try {
      fn = readFunction(data, heap);
    } catch (err) {
      if (err instanceof BytecodeFormatError) {
        stderr(`invalid bytecode file ${filepath}: ${err.message}`);
        return ExitCode.DataError;
      }
      throw err;
    }
    const chunk = heap.getFunction(fn.handle).chunk;
    stdout([disassembleChunk(chunk, ""), formatConstantTable(chunk), formatLineTable(chunk)].join("\n\n"));
    return ExitCode.Ok;
  }

  const fn = compileSource(data.toString("utf-8"), filepath, heap, stderr);
  if (fn === null) {
    return ExitCode.DataError;
  }
  if (options.optimize ?? true) {
    optimizeFunction(heap, fn);
  }
  stdout(disassembleFunction(heap, fn));
  return ExitCode.Ok;
}

function compileSource(
  source: string,
  filename: string,
  heap: Heap,
  stderr: (text: string) => void
): FunctionValue | null {
  const reporter = new ErrorReporter(source, filename);
  try {
    return compile(source, { reporter, filename, heap });
  } catch (err) {
    if (err instanceof CompileError) {
      stderr(reporter.formatAll());
      return null;
    }
    throw err;
  }
}

function readInput(filepath: string, stderr: (text: string) => void): Buffer | null {
  try {
    return fs.readFileSync(filepath);
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    stderr(code === "ENOENT" ? `file not found: ${filepath}` : `cannot read ${filepath}: ${String(err)}`);
    return null;
  }
}
