#!/usr/bin/env node
/**
 * TinyLang CLI - run, compile and disassemble TinyLang programs.
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import { startRepl } from "./repl.js";
import {
  ExitCode,
  compileFile,
  disassembleFile,
  exitCodeFor,
  runCode,
  runFile,
  type CompileOptions,
  type OutputSinks,
} from "./runner.js";
import { VERSION } from "./version.js";

export const USAGE = `TinyLang v${VERSION}

Usage:
  tinylang                       Start interactive REPL
  tinylang <file.tl|file.tbc>    Run a source or bytecode file
  tinylang -e <code>             Evaluate code
  tinylang compile [options] <file.tl>
  tinylang disasm [-O0] <file.tl|file.tbc>

Compile options:
  -o, --output <file>   Output file (default: <stem>.tbc)
  -v, --verbose         Report progress and optimizer statistics
  -d, --disassemble     Print a listing of the compiled code
  -O0, --no-optimize    Disable the optimizer

Options:
  -h, --help            Show this help message
  --version             Show version`;

/**
 * A parsed command line.
 */
export type Command =
  | { kind: "repl" }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "eval"; code: string }
  | { kind: "run"; file: string }
  | { kind: "compile"; input: string; options: CompileOptions }
  | { kind: "disasm"; file: string; optimize: boolean };

/**
 * Invalid command line.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function parseArgs(args: readonly string[]): Command {
  if (args.length === 0) {
    return { kind: "repl" };
  }
  const [first, ...rest] = args;

  switch (first) {
    case "-h":
    case "--help":
      return { kind: "help" };
    case "--version":
      return { kind: "version" };
    case "-e":
    case "--eval":
      if (rest.length !== 1) {
        throw new UsageError(rest.length === 0 ? "-e requires an argument" : `unexpected argument: ${rest[1]}`);
      }
      return { kind: "eval", code: rest[0] };
    case "compile":
      return parseCompile(rest);
    case "disasm":
      return parseDisasm(rest);
  }

  if (first.startsWith("-")) {
    throw new UsageError(`unknown option: ${first}`);
  }
  if (rest.length > 0) {
    throw new UsageError(`unexpected argument: ${rest[0]}`);
  }
  return { kind: "run", file: first };
}

function parseCompile(args: readonly string[]): Command {
  const options: CompileOptions = {};
  const inputs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-o":
      case "--output":
        if (i + 1 >= args.length) {
          throw new UsageError(`${arg} requires an output filename`);
        }
        options.output = args[++i];
        break;
      case "-v":
      case "--verbose":
        options.verbose = true;
        break;
      case "-d":
      case "--disassemble":
        options.disassemble = true;
        break;
      case "-O0":
      case "--no-optimize":
        options.optimize = false;
        break;
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`unknown option: ${arg}`);
        }
        inputs.push(arg);
    }
  }

  if (inputs.length !== 1) {
    throw new UsageError(inputs.length === 0 ? "no input file" : "multiple input files are not supported");
  }
  return { kind: "compile", input: inputs[0], options };
}

function parseDisasm(args: readonly string[]): Command {
  let optimize = true;
  const files: string[] = [];
  for (const arg of args) {
    if (arg === "-O0" || arg === "--no-optimize") {
      optimize = false;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`unknown option: ${arg}`);
    } else {
      files.push(arg);
    }
  }
  if (files.length !== 1) {
    throw new UsageError(files.length === 0 ? "no input file" : "multiple input files are not supported");
  }
  return { kind: "disasm", file: files[0], optimize };
}

/**
 * Run the CLI and return the process exit code.
 */
export async function main(args: readonly string[], sinks: OutputSinks = {}): Promise<ExitCode> {
  const stdout = sinks.stdout ?? ((text: string) => console.log(text));
  const stderr = sinks.stderr ?? ((text: string) => console.error(text));

  let command: Command;
  try {
    command = parseArgs(args);
  } catch (err) {
    if (err instanceof UsageError) {
      stderr(`error: ${err.message}`);
      stderr(USAGE);
      return ExitCode.Usage;
    }
    throw err;
  }

  switch (command.kind) {
    case "help":
      stdout(USAGE);
      return ExitCode.Ok;
    case "version":
      stdout(`tinylang ${VERSION}`);
      return ExitCode.Ok;
    case "eval":
      return exitCodeFor(runCode(command.code, { stdout, stderr }));
    case "run":
      return exitCodeFor(runFile(command.file, { stdout, stderr }));
    case "compile":
      return compileFile(command.input, { ...command.options, stdout, stderr });
    case "disasm":
      return disassembleFile(command.file, { stdout, stderr, optimize: command.optimize });
    case "repl":
      await startRepl({ stdout, stderr });
      return ExitCode.Ok;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && fs.existsSync(script) && fs.realpathSync(script) === fileURLToPath(import.meta.url);
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = ExitCode.Software;
    }
  );
}
