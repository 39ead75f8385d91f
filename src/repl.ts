/**
 * TinyLang REPL - Read-Eval-Print Loop for interactive scripting.
 */

import * as readline from "readline";
import { VM } from "./vm/vm.js";
import { ValueType } from "./value/value.js";
import { VERSION } from "./version.js";

export const PROMPT = "tl> ";
export const CONTINUE_PROMPT = "... ";

const HELP = `REPL Commands:
  /help      Show this help
  /globals   List global variables
  /stack     Show the value stack
  /gc        Run the garbage collector
  /stats     Show execution and memory statistics
  /quit      Exit the REPL (also :quit)`;

export type CommandResult = "continue" | "quit";

export interface ReplOptions {
  input?: NodeJS.ReadableStream;
  /** Receives the prompts. */
  output?: NodeJS.WritableStream;
  /** Program output and command replies. Defaults to console.log. */
  stdout?: (text: string) => void;
  /** Diagnostics. Defaults to console.error. */
  stderr?: (text: string) => void;
}

/**
 * Check whether buffered input can be compiled: braces and parentheses
 * are balanced and no block comment is open.
 */
export function isComplete(input: string): boolean {
  let depth = 0;
  let quote: string | null = null;
  let i = 0;

  while (i < input.length) {
    const c = input[i];
    if (quote !== null) {
      if (c === "\\") {
        i += 2;
        continue;
      }
      // Strings end at the line end; the lexer reports the missing quote.
      if (c === quote || c === "\n") {
        quote = null;
      }
      i++;
      continue;
    }

    if (c === "/" && input[i + 1] === "/") {
      const end = input.indexOf("\n", i);
      if (end === -1) {
        break;
      }
      i = end;
      continue;
    }
    if (c === "/" && input[i + 1] === "*") {
      const end = input.indexOf("*/", i + 2);
      if (end === -1) {
        return false;
      }
      i = end + 2;
      continue;
    }

    switch (c) {
      case '"':
      case "'":
        quote = c;
        break;
      case "{":
      case "(":
        depth++;
        break;
      case "}":
      case ")":
        depth--;
        break;
    }
    i++;
  }

  return depth <= 0;
}

/**
 * Handle REPL commands.
 */
export function handleCommand(vm: VM, line: string, print: (text: string) => void): CommandResult {
  const [command = ""] = line.trim().split(/\s+/);

  switch (command) {
    case "/help":
      print(HELP);
      break;

    case "/globals": {
      const entries = [...vm.globalsSnapshot()]
        .filter(([, value]) => value.type !== ValueType.Native)
        .sort(([a], [b]) => a.localeCompare(b));
      print(entries.length === 0 ? "(no globals)" : entries.map(([name, value]) => `${name} = ${value.inspect()}`).join("\n"));
      break;
    }

    case "/stack": {
      const values = vm.stackSnapshot();
      print(values.length === 0 ? "(empty stack)" : values.map((value, i) => `[${i}] ${value.inspect()}`).join("\n"));
      break;
    }

    case "/gc": {
      const freed = vm.collectGarbage();
      print(`gc: freed ${freed} objects, ${vm.memoryUsage} bytes in use`);
      break;
    }

    case "/stats": {
      const stats = vm.gcHeap.stats();
      print(
        [
          `instructions: ${vm.instructionCount}`,
          `memory: ${stats.bytesAllocated} bytes in ${stats.liveObjects} objects`,
          `collections: ${stats.collections}, ${stats.objectsFreed} objects freed`,
        ].join("\n")
      );
      break;
    }

    case "/quit":
    case ":quit":
      return "quit";

    default:
      print(`unknown command: ${command} (type /help)`);
  }
  return "continue";
}

/**
 * Line-at-a-time REPL state: buffers input until it is complete, then runs
 * it on a VM whose globals persist between inputs.
 */
export class ReplSession {
  private buffer = "";

  constructor(
    readonly vm: VM,
    private readonly print: (text: string) => void
  ) {}

  get prompt(): string {
    return this.buffer === "" ? PROMPT : CONTINUE_PROMPT;
  }

  /**
   * Take one input line. Returns false when the session should end.
   */
  feed(line: string): boolean {
    const trimmed = line.trim();
    if (this.buffer === "") {
      if (trimmed === "") {
        return true;
      }
      if ((trimmed.startsWith("/") && !trimmed.startsWith("//") && !trimmed.startsWith("/*")) || trimmed.startsWith(":")) {
        return handleCommand(this.vm, trimmed, this.print) === "continue";
      }
    }

    this.buffer += `${line}\n`;
    if (!isComplete(this.buffer)) {
      return true;
    }
    const source = this.buffer;
    this.buffer = "";
    this.vm.interpret(source, "<repl>");
    return true;
  }
}

/**
 * Start the interactive REPL. Resolves when the input ends or the user
 * quits.
 */
export function startRepl(options: ReplOptions = {}): Promise<void> {
  const stdout = options.stdout ?? ((text: string) => console.log(text));
  const stderr = options.stderr ?? ((text: string) => console.error(text));
  const session = new ReplSession(new VM({ stdout, stderr, filename: "<repl>" }), stdout);

  const rl = readline.createInterface({
    input: options.input ?? process.stdin,
    output: options.output ?? process.stdout,
  });

  stdout(`TinyLang ${VERSION} - type /help for commands, /quit to exit`);

  return new Promise((resolve) => {
    rl.on("line", (line) => {
      if (!session.feed(line)) {
        rl.close();
        return;
      }
      rl.setPrompt(session.prompt);
      rl.prompt();
    });
    rl.on("close", () => {
      stdout("Goodbye!");
      resolve();
    });

    rl.setPrompt(session.prompt);
    rl.prompt();
  });
}
