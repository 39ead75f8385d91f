/**
 * Diagnostic collection and formatting shared by the lexer, parser and
 * compiler.
 */

import { Position, lineNumber, columnNumber } from "../token/token.js";

/**
 * Error categories, in pipeline order.
 */
export const enum ErrorKind {
  Lexical = "LEXICAL",
  Syntax = "SYNTAX",
  Semantic = "SEMANTIC",
  Runtime = "RUNTIME",
}

/**
 * A single reported problem. Line and column are 1-indexed; 0 means unknown.
 */
export interface Diagnostic {
  kind: ErrorKind;
  message: string;
  line: number;
  column: number;
}

/**
 * Collects diagnostics for one source text.
 *
 * Every stage reports into the same reporter so that a single run lists
 * lexical, syntax and semantic problems together.
 */
export class ErrorReporter {
  private readonly diagnostics: Diagnostic[] = [];

  constructor(
    readonly source: string = "",
    readonly filename: string = "<input>"
  ) {}

  /**
   * Record a diagnostic at a source position (or at an unknown location).
   */
  report(kind: ErrorKind, message: string, pos?: Position): void {
    this.diagnostics.push({
      kind,
      message,
      line: pos ? lineNumber(pos) : 0,
      column: pos ? columnNumber(pos) : 0,
    });
  }

  hasErrors(): boolean {
    return this.diagnostics.length > 0;
  }

  get errors(): readonly Diagnostic[] {
    return this.diagnostics;
  }

  count(kind: ErrorKind): number {
    return this.diagnostics.filter((d) => d.kind === kind).length;
  }

  clear(): void {
    this.diagnostics.length = 0;
  }

  /**
   * Render a diagnostic with the offending source line and a caret.
   */
  format(diagnostic: Diagnostic): string {
    let out = `[${diagnostic.kind} ERROR]`;
    if (diagnostic.line > 0) {
      out += ` at line ${diagnostic.line}`;
      if (diagnostic.column > 0) {
        out += `, column ${diagnostic.column}`;
      }
    }
    out += `: ${diagnostic.message}`;

    const text = this.lineAt(diagnostic.line);
    if (text !== "") {
      out += `\n${text}`;
      if (diagnostic.column > 0) {
        out += `\n${" ".repeat(diagnostic.column - 1)}^`;
      }
    }
    return out;
  }

  formatAll(): string {
    return this.diagnostics.map((d) => this.format(d)).join("\n");
  }

  /**
   * Source text of a 1-indexed line, without its terminator.
   */
  lineAt(line: number): string {
    if (line <= 0 || this.source === "") {
      return "";
    }
    const lines = this.source.split("\n");
    const text = lines[line - 1];
    return text === undefined ? "" : text.replace(/\r$/, "");
  }
}
