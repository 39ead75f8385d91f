import { describe, it, expect } from "vitest";
import { ErrorKind, ErrorReporter } from "./reporter.js";
import { newPosition } from "../token/token.js";

describe("ErrorReporter", () => {
  it("should start empty", () => {
    const reporter = new ErrorReporter();
    expect(reporter.hasErrors()).toBe(false);
    expect(reporter.errors).toEqual([]);
  });

  it("should convert positions to 1-indexed lines and columns", () => {
    const reporter = new ErrorReporter("let x = 1;\nlet y = ;");
    reporter.report(ErrorKind.Syntax, "unexpected ';'", newPosition(19, 11, 1, 8, "<test>"));
    expect(reporter.errors).toEqual([
      { kind: ErrorKind.Syntax, message: "unexpected ';'", line: 2, column: 9 },
    ]);
  });

  it("should count diagnostics by kind", () => {
    const reporter = new ErrorReporter();
    reporter.report(ErrorKind.Lexical, "a");
    reporter.report(ErrorKind.Semantic, "b");
    reporter.report(ErrorKind.Semantic, "c");
    expect(reporter.count(ErrorKind.Semantic)).toBe(2);
    expect(reporter.count(ErrorKind.Syntax)).toBe(0);
    reporter.clear();
    expect(reporter.hasErrors()).toBe(false);
  });

  describe("format", () => {
    it("should render the source line and a caret", () => {
      const reporter = new ErrorReporter("let x = 1;\nlet y = ;");
      reporter.report(ErrorKind.Syntax, "unexpected ';'", newPosition(19, 11, 1, 8, "<test>"));
      expect(reporter.format(reporter.errors[0])).toBe(
        "[SYNTAX ERROR] at line 2, column 9: unexpected ';'\nlet y = ;\n        ^"
      );
    });

    it("should omit the location when it is unknown", () => {
      const reporter = new ErrorReporter("x;");
      reporter.report(ErrorKind.Semantic, "too many constants in one chunk");
      expect(reporter.formatAll()).toBe("[SEMANTIC ERROR]: too many constants in one chunk");
    });

    it("should strip carriage returns from source lines", () => {
      const reporter = new ErrorReporter("a\r\nb");
      reporter.report(ErrorKind.Lexical, "bad", newPosition(0, 0, 0, 0, "<test>"));
      expect(reporter.formatAll()).toBe("[LEXICAL ERROR] at line 1, column 1: bad\na\n^");
    });

    it("should join several diagnostics with newlines", () => {
      const reporter = new ErrorReporter();
      reporter.report(ErrorKind.Syntax, "first");
      reporter.report(ErrorKind.Semantic, "second");
      expect(reporter.formatAll()).toBe("[SYNTAX ERROR]: first\n[SEMANTIC ERROR]: second");
    });
  });
});
