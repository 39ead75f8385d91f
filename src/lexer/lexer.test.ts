import { describe, it, expect } from "vitest";
import { Lexer, tokenize, LexerError } from "./lexer.js";
import { TokenKind } from "../token/token.js";
import { ErrorKind, ErrorReporter } from "../errors/reporter.js";

function kinds(input: string): TokenKind[] {
  return tokenize(input).map((t) => t.kind);
}

describe("Lexer", () => {
  describe("basic tokens", () => {
    it("should tokenize empty input", () => {
      const tokens = tokenize("");
      expect(tokens).toHaveLength(1);
      expect(tokens[0].kind).toBe(TokenKind.EOF);
    });

    it("should tokenize identifiers", () => {
      const tokens = tokenize("foo bar _baz x1");
      expect(tokens.map((t) => t.literal)).toEqual(["foo", "bar", "_baz", "x1", ""]);
      expect(tokens[3].kind).toBe(TokenKind.IDENT);
    });

    it("should tokenize keywords", () => {
      expect(kinds("let var fn return if else while for break continue true false nil")).toEqual([
        TokenKind.LET,
        TokenKind.VAR,
        TokenKind.FN,
        TokenKind.RETURN,
        TokenKind.IF,
        TokenKind.ELSE,
        TokenKind.WHILE,
        TokenKind.FOR,
        TokenKind.BREAK,
        TokenKind.CONTINUE,
        TokenKind.TRUE,
        TokenKind.FALSE,
        TokenKind.NIL,
        TokenKind.EOF,
      ]);
    });

    it("should treat print as an identifier", () => {
      const tokens = tokenize("print");
      expect(tokens[0].kind).toBe(TokenKind.IDENT);
      expect(tokens[0].literal).toBe("print");
    });
  });

  describe("numbers", () => {
    it("should tokenize integers and decimals", () => {
      const tokens = tokenize("42 0 3.14 2.5e10 1e-5 3E+2");
      expect(tokens.slice(0, 6).every((t) => t.kind === TokenKind.NUMBER)).toBe(true);
      expect(tokens.slice(0, 6).map((t) => t.literal)).toEqual([
        "42",
        "0",
        "3.14",
        "2.5e10",
        "1e-5",
        "3E+2",
      ]);
    });

    it("should error on invalid number literals", () => {
      expect(() => tokenize("123abc")).toThrow(LexerError);
      expect(() => tokenize("123abc")).toThrow("invalid number literal: 123a at line 1, column 4");
    });
  });

  describe("strings", () => {
    it("should tokenize double-quoted strings", () => {
      const tokens = tokenize('"hello world"');
      expect(tokens[0].kind).toBe(TokenKind.STRING);
      expect(tokens[0].literal).toBe("hello world");
    });

    it("should tokenize single-quoted strings", () => {
      const tokens = tokenize("'it\"s'");
      expect(tokens[0].kind).toBe(TokenKind.STRING);
      expect(tokens[0].literal).toBe('it"s');
    });

    it("should handle escape sequences", () => {
      const tokens = tokenize('"a\\nb\\t\\"c\\\\"');
      expect(tokens[0].literal).toBe('a\nb\t"c\\');
    });

    it("should error on unterminated strings", () => {
      expect(() => tokenize('"hello')).toThrow(LexerError);
      expect(() => tokenize('"hello\n"')).toThrow(LexerError);
    });

    it("should error on invalid escape sequences", () => {
      expect(() => tokenize('"\\z"')).toThrow("invalid escape sequence: \\z");
    });
  });

  describe("operators", () => {
    it("should tokenize arithmetic operators", () => {
      expect(kinds("+ - * / %")).toEqual([
        TokenKind.PLUS,
        TokenKind.MINUS,
        TokenKind.ASTERISK,
        TokenKind.SLASH,
        TokenKind.MOD,
        TokenKind.EOF,
      ]);
    });

    it("should tokenize comparison operators", () => {
      expect(kinds("== != < > <= >=")).toEqual([
        TokenKind.EQ,
        TokenKind.NOT_EQ,
        TokenKind.LT,
        TokenKind.GT,
        TokenKind.LT_EQUALS,
        TokenKind.GT_EQUALS,
        TokenKind.EOF,
      ]);
    });

    it("should tokenize logical operators", () => {
      expect(kinds("&& || ! =")).toEqual([
        TokenKind.AND,
        TokenKind.OR,
        TokenKind.BANG,
        TokenKind.ASSIGN,
        TokenKind.EOF,
      ]);
    });

    it("should tokenize punctuation", () => {
      expect(kinds("(){},;")).toEqual([
        TokenKind.LPAREN,
        TokenKind.RPAREN,
        TokenKind.LBRACE,
        TokenKind.RBRACE,
        TokenKind.COMMA,
        TokenKind.SEMICOLON,
        TokenKind.EOF,
      ]);
    });

    it("should reject a lone ampersand", () => {
      expect(() => tokenize("a & b")).toThrow("unexpected character '&'");
    });
  });

  describe("comments", () => {
    it("should skip single-line comments", () => {
      expect(kinds("x // comment\ny")).toEqual([TokenKind.IDENT, TokenKind.IDENT, TokenKind.EOF]);
    });

    it("should skip multi-line comments", () => {
      const tokens = tokenize("/* a\nb */ x");
      expect(tokens[0].literal).toBe("x");
      expect(tokens[0].start.line).toBe(1);
      expect(tokens[0].start.column).toBe(5);
    });

    it("should error on unterminated block comments", () => {
      expect(() => tokenize("/* never closed")).toThrow("unterminated block comment");
    });
  });

  describe("position tracking", () => {
    it("should track line and column", () => {
      const tokens = tokenize("let x\n  = 5;");
      expect(tokens[0].start).toMatchObject({ line: 0, column: 0, char: 0 });
      expect(tokens[1].start).toMatchObject({ line: 0, column: 4 });
      expect(tokens[2].start).toMatchObject({ line: 1, column: 2, char: 8, lineStart: 6 });
      expect(tokens[3].start).toMatchObject({ line: 1, column: 4 });
    });
  });

  describe("with a reporter", () => {
    it("should report instead of throwing", () => {
      const reporter = new ErrorReporter("@");
      const tokens = tokenize("@", "<test>", reporter);
      expect(tokens.map((t) => t.kind)).toEqual([TokenKind.ILLEGAL, TokenKind.EOF]);
      expect(reporter.errors).toEqual([
        { kind: ErrorKind.Lexical, message: "unexpected character '@'", line: 1, column: 1 },
      ]);
    });

    it("should keep going after an unterminated string", () => {
      const reporter = new ErrorReporter();
      const tokens = tokenize('x = "abc', "<test>", reporter);
      expect(tokens.map((t) => t.kind)).toEqual([
        TokenKind.IDENT,
        TokenKind.ASSIGN,
        TokenKind.ILLEGAL,
        TokenKind.EOF,
      ]);
      expect(tokens[2].literal).toBe("abc");
      expect(reporter.errors[0]).toMatchObject({
        message: "unterminated string literal",
        line: 1,
        column: 5,
      });
    });
  });

  describe("complex input", () => {
    it("should tokenize a function declaration", () => {
      expect(kinds("fn add(a, b) { return a + b; }")).toEqual([
        TokenKind.FN,
        TokenKind.IDENT,
        TokenKind.LPAREN,
        TokenKind.IDENT,
        TokenKind.COMMA,
        TokenKind.IDENT,
        TokenKind.RPAREN,
        TokenKind.LBRACE,
        TokenKind.RETURN,
        TokenKind.IDENT,
        TokenKind.PLUS,
        TokenKind.IDENT,
        TokenKind.SEMICOLON,
        TokenKind.RBRACE,
        TokenKind.EOF,
      ]);
    });
  });
});
