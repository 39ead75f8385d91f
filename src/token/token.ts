/**
 * Token types for the TinyLang lexer.
 */
export const enum TokenKind {
  // Literals
  NUMBER = "NUMBER",
  STRING = "STRING",
  IDENT = "IDENT",

  // Operators
  PLUS = "+",
  MINUS = "-",
  ASTERISK = "*",
  SLASH = "/",
  MOD = "%",

  // Comparison
  EQ = "==",
  NOT_EQ = "!=",
  LT = "<",
  GT = ">",
  LT_EQUALS = "<=",
  GT_EQUALS = ">=",

  // Logical
  AND = "&&",
  OR = "||",
  BANG = "!",

  // Assignment
  ASSIGN = "=",

  // Punctuation
  LPAREN = "(",
  RPAREN = ")",
  LBRACE = "{",
  RBRACE = "}",
  COMMA = ",",
  SEMICOLON = ";",

  // Keywords
  LET = "let",
  VAR = "var",
  FN = "fn",
  RETURN = "return",
  IF = "if",
  ELSE = "else",
  WHILE = "while",
  FOR = "for",
  BREAK = "break",
  CONTINUE = "continue",
  TRUE = "true",
  FALSE = "false",
  NIL = "nil",

  // Special
  EOF = "EOF",
  ILLEGAL = "ILLEGAL",
}

/**
 * Keywords map for identifier lookup.
 */
const keywords: Map<string, TokenKind> = new Map([
  ["let", TokenKind.LET],
  ["var", TokenKind.VAR],
  ["fn", TokenKind.FN],
  ["return", TokenKind.RETURN],
  ["if", TokenKind.IF],
  ["else", TokenKind.ELSE],
  ["while", TokenKind.WHILE],
  ["for", TokenKind.FOR],
  ["break", TokenKind.BREAK],
  ["continue", TokenKind.CONTINUE],
  ["true", TokenKind.TRUE],
  ["false", TokenKind.FALSE],
  ["nil", TokenKind.NIL],
]);

/**
 * Look up an identifier to see if it's a keyword.
 */
export function lookupIdentifier(ident: string): TokenKind {
  return keywords.get(ident) ?? TokenKind.IDENT;
}

/**
 * Position in source code.
 */
export interface Position {
  /** Character offset within the source */
  char: number;
  /** Offset of the start of the current line */
  lineStart: number;
  /** 0-indexed line number */
  line: number;
  /** 0-indexed column number */
  column: number;
  /** Filename */
  file: string;
}

/**
 * Create a new Position.
 */
export function newPosition(
  char: number,
  lineStart: number,
  line: number,
  column: number,
  file: string
): Position {
  return { char, lineStart, line, column, file };
}

/**
 * The zero value Position, used for synthesized nodes.
 */
export const NoPos: Position = {
  char: 0,
  lineStart: 0,
  line: 0,
  column: 0,
  file: "",
};

/**
 * Returns the 1-indexed line number.
 */
export function lineNumber(p: Position): number {
  return p.line + 1;
}

/**
 * Returns the 1-indexed column number.
 */
export function columnNumber(p: Position): number {
  return p.column + 1;
}

/**
 * A token produced by the lexer.
 */
export interface Token {
  kind: TokenKind;
  literal: string;
  start: Position;
}

/**
 * Create a new Token.
 */
export function newToken(kind: TokenKind, literal: string, start: Position): Token {
  return { kind, literal, start };
}
