import {
  Token,
  TokenKind,
  Position,
  newPosition,
  newToken,
  lookupIdentifier,
} from "../token/token.js";
import { ErrorKind, ErrorReporter } from "../errors/reporter.js";

/**
 * Lexer error with position information.
 */
export class LexerError extends Error {
  constructor(
    message: string,
    public readonly position: Position
  ) {
    super(`${message} at line ${position.line + 1}, column ${position.column + 1}`);
    this.name = "LexerError";
  }
}

/**
 * Lexer tokenizes TinyLang source code.
 *
 * With a reporter, malformed input is recorded as a lexical diagnostic and
 * surfaces as an ILLEGAL token; without one it throws LexerError.
 */
export class Lexer {
  private characters: string[];
  private position: number = -1;
  private nextPosition: number = 0;
  private ch: string = "";
  private line: number = 0;
  private column: number = -1;
  private lineStart: number = 0;
  private file: string;
  private tokenStartPosition: Position;
  private reporter: ErrorReporter | null;

  constructor(input: string, file: string = "<stdin>", reporter: ErrorReporter | null = null) {
    this.characters = [...input];
    this.file = file;
    this.reporter = reporter;
    this.tokenStartPosition = this.currentPosition();
    this.readChar();
  }

  private currentPosition(): Position {
    return newPosition(this.position, this.lineStart, this.line, this.column, this.file);
  }

  private readChar(): void {
    if (this.nextPosition >= this.characters.length) {
      this.ch = "\0";
    } else {
      this.ch = this.characters[this.nextPosition];
    }
    this.position = this.nextPosition;
    this.nextPosition++;
    this.column++;
  }

  private peekChar(): string {
    if (this.nextPosition >= this.characters.length) {
      return "\0";
    }
    return this.characters[this.nextPosition];
  }

  /**
   * Skip whitespace, including newlines, and comments.
   */
  private skipTrivia(): void {
    for (;;) {
      if (this.ch === " " || this.ch === "\t" || this.ch === "\r") {
        this.readChar();
      } else if (this.ch === "\n") {
        this.readChar();
        this.handleNewline();
      } else if (this.ch === "/" && this.peekChar() === "/") {
        this.skipLineComment();
      } else if (this.ch === "/" && this.peekChar() === "*") {
        this.skipBlockComment();
      } else {
        return;
      }
    }
  }

  private skipLineComment(): void {
    while (this.ch !== "\n" && this.ch !== "\0") {
      this.readChar();
    }
  }

  private skipBlockComment(): void {
    const start = this.currentPosition();
    this.readChar(); // consume /
    this.readChar(); // consume *
    while (!(this.ch === "*" && this.peekChar() === "/")) {
      if (this.ch === "\0") {
        this.error("unterminated block comment", start);
        return;
      }
      this.readChar();
      if (this.characters[this.position - 1] === "\n") {
        this.handleNewline();
      }
    }
    this.readChar(); // consume *
    this.readChar(); // consume /
  }

  /**
   * Called after the newline character has been consumed.
   */
  private handleNewline(): void {
    this.line++;
    this.column = 0;
    this.lineStart = this.position;
  }

  private makeToken(kind: TokenKind, literal: string): Token {
    return newToken(kind, literal, this.tokenStartPosition);
  }

  private error(message: string, pos: Position): void {
    if (this.reporter === null) {
      throw new LexerError(message, pos);
    }
    this.reporter.report(ErrorKind.Lexical, message, pos);
  }

  /**
   * Get the next token.
   */
  nextToken(): Token {
    this.skipTrivia();
    this.tokenStartPosition = this.currentPosition();

    if (this.ch === "\0") {
      return this.makeToken(TokenKind.EOF, "");
    }

    if (this.ch === '"' || this.ch === "'") {
      return this.readString(this.ch);
    }

    if (isDigit(this.ch)) {
      return this.readNumber();
    }

    if (isLetter(this.ch)) {
      return this.readIdentifier();
    }

    const tok = this.readOperator();
    if (tok) {
      return tok;
    }

    const ch = this.ch;
    this.error(`unexpected character '${ch}'`, this.tokenStartPosition);
    this.readChar();
    return this.makeToken(TokenKind.ILLEGAL, ch);
  }

  private readIdentifier(): Token {
    const start = this.position;
    while (isLetter(this.ch) || isDigit(this.ch)) {
      this.readChar();
    }
    const literal = this.characters.slice(start, this.position).join("");
    return this.makeToken(lookupIdentifier(literal), literal);
  }

  /**
   * Read a decimal number literal with optional fraction and exponent.
   */
  private readNumber(): Token {
    const start = this.position;
    while (isDigit(this.ch)) {
      this.readChar();
    }

    if (this.ch === "." && isDigit(this.peekChar())) {
      this.readChar(); // consume .
      while (isDigit(this.ch)) {
        this.readChar();
      }
    }

    if (this.ch === "e" || this.ch === "E") {
      const next = this.peekChar();
      if (isDigit(next) || next === "+" || next === "-") {
        this.readChar(); // consume e/E
        if (next === "+" || next === "-") {
          this.readChar();
        }
        while (isDigit(this.ch)) {
          this.readChar();
        }
      }
    }

    const literal = this.characters.slice(start, this.position).join("");
    if (isLetter(this.ch)) {
      this.error(`invalid number literal: ${literal}${this.ch}`, this.currentPosition());
      while (isLetter(this.ch) || isDigit(this.ch)) {
        this.readChar();
      }
      return this.makeToken(TokenKind.ILLEGAL, literal);
    }
    return this.makeToken(TokenKind.NUMBER, literal);
  }

  /**
   * Read a quoted string literal. Strings end at the closing quote and may
   * not span lines.
   */
  private readString(quote: string): Token {
    const chars: string[] = [];
    this.readChar(); // consume opening quote

    while (this.ch !== quote && this.ch !== "\0" && this.ch !== "\n") {
      if (this.ch === "\\") {
        this.readChar();
        chars.push(this.readEscapeSequence());
      } else {
        chars.push(this.ch);
        this.readChar();
      }
    }

    if (this.ch !== quote) {
      this.error("unterminated string literal", this.tokenStartPosition);
      return this.makeToken(TokenKind.ILLEGAL, chars.join(""));
    }

    this.readChar(); // consume closing quote
    return this.makeToken(TokenKind.STRING, chars.join(""));
  }

  private readEscapeSequence(): string {
    const ch = this.ch;
    const pos = this.currentPosition();
    this.readChar();

    switch (ch) {
      case "n":
        return "\n";
      case "r":
        return "\r";
      case "t":
        return "\t";
      case "0":
        return "\0";
      case "\\":
        return "\\";
      case '"':
        return '"';
      case "'":
        return "'";
      default:
        this.error(`invalid escape sequence: \\${ch}`, pos);
        return ch;
    }
  }

  private readOperator(): Token | null {
    const ch = this.ch;
    const next = this.peekChar();

    const twoChar = ch + next;
    switch (twoChar) {
      case "==":
      case "!=":
      case "<=":
      case ">=":
      case "&&":
      case "||": {
        this.readChar();
        this.readChar();
        return this.makeToken(twoCharTokens.get(twoChar) ?? TokenKind.ILLEGAL, twoChar);
      }
    }

    const kind = singleCharTokens.get(ch);
    if (kind !== undefined) {
      this.readChar();
      return this.makeToken(kind, ch);
    }

    return null;
  }
}

const twoCharTokens: Map<string, TokenKind> = new Map([
  ["==", TokenKind.EQ],
  ["!=", TokenKind.NOT_EQ],
  ["<=", TokenKind.LT_EQUALS],
  [">=", TokenKind.GT_EQUALS],
  ["&&", TokenKind.AND],
  ["||", TokenKind.OR],
]);

const singleCharTokens: Map<string, TokenKind> = new Map([
  ["+", TokenKind.PLUS],
  ["-", TokenKind.MINUS],
  ["*", TokenKind.ASTERISK],
  ["/", TokenKind.SLASH],
  ["%", TokenKind.MOD],
  ["=", TokenKind.ASSIGN],
  ["!", TokenKind.BANG],
  ["<", TokenKind.LT],
  [">", TokenKind.GT],
  ["(", TokenKind.LPAREN],
  [")", TokenKind.RPAREN],
  ["{", TokenKind.LBRACE],
  ["}", TokenKind.RBRACE],
  [",", TokenKind.COMMA],
  [";", TokenKind.SEMICOLON],
]);

function isLetter(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

/**
 * Tokenize an input string into an array of tokens ending with EOF.
 */
export function tokenize(input: string, file?: string, reporter?: ErrorReporter): Token[] {
  const lexer = new Lexer(input, file, reporter ?? null);
  const tokens: Token[] = [];
  let tok: Token;
  do {
    tok = lexer.nextToken();
    tokens.push(tok);
  } while (tok.kind !== TokenKind.EOF);
  return tokens;
}
