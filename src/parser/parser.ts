/**
 * Pratt parser for TinyLang.
 */

import { Lexer } from "../lexer/lexer.js";
import { Token, TokenKind, Position } from "../token/token.js";
import { ErrorKind, ErrorReporter } from "../errors/reporter.js";
import { Precedence, getPrecedence } from "./precedence.js";
import * as ast from "../ast/nodes.js";

/**
 * Parser error with position information.
 */
export class ParserError extends Error {
  constructor(
    message: string,
    public readonly position: Position
  ) {
    super(`${message} at line ${position.line + 1}, column ${position.column + 1}`);
    this.name = "ParserError";
  }
}

type PrefixParseFn = () => ast.Expr | null;
type InfixParseFn = (left: ast.Expr) => ast.Expr | null;

const binaryOps: Map<TokenKind, ast.BinaryOp> = new Map([
  [TokenKind.PLUS, "+"],
  [TokenKind.MINUS, "-"],
  [TokenKind.ASTERISK, "*"],
  [TokenKind.SLASH, "/"],
  [TokenKind.MOD, "%"],
  [TokenKind.EQ, "=="],
  [TokenKind.NOT_EQ, "!="],
  [TokenKind.LT, "<"],
  [TokenKind.LT_EQUALS, "<="],
  [TokenKind.GT, ">"],
  [TokenKind.GT_EQUALS, ">="],
  [TokenKind.AND, "&&"],
  [TokenKind.OR, "||"],
]);

/**
 * Tokens that may follow `print` in the statement form. Anything else,
 * `(` in particular, makes `print` an ordinary expression.
 */
const printStatementStarts: ReadonlySet<TokenKind> = new Set([
  TokenKind.NUMBER,
  TokenKind.STRING,
  TokenKind.IDENT,
  TokenKind.TRUE,
  TokenKind.FALSE,
  TokenKind.NIL,
  TokenKind.BANG,
  TokenKind.MINUS,
  TokenKind.FN,
]);

/**
 * Pratt parser for TinyLang source code.
 *
 * Parse functions are entered with the first token of their construct as
 * the current token and return with the current token just past it. With a
 * reporter attached, errors are reported and parsing resumes at the next
 * statement boundary; without one, `parse()` throws the first error.
 */
export class Parser {
  private lexer: Lexer;
  private curToken: Token;
  private peekToken: Token;
  private errors: ParserError[] = [];
  private reporter: ErrorReporter | null;
  private maxDepth = 500;
  private depth = 0;

  private prefixParseFns: Map<TokenKind, PrefixParseFn> = new Map();
  private infixParseFns: Map<TokenKind, InfixParseFn> = new Map();

  constructor(lexer: Lexer, reporter: ErrorReporter | null = null) {
    this.lexer = lexer;
    this.reporter = reporter;
    this.curToken = this.readToken();
    this.peekToken = this.readToken();

    this.registerPrefix(TokenKind.IDENT, () => this.parseIdent());
    this.registerPrefix(TokenKind.NUMBER, () => this.parseNumber());
    this.registerPrefix(TokenKind.STRING, () => this.parseString());
    this.registerPrefix(TokenKind.TRUE, () => this.parseBool());
    this.registerPrefix(TokenKind.FALSE, () => this.parseBool());
    this.registerPrefix(TokenKind.NIL, () => this.parseNil());
    this.registerPrefix(TokenKind.BANG, () => this.parsePrefix());
    this.registerPrefix(TokenKind.MINUS, () => this.parsePrefix());
    this.registerPrefix(TokenKind.LPAREN, () => this.parseGrouped());
    this.registerPrefix(TokenKind.FN, () => this.parseFunc());

    for (const kind of binaryOps.keys()) {
      this.registerInfix(kind, (left) => this.parseInfix(left));
    }
    this.registerInfix(TokenKind.ASSIGN, (left) => this.parseAssign(left));
    this.registerInfix(TokenKind.LPAREN, (left) => this.parseCall(left));
  }

  private registerPrefix(kind: TokenKind, fn: PrefixParseFn): void {
    this.prefixParseFns.set(kind, fn);
  }

  private registerInfix(kind: TokenKind, fn: InfixParseFn): void {
    this.infixParseFns.set(kind, fn);
  }

  /**
   * Next token from the lexer. ILLEGAL tokens were already reported by the
   * lexer and are skipped here.
   */
  private readToken(): Token {
    let tok = this.lexer.nextToken();
    while (tok.kind === TokenKind.ILLEGAL) {
      tok = this.lexer.nextToken();
    }
    return tok;
  }

  private nextToken(): void {
    this.curToken = this.peekToken;
    this.peekToken = this.readToken();
  }

  private curTokenIs(kind: TokenKind): boolean {
    return this.curToken.kind === kind;
  }

  private peekTokenIs(kind: TokenKind): boolean {
    return this.peekToken.kind === kind;
  }

  /**
   * Consume the current token if it has the given kind, else report.
   */
  private expect(kind: TokenKind, context: string): boolean {
    if (this.curTokenIs(kind)) {
      this.nextToken();
      return true;
    }
    this.error(`expected '${kind}' ${context}, got ${describeToken(this.curToken)}`, this.curToken.start);
    return false;
  }

  private error(message: string, pos: Position, kind: ErrorKind = ErrorKind.Syntax): void {
    this.errors.push(new ParserError(message, pos));
    this.reporter?.report(kind, message, pos);
  }

  private curPrecedence(): Precedence {
    return getPrecedence(this.curToken.kind);
  }

  /**
   * Synchronize after an error by skipping to the next statement boundary:
   * just past a `;`, or at a keyword that begins a statement.
   */
  private synchronize(): void {
    while (!this.curTokenIs(TokenKind.EOF)) {
      if (this.curTokenIs(TokenKind.SEMICOLON)) {
        this.nextToken();
        return;
      }
      switch (this.curToken.kind) {
        case TokenKind.LET:
        case TokenKind.VAR:
        case TokenKind.FN:
        case TokenKind.RETURN:
        case TokenKind.IF:
        case TokenKind.WHILE:
        case TokenKind.FOR:
        case TokenKind.BREAK:
        case TokenKind.CONTINUE:
          return;
      }
      this.nextToken();
    }
  }

  /**
   * Parse the entire program.
   */
  parse(): ast.Program {
    const stmts: ast.Stmt[] = [];

    while (!this.curTokenIs(TokenKind.EOF)) {
      const stmt = this.parseStatement();
      if (stmt) {
        stmts.push(stmt);
      } else {
        this.synchronize();
      }
    }

    if (this.reporter === null && this.errors.length > 0) {
      throw this.errors[0];
    }

    return new ast.Program(stmts);
  }

  /**
   * Get all parse errors.
   */
  getErrors(): ParserError[] {
    return this.errors;
  }

  // =========================================================================
  // Statement Parsing
  // =========================================================================

  private parseStatement(): ast.Stmt | null {
    switch (this.curToken.kind) {
      case TokenKind.LET:
      case TokenKind.VAR:
        return this.parseVar();
      case TokenKind.FN:
        if (this.peekTokenIs(TokenKind.IDENT)) {
          return this.parseFuncDecl();
        }
        return this.parseExpressionStatement();
      case TokenKind.RETURN:
        return this.parseReturn();
      case TokenKind.IF:
        return this.parseIf();
      case TokenKind.WHILE:
        return this.parseWhile();
      case TokenKind.FOR:
        return this.parseFor();
      case TokenKind.BREAK:
      case TokenKind.CONTINUE:
        return this.parseLoopJump();
      case TokenKind.LBRACE:
        return this.parseBlock();
      case TokenKind.IDENT:
        if (this.curToken.literal === "print" && printStatementStarts.has(this.peekToken.kind)) {
          return this.parsePrint();
        }
        return this.parseExpressionStatement();
      default:
        return this.parseExpressionStatement();
    }
  }

  private parseVar(): ast.VarStmt | null {
    const letPos = this.curToken.start;
    const keyword = this.curTokenIs(TokenKind.LET) ? "let" : "var";
    this.nextToken(); // consume 'let' / 'var'

    if (!this.curTokenIs(TokenKind.IDENT)) {
      this.error(`expected identifier after '${keyword}', got ${describeToken(this.curToken)}`, this.curToken.start);
      return null;
    }
    const name = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();

    let value: ast.Expr | null = null;
    if (this.curTokenIs(TokenKind.ASSIGN)) {
      this.nextToken(); // consume '='
      value = this.parseExpression(Precedence.LOWEST);
      if (!value) return null;
    }

    if (!this.expect(TokenKind.SEMICOLON, "after variable declaration")) return null;
    return new ast.VarStmt(letPos, keyword, name, value);
  }

  private parseFuncDecl(): ast.FuncDecl | null {
    const fn = this.parseFunc();
    if (!fn || !fn.name) return null;
    return new ast.FuncDecl(fn.name, fn);
  }

  private parseReturn(): ast.ReturnStmt | null {
    const returnPos = this.curToken.start;
    this.nextToken(); // consume 'return'

    if (this.curTokenIs(TokenKind.SEMICOLON)) {
      this.nextToken();
      return new ast.ReturnStmt(returnPos, null);
    }

    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;
    // A closing brace or the end of input also ends the statement.
    if (!this.curTokenIs(TokenKind.RBRACE) && !this.curTokenIs(TokenKind.EOF)) {
      if (!this.expect(TokenKind.SEMICOLON, "after return value")) return null;
    }
    return new ast.ReturnStmt(returnPos, value);
  }

  private parsePrint(): ast.PrintStmt | null {
    const printPos = this.curToken.start;
    this.nextToken(); // consume 'print'

    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;
    if (!this.expect(TokenKind.SEMICOLON, "after value")) return null;
    return new ast.PrintStmt(printPos, value);
  }

  private parseIf(): ast.IfStmt | null {
    const ifPos = this.curToken.start;
    this.nextToken(); // consume 'if'

    const condition = this.parseCondition("if");
    if (!condition) return null;

    const consequence = this.parseStatement();
    if (!consequence) return null;

    let alternative: ast.Stmt | null = null;
    if (this.curTokenIs(TokenKind.ELSE)) {
      this.nextToken(); // consume 'else'
      alternative = this.parseStatement();
      if (!alternative) return null;
    }

    return new ast.IfStmt(ifPos, condition, consequence, alternative);
  }

  private parseWhile(): ast.WhileStmt | null {
    const whilePos = this.curToken.start;
    this.nextToken(); // consume 'while'

    const condition = this.parseCondition("while");
    if (!condition) return null;

    const body = this.parseStatement();
    if (!body) return null;

    return new ast.WhileStmt(whilePos, condition, body);
  }

  /**
   * Parse a parenthesized condition: `( expr )`.
   */
  private parseCondition(keyword: string): ast.Expr | null {
    if (!this.expect(TokenKind.LPAREN, `after '${keyword}'`)) return null;
    const condition = this.parseExpression(Precedence.LOWEST);
    if (!condition) return null;
    if (!this.expect(TokenKind.RPAREN, "after condition")) return null;
    return condition;
  }

  private parseFor(): ast.ForStmt | null {
    const forPos = this.curToken.start;
    this.nextToken(); // consume 'for'

    if (!this.expect(TokenKind.LPAREN, "after 'for'")) return null;

    let init: ast.VarStmt | ast.ExprStmt | null = null;
    if (this.curTokenIs(TokenKind.SEMICOLON)) {
      this.nextToken();
    } else if (this.curTokenIs(TokenKind.LET) || this.curTokenIs(TokenKind.VAR)) {
      init = this.parseVar();
      if (!init) return null;
    } else {
      init = this.parseExpressionStatement();
      if (!init) return null;
    }

    let condition: ast.Expr | null = null;
    if (!this.curTokenIs(TokenKind.SEMICOLON)) {
      condition = this.parseExpression(Precedence.LOWEST);
      if (!condition) return null;
    }
    if (!this.expect(TokenKind.SEMICOLON, "after loop condition")) return null;

    let post: ast.Expr | null = null;
    if (!this.curTokenIs(TokenKind.RPAREN)) {
      post = this.parseExpression(Precedence.LOWEST);
      if (!post) return null;
    }
    if (!this.expect(TokenKind.RPAREN, "after for clauses")) return null;

    const body = this.parseStatement();
    if (!body) return null;

    return new ast.ForStmt(forPos, init, condition, post, body);
  }

  private parseLoopJump(): ast.BreakStmt | ast.ContinueStmt | null {
    const pos = this.curToken.start;
    const isBreak = this.curTokenIs(TokenKind.BREAK);
    this.nextToken(); // consume 'break' / 'continue'
    if (!this.expect(TokenKind.SEMICOLON, `after '${isBreak ? "break" : "continue"}'`)) return null;
    return isBreak ? new ast.BreakStmt(pos) : new ast.ContinueStmt(pos);
  }

  private parseExpressionStatement(): ast.ExprStmt | null {
    const expr = this.parseExpression(Precedence.LOWEST);
    if (!expr) return null;
    if (!this.expect(TokenKind.SEMICOLON, "after expression")) return null;
    return new ast.ExprStmt(expr);
  }

  private parseBlock(): ast.Block | null {
    if (!this.curTokenIs(TokenKind.LBRACE)) {
      this.error(`expected '{', got ${describeToken(this.curToken)}`, this.curToken.start);
      return null;
    }
    const lbrace = this.curToken.start;
    this.nextToken(); // consume '{'

    const stmts: ast.Stmt[] = [];
    while (!this.curTokenIs(TokenKind.RBRACE) && !this.curTokenIs(TokenKind.EOF)) {
      const stmt = this.parseStatement();
      if (stmt) {
        stmts.push(stmt);
      } else {
        this.synchronize();
      }
    }

    if (!this.curTokenIs(TokenKind.RBRACE)) {
      this.error("expected '}' after block", this.curToken.start);
      return null;
    }
    const rbrace = this.curToken.start;
    this.nextToken(); // consume '}'

    return new ast.Block(lbrace, stmts, rbrace);
  }

  // =========================================================================
  // Expression Parsing
  // =========================================================================

  private parseExpression(precedence: Precedence): ast.Expr | null {
    this.depth++;
    if (this.depth > this.maxDepth) {
      this.error("maximum expression depth exceeded", this.curToken.start);
      this.depth--;
      return null;
    }

    const prefixFn = this.prefixParseFns.get(this.curToken.kind);
    if (!prefixFn) {
      this.error(`unexpected ${describeToken(this.curToken)}`, this.curToken.start);
      this.depth--;
      return null;
    }

    let left = prefixFn();
    if (!left) {
      this.depth--;
      return null;
    }

    while (!this.curTokenIs(TokenKind.EOF) && precedence < this.curPrecedence()) {
      const infixFn = this.infixParseFns.get(this.curToken.kind);
      if (!infixFn) {
        break;
      }

      left = infixFn(left);
      if (!left) {
        this.depth--;
        return null;
      }
    }

    this.depth--;
    return left;
  }

  // =========================================================================
  // Literal Parsing
  // =========================================================================

  private parseIdent(): ast.Ident {
    const ident = new ast.Ident(this.curToken.start, this.curToken.literal);
    this.nextToken();
    return ident;
  }

  private parseNumber(): ast.NumberLit | null {
    const literal = this.curToken.literal;
    const value = Number(literal);
    if (Number.isNaN(value)) {
      this.error(`invalid number literal: ${literal}`, this.curToken.start);
      return null;
    }
    const node = new ast.NumberLit(this.curToken.start, literal, value);
    this.nextToken();
    return node;
  }

  private parseString(): ast.StringLit {
    const node = new ast.StringLit(this.curToken.start, this.curToken.literal);
    this.nextToken();
    return node;
  }

  private parseBool(): ast.BoolLit {
    const value = this.curTokenIs(TokenKind.TRUE);
    const node = new ast.BoolLit(this.curToken.start, value);
    this.nextToken();
    return node;
  }

  private parseNil(): ast.NilLit {
    const node = new ast.NilLit(this.curToken.start);
    this.nextToken();
    return node;
  }

  // =========================================================================
  // Operator Parsing
  // =========================================================================

  private parsePrefix(): ast.PrefixExpr | null {
    const opPos = this.curToken.start;
    const op: ast.UnaryOp = this.curTokenIs(TokenKind.BANG) ? "!" : "-";
    this.nextToken();

    const right = this.parseExpression(Precedence.UNARY);
    if (!right) return null;

    return new ast.PrefixExpr(opPos, op, right);
  }

  private parseInfix(left: ast.Expr): ast.InfixExpr | null {
    const opPos = this.curToken.start;
    const op = binaryOps.get(this.curToken.kind);
    if (op === undefined) {
      this.error(`unexpected ${describeToken(this.curToken)}`, opPos);
      return null;
    }
    const precedence = this.curPrecedence();
    this.nextToken();

    const right = this.parseExpression(precedence);
    if (!right) return null;

    return new ast.InfixExpr(left, opPos, op, right);
  }

  /**
   * Assignment is right-associative and only accepts a plain identifier as
   * its target.
   */
  private parseAssign(left: ast.Expr): ast.AssignExpr | null {
    const opPos = this.curToken.start;
    this.nextToken(); // consume '='

    const value = this.parseExpression(Precedence.LOWEST);
    if (!value) return null;

    if (left.kind !== "Ident") {
      this.error("invalid assignment target", left.pos(), ErrorKind.Semantic);
      return null;
    }
    return new ast.AssignExpr(left, opPos, value);
  }

  private parseGrouped(): ast.Expr | null {
    this.nextToken(); // consume '('
    const expr = this.parseExpression(Precedence.LOWEST);
    if (!expr) return null;
    if (!this.expect(TokenKind.RPAREN, "after expression")) return null;
    return expr;
  }

  // =========================================================================
  // Functions and Calls
  // =========================================================================

  private parseFunc(): ast.FuncLit | null {
    const funcPos = this.curToken.start;
    this.nextToken(); // consume 'fn'

    // Optional function name
    let name: ast.Ident | null = null;
    if (this.curTokenIs(TokenKind.IDENT)) {
      name = new ast.Ident(this.curToken.start, this.curToken.literal);
      this.nextToken();
    }

    if (!this.expect(TokenKind.LPAREN, "before parameters")) return null;

    const params: ast.Ident[] = [];
    while (!this.curTokenIs(TokenKind.RPAREN) && !this.curTokenIs(TokenKind.EOF)) {
      if (!this.curTokenIs(TokenKind.IDENT)) {
        this.error(`expected parameter name, got ${describeToken(this.curToken)}`, this.curToken.start);
        return null;
      }
      params.push(new ast.Ident(this.curToken.start, this.curToken.literal));
      this.nextToken();

      if (!this.curTokenIs(TokenKind.COMMA)) break;
      this.nextToken(); // consume ','
    }

    if (!this.expect(TokenKind.RPAREN, "after parameters")) return null;

    const body = this.parseBlock();
    if (!body) return null;

    return new ast.FuncLit(funcPos, name, params, body);
  }

  private parseCall(fn: ast.Expr): ast.CallExpr | null {
    const lparen = this.curToken.start;
    this.nextToken(); // consume '('

    const args: ast.Expr[] = [];
    while (!this.curTokenIs(TokenKind.RPAREN) && !this.curTokenIs(TokenKind.EOF)) {
      const arg = this.parseExpression(Precedence.LOWEST);
      if (!arg) return null;
      args.push(arg);

      if (!this.curTokenIs(TokenKind.COMMA)) break;
      this.nextToken(); // consume ','
    }

    const rparen = this.curToken.start;
    if (!this.expect(TokenKind.RPAREN, "after arguments")) return null;

    return new ast.CallExpr(fn, lparen, args, rparen);
  }
}

function describeToken(tok: Token): string {
  if (tok.kind === TokenKind.EOF) {
    return "end of input";
  }
  return `'${tok.literal}'`;
}

/**
 * Parse source code into an AST.
 *
 * Without a reporter the first error is thrown as a ParserError (or a
 * LexerError from the lexer).
 */
export function parse(source: string, filename?: string, reporter?: ErrorReporter): ast.Program {
  const lexer = new Lexer(source, filename, reporter ?? null);
  const parser = new Parser(lexer, reporter ?? null);
  return parser.parse();
}
