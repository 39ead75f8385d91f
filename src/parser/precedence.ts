/**
 * Binding power of infix tokens for the Pratt parser.
 */

import { TokenKind } from "../token/token.js";

export const enum Precedence {
  LOWEST = 1,
  /** Right-associative `=`. */
  ASSIGN,
  OR,
  AND,
  /** `==` and `!=`. */
  EQUALITY,
  /** `<`, `<=`, `>`, `>=`. */
  COMPARISON,
  TERM,
  FACTOR,
  /** Unary `-` and `!`. */
  UNARY,
  CALL,
}

const infixPrecedence: ReadonlyMap<TokenKind, Precedence> = new Map([
  [TokenKind.ASSIGN, Precedence.ASSIGN],
  [TokenKind.OR, Precedence.OR],
  [TokenKind.AND, Precedence.AND],
  [TokenKind.EQ, Precedence.EQUALITY],
  [TokenKind.NOT_EQ, Precedence.EQUALITY],
  [TokenKind.LT, Precedence.COMPARISON],
  [TokenKind.LT_EQUALS, Precedence.COMPARISON],
  [TokenKind.GT, Precedence.COMPARISON],
  [TokenKind.GT_EQUALS, Precedence.COMPARISON],
  [TokenKind.PLUS, Precedence.TERM],
  [TokenKind.MINUS, Precedence.TERM],
  [TokenKind.ASTERISK, Precedence.FACTOR],
  [TokenKind.SLASH, Precedence.FACTOR],
  [TokenKind.MOD, Precedence.FACTOR],
  [TokenKind.LPAREN, Precedence.CALL],
]);

/**
 * Precedence of a token in infix position; LOWEST for tokens that do not
 * continue an expression.
 */
export function getPrecedence(kind: TokenKind): Precedence {
  return infixPrecedence.get(kind) ?? Precedence.LOWEST;
}
