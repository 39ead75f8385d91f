/**
 * AST node types for the TinyLang parser.
 *
 * Every node is a class carrying a literal `kind` tag, so the unions below
 * narrow in a `switch (node.kind)`. `toString()` renders a fully
 * parenthesized form used by tests and tooling.
 */

import type { Position } from "../token/token.js";

export type UnaryOp = "-" | "!";

export type BinaryOp =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&&"
  | "||";

// ============================================================================
// Literal Expressions
// ============================================================================

/**
 * Number literal. All numbers are IEEE-754 doubles.
 */
export class NumberLit {
  readonly kind = "NumberLit" as const;

  constructor(
    public readonly position: Position,
    public readonly literal: string,
    public readonly value: number
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.literal;
  }
}

export class StringLit {
  readonly kind = "StringLit" as const;

  constructor(
    public readonly position: Position,
    public readonly value: string
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return JSON.stringify(this.value);
  }
}

export class BoolLit {
  readonly kind = "BoolLit" as const;

  constructor(
    public readonly position: Position,
    public readonly value: boolean
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.value ? "true" : "false";
  }
}

export class NilLit {
  readonly kind = "NilLit" as const;

  constructor(public readonly position: Position) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return "nil";
  }
}

// ============================================================================
// Identifier
// ============================================================================

/**
 * Identifier (variable reference).
 */
export class Ident {
  readonly kind = "Ident" as const;

  constructor(
    public readonly position: Position,
    public readonly name: string
  ) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return this.name;
  }
}

// ============================================================================
// Operator Expressions
// ============================================================================

/**
 * Prefix operator expression (unary).
 */
export class PrefixExpr {
  readonly kind = "PrefixExpr" as const;

  constructor(
    public readonly opPos: Position,
    public readonly op: UnaryOp,
    public readonly right: Expr
  ) {}

  pos(): Position {
    return this.opPos;
  }
  toString(): string {
    return `(${this.op}${this.right.toString()})`;
  }
}

/**
 * Infix operator expression (binary). `&&` and `||` are infix expressions
 * too; the compiler gives them short-circuit semantics.
 */
export class InfixExpr {
  readonly kind = "InfixExpr" as const;

  constructor(
    public readonly left: Expr,
    public readonly opPos: Position,
    public readonly op: BinaryOp,
    public readonly right: Expr
  ) {}

  pos(): Position {
    return this.left.pos();
  }
  toString(): string {
    return `(${this.left.toString()} ${this.op} ${this.right.toString()})`;
  }
}

/**
 * Assignment to a variable. Evaluates to the assigned value.
 */
export class AssignExpr {
  readonly kind = "AssignExpr" as const;

  constructor(
    public readonly target: Ident,
    public readonly opPos: Position,
    public readonly value: Expr
  ) {}

  pos(): Position {
    return this.target.pos();
  }
  toString(): string {
    return `(${this.target.name} = ${this.value.toString()})`;
  }
}

// ============================================================================
// Calls and Functions
// ============================================================================

export class CallExpr {
  readonly kind = "CallExpr" as const;

  constructor(
    public readonly fn: Expr,
    public readonly lparen: Position,
    public readonly args: Expr[],
    public readonly rparen: Position
  ) {}

  pos(): Position {
    return this.fn.pos();
  }
  toString(): string {
    return `${this.fn.toString()}(${this.args.map((a) => a.toString()).join(", ")})`;
  }
}

/**
 * Function literal. Named when it comes from a declaration; anonymous
 * function expressions have a null name.
 */
export class FuncLit {
  readonly kind = "FuncLit" as const;

  constructor(
    public readonly funcPos: Position,
    public readonly name: Ident | null,
    public readonly params: Ident[],
    public readonly body: Block
  ) {}

  pos(): Position {
    return this.funcPos;
  }
  toString(): string {
    const name = this.name ? ` ${this.name.name}` : "";
    const params = this.params.map((p) => p.name).join(", ");
    return `fn${name}(${params}) ${this.body.toString()}`;
  }
}

// ============================================================================
// Statements
// ============================================================================

/**
 * Variable declaration: `let x = 1;` or `var x;`.
 */
export class VarStmt {
  readonly kind = "VarStmt" as const;

  constructor(
    public readonly letPos: Position,
    public readonly keyword: "let" | "var",
    public readonly name: Ident,
    public readonly value: Expr | null
  ) {}

  pos(): Position {
    return this.letPos;
  }
  toString(): string {
    if (this.value === null) {
      return `${this.keyword} ${this.name.name};`;
    }
    return `${this.keyword} ${this.name.name} = ${this.value.toString()};`;
  }
}

/**
 * Named function declaration: `fn name(params) { ... }`.
 */
export class FuncDecl {
  readonly kind = "FuncDecl" as const;

  constructor(
    public readonly name: Ident,
    public readonly fn: FuncLit
  ) {}

  pos(): Position {
    return this.fn.pos();
  }
  toString(): string {
    return this.fn.toString();
  }
}

export class ExprStmt {
  readonly kind = "ExprStmt" as const;

  constructor(public readonly expr: Expr) {}

  pos(): Position {
    return this.expr.pos();
  }
  toString(): string {
    return `${this.expr.toString()};`;
  }
}

/**
 * The `print expr;` statement form.
 */
export class PrintStmt {
  readonly kind = "PrintStmt" as const;

  constructor(
    public readonly printPos: Position,
    public readonly value: Expr
  ) {}

  pos(): Position {
    return this.printPos;
  }
  toString(): string {
    return `print ${this.value.toString()};`;
  }
}

export class Block {
  readonly kind = "Block" as const;

  constructor(
    public readonly lbrace: Position,
    public readonly stmts: Stmt[],
    public readonly rbrace: Position
  ) {}

  pos(): Position {
    return this.lbrace;
  }
  toString(): string {
    if (this.stmts.length === 0) {
      return "{}";
    }
    return `{ ${this.stmts.map((s) => s.toString()).join(" ")} }`;
  }
}

export class IfStmt {
  readonly kind = "IfStmt" as const;

  constructor(
    public readonly ifPos: Position,
    public readonly condition: Expr,
    public readonly consequence: Stmt,
    public readonly alternative: Stmt | null
  ) {}

  pos(): Position {
    return this.ifPos;
  }
  toString(): string {
    let out = `if (${this.condition.toString()}) ${this.consequence.toString()}`;
    if (this.alternative) {
      out += ` else ${this.alternative.toString()}`;
    }
    return out;
  }
}

export class WhileStmt {
  readonly kind = "WhileStmt" as const;

  constructor(
    public readonly whilePos: Position,
    public readonly condition: Expr,
    public readonly body: Stmt
  ) {}

  pos(): Position {
    return this.whilePos;
  }
  toString(): string {
    return `while (${this.condition.toString()}) ${this.body.toString()}`;
  }
}

/**
 * C-style for loop. Any of the three clauses may be omitted.
 */
export class ForStmt {
  readonly kind = "ForStmt" as const;

  constructor(
    public readonly forPos: Position,
    public readonly init: VarStmt | ExprStmt | null,
    public readonly condition: Expr | null,
    public readonly post: Expr | null,
    public readonly body: Stmt
  ) {}

  pos(): Position {
    return this.forPos;
  }
  toString(): string {
    const init = this.init ? this.init.toString() : ";";
    const cond = this.condition ? ` ${this.condition.toString()}` : "";
    const post = this.post ? ` ${this.post.toString()}` : "";
    return `for (${init}${cond};${post}) ${this.body.toString()}`;
  }
}

export class BreakStmt {
  readonly kind = "BreakStmt" as const;

  constructor(public readonly position: Position) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return "break;";
  }
}

export class ContinueStmt {
  readonly kind = "ContinueStmt" as const;

  constructor(public readonly position: Position) {}

  pos(): Position {
    return this.position;
  }
  toString(): string {
    return "continue;";
  }
}

export class ReturnStmt {
  readonly kind = "ReturnStmt" as const;

  constructor(
    public readonly returnPos: Position,
    public readonly value: Expr | null
  ) {}

  pos(): Position {
    return this.returnPos;
  }
  toString(): string {
    return this.value ? `return ${this.value.toString()};` : "return;";
  }
}

// ============================================================================
// Program
// ============================================================================

/**
 * Root node: the statements of one source text.
 */
export class Program {
  readonly kind = "Program" as const;

  constructor(public readonly stmts: Stmt[]) {}

  toString(): string {
    return this.stmts.map((s) => s.toString()).join("\n");
  }
}

// ============================================================================
// Unions
// ============================================================================

export type Expr =
  | NumberLit
  | StringLit
  | BoolLit
  | NilLit
  | Ident
  | PrefixExpr
  | InfixExpr
  | AssignExpr
  | CallExpr
  | FuncLit;

export type Stmt =
  | VarStmt
  | FuncDecl
  | ExprStmt
  | PrintStmt
  | Block
  | IfStmt
  | WhileStmt
  | ForStmt
  | BreakStmt
  | ContinueStmt
  | ReturnStmt;

export type Node = Expr | Stmt | Program;
