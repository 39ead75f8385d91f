/**
 * Compiler module exports.
 */

export {
  Compiler,
  CompileError,
  compile,
  foldExpr,
  foldArithmetic,
  ANONYMOUS,
  MAX_ARGS,
  MAX_LOCALS,
  MAX_UPVALUES,
} from "./compiler.js";
export type { CompilerConfig } from "./compiler.js";
