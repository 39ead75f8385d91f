export { createBuiltins, RANGE_LIMIT } from "./builtins.js";
export type { BuiltinOptions } from "./builtins.js";
