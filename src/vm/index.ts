/**
 * VM module exports.
 */

export { VM, InterpretResult } from "./vm.js";
export type { VMConfig } from "./vm.js";
export { VMError, arityMessage } from "./error.js";
export type { TraceEntry } from "./error.js";
export { Frame } from "./frame.js";
