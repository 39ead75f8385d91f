/**
 * Built-in functions for TinyLang.
 */

import {
  NIL,
  NativeValue,
  ValueType,
  newNumber,
  newString,
  type NativeFn,
  type Value,
} from "../value/value.js";
import { VMError } from "../vm/error.js";

/** Largest count `range` accepts. */
export const RANGE_LIMIT = 100_000;

export interface BuiltinOptions {
  /** Receives the output of `print`. Defaults to console.log. */
  stdout?: (text: string) => void;
}

/**
 * Create the standard builtins map.
 */
export function createBuiltins(options: BuiltinOptions = {}): Map<string, NativeValue> {
  const stdout = options.stdout ?? ((text: string) => console.log(text));
  const builtins = new Map<string, NativeValue>();
  const define = (name: string, minArity: number, maxArity: number, fn: NativeFn): void => {
    builtins.set(name, new NativeValue(name, minArity, maxArity, fn));
  };

  // print - output values separated by spaces
  define("print", 0, Infinity, (args) => {
    stdout(args.map((arg) => arg.inspect()).join(" "));
    return NIL;
  });

  // clock - seconds since process start, for timing scripts
  define("clock", 0, 0, () => newNumber(performance.now() / 1000));

  define("len", 1, 1, ([value]) => {
    if (value.type !== ValueType.String) {
      throw new VMError(`len() expects a string, got ${value.type}`);
    }
    return newNumber(value.value.length);
  });

  define("assert", 1, 2, ([condition, message]) => {
    if (!condition.isTruthy()) {
      throw new VMError(message === undefined ? "assertion failed" : message.inspect());
    }
    return NIL;
  });

  define("toNumber", 1, 1, ([value]) => newNumber(toNumber(value)));

  define("toString", 1, 1, ([value]) => (value.type === ValueType.String ? value : newString(value.inspect())));

  // range - the list 0..n-1 rendered as a string
  define("range", 1, 1, ([value]) => {
    if (value.type !== ValueType.Number || !Number.isInteger(value.value) || value.value < 0) {
      throw new VMError(`range() expects a non-negative integer, got ${value.inspect()}`);
    }
    if (value.value > RANGE_LIMIT) {
      throw new VMError(`range() count ${value.inspect()} exceeds the limit of ${RANGE_LIMIT}`);
    }
    const items = Array.from({ length: value.value }, (_, i) => String(i));
    return newString(`[${items.join(", ")}]`);
  });

  return builtins;
}

function toNumber(value: Value): number {
  switch (value.type) {
    case ValueType.Number:
      return value.value;
    case ValueType.Bool:
      return value.value ? 1 : 0;
    case ValueType.String: {
      const text = value.value.trim();
      const parsed = Number(text);
      if (text === "" || Number.isNaN(parsed)) {
        throw new VMError(`cannot convert "${value.value}" to number`);
      }
      return parsed;
    }
    default:
      throw new VMError(`cannot convert ${value.inspect()} to number`);
  }
}
