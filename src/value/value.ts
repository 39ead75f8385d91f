/**
 * TinyLang runtime values.
 *
 * Primitive values are held inline. Functions and closures live in the heap
 * arena and are referenced here by integer handle; the reference also
 * carries the function name so values can be printed without the heap.
 */

/**
 * Value type enumeration. The string values are the names used in error
 * messages ("cannot add string and number").
 */
export const enum ValueType {
  Nil = "nil",
  Bool = "bool",
  Number = "number",
  String = "string",
  Function = "function",
  Closure = "closure",
  Native = "native",
}

/** Index of an object slot in the heap arena. */
export type Handle = number;

/**
 * Behaviour shared by every runtime value.
 */
interface ValueBase {
  readonly type: ValueType;
  /** Textual form, as printed by `print`. */
  inspect(): string;
  isTruthy(): boolean;
  equals(other: Value): boolean;
}

/**
 * Nil singleton - represents absence of value.
 */
export class NilValue implements ValueBase {
  readonly type = ValueType.Nil;

  inspect(): string {
    return "nil";
  }

  isTruthy(): boolean {
    return false;
  }

  equals(other: Value): boolean {
    return other.type === ValueType.Nil;
  }
}

/** The singleton nil value. */
export const NIL = Object.freeze(new NilValue());

export class BoolValue implements ValueBase {
  readonly type = ValueType.Bool;

  constructor(public readonly value: boolean) {}

  inspect(): string {
    return this.value ? "true" : "false";
  }

  isTruthy(): boolean {
    return this.value;
  }

  equals(other: Value): boolean {
    return other.type === ValueType.Bool && other.value === this.value;
  }
}

/** Singleton true value. */
export const TRUE = Object.freeze(new BoolValue(true));
/** Singleton false value. */
export const FALSE = Object.freeze(new BoolValue(false));

/** Get boolean singleton. */
export function toBool(value: boolean): BoolValue {
  return value ? TRUE : FALSE;
}

/**
 * Double-precision number. Zero and NaN are falsy; NaN equals NaN.
 */
export class NumberValue implements ValueBase {
  readonly type = ValueType.Number;

  constructor(public readonly value: number) {}

  inspect(): string {
    return formatNumber(this.value);
  }

  isTruthy(): boolean {
    return this.value !== 0;
  }

  equals(other: Value): boolean {
    if (other.type !== ValueType.Number) {
      return false;
    }
    if (Number.isNaN(this.value)) {
      return Number.isNaN(other.value);
    }
    return other.value === this.value;
  }
}

/**
 * Immutable string. The empty string is falsy.
 */
export class StringValue implements ValueBase {
  readonly type = ValueType.String;

  constructor(public readonly value: string) {}

  inspect(): string {
    return this.value;
  }

  isTruthy(): boolean {
    return this.value.length > 0;
  }

  equals(other: Value): boolean {
    return other.type === ValueType.String && other.value === this.value;
  }
}

/**
 * Reference to a compiled function in the heap.
 */
export class FunctionValue implements ValueBase {
  readonly type = ValueType.Function;

  constructor(
    public readonly handle: Handle,
    public readonly name: string
  ) {}

  inspect(): string {
    return formatFunctionName(this.name);
  }

  isTruthy(): boolean {
    return true;
  }

  equals(other: Value): boolean {
    return other.type === ValueType.Function && other.handle === this.handle;
  }
}

/**
 * Reference to a closure in the heap.
 */
export class ClosureValue implements ValueBase {
  readonly type = ValueType.Closure;

  constructor(
    public readonly handle: Handle,
    public readonly name: string
  ) {}

  inspect(): string {
    return formatFunctionName(this.name);
  }

  isTruthy(): boolean {
    return true;
  }

  equals(other: Value): boolean {
    return other.type === ValueType.Closure && other.handle === this.handle;
  }
}

/**
 * Native function signature. Natives validate their own argument types and
 * signal failure by throwing.
 */
export type NativeFn = (args: Value[]) => Value;

/**
 * Built-in function implemented in TypeScript.
 */
export class NativeValue implements ValueBase {
  readonly type = ValueType.Native;

  /**
   * @param minArity - fewest accepted arguments
   * @param maxArity - most accepted arguments; Infinity for variadic natives
   */
  constructor(
    public readonly name: string,
    public readonly minArity: number,
    public readonly maxArity: number,
    public readonly fn: NativeFn
  ) {}

  inspect(): string {
    return `<native fn ${this.name}>`;
  }

  isTruthy(): boolean {
    return true;
  }

  equals(other: Value): boolean {
    return other === this;
  }
}

export type Value =
  | NilValue
  | BoolValue
  | NumberValue
  | StringValue
  | FunctionValue
  | ClosureValue
  | NativeValue;

/** Values that refer to a heap object. */
export type HeapValue = FunctionValue | ClosureValue;

// ============================================================================
// Helpers
// ============================================================================

export function newNumber(value: number): NumberValue {
  return new NumberValue(value);
}

export function newString(value: string): StringValue {
  return new StringValue(value);
}

export function isHeapValue(value: Value): value is HeapValue {
  return value.type === ValueType.Function || value.type === ValueType.Closure;
}

/**
 * Value equality.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  return a.equals(b);
}

/**
 * Format a number the way `print` shows it: integers without a decimal
 * point, everything else with at most 12 significant digits.
 */
export function formatNumber(n: number): string {
  if (Number.isNaN(n)) {
    return "nan";
  }
  if (n === Infinity) {
    return "inf";
  }
  if (n === -Infinity) {
    return "-inf";
  }
  if (Number.isInteger(n) && Math.abs(n) < 1e21) {
    return Object.is(n, -0) ? "-0" : n.toFixed(0);
  }
  return String(Number(n.toPrecision(12)));
}

function formatFunctionName(name: string): string {
  return name === "" ? "<script>" : `<fn ${name}>`;
}
