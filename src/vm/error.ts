/**
 * Runtime errors raised by the VM and the builtins.
 */

/**
 * One active call when a runtime error was raised.
 */
export interface TraceEntry {
  /** Function name; `<script>` for the top level. */
  name: string;
  line: number;
}

/**
 * VM execution error. The VM fills in `trace`, innermost frame first, before
 * it reports the error.
 */
export class VMError extends Error {
  trace: TraceEntry[] = [];

  constructor(message: string) {
    super(message);
    this.name = "VMError";
  }

  /**
   * Render the message and the frame trace.
   */
  format(): string {
    const lines = [`[RUNTIME ERROR] ${this.message}`];
    for (const entry of this.trace) {
      lines.push(`  at ${entry.name} (line ${entry.line})`);
    }
    return lines.join("\n");
  }
}

/**
 * Message for a call with the wrong number of arguments.
 */
export function arityMessage(min: number, max: number, got: number): string {
  if (min === max) {
    return `expected ${min} arguments but got ${got}`;
  }
  if (max === Infinity) {
    return `expected at least ${min} arguments but got ${got}`;
  }
  return `expected ${min} to ${max} arguments but got ${got}`;
}
