/**
 * Handle arena for functions and closures with a mark-and-sweep collector.
 */

import { ClosureObject, FunctionObject, type HeapObject } from "./objects.js";
import {
  ClosureValue,
  FunctionValue,
  ValueType,
  type Handle,
  type Value,
} from "../value/value.js";

/**
 * Raised when a handle does not name a live object of the expected kind.
 */
export class HeapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HeapError";
  }
}

/**
 * Collector configuration.
 */
export interface HeapConfig {
  /** Collect before every allocation. */
  stressMode?: boolean;
  /** Lower bound for the next collection threshold, in bytes. */
  initialThreshold?: number;
  /** Threshold multiplier applied to the surviving bytes. */
  growFactor?: number;
  /** Receives one line per collection when set. */
  log?: (message: string) => void;
}

export interface HeapStats {
  liveObjects: number;
  bytesAllocated: number;
  nextGC: number;
  collections: number;
  objectsFreed: number;
}

/**
 * Sink for root references during the mark phase.
 */
export interface RootMarker {
  markValue(value: Value): void;
  markHandle(handle: Handle): void;
}

/**
 * Reports a component's roots. Registered with `addRootProvider`.
 */
export type RootProvider = (marker: RootMarker) => void;

interface Slot {
  object: HeapObject;
  size: number;
  marked: boolean;
}

const DEFAULT_THRESHOLD = 1024 * 1024;
const DEFAULT_GROW_FACTOR = 2;

/**
 * Estimated footprint of a function: header, code bytes and constants.
 */
export function functionSize(fn: FunctionObject): number {
  return 64 + fn.chunk.code.length + 16 * fn.chunk.constants.length;
}

export function closureSize(closure: ClosureObject): number {
  return 32 + 16 * closure.upvalues.length;
}

/**
 * Object arena addressed by integer handles.
 *
 * Allocation may collect first: every object reachable from a root
 * provider, an extra root or the object being allocated survives.
 */
export class Heap implements RootMarker {
  private slots: (Slot | null)[] = [];
  private freeList: Handle[] = [];
  private gray: Handle[] = [];
  private providers = new Set<RootProvider>();
  private extraRoots = new Map<Handle, number>();

  private readonly stressMode: boolean;
  private readonly initialThreshold: number;
  private readonly growFactor: number;
  private readonly log: ((message: string) => void) | undefined;

  private bytes = 0;
  private nextGC: number;
  private collections = 0;
  private freedTotal = 0;
  private live = 0;

  constructor(config: HeapConfig = {}) {
    this.stressMode = config.stressMode ?? false;
    this.initialThreshold = config.initialThreshold ?? DEFAULT_THRESHOLD;
    this.growFactor = config.growFactor ?? DEFAULT_GROW_FACTOR;
    this.log = config.log;
    this.nextGC = this.initialThreshold;
  }

  // =========================================================================
  // Allocation
  // =========================================================================

  allocateFunction(fn: FunctionObject): FunctionValue {
    const handle = this.allocate(fn, functionSize(fn));
    return new FunctionValue(handle, fn.name);
  }

  allocateClosure(closure: ClosureObject): ClosureValue {
    const handle = this.allocate(closure, closureSize(closure));
    return new ClosureValue(handle, closure.fn.name);
  }

  private allocate(object: HeapObject, size: number): Handle {
    if (this.stressMode || this.bytes + size > this.nextGC) {
      this.collect(object);
    }

    const slot: Slot = { object, size, marked: false };
    let handle = this.freeList.pop();
    if (handle === undefined) {
      handle = this.slots.length;
      this.slots.push(slot);
    } else {
      this.slots[handle] = slot;
    }
    this.bytes += size;
    this.live++;
    return handle;
  }

  // =========================================================================
  // Access
  // =========================================================================

  get(handle: Handle): HeapObject {
    const slot = this.slots[handle];
    if (slot === undefined || slot === null) {
      throw new HeapError(`invalid handle ${handle}`);
    }
    return slot.object;
  }

  getFunction(handle: Handle): FunctionObject {
    const object = this.get(handle);
    if (object.kind !== "function") {
      throw new HeapError(`handle ${handle} is not a function`);
    }
    return object;
  }

  getClosure(handle: Handle): ClosureObject {
    const object = this.get(handle);
    if (object.kind !== "closure") {
      throw new HeapError(`handle ${handle} is not a closure`);
    }
    return object;
  }

  isLive(handle: Handle): boolean {
    const slot = this.slots[handle];
    return slot !== undefined && slot !== null;
  }

  // =========================================================================
  // Roots
  // =========================================================================

  /**
   * Register a root provider. Returns a function that unregisters it.
   */
  addRootProvider(provider: RootProvider): () => void {
    this.providers.add(provider);
    return () => {
      this.providers.delete(provider);
    };
  }

  /**
   * Pin a heap value until a matching `removeRoot`. Non-heap values are
   * ignored.
   */
  addRoot(value: Value): void {
    if (value.type === ValueType.Function || value.type === ValueType.Closure) {
      this.extraRoots.set(value.handle, (this.extraRoots.get(value.handle) ?? 0) + 1);
    }
  }

  removeRoot(value: Value): void {
    if (value.type !== ValueType.Function && value.type !== ValueType.Closure) {
      return;
    }
    const count = this.extraRoots.get(value.handle);
    if (count === undefined) {
      return;
    }
    if (count <= 1) {
      this.extraRoots.delete(value.handle);
    } else {
      this.extraRoots.set(value.handle, count - 1);
    }
  }

  // =========================================================================
  // Collection
  // =========================================================================

  markValue(value: Value): void {
    if (value.type === ValueType.Function || value.type === ValueType.Closure) {
      this.markHandle(value.handle);
    }
  }

  markHandle(handle: Handle): void {
    const slot = this.slots[handle];
    if (slot === undefined || slot === null || slot.marked) {
      return;
    }
    slot.marked = true;
    this.gray.push(handle);
  }

  /**
   * Run a full collection. `pending` is an object about to be inserted; its
   * references are treated as roots.
   */
  collect(pending?: HeapObject): number {
    const before = this.bytes;

    for (const provider of this.providers) {
      provider(this);
    }
    for (const handle of this.extraRoots.keys()) {
      this.markHandle(handle);
    }
    if (pending) {
      this.blacken(pending);
    }
    this.traceReferences();
    const freed = this.sweep();

    this.collections++;
    this.freedTotal += freed;
    this.nextGC = Math.max(this.bytes * this.growFactor, this.initialThreshold);
    this.log?.(
      `gc: freed ${freed} objects, ${before - this.bytes} bytes (${before} -> ${this.bytes}), next at ${this.nextGC}`
    );
    return freed;
  }

  private traceReferences(): void {
    let handle = this.gray.pop();
    while (handle !== undefined) {
      this.blacken(this.get(handle));
      handle = this.gray.pop();
    }
  }

  private blacken(object: HeapObject): void {
    if (object.kind === "function") {
      for (const constant of object.chunk.constants) {
        this.markValue(constant);
      }
      return;
    }
    this.markHandle(object.fn.handle);
    for (const cell of object.upvalues) {
      if (!cell.open) {
        this.markValue(cell.closed);
      }
    }
  }

  private sweep(): number {
    let freed = 0;
    for (let handle = 0; handle < this.slots.length; handle++) {
      const slot = this.slots[handle];
      if (slot === null) {
        continue;
      }
      if (slot.marked) {
        slot.marked = false;
        continue;
      }
      this.slots[handle] = null;
      this.freeList.push(handle);
      this.bytes -= slot.size;
      this.live--;
      freed++;
    }
    return freed;
  }

  // =========================================================================
  // Introspection
  // =========================================================================

  get bytesAllocated(): number {
    return this.bytes;
  }

  stats(): HeapStats {
    return {
      liveObjects: this.live,
      bytesAllocated: this.bytes,
      nextGC: this.nextGC,
      collections: this.collections,
      objectsFreed: this.freedTotal,
    };
  }
}
