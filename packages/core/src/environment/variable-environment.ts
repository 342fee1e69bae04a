// packages/core/src/environment/variable-environment.ts

import type { Value } from '../types/flow.js';
import { UnresolvedNameError } from '../utils/errors.js';

/**
 * Mutable store of experiment variables for one run.
 *
 * Names are flat strings; loop counters live under dotted keys such as
 * `trials.thisN`. Components hold no reference to it beyond the call that
 * receives it.
 */
export class VariableEnvironment {
  private values = new Map<string, Value>();

  constructor(initial?: Record<string, Value>) {
    if (initial) {
      for (const [name, value] of Object.entries(initial)) {
        this.values.set(name, value);
      }
    }
  }

  /** Value bound to `name`. Throws UnresolvedNameError when unbound. */
  get(name: string): Value {
    const value = this.values.get(name);
    if (value === undefined) {
      throw new UnresolvedNameError(name);
    }
    return value;
  }

  lookup(name: string): Value | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, value: Value): void {
    this.values.set(name, value);
  }

  delete(name: string): boolean {
    return this.values.delete(name);
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  get size(): number {
    return this.values.size;
  }

  /**
   * Bind several names at once. The returned release function restores each
   * name to what it was before (or unbinds it), whatever was written since.
   */
  bind(bindings: Record<string, Value>): () => void {
    const previous = new Map<string, Value | undefined>();
    for (const [name, value] of Object.entries(bindings)) {
      if (!previous.has(name)) {
        previous.set(name, this.values.get(name));
      }
      this.values.set(name, value);
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      for (const [name, value] of previous) {
        if (value === undefined) {
          this.values.delete(name);
        } else {
          this.values.set(name, value);
        }
      }
    };
  }

  /** Plain-object deep copy of every binding. */
  snapshot(): Record<string, Value> {
    const copy: Record<string, Value> = {};
    for (const [name, value] of this.values) {
      copy[name] = structuredClone(value);
    }
    return copy;
  }

  clear(): void {
    this.values.clear();
  }
}
