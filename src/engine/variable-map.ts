import { type Variable, variableKey } from "./types";

interface Entry<V> {
  variable: Variable;
  value: V;
}

/**
 * Insertion-ordered map keyed by a variable's fields rather than its object
 * identity, so any two equal variables address the same entry.
 */
export class VariableMap<V> implements Iterable<[Variable, V]> {
  private readonly entriesByKey = new Map<string, Entry<V>>();

  constructor(entries?: Iterable<readonly [Variable, V]>) {
    if (entries) {
      for (const [variable, value] of entries) this.set(variable, value);
    }
  }

  get size(): number {
    return this.entriesByKey.size;
  }

  get(variable: Variable): V | undefined {
    return this.entriesByKey.get(variableKey(variable))?.value;
  }

  has(variable: Variable): boolean {
    return this.entriesByKey.has(variableKey(variable));
  }

  set(variable: Variable, value: V): this {
    const key = variableKey(variable);
    const existing = this.entriesByKey.get(key);
    if (existing) existing.value = value;
    else this.entriesByKey.set(key, { variable, value });
    return this;
  }

  delete(variable: Variable): boolean {
    return this.entriesByKey.delete(variableKey(variable));
  }

  *keys(): IterableIterator<Variable> {
    for (const e of this.entriesByKey.values()) yield e.variable;
  }

  *values(): IterableIterator<V> {
    for (const e of this.entriesByKey.values()) yield e.value;
  }

  *entries(): IterableIterator<[Variable, V]> {
    for (const e of this.entriesByKey.values()) yield [e.variable, e.value];
  }

  [Symbol.iterator](): IterableIterator<[Variable, V]> {
    return this.entries();
  }

  clone(copyValue: (value: V) => V = (value) => value): VariableMap<V> {
    const next = new VariableMap<V>();
    for (const [variable, value] of this.entries()) {
      next.set(variable, copyValue(value));
    }
    return next;
  }
}

export type Domains = VariableMap<Set<string>>;
export type Assignment = VariableMap<string>;
