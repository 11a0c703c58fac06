import type { StateJournal } from './StateJournal.js';

/**
 * A single journaled slot.
 */
export class StorageValue<T> {
  private value: T;

  constructor(
    private readonly journal: StateJournal,
    initial: T,
  ) {
    this.value = initial;
  }

  get(): T {
    return this.value;
  }

  set(next: T): void {
    const previous = this.value;
    this.journal.record(() => {
      this.value = previous;
    });
    this.value = next;
  }
}

type Slot<V> = { value: V };

/**
 * A journaled mapping with a default value for unset keys. Keys are
 * serialized with `toKey`, so composite keys need a serializer that cannot
 * collide.
 */
export class StorageMap<K, V> {
  private readonly slots = new Map<string, Slot<V>>();

  constructor(
    private readonly journal: StateJournal,
    private readonly defaultValue: V,
    private readonly toKey: (key: K) => string = (key) => String(key),
  ) {}

  get(key: K): V {
    const slot = this.slots.get(this.toKey(key));
    return slot ? slot.value : this.defaultValue;
  }

  has(key: K): boolean {
    return this.slots.has(this.toKey(key));
  }

  set(key: K, value: V): void {
    const k = this.toKey(key);
    const previous = this.slots.get(k);
    this.journal.record(() => {
      if (previous) this.slots.set(k, previous);
      else this.slots.delete(k);
    });
    this.slots.set(k, { value });
  }

  update(key: K, fn: (current: V) => V): V {
    const next = fn(this.get(key));
    this.set(key, next);
    return next;
  }

  get size(): number {
    return this.slots.size;
  }
}

export function compositeKey(parts: readonly unknown[]): string {
  return JSON.stringify(parts.map((part) => String(part)));
}
