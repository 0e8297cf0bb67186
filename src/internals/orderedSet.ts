import { ExecutionException } from "./exceptions";

/**
 * Set that remembers insertion order and supports O(1) membership checks
 * and removal.
 *
 * Elements are identified by a key computed with `keyOf`. The default key is
 * the element itself, which gives the usual `Set` semantics; structured
 * values can provide a canonical key to get structural membership instead.
 *
 * @template T Type of the stored elements.
 * @template K Type of the keys that identify elements.
 */
export class OrderedSet<T, K = T> implements Iterable<T> {
  private entries = new Map<K, T>();

  /**
   * @param keyOf Computes the identity of an element.
   */
  private constructor(private readonly keyOf: (value: T) => K) {}

  /**
   * Creates a set that uses the elements themselves as keys.
   */
  static from<T>(values: Iterable<T> = []): OrderedSet<T, T> {
    const set = new OrderedSet<T, T>((value) => value);
    for (const value of values) set.add(value);
    return set;
  }

  /**
   * Creates a set that identifies elements by `keyOf`.
   */
  static keyed<T, K>(
    keyOf: (value: T) => K,
    values: Iterable<T> = [],
  ): OrderedSet<T, K> {
    const set = new OrderedSet<T, K>(keyOf);
    for (const value of values) set.add(value);
    return set;
  }

  get size(): number {
    return this.entries.size;
  }

  public has(value: T): boolean {
    return this.entries.has(this.keyOf(value));
  }

  /**
   * Appends `value` unless an equal element is already present.
   * @returns `true` iff the set has changed.
   */
  public add(value: T): boolean {
    const key = this.keyOf(value);
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, value);
    return true;
  }

  /**
   * Removes the element equal to `value` if there is one.
   * @returns `true` iff the set has changed.
   */
  public discard(value: T): boolean {
    return this.entries.delete(this.keyOf(value));
  }

  /**
   * Removes and returns the last (or the first) element.
   * @throws If the set is empty.
   */
  public pop(last: boolean = true): T {
    if (this.entries.size === 0) {
      throw ExecutionException.make("pop from an empty set");
    }
    const values = [...this.entries.values()];
    const value = last ? values[values.length - 1] : values[0];
    this.discard(value);
    return value;
  }

  public clear(): void {
    this.entries.clear();
  }

  public [Symbol.iterator](): Iterator<T> {
    return this.entries.values();
  }

  public *reversed(): Generator<T> {
    const values = [...this.entries.values()];
    for (let i = values.length - 1; i >= 0; i--) {
      yield values[i];
    }
  }

  public toArray(): T[] {
    return [...this.entries.values()];
  }

  /**
   * Two ordered sets are equal when they hold equal elements in the same order.
   */
  public equals(other: OrderedSet<T, K>): boolean {
    if (this.size !== other.size) return false;
    const lhs = [...this.entries.keys()];
    const rhs = [...other.entries.keys()];
    return lhs.every((key, idx) => key === rhs[idx]);
  }

  public toString(): string {
    return this.size === 0
      ? "OrderedSet()"
      : `OrderedSet([${this.toArray().map(String).join(", ")}])`;
  }
}
