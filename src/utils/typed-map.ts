/**
 * Type-safe Map wrapper.
 *
 * Settings tables are keyed by names that come straight from the
 * configuration file; keeping them in a Map rather than a plain object means
 * a group called `__proto__` or `constructor` is just another key.
 *
 * @packageDocumentation
 */

/**
 * Thin wrapper around Map with enforced key and value types and insertion
 * order iteration.
 *
 * @example
 * ```ts
 * const events = new TypedMap<string, number>();
 * events.set('ringtone', 1).set('sms', 2);
 * events.get('sms');  // 2
 * [...events.keys()]; // ['ringtone', 'sms']
 * ```
 *
 * @template K - The type of keys in the map.
 * @template V - The type of values in the map.
 */
export class TypedMap<K, V> {
  private readonly map: Map<K, V>;

  constructor() {
    this.map = new Map<K, V>();
  }

  /**
   * Creates a TypedMap from an iterable of entries.
   *
   * @param entries - An iterable of [key, value] tuples.
   */
  static fromEntries<K, V>(entries: Iterable<readonly [K, V]>): TypedMap<K, V> {
    const typedMap = new TypedMap<K, V>();
    for (const [key, value] of entries) {
      typedMap.map.set(key, value);
    }
    return typedMap;
  }

  get(key: K): V | undefined {
    return this.map.get(key);
  }

  /**
   * Sets a value, replacing any previous value for the key. An existing key
   * keeps its original position in iteration order.
   */
  set(key: K, value: V): this {
    this.map.set(key, value);
    return this;
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }

  entries(): IterableIterator<[K, V]> {
    return this.map.entries();
  }

  keys(): IterableIterator<K> {
    return this.map.keys();
  }

  values(): IterableIterator<V> {
    return this.map.values();
  }

  get size(): number {
    return this.map.size;
  }

  clear(): void {
    this.map.clear();
  }

  /**
   * Returns a shallow copy with the same entries in the same order.
   */
  clone(): TypedMap<K, V> {
    return TypedMap.fromEntries(this.map);
  }

  /**
   * Converts the map to a plain object, stringifying keys. A `__proto__` key
   * becomes an own property rather than the object's prototype.
   */
  toObject(): Record<string, V> {
    return Object.fromEntries([...this.map].map(([key, value]) => [String(key), value] as const));
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.map[Symbol.iterator]();
  }
}
