import type { ScalarCachePort } from "../../ports/cache/ScalarCachePort";

/** Unbounded map-backed cache; entries live as long as the instance. */
export class InMemoryScalarCache<V> implements ScalarCachePort<V> {
  private readonly entries = new Map<string, V>();

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    return this.entries.get(key);
  }

  set(key: string, value: V): void {
    this.entries.set(key, value);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }
}
