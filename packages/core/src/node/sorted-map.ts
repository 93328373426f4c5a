/**
 * String-keyed map whose iteration order is always ascending by key
 * (UTF-16 code unit order), independent of insertion order.
 */

export interface ReadonlySortedMap<V extends object> extends Iterable<[string, V]> {
  readonly size: number;
  get(key: string): V | undefined;
  has(key: string): boolean;
  keys(): readonly string[];
  values(): V[];
  entries(): Array<[string, V]>;
}

export class SortedMap<V extends object> implements ReadonlySortedMap<V> {
  private readonly items = new Map<string, V>();
  private readonly order: string[] = [];

  constructor(initial?: Iterable<[string, V]>) {
    if (initial) {
      for (const [key, value] of initial) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this.items.size;
  }

  get(key: string): V | undefined {
    return this.items.get(key);
  }

  has(key: string): boolean {
    return this.items.has(key);
  }

  /** Inserts or replaces; replacing keeps the key's position */
  set(key: string, value: V): this {
    if (!this.items.has(key)) {
      insertSorted(this.order, key);
    }
    this.items.set(key, value);
    return this;
  }

  delete(key: string): boolean {
    if (!this.items.delete(key)) return false;
    const index = indexOfSorted(this.order, key);
    if (index >= 0) this.order.splice(index, 1);
    return true;
  }

  clear(): void {
    this.items.clear();
    this.order.length = 0;
  }

  /** Snapshot of the keys in ascending order */
  keys(): readonly string[] {
    return this.order.slice();
  }

  values(): V[] {
    return this.entries().map(([, value]) => value);
  }

  entries(): Array<[string, V]> {
    const out: Array<[string, V]> = [];
    for (const key of this.order) {
      const value = this.items.get(key);
      if (value !== undefined) out.push([key, value]);
    }
    return out;
  }

  /** Iterates a snapshot, so callers may mutate the map while looping */
  [Symbol.iterator](): Iterator<[string, V]> {
    return this.entries()[Symbol.iterator]();
  }
}

function indexOfSorted(list: readonly string[], value: string): number {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const current = list[mid];
    if (current === value) return mid;
    if (current !== undefined && current < value) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return -1;
}

function insertSorted(list: string[], value: string): void {
  let lo = 0;
  let hi = list.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const current = list[mid];
    if (current === value) return;
    if (current !== undefined && current < value) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  list.splice(lo, 0, value);
}
