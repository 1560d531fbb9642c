import type { StoredValue } from '../../types';

export function foldKey(key: string): string {
  return key.toLowerCase();
}

/**
 * Case-insensitive index over a store's property bag.
 *
 * Maps a folded key to the exact name it is stored under. The index is filled
 * lazily: a miss scans the bag once and remembers the first match, so repeated
 * lookups in any casing are O(1) afterwards. Because it remembers names rather
 * than values, overwriting a key never leaves a stale entry behind; removals
 * must call `forget()`.
 */
export class CaseInsensitiveLookupCache {
  private readonly index = new Map<string, string>();

  constructor(private readonly bag: ReadonlyMap<string, StoredValue>) {}

  /** Returns the stored name `key` resolves to, or undefined. */
  resolve(key: string): string | undefined {
    const folded = foldKey(key);
    const cached = this.index.get(folded);
    if (cached !== undefined) {
      if (this.bag.has(cached)) return cached;
      this.index.delete(folded);
    }

    for (const name of this.bag.keys()) {
      if (foldKey(name) === folded) {
        this.index.set(folded, name);
        return name;
      }
    }
    return undefined;
  }

  has(key: string): boolean {
    return this.resolve(key) !== undefined;
  }

  get<D>(key: string, defaultValue: D): StoredValue | D {
    const name = this.resolve(key);
    if (name === undefined) return defaultValue;
    const value = this.bag.get(name);
    return value === undefined ? defaultValue : value;
  }

  /** Records a name that was just written, so the next lookup skips the scan. */
  remember(name: string): void {
    this.index.set(foldKey(name), name);
  }

  forget(key: string): void {
    this.index.delete(foldKey(key));
  }

  clear(): void {
    this.index.clear();
  }

  /** Number of memoized entries. */
  get size(): number {
    return this.index.size;
  }
}
