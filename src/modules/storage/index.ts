import type { z } from 'zod';
import { Config } from '../../config';
import {
  EncodingError,
  IdentityViolationError,
  MediumUnavailableError,
  StorageError,
  describeError,
} from '../../errors';
import { Messages } from '../../messages';
import type { StoreSnapshot, StoredValue } from '../../types';
import type { Logger } from '../../utils/logger';
import { withEncodingErrors } from '../codec';
import { CaseInsensitiveLookupCache } from '../lookup';
import type { StoreContext } from '../registry';

/**
 * Base of every store: a singleton bag of values with case-insensitive reads.
 *
 * Instances only come from `StoreRegistry.getInstance()`. The registry takes the
 * type's snapshot, calls its `create()`, then copies the snapshot in through
 * `hydrate()`. Read-only request data stores use this class directly.
 */
export abstract class SingletonStore {
  static readonly storeName: string = 'store';

  protected readonly bag = new Map<string, StoredValue>();
  protected readonly lookup = new CaseInsensitiveLookupCache(this.bag);
  protected readonly logger: Logger;
  private hydrated = false;

  constructor(protected readonly context: StoreContext) {
    context.registry.claim(new.target);
    this.logger = context.logger;
  }

  get storeName(): string {
    return this.context.type.storeName;
  }

  /** @internal Called once by the registry with the type's snapshot. */
  hydrate(snapshot: StoreSnapshot): void {
    if (this.hydrated) {
      throw new IdentityViolationError(Messages.alreadyHydrated(this.storeName));
    }
    this.hydrated = true;
    for (const [key, value] of Object.entries(snapshot)) {
      this.bag.set(key, value);
    }
  }

  has(key: string): boolean {
    return this.lookup.has(key);
  }

  get(key: string): StoredValue | null;
  get<D>(key: string, defaultValue: D): StoredValue | D;
  get<D>(key: string, defaultValue?: D): StoredValue | D | null {
    return this.lookup.get(key, defaultValue === undefined ? null : defaultValue);
  }

  /** Stored names, in insertion order, with the casing they were stored under. */
  keys(): string[] {
    return Array.from(this.bag.keys());
  }

  get size(): number {
    return this.bag.size;
  }

  all(): StoreSnapshot {
    return Object.fromEntries(this.bag);
  }

  toJSON(): StoreSnapshot {
    return this.all();
  }

  clone(): never {
    throw new IdentityViolationError(Messages.cloneForbidden(this.storeName));
  }
}

/**
 * Read/write store bound to an external medium.
 *
 * The bag holds raw (encoded) values; `get()` and `all()` decode them through
 * the registry's codec, `getRaw()` does not. Subclasses mirror every write to
 * their medium in `persist()` / `erase()` and report medium presence in
 * `contains()`.
 */
export abstract class AbstractStorage extends SingletonStore {
  static readonly defaultExpiry: number = Config.memoryExpiry;

  /** TTL in seconds for this store type, read on every write. */
  get expiry(): number {
    return this.context.registry.getExpiry(this.context.type);
  }

  /**
   * Encodes `value` and writes it to the medium, then to the store.
   * A key that already exists in another casing is overwritten in place.
   */
  set(key: string, value: StoredValue): this {
    const name = this.lookup.resolve(key) ?? key;
    const raw = withEncodingErrors(
      () => this.context.codec.encode(value),
      (details) => Messages.cannotEncode(name, details),
    );

    this.guard(name, () => this.persist(name, raw, this.expiry));
    this.bag.set(name, raw);
    this.lookup.remember(name);
    return this;
  }

  get(key: string): StoredValue | null;
  get<D>(key: string, defaultValue: D): StoredValue | D;
  get<D>(key: string, defaultValue?: D): StoredValue | D | null {
    const fallback = defaultValue === undefined ? null : defaultValue;
    const name = this.lookup.resolve(key);
    if (name === undefined) return fallback;
    const value = this.bag.get(name);
    return value === undefined ? fallback : this.decodeValue(name, value);
  }

  getRaw(key: string): StoredValue | null;
  getRaw<D>(key: string, defaultValue: D): StoredValue | D;
  getRaw<D>(key: string, defaultValue?: D): StoredValue | D | null {
    return this.lookup.get(key, defaultValue === undefined ? null : defaultValue);
  }

  /**
   * Decodes the value and validates it against `schema`.
   * Returns null when the key is absent; a value of the wrong shape raises EncodingError.
   */
  getParsed<T>(key: string, schema: z.ZodType<T>): T | null {
    const name = this.lookup.resolve(key);
    if (name === undefined) return null;
    const value = this.decodeValue(name, this.bag.get(name) ?? null);
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new EncodingError(Messages.schemaMismatch(name, parsed.error.message), { cause: parsed.error });
    }
    return parsed.data;
  }

  /** True only when the key is present both here and in the medium. */
  has(key: string): boolean {
    const name = this.lookup.resolve(key);
    return name !== undefined && this.contains(name);
  }

  remove(key: string): this {
    const name = this.lookup.resolve(key);
    if (name === undefined) return this;

    this.guard(name, () => this.erase(name));
    this.bag.delete(name);
    this.lookup.forget(name);
    return this;
  }

  /**
   * Removes keys one by one through `remove()`, so each one reaches the medium.
   * Not atomic: a failure part-way leaves the remaining keys in place.
   */
  clear(): this {
    for (const name of this.keys()) {
      this.remove(name);
    }
    return this;
  }

  all(): StoreSnapshot {
    return Object.fromEntries([...this.bag].map(([name, value]) => [name, this.decodeValue(name, value)]));
  }

  protected decodeValue(name: string, value: StoredValue): StoredValue {
    if (typeof value !== 'string') return value;
    try {
      return withEncodingErrors(
        () => this.context.codec.decode(value),
        (details) => Messages.cannotDecode(name, details),
      );
    } catch (error) {
      if (this.context.decodeMode === 'strict') throw error;
      this.logger.warn({ key: name, err: error }, 'stored value could not be decoded, returning raw value');
      return value;
    }
  }

  private guard(name: string, write: () => void): void {
    try {
      write();
    } catch (error) {
      this.logger.warn({ key: name, err: error }, 'medium refused the write');
      if (error instanceof StorageError) throw error;
      throw new MediumUnavailableError(Messages.mediumFailure(this.storeName, name, describeError(error)), {
        cause: error,
      });
    }
  }

  protected abstract persist(name: string, raw: string, expiry: number): void;

  protected abstract erase(name: string): void;

  protected abstract contains(name: string): boolean;
}
