import { z } from 'zod';
import type { CookieTransport } from '../../adapters/cookieTransport';
import { MemoryMedium } from '../../adapters/memoryMedium';
import type { SessionTransport } from '../../adapters/sessionTransport';
import { Config } from '../../config';
import {
  ConfigurationError,
  IdentityViolationError,
  RegistryDisposedError,
} from '../../errors';
import { Messages } from '../../messages';
import type { CookieDefaults, DecodeMode, RequestSnapshot, StoreSnapshot } from '../../types';
import { type Logger, createLogger } from '../../utils/logger';
import { JsonCodec, type SerializationCodec } from '../codec';
import type { SingletonStore } from '../storage';

/**
 * Everything a store type needs from its registry: the media it persists to,
 * the codec, its logger and the request data it may snapshot.
 */
export interface StoreContext {
  readonly registry: StoreRegistry;
  readonly type: StoreType;
  readonly logger: Logger;
  readonly codec: SerializationCodec;
  readonly decodeMode: DecodeMode;
  readonly request: RequestSnapshot;
  readonly cookies?: CookieTransport;
  readonly session?: SessionTransport;
  readonly memory: MemoryMedium;
  readonly cookieDefaults: CookieDefaults;
}

/**
 * A store class, used as the nominal key of the registry.
 * `snapshot()` reads the medium once; `create()` is a plain factory.
 */
export interface StoreType<S extends SingletonStore = SingletonStore> {
  new (context: StoreContext): S;
  readonly storeName: string;
  readonly defaultExpiry?: number;
  snapshot(context: StoreContext): StoreSnapshot;
  create(context: StoreContext): S;
}

export interface StoreRegistryOptions {
  request?: RequestSnapshot;
  cookies?: CookieTransport;
  session?: SessionTransport;
  memory?: MemoryMedium;
  codec?: SerializationCodec;
  logger?: Logger;
  decodeMode?: DecodeMode;
  cookieDefaults?: Partial<CookieDefaults>;
}

const optionsSchema = z.object({
  decodeMode: z.enum(['strict', 'lenient']).optional(),
  cookieDefaults: z
    .object({
      path: z.string().startsWith('/').optional(),
      domain: z.string().min(1).optional(),
      secure: z.boolean().optional(),
      httpOnly: z.boolean().optional(),
      sameSite: z.enum(['lax', 'strict', 'none']).optional(),
    })
    .optional(),
});

const expirySchema = z.number().int().nonnegative();

/**
 * Owns at most one live store per store type.
 *
 * One registry belongs to one request/session context and is passed around
 * explicitly; nothing here is process-wide. Call `dispose()` when the context ends.
 *
 * @example
 * const registry = new StoreRegistry({ session, cookies });
 * registry.setExpiry(CookieStore, 600);
 * registry.getInstance(CookieStore).set('theme', 'dark');
 */
export class StoreRegistry {
  private readonly instances = new Map<StoreType, SingletonStore>();
  private readonly expiry = new Map<StoreType, number>();
  private readonly pending = new Set<StoreType>();
  private constructing: StoreType | null = null;
  private disposed = false;

  private readonly logger: Logger;
  private readonly codec: SerializationCodec;
  private readonly decodeMode: DecodeMode;
  private readonly cookieDefaults: CookieDefaults;
  private readonly memory: MemoryMedium;

  constructor(private readonly options: StoreRegistryOptions = {}) {
    const parsed = optionsSchema.safeParse({
      decodeMode: options.decodeMode,
      cookieDefaults: options.cookieDefaults,
    });
    if (!parsed.success) {
      throw new ConfigurationError(Messages.invalidOptions(parsed.error.message), { cause: parsed.error });
    }

    this.logger = options.logger ?? createLogger();
    this.codec = options.codec ?? new JsonCodec();
    this.decodeMode = parsed.data.decodeMode ?? Config.decodeMode;
    this.memory = options.memory ?? new MemoryMedium();
    this.cookieDefaults = {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      ...parsed.data.cookieDefaults,
    };
  }

  /**
   * Returns the store for `type`, creating it on first use:
   * snapshot the medium, `create()`, copy the snapshot in, register.
   * Later calls are plain lookups.
   */
  getInstance<S extends SingletonStore>(type: StoreType<S>): S {
    const existing = this.instances.get(type);
    if (existing !== undefined) {
      if (existing instanceof type) return existing;
      throw new IdentityViolationError(Messages.duplicateInstance(type.storeName));
    }
    if (this.disposed) {
      throw new RegistryDisposedError(Messages.disposed(type.storeName));
    }
    if (this.pending.has(type)) {
      throw new IdentityViolationError(Messages.reentrantConstruction(type.storeName));
    }

    this.pending.add(type);
    try {
      const context = this.contextFor(type);
      const snapshot = type.snapshot(context);

      this.constructing = type;
      let instance: S;
      try {
        instance = type.create(context);
      } finally {
        this.constructing = null;
      }

      instance.hydrate(snapshot);
      this.instances.set(type, instance);
      context.logger.debug({ keys: instance.size }, 'store created');
      return instance;
    } finally {
      this.pending.delete(type);
    }
  }

  has(type: StoreType): boolean {
    return this.instances.has(type);
  }

  /**
   * Sets the TTL, in seconds, for every key of `type`. Takes effect from the next write;
   * entries already persisted keep the TTL they were written with.
   */
  setExpiry<T extends StoreType>(type: T, seconds: number): T {
    const parsed = expirySchema.safeParse(seconds);
    if (!parsed.success) {
      throw new ConfigurationError(Messages.invalidExpiry(type.storeName, seconds), { cause: parsed.error });
    }
    this.expiry.set(type, parsed.data);
    this.logger.debug({ store: type.storeName, seconds: parsed.data }, 'expiry updated');
    return type;
  }

  getExpiry(type: StoreType): number {
    return this.expiry.get(type) ?? type.defaultExpiry ?? Config.memoryExpiry;
  }

  /**
   * @internal Called from the store constructor. Only the type currently being
   * created by `getInstance()` may be constructed.
   */
  claim(target: { readonly storeName: string }): void {
    if (this.constructing === null || this.constructing !== target) {
      throw new IdentityViolationError(Messages.outsideRegistry(target.storeName));
    }
    if (this.instances.has(this.constructing)) {
      throw new IdentityViolationError(Messages.duplicateInstance(target.storeName));
    }
  }

  /** Drops every store. The registry cannot create stores afterwards. */
  dispose(): void {
    this.logger.debug({ stores: this.instances.size }, 'registry disposed');
    this.instances.clear();
    this.disposed = true;
  }

  private contextFor(type: StoreType): StoreContext {
    return {
      registry: this,
      type,
      logger: this.logger.child({ store: type.storeName }),
      codec: this.codec,
      decodeMode: this.decodeMode,
      request: this.options.request ?? {},
      cookies: this.options.cookies,
      session: this.options.session,
      memory: this.memory,
      cookieDefaults: this.cookieDefaults,
    };
  }
}
