import type { CookieTransport } from './adapters/cookieTransport';
import type { MemoryMedium } from './adapters/memoryMedium';
import type { SessionTransport } from './adapters/sessionTransport';
import { IdentityViolationError } from './errors';
import type { SerializationCodec } from './modules/codec';
import { foldKey } from './modules/lookup';
import { StoreRegistry } from './modules/registry';
import { CookieStore } from './stores/CookieStore';
import { InMemoryStore } from './stores/InMemoryStore';
import {
  BodyStore,
  EnvStore,
  FormStore,
  HeaderStore,
  QueryStore,
  ServerStore,
} from './stores/RequestDataStore';
import { SessionStore } from './stores/SessionStore';
import type { CookieDefaults, DecodeMode, RequestSnapshot, StoreSnapshot, StoredValue } from './types';
import type { Logger } from './utils/logger';

export {
  BufferedCookieTransport,
  type CookieDirective,
  type CookieTransport,
  ResponseCookieTransport,
  serializeDirective,
} from './adapters/cookieTransport';
export { type IncomingSnapshotOptions, snapshotFromIncomingMessage } from './adapters/http';
export { MemoryMedium } from './adapters/memoryMedium';
export {
  MemorySessionRepository,
  MemorySessionTransport,
  type SessionStartOptions,
  type SessionTransport,
} from './adapters/sessionTransport';
export { Config, type StoresConfig } from './config';
export * from './errors';
export { JsonCodec, type SerializationCodec, storedValueSchema } from './modules/codec';
export { CaseInsensitiveLookupCache, foldKey } from './modules/lookup';
export { type StoreContext, StoreRegistry, type StoreRegistryOptions, type StoreType } from './modules/registry';
export { AbstractStorage, SingletonStore } from './modules/storage';
export { CookieStore, isSecureRequest } from './stores/CookieStore';
export { InMemoryStore } from './stores/InMemoryStore';
export { BodyStore, EnvStore, FormStore, HeaderStore, QueryStore, ServerStore } from './stores/RequestDataStore';
export { SessionStore } from './stores/SessionStore';
export * from './types';
export { createLogger, type Logger } from './utils/logger';

const METHODS_WITH_FORM = new Set(['POST', 'PUT', 'PATCH']);

export interface RequestContextConfig {
  snapshot?: RequestSnapshot;
  cookies?: CookieTransport;
  session?: SessionTransport;
  memory?: MemoryMedium;
  /** TTLs in seconds, applied before any store is created. */
  expiry?: { session?: number; cookie?: number; memory?: number };
  codec?: SerializationCodec;
  logger?: Logger;
  decodeMode?: DecodeMode;
  cookieDefaults?: Partial<CookieDefaults>;
}

/**
 * Everything one request can read and persist, behind a single registry.
 *
 * Create one per request and `dispose()` it when the response is done.
 * Stores are created on first access.
 *
 * @example
 * const ctx = new RequestContext({
 *   snapshot: snapshotFromIncomingMessage(req),
 *   cookies: new ResponseCookieTransport(res, req.headers.cookie),
 *   session: new MemorySessionTransport(sessions, sessionIdFromCookie),
 *   expiry: { session: 1800 },
 * });
 * ctx.session().set('userId', 42);
 * ctx.input('page', 1);
 */
export class RequestContext {
  readonly registry: StoreRegistry;
  readonly method: string;

  constructor(config: RequestContextConfig = {}) {
    const snapshot = config.snapshot ?? {};
    this.method = (snapshot.method ?? 'GET').toUpperCase();
    this.registry = new StoreRegistry({
      request: snapshot,
      cookies: config.cookies,
      session: config.session,
      memory: config.memory,
      codec: config.codec,
      logger: config.logger,
      decodeMode: config.decodeMode,
      cookieDefaults: config.cookieDefaults,
    });

    const { session, cookie, memory } = config.expiry ?? {};
    if (session !== undefined) this.registry.setExpiry(SessionStore, session);
    if (cookie !== undefined) this.registry.setExpiry(CookieStore, cookie);
    if (memory !== undefined) this.registry.setExpiry(InMemoryStore, memory);
  }

  public session(): SessionStore {
    return this.registry.getInstance(SessionStore);
  }

  public cookies(): CookieStore {
    return this.registry.getInstance(CookieStore);
  }

  public memory(): InMemoryStore {
    return this.registry.getInstance(InMemoryStore);
  }

  public query(): QueryStore {
    return this.registry.getInstance(QueryStore);
  }

  public form(): FormStore {
    return this.registry.getInstance(FormStore);
  }

  public body(): BodyStore {
    return this.registry.getInstance(BodyStore);
  }

  public server(): ServerStore {
    return this.registry.getInstance(ServerStore);
  }

  public env(): EnvStore {
    return this.registry.getInstance(EnvStore);
  }

  public headers(): HeaderStore {
    return this.registry.getInstance(HeaderStore);
  }

  /**
   * Merged request input. Later sources win on equal keys:
   * - POST, PUT, PATCH: query, then decoded body, then form fields
   * - DELETE: query, then decoded body
   * - anything else: query only
   */
  public input(): StoreSnapshot;
  public input(key: string): StoredValue | null;
  public input<D>(key: string, defaultValue: D): StoredValue | D;
  public input<D>(key?: string, defaultValue?: D): StoreSnapshot | StoredValue | D {
    const merged = this.mergedInput();
    if (key === undefined) return merged;

    const folded = foldKey(key);
    const match = Object.keys(merged).find((name) => foldKey(name) === folded);
    if (match === undefined) return defaultValue === undefined ? null : defaultValue;
    return merged[match];
  }

  public clone(): never {
    throw new IdentityViolationError('RequestContext cannot be cloned; create one per request.');
  }

  public dispose(): void {
    this.registry.dispose();
  }

  private mergedInput(): StoreSnapshot {
    let merged: StoreSnapshot = { ...this.query().all() };
    if (METHODS_WITH_FORM.has(this.method) || this.method === 'DELETE') {
      merged = { ...merged, ...this.body().all() };
    }
    if (METHODS_WITH_FORM.has(this.method)) {
      merged = { ...merged, ...this.form().all() };
    }
    return merged;
  }
}
