/**
 * Core types shared by the registry, the stores and their media.
 */

/**
 * A logical value that can be kept in a store.
 * Anything outside this shape is rejected by the codec before it reaches a medium.
 */
export type StoredValue =
  | string
  | number
  | boolean
  | null
  | StoredValue[]
  | { [key: string]: StoredValue };

/** One-time read of a store's medium, copied into the store at construction. */
export type StoreSnapshot = Record<string, StoredValue>;

/**
 * How a store reacts when an existing raw value cannot be decoded.
 * - `'lenient'`: return the raw value and log a warning.
 * - `'strict'`: throw an EncodingError.
 */
export type DecodeMode = 'strict' | 'lenient';

export type SameSite = 'lax' | 'strict' | 'none';

/** Attributes applied to every Set-Cookie directive emitted by a CookieStore. */
export interface CookieDefaults {
  path: string;
  domain?: string;
  /** When omitted, derived from the server snapshot (`HTTPS` or port 443). */
  secure?: boolean;
  httpOnly: boolean;
  sameSite: SameSite;
}

/**
 * Flat request data handed to the read-only stores.
 * Decoding a JSON/XML body is the caller's concern: `body` arrives decoded.
 */
export interface RequestSnapshot {
  method?: string;
  query?: StoreSnapshot;
  /** Form fields (urlencoded or multipart text parts). */
  form?: StoreSnapshot;
  /** Decoded request payload (JSON, XML converted to a map, ...). */
  body?: StoreSnapshot;
  server?: StoreSnapshot;
  env?: Record<string, string | undefined>;
  headers?: Record<string, string | string[] | undefined>;
}
