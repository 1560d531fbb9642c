/**
 * Storage contract, exercised through the in-memory store:
 * round trips, case-insensitive keys, raw vs decoded access,
 * remove/clear semantics, TTL and decode modes.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  EncodingError,
  InMemoryStore,
  MemoryMedium,
  type SerializationCodec,
  StoreRegistry,
  type StoredValue,
} from '../src/index';
import { captureLogger, silentLogger } from './helpers/logger';

describe('InMemoryStore', () => {
  let clock: number;
  let medium: MemoryMedium;
  let registry: StoreRegistry;
  let store: InMemoryStore;

  beforeEach(() => {
    clock = 1_000;
    medium = new MemoryMedium(() => clock);
    registry = new StoreRegistry({ memory: medium, logger: silentLogger() });
    store = registry.getInstance(InMemoryStore);
  });

  // ─── Round trips ──────────────────────────────────────────────────────────

  it('returns what was set, for every supported shape', () => {
    const values: Record<string, StoredValue> = {
      text: 'hello',
      number: 3.5,
      flag: true,
      nothing: null,
      list: [1, 'two', false],
      nested: { cart: { items: [{ sku: 'A1', qty: 2 }], total: 19.9 } },
    };

    for (const [key, value] of Object.entries(values)) {
      store.set(key, value);
    }
    for (const [key, value] of Object.entries(values)) {
      expect(store.get(key)).toEqual(value);
    }
  });

  it('set → get → remove → has → get with default', () => {
    store.set('a', [1, 2, 3]);
    expect(store.get('a')).toEqual([1, 2, 3]);

    store.remove('a');

    expect(store.has('a')).toBe(false);
    expect(store.get('a', 'fallback')).toBe('fallback');
  });

  it('returns null or the given default for unknown keys', () => {
    expect(store.get('missing')).toBeNull();
    expect(store.get('missing', 0)).toBe(0);
    expect(store.getRaw('missing')).toBeNull();
    expect(store.getRaw('missing', 'raw-default')).toBe('raw-default');
  });

  it('is chainable', () => {
    const result = store.set('a', 1).set('b', 2).remove('a');

    expect(result).toBe(store);
    expect(store.keys()).toEqual(['b']);
  });

  // ─── Case insensitivity ───────────────────────────────────────────────────

  it('resolves keys regardless of case', () => {
    store.set('UserId', 1);

    expect(store.has('userid')).toBe(true);
    expect(store.has('USERID')).toBe(true);
    expect(store.get('UserId')).toBe(1);
    expect(store.get('userID')).toBe(1);
  });

  it('overwrites the existing slot when the casing differs', () => {
    store.set('x', 'v');
    store.set('X', 'w');

    expect(store.keys()).toEqual(['x']);
    expect(store.get('x')).toBe('w');
    expect(medium.read()).toEqual({ x: '"w"' });
  });

  it('removes regardless of case', () => {
    store.set('Theme', 'dark');
    store.remove('THEME');

    expect(store.size).toBe(0);
    expect(medium.has('Theme')).toBe(false);
  });

  // ─── Raw vs logical ───────────────────────────────────────────────────────

  it('keeps the encoded form in the store and the medium', () => {
    store.set('profile', { name: 'Ada' });

    expect(store.getRaw('profile')).toBe('{"name":"Ada"}');
    expect(medium.read()).toEqual({ profile: '{"name":"Ada"}' });
  });

  it('all() decodes every entry', () => {
    store.set('a', 1).set('b', ['x']).set('c', { d: null });

    expect(store.all()).toEqual({ a: 1, b: ['x'], c: { d: null } });
    expect(store.toJSON()).toEqual(store.all());
  });

  it('getParsed validates against a zod schema', () => {
    const Profile = z.object({ name: z.string(), age: z.number() });
    store.set('profile', { name: 'Ada', age: 36 });
    store.set('broken', { name: 'Ada' });

    expect(store.getParsed('PROFILE', Profile)).toEqual({ name: 'Ada', age: 36 });
    expect(store.getParsed('missing', Profile)).toBeNull();
    expect(() => store.getParsed('broken', Profile)).toThrow(EncodingError);
  });

  // ─── Removal ──────────────────────────────────────────────────────────────

  it('removing an absent key is a no-op', () => {
    store.set('keep', 'me');

    expect(() => store.remove('ghost')).not.toThrow();
    expect(store.all()).toEqual({ keep: 'me' });
    expect(medium.read()).toEqual({ keep: '"me"' });
  });

  it('clear() removes every key from the store and the medium', () => {
    store.set('a', 1).set('B', 2).set('c', 3);

    store.clear();

    expect(store.all()).toEqual({});
    for (const key of ['a', 'B', 'c']) {
      expect(store.has(key)).toBe(false);
    }
    expect(medium.read()).toEqual({});
  });

  // ─── Encoding failures ────────────────────────────────────────────────────

  it('rejects unencodable values without storing them', () => {
    expect(() => store.set('bad', Number.NaN)).toThrow(EncodingError);
    expect(store.has('bad')).toBe(false);
    expect(store.keys()).toEqual([]);
    expect(medium.read()).toEqual({});
  });

  it('wraps errors thrown by a custom codec', () => {
    const failing: SerializationCodec = {
      encode() {
        throw new Error('boom');
      },
      decode(raw) {
        return raw;
      },
    };
    const custom = new StoreRegistry({ codec: failing, logger: silentLogger() }).getInstance(InMemoryStore);

    expect(() => custom.set('k', 'v')).toThrow('Cannot encode value for key "k": boom');
    expect(() => custom.set('k', 'v')).toThrow(EncodingError);
  });

  // ─── TTL ──────────────────────────────────────────────────────────────────

  it('writes entries with the type TTL', () => {
    registry.setExpiry(InMemoryStore, 10);
    store.set('short', 'lived');

    clock += 9_999;
    expect(store.has('short')).toBe(true);

    clock += 1;
    expect(store.has('short')).toBe(false);
    expect(medium.read()).toEqual({});
  });

  it('treats a TTL of 0 as no expiry', () => {
    registry.setExpiry(InMemoryStore, 0);
    store.set('forever', 1);

    clock += 10 * 365 * 24 * 3600 * 1000;

    expect(store.has('forever')).toBe(true);
  });

  it('does not change entries written before a TTL change', () => {
    registry.setExpiry(InMemoryStore, 10);
    store.set('early', 1);
    registry.setExpiry(InMemoryStore, 0);
    store.set('late', 2);

    clock += 60_000;

    expect(store.has('early')).toBe(false);
    expect(store.has('late')).toBe(true);
  });

  // ─── Snapshot and decoding ────────────────────────────────────────────────

  it('starts from what the medium already holds', () => {
    const shared = new MemoryMedium();
    shared.write('Seed', '"planted"', 0);

    const seeded = new StoreRegistry({ memory: shared, logger: silentLogger() }).getInstance(InMemoryStore);

    expect(seeded.get('seed')).toBe('planted');
    expect(seeded.has('SEED')).toBe(true);
  });

  it('keeps a key named __proto__ as an ordinary entry', () => {
    store.set('__proto__', 1);

    expect(Object.keys(store.all())).toEqual(['__proto__']);
    expect(JSON.stringify(store.all())).toBe('{"__proto__":1}');
    expect(JSON.stringify(medium.read())).toBe('{"__proto__":"1"}');

    const reopened = new StoreRegistry({ memory: medium, logger: silentLogger() }).getInstance(InMemoryStore);

    expect(reopened.keys()).toEqual(['__proto__']);
    expect(reopened.get('__PROTO__')).toBe(1);
  });

  it('refuses values carrying an own __proto__ key', () => {
    const value: StoredValue = JSON.parse('{"__proto__":{"x":1},"a":2}');

    expect(() => store.set('k', value)).toThrow(
      'Cannot encode value for key "k": unsupported value (key "__proto__" cannot be stored)',
    );
    expect(() => store.set('k', value)).toThrow(EncodingError);
    expect(store.has('k')).toBe(false);
    expect(medium.read()).toEqual({});
  });

  it('returns the raw value when it cannot be decoded, and logs a warning', () => {
    const { logger, lines } = captureLogger('warn');
    const shared = new MemoryMedium();
    shared.write('legacy', 'not-json', 0);

    const lenient = new StoreRegistry({ memory: shared, logger, decodeMode: 'lenient' }).getInstance(
      InMemoryStore,
    );

    expect(lenient.get('legacy')).toBe('not-json');
    expect(lenient.all()).toEqual({ legacy: 'not-json' });
    expect(lines[0].msg).toBe('stored value could not be decoded, returning raw value');
    expect(lines[0].key).toBe('legacy');
    expect(lines[0].store).toBe('memory');
  });

  it('throws on undecodable values in strict mode', () => {
    const shared = new MemoryMedium();
    shared.write('legacy', 'not-json', 0);

    const strict = new StoreRegistry({ memory: shared, logger: silentLogger(), decodeMode: 'strict' }).getInstance(
      InMemoryStore,
    );

    expect(() => strict.get('legacy')).toThrow(EncodingError);
    expect(strict.getRaw('legacy')).toBe('not-json');
  });
});

describe('MemoryMedium', () => {
  it('snapshot and restore copy the live entries', () => {
    const medium = new MemoryMedium();
    medium.write('a', '1', 0);

    const snap = medium.snapshot();
    medium.write('b', '2', 0);
    medium.restore(snap);

    expect(medium.read()).toEqual({ a: '1' });
  });

  it('delete reports whether the entry existed', () => {
    const medium = new MemoryMedium();
    medium.write('a', '1', 0);

    expect(medium.delete('a')).toBe(true);
    expect(medium.delete('a')).toBe(false);
  });
});
