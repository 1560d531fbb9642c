import { describe, expect, it } from 'vitest';
import {
  BufferedCookieTransport,
  CookieStore,
  IdentityViolationError,
  InMemoryStore,
  MemoryMedium,
  MemorySessionRepository,
  MemorySessionTransport,
  RegistryDisposedError,
  RequestContext,
  type RequestSnapshot,
  SessionStore,
} from '../src/index';
import { silentLogger } from './helpers/logger';

const snapshot = (method: string): RequestSnapshot => ({
  method,
  query: { page: '1', q: 'from-query' },
  body: { q: 'from-body', items: [1, 2] },
  form: { q: 'from-form', csrf: 'test-token' },
  server: { REQUEST_METHOD: method, HTTPS: 'off' },
  env: { APP_ENV: 'test', UNSET: undefined },
  headers: { 'content-type': 'application/json', accept: ['text/html', 'application/json'] },
});

describe('RequestContext', () => {
  describe('input()', () => {
    it('merges query, body and form fields for POST', () => {
      const ctx = new RequestContext({ snapshot: snapshot('POST'), logger: silentLogger() });

      expect(ctx.input()).toEqual({ page: '1', q: 'from-form', items: [1, 2], csrf: 'test-token' });
    });

    it('uses query and body for DELETE', () => {
      const ctx = new RequestContext({ snapshot: snapshot('delete'), logger: silentLogger() });

      expect(ctx.method).toBe('DELETE');
      expect(ctx.input()).toEqual({ page: '1', q: 'from-body', items: [1, 2] });
    });

    it('uses only the query for GET', () => {
      const ctx = new RequestContext({ snapshot: snapshot('GET'), logger: silentLogger() });

      expect(ctx.input()).toEqual({ page: '1', q: 'from-query' });
    });

    it('looks up single keys ignoring case', () => {
      const ctx = new RequestContext({ snapshot: snapshot('PATCH'), logger: silentLogger() });

      expect(ctx.input('Q')).toBe('from-form');
      expect(ctx.input('missing')).toBeNull();
      expect(ctx.input('missing', 'fallback')).toBe('fallback');
    });
  });

  it('exposes request data through read-only stores', () => {
    const ctx = new RequestContext({ snapshot: snapshot('GET'), logger: silentLogger() });

    expect(ctx.query().get('PAGE')).toBe('1');
    expect(ctx.headers().get('Content-Type')).toBe('application/json');
    expect(ctx.headers().get('ACCEPT')).toEqual(['text/html', 'application/json']);
    expect(ctx.env().all()).toEqual({ APP_ENV: 'test' });
    expect(ctx.server().get('https')).toBe('off');
    expect(ctx.form().has('csrf')).toBe(true);
    expect(ctx.body().get('items')).toEqual([1, 2]);
  });

  it('returns the same store on every access', () => {
    const ctx = new RequestContext({ snapshot: snapshot('GET'), logger: silentLogger() });

    expect(ctx.query()).toBe(ctx.query());
    expect(ctx.memory()).toBe(ctx.registry.getInstance(InMemoryStore));
  });

  it('applies the expiry pair before stores are created', () => {
    const ctx = new RequestContext({ expiry: { session: 1800, cookie: 600 }, logger: silentLogger() });

    expect(ctx.registry.getExpiry(SessionStore)).toBe(1800);
    expect(ctx.registry.getExpiry(CookieStore)).toBe(600);
    expect(ctx.registry.getExpiry(InMemoryStore)).toBe(3600);
  });

  it('carries a session across requests through the shared repository', () => {
    const sessions = new MemorySessionRepository();

    const first = new RequestContext({
      session: new MemorySessionTransport(sessions),
      cookies: new BufferedCookieTransport(undefined),
      logger: silentLogger(),
    });
    first.session().set('userId', 42);
    const sessionId = first.session().sessionId ?? '';
    first.cookies().set('sid', sessionId);
    first.dispose();

    const second = new RequestContext({
      session: new MemorySessionTransport(sessions, sessionId),
      logger: silentLogger(),
    });

    expect(second.session().get('USERID')).toBe(42);
  });

  it('shares an in-memory medium between contexts', () => {
    const medium = new MemoryMedium();
    new RequestContext({ memory: medium, logger: silentLogger() }).memory().set('visits', 1);

    const later = new RequestContext({ memory: medium, logger: silentLogger() });

    expect(later.memory().get('visits')).toBe(1);
  });

  it('cannot be used after dispose', () => {
    const ctx = new RequestContext({ logger: silentLogger() });
    ctx.dispose();

    expect(() => ctx.query()).toThrow(RegistryDisposedError);
  });

  it('cannot be cloned', () => {
    const ctx = new RequestContext({ logger: silentLogger() });

    expect(() => ctx.clone()).toThrow(IdentityViolationError);
  });
});
