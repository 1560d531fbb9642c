import type { ServerResponse } from 'node:http';
import { parse, serialize } from 'cookie';
import type { SameSite } from '../types';

/** One Set-Cookie instruction. `maxAge` in seconds; absent means a browser-session cookie. */
export interface CookieDirective {
  name: string;
  value: string;
  maxAge?: number;
  expires?: Date;
  path?: string;
  domain?: string;
  secure?: boolean;
  httpOnly?: boolean;
  sameSite?: SameSite;
}

/**
 * Reads the cookies of the incoming request and emits Set-Cookie directives for the response.
 * `emit()` must fail once the response headers have gone out.
 */
export interface CookieTransport {
  readonly headersSent: boolean;
  /** Current view of the cookie jar: incoming cookies plus everything emitted since. */
  read(): Record<string, string>;
  has(name: string): boolean;
  emit(directive: CookieDirective): void;
}

export function isExpiring(directive: CookieDirective): boolean {
  if (directive.maxAge !== undefined && directive.maxAge <= 0) return true;
  return directive.expires !== undefined && directive.expires.getTime() <= Date.now();
}

export function serializeDirective(directive: CookieDirective): string {
  return serialize(directive.name, directive.value, {
    maxAge: directive.maxAge,
    expires: directive.expires,
    path: directive.path,
    domain: directive.domain,
    secure: directive.secure,
    httpOnly: directive.httpOnly,
    sameSite: directive.sameSite,
  });
}

/**
 * Keeps the jar in step with emitted directives.
 * Subclasses decide where serialized header lines go.
 */
abstract class CookieJarTransport implements CookieTransport {
  private readonly jar: Map<string, string>;

  constructor(cookieHeader: string | undefined) {
    this.jar = new Map(Object.entries(cookieHeader ? parse(cookieHeader) : {}));
  }

  abstract get headersSent(): boolean;

  read(): Record<string, string> {
    return Object.fromEntries(this.jar);
  }

  has(name: string): boolean {
    return this.jar.has(name);
  }

  emit(directive: CookieDirective): void {
    if (this.headersSent) {
      throw new Error(`Set-Cookie for "${directive.name}" emitted after headers were sent`);
    }
    this.writeHeader(serializeDirective(directive));
    if (isExpiring(directive)) {
      this.jar.delete(directive.name);
    } else {
      this.jar.set(directive.name, directive.value);
    }
  }

  protected abstract writeHeader(line: string): void;
}

/**
 * Collects Set-Cookie lines in memory until `markSent()`.
 * For frameworks that build the response headers themselves, and for tests.
 */
export class BufferedCookieTransport extends CookieJarTransport {
  private readonly lines: string[] = [];
  private sent = false;

  get headersSent(): boolean {
    return this.sent;
  }

  /** Serialized Set-Cookie header values, in emission order. */
  headers(): string[] {
    return [...this.lines];
  }

  markSent(): void {
    this.sent = true;
  }

  protected writeHeader(line: string): void {
    this.lines.push(line);
  }
}

/** Writes Set-Cookie headers straight onto a Node `ServerResponse`. */
export class ResponseCookieTransport extends CookieJarTransport {
  constructor(
    private readonly response: ServerResponse,
    cookieHeader: string | undefined,
  ) {
    super(cookieHeader);
  }

  get headersSent(): boolean {
    return this.response.headersSent;
  }

  protected writeHeader(line: string): void {
    const current = this.response.getHeader('Set-Cookie');
    const lines = current === undefined ? [] : Array.isArray(current) ? current : [String(current)];
    this.response.setHeader('Set-Cookie', [...lines, line]);
  }
}
