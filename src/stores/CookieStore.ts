import type { CookieDirective, CookieTransport } from '../adapters/cookieTransport';
import { Config } from '../config';
import { EncodingError, MediumUnavailableError } from '../errors';
import { Messages } from '../messages';
import { AbstractStorage } from '../modules/storage';
import type { StoreContext } from '../modules/registry';
import type { StoreSnapshot } from '../types';

const EPOCH = new Date(0);

/** RFC 6265 cookie-name token. */
const COOKIE_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

function requireCookies(context: StoreContext): CookieTransport {
  if (!context.cookies) {
    throw new MediumUnavailableError(Messages.missingTransport(context.type.storeName, 'cookie'));
  }
  return context.cookies;
}

/** `HTTPS` set to anything but "off", or a request on port 443. */
export function isSecureRequest(context: StoreContext): boolean {
  const server = context.request.server ?? {};
  const https = server.HTTPS;
  if (typeof https === 'string' && https !== '' && https.toLowerCase() !== 'off') return true;
  return Number(server.SERVER_PORT) === 443;
}

/**
 * Store backed by the client's cookie jar.
 *
 * Raw values travel as cookie values; each `set()` and `remove()` emits a
 * Set-Cookie directive, so both fail once the response headers are sent.
 * A TTL of 0 produces browser-session cookies. Keys must be valid cookie names.
 */
export class CookieStore extends AbstractStorage {
  static readonly storeName: string = 'cookie';
  static readonly defaultExpiry: number = Config.cookieExpiry;

  static snapshot(context: StoreContext): StoreSnapshot {
    return requireCookies(context).read();
  }

  static create(context: StoreContext): CookieStore {
    return new CookieStore(context);
  }

  protected persist(name: string, raw: string, expiry: number): void {
    this.send({
      ...this.attributes(),
      name,
      value: raw,
      maxAge: expiry > 0 ? expiry : undefined,
    });
  }

  protected erase(name: string): void {
    this.send({ ...this.attributes(), name, value: '', maxAge: 0, expires: EPOCH });
  }

  protected contains(name: string): boolean {
    return requireCookies(this.context).has(name);
  }

  private attributes(): Omit<CookieDirective, 'name' | 'value'> {
    const defaults = this.context.cookieDefaults;
    return {
      path: defaults.path,
      domain: defaults.domain,
      secure: defaults.secure ?? isSecureRequest(this.context),
      httpOnly: defaults.httpOnly,
      sameSite: defaults.sameSite,
    };
  }

  private send(directive: CookieDirective): void {
    if (!COOKIE_NAME.test(directive.name)) {
      throw new EncodingError(Messages.invalidCookieName(directive.name));
    }
    const transport = requireCookies(this.context);
    if (transport.headersSent) {
      throw new MediumUnavailableError(Messages.headersSent(directive.name));
    }
    transport.emit(directive);
  }
}
