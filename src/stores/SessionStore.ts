import { Config } from '../config';
import { MediumUnavailableError } from '../errors';
import { Messages } from '../messages';
import type { SessionTransport } from '../adapters/sessionTransport';
import { AbstractStorage } from '../modules/storage';
import type { StoreContext } from '../modules/registry';
import type { StoreSnapshot } from '../types';

function requireSession(context: StoreContext): SessionTransport {
  if (!context.session) {
    throw new MediumUnavailableError(Messages.missingTransport(context.type.storeName, 'session'));
  }
  return context.session;
}

/**
 * Store backed by the server-side session.
 *
 * Taking the snapshot starts the session when it is not active yet, with the
 * store's TTL as its lifetime. Every write goes straight into the session map.
 * The lifetime is fixed when the session starts: a later `setExpiry()` on this
 * type does not change a session that is already running.
 */
export class SessionStore extends AbstractStorage {
  static readonly storeName: string = 'session';
  static readonly defaultExpiry: number = Config.sessionExpiry;

  static snapshot(context: StoreContext): StoreSnapshot {
    const session = requireSession(context);
    if (!session.active) {
      session.start({ lifetime: context.registry.getExpiry(context.type) });
    }
    return session.read();
  }

  static create(context: StoreContext): SessionStore {
    return new SessionStore(context);
  }

  /** Id of the underlying session, for the caller to hand back to the client. */
  get sessionId(): string | null {
    return requireSession(this.context).id;
  }

  protected persist(name: string, raw: string): void {
    requireSession(this.context).write(name, raw);
  }

  protected erase(name: string): void {
    requireSession(this.context).delete(name);
  }

  protected contains(name: string): boolean {
    return requireSession(this.context).has(name);
  }
}
