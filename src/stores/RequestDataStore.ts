import { SingletonStore } from '../modules/storage';
import type { StoreContext } from '../modules/registry';
import type { StoreSnapshot, StoredValue } from '../types';

function definedEntries(
  source: Record<string, StoredValue | undefined> | undefined,
): StoreSnapshot {
  const defined = Object.entries(source ?? {}).filter(
    (entry): entry is [string, StoredValue] => entry[1] !== undefined,
  );
  return Object.fromEntries(defined);
}

/** Query string parameters. */
export class QueryStore extends SingletonStore {
  static readonly storeName: string = 'query';

  static snapshot(context: StoreContext): StoreSnapshot {
    return { ...context.request.query };
  }

  static create(context: StoreContext): QueryStore {
    return new QueryStore(context);
  }
}

/** Form fields of a POST-like request. */
export class FormStore extends SingletonStore {
  static readonly storeName: string = 'form';

  static snapshot(context: StoreContext): StoreSnapshot {
    return { ...context.request.form };
  }

  static create(context: StoreContext): FormStore {
    return new FormStore(context);
  }
}

/** Decoded request payload. */
export class BodyStore extends SingletonStore {
  static readonly storeName: string = 'body';

  static snapshot(context: StoreContext): StoreSnapshot {
    return { ...context.request.body };
  }

  static create(context: StoreContext): BodyStore {
    return new BodyStore(context);
  }
}

export class ServerStore extends SingletonStore {
  static readonly storeName: string = 'server';

  static snapshot(context: StoreContext): StoreSnapshot {
    return { ...context.request.server };
  }

  static create(context: StoreContext): ServerStore {
    return new ServerStore(context);
  }
}

/** Environment variables; unset variables are left out. */
export class EnvStore extends SingletonStore {
  static readonly storeName: string = 'env';

  static snapshot(context: StoreContext): StoreSnapshot {
    return definedEntries(context.request.env);
  }

  static create(context: StoreContext): EnvStore {
    return new EnvStore(context);
  }
}

/**
 * Request headers. Lookups ignore case, so `get('content-type')` and
 * `get('Content-Type')` agree; repeated headers stay arrays.
 */
export class HeaderStore extends SingletonStore {
  static readonly storeName: string = 'headers';

  static snapshot(context: StoreContext): StoreSnapshot {
    return definedEntries(context.request.headers);
  }

  static create(context: StoreContext): HeaderStore {
    return new HeaderStore(context);
  }
}
