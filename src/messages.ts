export const Messages = {
  /** Raised when anything other than the registry constructs a store. */
  outsideRegistry: (storeName: string) =>
    `StoreRegistry: "${storeName}" stores are created by registry.getInstance(), not by calling the constructor.`,

  duplicateInstance: (storeName: string) =>
    `StoreRegistry: a "${storeName}" store already exists for this registry.`,

  reentrantConstruction: (storeName: string) =>
    `StoreRegistry: "${storeName}" was requested again while its snapshot was still being taken.`,

  cloneForbidden: (storeName: string) =>
    `StoreRegistry: "${storeName}" is a singleton and cannot be cloned.`,

  alreadyHydrated: (storeName: string) =>
    `StoreRegistry: "${storeName}" has already been populated from its snapshot.`,

  disposed: (storeName: string) =>
    `StoreRegistry: cannot create "${storeName}", the registry has been disposed.`,

  invalidExpiry: (storeName: string, seconds: unknown) =>
    `StoreRegistry: expiry for "${storeName}" must be a whole number of seconds >= 0, got ${String(seconds)}.`,

  invalidOptions: (details: string) => `StoreRegistry: invalid options. ${details}`,

  cannotEncode: (key: string, details: string) =>
    `Cannot encode value for key "${key}": ${details}`,

  cannotDecode: (key: string, details: string) =>
    `Cannot decode stored value for key "${key}": ${details}`,

  invalidCookieName: (key: string) =>
    `Cannot encode key "${key}": not a valid cookie name.`,

  schemaMismatch: (key: string, details: string) =>
    `Stored value for key "${key}" does not match the expected schema: ${details}`,

  missingTransport: (storeName: string, transport: string) =>
    `"${storeName}" store needs a ${transport} transport, but none was configured.`,

  headersSent: (cookieName: string) =>
    `Headers already sent. Unable to write cookie "${cookieName}".`,

  sessionInactive: () => 'Session is not active. Call start() before writing to it.',

  mediumFailure: (storeName: string, key: string, details: string) =>
    `"${storeName}" medium refused the write for key "${key}": ${details}`,
};
