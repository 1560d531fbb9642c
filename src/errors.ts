export type StorageErrorCode =
  | 'IDENTITY_VIOLATION'
  | 'ENCODING_ERROR'
  | 'MEDIUM_UNAVAILABLE'
  | 'CONFIGURATION_ERROR'
  | 'REGISTRY_DISPOSED';

/**
 * Base class for every error raised by the registry, the stores and their media.
 * A missing key is never an error: `get()` and `getRaw()` return their default instead.
 */
export class StorageError extends Error {
  readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
    this.code = code;
  }
}

/** A singleton store was duplicated, cloned, or built outside its registry. */
export class IdentityViolationError extends StorageError {
  constructor(message: string) {
    super('IDENTITY_VIOLATION', message);
    this.name = 'IdentityViolationError';
  }
}

/** A value could not be converted to or from its wire form. */
export class EncodingError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ENCODING_ERROR', message, options);
    this.name = 'EncodingError';
  }
}

/** The store's medium cannot take the write right now (headers flushed, no session, ...). */
export class MediumUnavailableError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MEDIUM_UNAVAILABLE', message, options);
    this.name = 'MediumUnavailableError';
  }
}

export class ConfigurationError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_ERROR', message, options);
    this.name = 'ConfigurationError';
  }
}

export class RegistryDisposedError extends StorageError {
  constructor(message: string) {
    super('REGISTRY_DISPOSED', message);
    this.name = 'RegistryDisposedError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
