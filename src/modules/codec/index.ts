import { z } from 'zod';
import { EncodingError, describeError } from '../../errors';
import type { StoredValue } from '../../types';

/**
 * Converts a logical value to the string form a medium persists, and back.
 *
 * Implementations must satisfy `decode(encode(v))` deep-equals `v` for every
 * value they accept, and throw EncodingError for anything they cannot represent.
 */
export interface SerializationCodec {
  encode(value: unknown): string;
  decode(raw: string): StoredValue;
}

/**
 * Schema of every value a store accepts.
 * Rejects `undefined`, functions, symbols, bigint, NaN/Infinity, Date, Map and Set,
 * none of which survive a JSON round trip unchanged. `-0` is accepted and reads back as `0`.
 *
 * The record branch drops own `__proto__` keys while parsing; JsonCodec rejects
 * them separately with `findReservedKey`.
 */
export const storedValueSchema: z.ZodType<StoredValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(storedValueSchema),
    z.record(storedValueSchema),
  ]),
);

const RESERVED_KEY = '__proto__';

/** Path of the first object holding an own `__proto__` key (`[]` for the value itself), or null. */
export function findReservedKey(value: unknown, path: readonly string[] = []): string[] | null {
  if (typeof value !== 'object' || value === null) return null;
  if (!Array.isArray(value) && Object.hasOwn(value, RESERVED_KEY)) return [...path];
  for (const [key, child] of Object.entries(value)) {
    const found = findReservedKey(child, [...path, key]);
    if (found !== null) return found;
  }
  return null;
}

function reservedKeyMessage(path: readonly string[]): string {
  const where = path.length > 0 ? ` under ${path.join('.')}` : '';
  return `key "${RESERVED_KEY}"${where} cannot be stored`;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export class JsonCodec implements SerializationCodec {
  encode(value: unknown): string {
    const parsed = storedValueSchema.safeParse(value);
    if (!parsed.success) {
      throw new EncodingError(`unsupported value (${formatIssues(parsed.error)})`, { cause: parsed.error });
    }
    const reserved = findReservedKey(value);
    if (reserved !== null) {
      throw new EncodingError(`unsupported value (${reservedKeyMessage(reserved)})`);
    }
    return JSON.stringify(parsed.data);
  }

  decode(raw: string): StoredValue {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new EncodingError(`not valid JSON (${describeError(error)})`, { cause: error });
    }
    const reserved = findReservedKey(data);
    if (reserved !== null) {
      throw new EncodingError(`unsupported value (${reservedKeyMessage(reserved)})`);
    }
    return storedValueSchema.parse(data);
  }
}

/**
 * Runs a codec call and guarantees that whatever it throws surfaces as an EncodingError.
 * Custom codecs are free to throw their own errors.
 */
export function withEncodingErrors<T>(operation: () => T, describe: (details: string) => string): T {
  try {
    return operation();
  } catch (error) {
    throw new EncodingError(describe(describeError(error)), { cause: error });
  }
}
