import type { LevelWithSilent } from 'pino';
import type { DecodeMode } from './types';

function envInt(name: string, value: number): number {
  const envValue = process.env[name];
  if (envValue == null || envValue === '') return value;
  const parsed = parseInt(envValue, 10);
  return Number.isNaN(parsed) || parsed < 0 ? value : parsed;
}

function envEnum<T extends string>(name: string, allowedValues: readonly T[], defaultValue: T): T {
  const envValue = process.env[name];
  const match = allowedValues.find((allowed) => allowed === envValue);
  return match ?? defaultValue;
}

export type StoresConfig = typeof Config;

const DECODE_MODES: readonly DecodeMode[] = ['strict', 'lenient'];

export const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Process-wide defaults, read once when the module loads.
 * Every value can still be overridden per registry through StoreRegistryOptions or setExpiry().
 */
export const Config = {
  logLevel: envEnum('REQUEST_STORES_LOG_LEVEL', LOG_LEVELS, 'silent'),
  sessionExpiry: envInt('REQUEST_STORES_SESSION_TTL', 3600),
  cookieExpiry: envInt('REQUEST_STORES_COOKIE_TTL', 43200),
  memoryExpiry: envInt('REQUEST_STORES_MEMORY_TTL', 3600),
  decodeMode: envEnum('REQUEST_STORES_DECODE_MODE', DECODE_MODES, 'lenient'),
};
