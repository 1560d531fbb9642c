import createPino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';
import { Config } from '../config';

export type { Logger };

/**
 * Builds the logger used when a registry is not given one.
 * Silent unless REQUEST_STORES_LOG_LEVEL says otherwise; stored values are never logged.
 */
export function createLogger(level: LevelWithSilent = Config.logLevel, destination?: DestinationStream): Logger {
  const options = { name: 'request-stores', level };
  return destination ? createPino(options, destination) : createPino(options);
}
