import pino from 'pino';
import type {DestinationStream} from 'pino';
import {Logger} from '../pure/effects';
import {LogLevel} from '../types';

/**
 * Pino logger behind the storefront's Logger interface. Writes JSON lines
 * to stderr unless given another destination, so logs never mix with the
 * storefront's own output.
 */
export function createLogger(level: LogLevel, destination: DestinationStream = pino.destination(2)): Logger {
  const log = pino(
    {
      level,
      base: {service: 'retail-catalog'},
      formatters: {
        level: (label: string) => ({level: label}),
      },
    },
    destination
  );

  return {
    debug: (message) => log.debug(message),
    info: (message) => log.info(message),
    warn: (message) => log.warn(message),
    error: (message) => log.error(message),
  };
}
