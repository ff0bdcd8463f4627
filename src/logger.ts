/**
 * Logger using Pino
 *
 * Writes JSON lines synchronously to stderr so that stdout stays free for
 * the reports printed by the CLI.
 *
 * Usage:
 * ```typescript
 * const log = createChildLogger({ module: 'path-repair' });
 * log.info({ from, to }, 'Renamed entry');
 * ```
 */

import pino from 'pino';
import {loadEnvironment, resolveLogLevel} from './environment';

export type Logger = pino.Logger;

export const logger: Logger = pino(
  {
    level: resolveLogLevel(loadEnvironment()),
    base: {service: 'encoding-repair'},
    serializers: {err: pino.stdSerializers.err},
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.destination({dest: 2, sync: true})
);

export function createChildLogger(bindings: {module: string}): Logger {
  return logger.child(bindings);
}

export function setLogLevel(level: string): void {
  logger.level = level;
}
