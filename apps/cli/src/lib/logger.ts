import { pino, stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';
import type { LogLevel, LogFormat } from '@agent-fleet/config';

export const LOGGER_NAME = 'agent-fleet';

/**
 * Logger the CLI forwards registrar entries to
 *
 * `json` writes one line per entry with an ISO timestamp; `pretty` goes
 * through the pino-pretty transport.
 */
export function createLogger(
  level: LogLevel = 'info',
  format: LogFormat = 'pretty',
  name: string = LOGGER_NAME
): Logger {
  const options: LoggerOptions = {
    name,
    level,
    timestamp: stdTimeFunctions.isoTime,
    ...(format === 'pretty' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  };

  return pino(options);
}
