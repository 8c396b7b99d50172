import { pino } from 'pino';
import type { DestinationStream, Logger } from 'pino';

/** pino logger with the extra `notice` level used for duplicate skips. */
export type SignatureLogger = Logger<'notice'>;

export interface CreateLoggerOptions {
  /** Minimum level written. Default: `'info'`. */
  readonly level?: string;
  /** Where JSON lines go. Default: stdout. */
  readonly destination?: DestinationStream;
}

/** Numeric value of `notice`: above `info` (30), below `warn` (40). */
export const NOTICE_LEVEL = 35;

export function createLogger(options: CreateLoggerOptions = {}): SignatureLogger {
  const loggerOptions = {
    name: 'signature-relay',
    level: options.level ?? 'info',
    customLevels: { notice: NOTICE_LEVEL },
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
