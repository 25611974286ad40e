/**
 * Console logging with a timestamp prefix and verbose gating.
 */

import { format } from 'date-fns';
import { LOG_TIMESTAMP_FORMAT } from './constants.js';

export interface Logger {
  /** Dropped unless the logger was created verbose. */
  verbose(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose: boolean;
  /** Clock for the line prefix; tests pin it. */
  now?: () => Date;
}

export function createLogger(options: LoggerOptions): Logger {
  const now = options.now ?? (() => new Date());
  const line = (message: string): string => `[${format(now(), LOG_TIMESTAMP_FORMAT)}] ${message}`;

  return {
    verbose: (message) => {
      if (options.verbose) {
        console.log(line(message));
      }
    },
    error: (message) => console.error(line(`Error: ${message}`)),
  };
}
