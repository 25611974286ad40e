/**
 * Runs the archive loop until SIGINT or SIGTERM and maps the result to an exit code.
 */

import { ArchiverLoop, type Sleep } from './archiver.js';
import { errorMessage } from './errors.js';
import { createFileOperations, type FileOperations } from './fileops.js';
import { createLogger, type Logger } from './logger.js';
import type { WatchConfig } from './types.js';

export interface DaemonOptions {
  logger?: Logger;
  operations?: FileOperations;
  sleep?: Sleep;
}

/** Resolves to 0 once a termination signal drained the loop, 1 if the loop crashed. */
export async function runDaemon(config: WatchConfig, options: DaemonOptions = {}): Promise<number> {
  const logger = options.logger ?? createLogger({ verbose: config.verbose });
  const archiver = new ArchiverLoop({
    config,
    operations: options.operations ?? createFileOperations(config.native),
    logger,
    sleep: options.sleep,
  });

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals): void => {
    if (!controller.signal.aborted) {
      logger.verbose(`Received ${signal}, finishing current file`);
      controller.abort();
    }
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  try {
    await archiver.run(controller.signal);
    return 0;
  } catch (error) {
    logger.error(errorMessage(error));
    return 1;
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}
