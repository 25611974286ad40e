/**
 * CLI interface using Commander.js
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_POLL_INTERVAL_MS } from './constants.js';
import type { WatchConfig } from './types.js';

/** Option parser resolving an existing directory to an absolute path. */
function directoryArg(label: string): (value: string) => string {
  return (value: string) => {
    const dir = path.resolve(value);
    let stats: fs.Stats;
    try {
      stats = fs.statSync(dir);
    } catch {
      throw new InvalidArgumentError(`${label} directory does not exist: ${dir}`);
    }
    if (!stats.isDirectory()) {
      throw new InvalidArgumentError(`${label} path is not a directory: ${dir}`);
    }
    return dir;
  };
}

/** Parse and validate a poll interval in milliseconds. */
function parseIntervalArg(value: string): number {
  const interval = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(interval) || interval <= 0) {
    throw new InvalidArgumentError(`Invalid interval '${value}'. Use a positive number of milliseconds (e.g. 1000).`);
  }
  return interval;
}

/** Options as Commander hands them to the action. */
interface ProgramOptions {
  indir: string;
  outdir: string;
  verbose: boolean;
  native: boolean;
  interval: number;
}

/** Create and configure the CLI program. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('fits-archiver')
    .description('Watch a directory for finished .fits captures, gzip them and file them under <outdir>/<prefix>/<YYYY>/<MM>/<DD>/')
    .version('0.1.0')
    .requiredOption('-i, --indir <path>', 'Input directory to watch for .fits files', directoryArg('Input'))
    .requiredOption('-o, --outdir <path>', 'Output base directory of the archive tree', directoryArg('Output'))
    .option('-v, --verbose', 'Verbose text output', false)
    .option('-n, --native', 'Compress and move in-process instead of running gzip, mkdir and mv', false)
    .option('--interval <ms>', 'Pause between two polls of the input directory', parseIntervalArg, DEFAULT_POLL_INTERVAL_MS)
    .allowExcessArguments(false)
    .action((options: ProgramOptions) => {
      // Store the validated config for later retrieval
      program.watchConfig = Object.freeze({
        sourceDirectory: options.indir,
        destinationRoot: options.outdir,
        verbose: options.verbose,
        pollIntervalMs: options.interval,
        native: options.native,
      });
    });

  return program;
}

// Extend Command type to include our custom properties
declare module 'commander' {
  interface Command {
    watchConfig?: WatchConfig;
  }
}
