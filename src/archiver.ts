/**
 * The poll loop: compress every finished capture file and file it into the archive tree.
 */

import * as path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { AppError, toError } from './errors.js';
import { archiveDirectory, compressedName, isCandidate, parseTimestamp } from './filename.js';
import type { FileOperations } from './fileops.js';
import type { Logger } from './logger.js';
import type { FileOutcome, LoopState, RunSummary, StepResult, WatchConfig } from './types.js';

/** Waits `ms`, returning early once `signal` is aborted. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) {
      throw error;
    }
  }
};

export interface ArchiverOptions {
  config: WatchConfig;
  operations: FileOperations;
  logger: Logger;
  sleep?: Sleep;
}

const OK: StepResult = { ok: true };

const NEXT_STATES: Record<LoopState, LoopState[]> = {
  running: ['draining', 'stopped'],
  draining: ['stopped'],
  stopped: [],
};

/**
 * Polls the source directory until cancelled. Files in one tick are handled
 * one at a time, in listing order; a failure only ever skips the file at hand.
 */
export class ArchiverLoop {
  private readonly config: WatchConfig;
  private readonly operations: FileOperations;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private currentState: LoopState = 'running';
  private readonly listeners = new Set<(state: LoopState) => void>();

  constructor(options: ArchiverOptions) {
    this.config = options.config;
    this.operations = options.operations;
    this.logger = options.logger;
    this.sleep = options.sleep ?? abortableSleep;
  }

  get state(): LoopState {
    return this.currentState;
  }

  /** Registers a state listener; returns its unsubscribe function. */
  onStateChange(listener: (state: LoopState) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Names of the `.fits` files currently in the source directory. */
  async listCandidates(): Promise<string[]> {
    try {
      const names = await this.operations.listFiles(this.config.sourceDirectory);
      return names.filter(isCandidate);
    } catch (error) {
      this.logger.verbose(toError(error).message);
      return [];
    }
  }

  compress(filePath: string): Promise<StepResult> {
    return this.attempt(() => this.operations.compress(filePath));
  }

  /** Creates `dir` only when it is not there yet. */
  ensureDirectory(dir: string): Promise<StepResult> {
    return this.attempt(async () => {
      if (!(await this.operations.directoryExists(dir))) {
        await this.operations.createDirectory(dir);
      }
    });
  }

  moveFile(src: string, dstDir: string): Promise<StepResult> {
    return this.attempt(() => this.operations.move(src, dstDir));
  }

  /**
   * Compress, parse, ensure the archive directory, move. Never throws.
   * A file whose compression failed is still `.fits` and comes back next tick;
   * anything after that leaves a `.gz` behind that no later tick picks up.
   */
  async processOneFile(filename: string): Promise<FileOutcome> {
    const source = path.join(this.config.sourceDirectory, filename);

    const compressed = await this.compress(source);
    if (!compressed.ok) {
      return this.report({ status: 'failed', source, stage: 'compress', error: compressed.error });
    }

    const gzName = compressedName(filename);
    const timestamp = parseTimestamp(gzName);
    if (!timestamp) {
      return this.report({ status: 'unmatched', source, compressedPath: compressedName(source) });
    }

    const targetDir = archiveDirectory(this.config.destinationRoot, timestamp);
    const ensured = await this.ensureDirectory(targetDir);
    if (!ensured.ok) {
      return this.report({ status: 'failed', source, stage: 'mkdir', error: ensured.error });
    }

    const moved = await this.moveFile(compressedName(source), targetDir);
    if (!moved.ok) {
      return this.report({ status: 'failed', source, stage: 'move', error: moved.error });
    }

    return this.report({ status: 'archived', source, destination: path.join(targetDir, gzName) });
  }

  /**
   * One tick over the current candidates. Once `signal` is aborted the
   * file in progress is finished and the rest of the batch is abandoned.
   */
  async poll(signal: AbortSignal): Promise<FileOutcome[]> {
    const outcomes: FileOutcome[] = [];
    for (const filename of await this.listCandidates()) {
      outcomes.push(await this.processOneFile(filename));
      if (signal.aborted) {
        this.transition('draining');
        break;
      }
    }
    return outcomes;
  }

  /** Polls and sleeps until `signal` is aborted. */
  async run(signal: AbortSignal): Promise<RunSummary> {
    if (this.currentState !== 'running') {
      throw new AppError(`Archiver loop cannot run from state '${this.currentState}'`);
    }

    const summary: RunSummary = { ticks: 0, archived: 0, unmatched: 0, failed: 0 };
    this.logger.verbose(`Watching ${this.config.sourceDirectory} -> ${this.config.destinationRoot}`);

    while (!signal.aborted) {
      const outcomes = await this.poll(signal);
      summary.ticks += 1;
      for (const outcome of outcomes) {
        summary[outcome.status] += 1;
      }
      if (signal.aborted) {
        break;
      }
      await this.sleep(this.config.pollIntervalMs, signal);
    }

    this.transition('stopped');
    this.logger.verbose(
      `Stopped after ${summary.ticks} polls: ${summary.archived} archived, ${summary.unmatched} unmatched, ${summary.failed} failed`
    );
    return summary;
  }

  private async attempt(step: () => Promise<void>): Promise<StepResult> {
    try {
      await step();
      return OK;
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }

  private report(outcome: FileOutcome): FileOutcome {
    switch (outcome.status) {
      case 'archived':
        this.logger.verbose(`${outcome.source} -> ${outcome.destination}`);
        break;
      case 'unmatched':
        this.logger.verbose(`${outcome.source} -> ${outcome.compressedPath} (unrecognized name, left in place)`);
        break;
      case 'failed':
        this.logger.verbose(`${outcome.source}: ${outcome.stage} failed: ${outcome.error.message}`);
        break;
    }
    return outcome;
  }

  private transition(next: LoopState): void {
    if (!NEXT_STATES[this.currentState].includes(next)) {
      return;
    }
    this.currentState = next;
    for (const listener of this.listeners) {
      listener(next);
    }
  }
}
