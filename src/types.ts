/**
 * Type definitions for the fits-archiver daemon.
 */

/**
 * Validated startup configuration. Frozen once built.
 */
export interface WatchConfig {
  /** Absolute path of the directory watched for `.fits` files. */
  readonly sourceDirectory: string;
  /** Absolute path of the archive tree root. */
  readonly destinationRoot: string;
  /** Report every archived file and every failure. */
  readonly verbose: boolean;
  /** Pause between two poll ticks, in milliseconds. */
  readonly pollIntervalMs: number;
  /** Use the in-process backend instead of gzip/mkdir/mv subprocesses. */
  readonly native: boolean;
}

/**
 * Segments parsed out of a capture filename.
 */
export interface FilenameTimestamp {
  prefix: string;
  year: string;
  month: string;
  day: string;
}

/** Step of single-file processing that can fail. */
export type FailureStage = 'list' | 'compress' | 'mkdir' | 'move';

/** Result of processing one candidate file. */
export type FileOutcome =
  | { status: 'archived'; source: string; destination: string }
  | { status: 'unmatched'; source: string; compressedPath: string }
  | { status: 'failed'; source: string; stage: Exclude<FailureStage, 'list'>; error: Error };

export type LoopState = 'running' | 'draining' | 'stopped';

/** Counters reported when the loop stops. */
export interface RunSummary {
  ticks: number;
  archived: number;
  unmatched: number;
  failed: number;
}

/** Result of one step of single-file processing. */
export type StepResult = { ok: true } | { ok: false; error: Error };
