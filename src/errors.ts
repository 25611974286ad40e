/**
 * Custom error classes for the fits-archiver daemon.
 */

import type { FailureStage } from './types.js';

/**
 * Base application error class.
 */
export class AppError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * A single file operation failed. Only ever affects the file being processed.
 */
export class FileOperationError extends AppError {
  readonly stage: FailureStage;
  readonly path: string;

  constructor(stage: FailureStage, path: string, message: string) {
    super(message);
    this.name = 'FileOperationError';
    this.stage = stage;
    this.path = path;
  }

  static listFailed(dir: string, reason: string): FileOperationError {
    return new FileOperationError('list', dir, `Cannot list ${dir}: ${reason}`);
  }

  static compressFailed(file: string, reason: string): FileOperationError {
    return new FileOperationError('compress', file, `Cannot compress ${file}: ${reason}`);
  }

  static mkdirFailed(dir: string, reason: string): FileOperationError {
    return new FileOperationError('mkdir', dir, `Cannot create directory ${dir}: ${reason}`);
  }

  static moveFailed(file: string, dir: string, reason: string): FileOperationError {
    return new FileOperationError('move', file, `Cannot move ${file} to ${dir}: ${reason}`);
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Wraps an unknown thrown value as an Error. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
