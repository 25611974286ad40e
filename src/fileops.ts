/**
 * File operations the archiver performs, behind an injectable interface.
 */

import { spawn } from 'node:child_process';
import { randomBytes } from 'node:crypto';
import { createReadStream, createWriteStream, promises as fs, type Stats } from 'node:fs';
import * as path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import { glob } from 'glob';
import { GZIP_COMMAND, GZIP_LEVEL, MKDIR_COMMAND, MOVE_COMMAND } from './constants.js';
import { FileOperationError, errorMessage } from './errors.js';
import { compressedName } from './filename.js';

/**
 * Capability the archive loop uses to touch the file system.
 * Every mutating method rejects with a FileOperationError on failure.
 */
export interface FileOperations {
  /** Names of the regular files in `dir`, in listing order. */
  listFiles(dir: string): Promise<string[]>;
  /** Gzips `filePath` in place, replacing it with `<filePath>.gz`. */
  compress(filePath: string): Promise<void>;
  directoryExists(dir: string): Promise<boolean>;
  /** Creates `dir` and any missing parents. */
  createDirectory(dir: string): Promise<void>;
  /** Moves `src` into `dstDir`, keeping its name. */
  move(src: string, dstDir: string): Promise<void>;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

abstract class BaseFileOperations implements FileOperations {
  async listFiles(dir: string): Promise<string[]> {
    try {
      // glob does not sort; order is the listing's
      return await glob('*', { cwd: dir, dot: true, nodir: true });
    } catch (error) {
      throw FileOperationError.listFailed(dir, errorMessage(error));
    }
  }

  async directoryExists(dir: string): Promise<boolean> {
    try {
      const stats = await fs.stat(dir);
      return stats.isDirectory();
    } catch {
      return false;
    }
  }

  abstract compress(filePath: string): Promise<void>;
  abstract createDirectory(dir: string): Promise<void>;
  abstract move(src: string, dstDir: string): Promise<void>;
}

/** Command lines for the subprocess backend; the operand is appended. */
export interface SubprocessCommands {
  gzip: string[];
  mkdir: string[];
  mv: string[];
}

const DEFAULT_COMMANDS: SubprocessCommands = {
  gzip: GZIP_COMMAND,
  mkdir: MKDIR_COMMAND,
  mv: MOVE_COMMAND,
};

/**
 * Runs gzip, mkdir and mv as child processes. A non-zero exit is a failure.
 */
export class SubprocessFileOperations extends BaseFileOperations {
  private readonly commands: SubprocessCommands;

  constructor(commands: Partial<SubprocessCommands> = {}) {
    super();
    this.commands = { ...DEFAULT_COMMANDS, ...commands };
  }

  async compress(filePath: string): Promise<void> {
    try {
      await this.runCommand(this.commands.gzip, [filePath]);
    } catch (error) {
      throw FileOperationError.compressFailed(filePath, errorMessage(error));
    }
  }

  async createDirectory(dir: string): Promise<void> {
    try {
      await this.runCommand(this.commands.mkdir, [dir]);
    } catch (error) {
      throw FileOperationError.mkdirFailed(dir, errorMessage(error));
    }
  }

  async move(src: string, dstDir: string): Promise<void> {
    try {
      await this.runCommand(this.commands.mv, [src, dstDir]);
    } catch (error) {
      throw FileOperationError.moveFailed(src, dstDir, errorMessage(error));
    }
  }

  private runCommand(commandLine: string[], operands: string[]): Promise<void> {
    const [cmd, ...args] = commandLine;
    if (cmd === undefined) {
      return Promise.reject(new Error('Empty command line'));
    }

    return new Promise((resolve, reject) => {
      // stdin is not a terminal, so gzip refuses to overwrite instead of prompting
      const child = spawn(cmd, [...args, ...operands], { stdio: ['ignore', 'ignore', 'pipe'] });

      let stderr = '';
      if (child.stderr) {
        child.stderr.on('data', (data: Buffer) => {
          stderr += data.toString();
        });
      }

      child.on('error', (error) => {
        reject(new Error(error.message));
      });

      child.on('close', (code) => {
        if (code !== 0) {
          reject(new Error(stderr.trim() || `${cmd} exited with code ${code}`));
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * Same contract as the subprocess backend, using zlib and fs directly.
 */
export class NativeFileOperations extends BaseFileOperations {
  async compress(filePath: string): Promise<void> {
    const target = compressedName(filePath);

    let stats: Stats;
    try {
      stats = await fs.stat(filePath);
    } catch (error) {
      throw FileOperationError.compressFailed(filePath, errorMessage(error));
    }
    if (!stats.isFile()) {
      throw FileOperationError.compressFailed(filePath, 'not a regular file');
    }

    try {
      await pipeline(
        createReadStream(filePath),
        createGzip({ level: GZIP_LEVEL }),
        createWriteStream(target, { flags: 'wx' })
      );
    } catch (error) {
      // Never touch a .gz that was already there
      if (!hasErrorCode(error, 'EEXIST')) {
        await fs.rm(target, { force: true });
      }
      throw FileOperationError.compressFailed(filePath, errorMessage(error));
    }

    try {
      await fs.chmod(target, stats.mode);
      await fs.utimes(target, stats.atime, stats.mtime);
      await fs.unlink(filePath);
    } catch (error) {
      throw FileOperationError.compressFailed(filePath, errorMessage(error));
    }
  }

  async createDirectory(dir: string): Promise<void> {
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (error) {
      throw FileOperationError.mkdirFailed(dir, errorMessage(error));
    }
  }

  async move(src: string, dstDir: string): Promise<void> {
    const target = path.join(dstDir, path.basename(src));
    try {
      await fs.rename(src, target);
    } catch (error) {
      if (!hasErrorCode(error, 'EXDEV')) {
        throw FileOperationError.moveFailed(src, dstDir, errorMessage(error));
      }
      await this.copyAcrossDevices(src, target, dstDir);
    }
  }

  /**
   * Copies to a temporary name beside `target` and renames it into place,
   * so a failed copy never leaves a partial file under the archive name.
   */
  private async copyAcrossDevices(src: string, target: string, dstDir: string): Promise<void> {
    const tempPath = path.join(dstDir, `.tmp-${randomBytes(8).toString('hex')}`);

    try {
      const stats = await fs.stat(src);
      await fs.copyFile(src, tempPath);
      await fs.utimes(tempPath, stats.atime, stats.mtime);
      await fs.rename(tempPath, target);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw FileOperationError.moveFailed(src, dstDir, errorMessage(error));
    }

    try {
      await fs.unlink(src);
    } catch (error) {
      throw FileOperationError.moveFailed(src, dstDir, errorMessage(error));
    }
  }
}

/** Picks the backend the configuration asks for. */
export function createFileOperations(native: boolean): FileOperations {
  return native ? new NativeFileOperations() : new SubprocessFileOperations();
}
