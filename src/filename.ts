/**
 * Capture filename parsing and archive path resolution.
 */

import * as path from 'node:path';
import { ARCHIVE_NAME_REGEX, COMPRESSED_SUFFIX, WATCH_SUFFIX } from './constants.js';
import type { FilenameTimestamp } from './types.js';

/**
 * Parses the prefix and capture date out of a filename.
 * Segments are kept as written; no calendar validation happens here.
 * @returns The parsed segments, or null if the name does not match
 */
export function parseTimestamp(filename: string): FilenameTimestamp | null {
  const match = ARCHIVE_NAME_REGEX.exec(filename);
  if (!match) {
    return null;
  }

  const [, prefix, year, month, day] = match;
  return { prefix, year, month, day };
}

/** Directory under `root` a file with the given timestamp is archived to. */
export function archiveDirectory(root: string, timestamp: FilenameTimestamp): string {
  return path.join(root, timestamp.prefix, timestamp.year, timestamp.month, timestamp.day);
}

/** Name gzip gives the compressed sibling of `filename`. */
export function compressedName(filename: string): string {
  return filename + COMPRESSED_SUFFIX;
}

/** True for directory entries eligible for processing. */
export function isCandidate(filename: string): boolean {
  return filename.endsWith(WATCH_SUFFIX);
}
