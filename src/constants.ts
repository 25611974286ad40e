/**
 * Centralized constants for filename patterns, suffixes and timing.
 */

/** Suffix of capture files that are ready to be archived. */
export const WATCH_SUFFIX = '.fits';

/** Suffix gzip appends to a compressed file. */
export const COMPRESSED_SUFFIX = '.gz';

/** gzip compression level (fast, as `gzip -1`). */
export const GZIP_LEVEL = 1;

/** Default pause between two poll ticks, in milliseconds. */
export const DEFAULT_POLL_INTERVAL_MS = 1000;

/**
 * Capture filename: `<prefix>_<YYYY><MM><DD>-<9 digits>.fits[.gz]`.
 * Groups: prefix, year, month, day.
 */
export const ARCHIVE_NAME_REGEX = /^(.*)_(\d{4})(\d{2})(\d{2})-\d{9}\.fits(?:\.gz)?$/;

/** Timestamp prefix of log lines. */
export const LOG_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/** External commands used by the subprocess backend. */
export const GZIP_COMMAND = ['gzip', `-${GZIP_LEVEL}`];
export const MKDIR_COMMAND = ['mkdir', '-p'];
export const MOVE_COMMAND = ['mv'];
