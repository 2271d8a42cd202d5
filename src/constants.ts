/**
 * Application-wide constants and configuration values.
 */

export const VERSION = '0.1.0';

/**
 * Local alignment scoring scheme. Fixed policy, not user-configurable.
 */
export const SCORING = {
  MATCH: 2,
  MISMATCH: -1,
  GAP: -2,
  EXACT_MATCH_BOOST: 10000,
  PREFIX_MATCH_BOOST: 5000
} as const;

/**
 * Defaults for options the user did not pass
 */
export const SEARCH_DEFAULTS = {
  LIMIT: 10,
  ROOT: '.',
  PARALLEL: true
} as const;

/**
 * Worker pool configuration
 */
export const WORKER_CONFIG = {
  MIN_WORKERS: 1,
  MAX_WORKERS: 64,
  TASK_TIMEOUT_MS: 60000,
  // Chunks never get smaller than this, so small inputs use fewer workers
  MIN_CHUNK_SIZE: 256
} as const;

/**
 * Log message prefixes
 */
export const LOG_PREFIX = {
  WALKER: '[DirectoryWalker]',
  ENGINE: '[SearchEngine]',
  WORKER_POOL: '[WorkerPool]',
  CLI: '[Cli]'
} as const;
