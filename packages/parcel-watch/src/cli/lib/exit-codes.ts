/**
 * Process exit codes
 *
 * @module cli/lib/exit-codes
 */

import { ConfigError, DatasetError, WatchlistError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Lookup found nothing */
  NOT_FOUND: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a thrown error to the exit code of the failed run
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof DatasetError || error instanceof WatchlistError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}
