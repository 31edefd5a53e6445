/**
 * CLI exit codes
 */

import { HTTPError, HTTPNetworkError, HTTPTimeoutError } from '../../core/http-client.js';
import { BulkLoadFailureError, NumericPrecisionError } from '../../core/errors.js';
import { ObjectStoreError } from '../../storage/object-store.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
  USER_CANCELLED: 10,
  UNKNOWN_COMMAND: 127,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Network failures and data corruption get their own codes; everything else
 * a command can throw (rejected input, missing records) is ERRORS.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof NumericPrecisionError || error instanceof BulkLoadFailureError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  if (
    error instanceof HTTPError ||
    error instanceof HTTPNetworkError ||
    error instanceof HTTPTimeoutError ||
    error instanceof ObjectStoreError
  ) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  return EXIT_CODES.ERRORS;
}
