/**
 * Process exit codes
 */

import { ErrorCodes, isApplicationError } from '../errors';

export const ExitCodes = {
  SUCCESS: 0,
  FAILURE: 1,
  UNREACHABLE: 2,
  DIAGNOSTICS_FAILED: 3,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Unreachable cluster or chart repository → 2; any other failure → 1
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (
    isApplicationError(error) &&
    (error.code === ErrorCodes.CLUSTER_UNREACHABLE || error.code === ErrorCodes.REPO_UNREACHABLE)
  ) {
    return ExitCodes.UNREACHABLE;
  }
  return ExitCodes.FAILURE;
}
