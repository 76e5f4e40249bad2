/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
  VALIDATION_FAILED: 2,
  INVALID_ARGS: 3,
  NOT_FOUND: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
