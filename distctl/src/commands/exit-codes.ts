/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  JOB_FAILED: 1,
  CANCELLED: 2,
  INVALID_ARGS: 3,
  CONFIG_INVALID: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
