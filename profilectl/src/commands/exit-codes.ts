/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  BUILD_FAILED: 1,
  INTEGRITY_FAILED: 2,
  INVALID_ARGS: 3,
  RESOLUTION_FAILED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
