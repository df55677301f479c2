/**
 * CLI exit codes. Every failure is fatal to the invocation, so there is no
 * partial-success code.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
