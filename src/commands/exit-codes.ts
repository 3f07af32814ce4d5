/**
 * CLI exit codes. `resolve-file` reads 1 as "aborted" and 2 as "failed";
 * `deps` reads 1 as "dependencies found".
 */
export const EXIT = {
  SUCCESS: 0,
  ATTENTION: 1,
  UNRESOLVED: 2,
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
