import type { ErrorKind } from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  BUILD_FAILED: 1,
  INVALID_CONFIG: 2,
  INVALID_ARGS: 3,
  PLANNING_FAILED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeFor(kind: ErrorKind): ExitCode {
  switch (kind) {
    case "configuration":
      return EXIT.INVALID_CONFIG;
    case "planning":
      return EXIT.PLANNING_FAILED;
    case "staleness":
    case "execution":
    case "filesystem":
      return EXIT.BUILD_FAILED;
  }
}
