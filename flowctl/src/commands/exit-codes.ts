import type { ActionStatus } from "../types/action.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  ACTION_FAILED: 1,
  ATTENTION_REQUIRED: 2,
  INVALID_ARGS: 3,
  REPOSITORY_LOCKED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Gate-closed and noop outcomes are normal runs, not failures. */
export function exitCodeFor(status: ActionStatus): ExitCode {
  switch (status) {
    case "completed":
    case "gate_closed":
    case "noop":
      return EXIT.SUCCESS;
    case "attention_required":
      return EXIT.ATTENTION_REQUIRED;
    case "failed":
      return EXIT.ACTION_FAILED;
  }
}
