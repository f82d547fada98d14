import type { RunReport } from "../types/report.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  PHASE_FAILED: 1,
  CONFIG_INVALID: 2,
  TARGET_UNREACHABLE: 3,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Zero only when no phase failed and the run was not cancelled. A failure outranks cancellation. */
export function exitCodeFor(report: RunReport): ExitCode {
  if (Object.values(report.phases).some((p) => p.state === "failed")) return EXIT.PHASE_FAILED;
  if (report.cancelled) return EXIT.CANCELLED;
  return EXIT.SUCCESS;
}
