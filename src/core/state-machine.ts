import type { PhaseTerminalState, SkipReason } from "../types/report.js";

/**
 * Per-phase lifecycle within one run:
 *   not-started → skipped-{reason}
 *   not-started → running → completed | failed
 */
export type PhaseStatus = "not-started" | "running" | PhaseTerminalState;

/**
 * Events that drive state transitions.
 */
export type TransitionEvent = "start" | "success" | "failure" | { skip: SkipReason };

export const SKIP_REASONS: readonly SkipReason[] = ["idempotent", "blocked", "excluded", "cancelled"];

export function isTerminal(status: PhaseStatus): status is PhaseTerminalState {
  return status !== "not-started" && status !== "running";
}

export function isSkipped(status: PhaseStatus): boolean {
  return status.startsWith("skipped-");
}

/**
 * Pure function: given current status + event, return next status.
 * Illegal transitions throw; the runner never issues one.
 */
export function nextState(current: PhaseStatus, event: TransitionEvent): PhaseStatus {
  if (typeof event === "object") {
    if (current !== "not-started") throw illegal(current, `skip:${event.skip}`);
    return `skipped-${event.skip}`;
  }

  switch (event) {
    case "start":
      if (current !== "not-started") throw illegal(current, event);
      return "running";
    case "success":
      if (current !== "running") throw illegal(current, event);
      return "completed";
    case "failure":
      if (current !== "running") throw illegal(current, event);
      return "failed";
  }
}

function illegal(current: PhaseStatus, event: string): Error {
  return new Error(`Illegal phase transition: ${current} --${event}-->`);
}
