import type { PatchOutcome } from "./patch.js";

export type SkipReason = "idempotent" | "blocked" | "excluded" | "cancelled";

export type PhaseTerminalState = "completed" | "failed" | `skipped-${SkipReason}`;

export type PhaseReport = {
  id: string;
  label: string;
  state: PhaseTerminalState;
  diagnostic?: string;
  warnings: string[];
  outcomes: PatchOutcome[];
  durationMs: number;
};

export type RunReport = {
  runId: string;
  target: string;
  startedAt: string;
  finishedAt: string;
  /** Selected phases in execution order. */
  order: string[];
  cancelled: boolean;
  phases: Record<string, PhaseReport>;
};
