import type { ContainerBridge } from "../bridge/bridge.js";
import type { JournalEntry } from "../core/journal.js";
import type { RetryPolicy } from "../core/retry.js";
import type { Logger } from "../logger.js";
import type { PatchOutcome } from "./patch.js";
import type { DeploymentTarget } from "./target.js";

/** Everything a phase body may touch. The target is always passed explicitly. */
export type PhaseContext = {
  target: DeploymentTarget;
  bridge: ContainerBridge;
  logger: Logger;
  signal: AbortSignal;
  retry: RetryPolicy;
  journalEntry(phaseId: string): JournalEntry;
};

export type PhaseExecution = {
  /** Whether the body changed anything in the deployment. Drives cache invalidation. */
  mutated: boolean;
  outcomes: PatchOutcome[];
  warnings: string[];
};

export type Verification = { ok: true } | { ok: false; diagnostic: string };

export interface Phase {
  readonly id: string;
  readonly label: string;
  readonly requires: readonly string[];
  /** Exclusion key matched against `exclude_features`. */
  readonly feature?: string;
  /** Cache scopes to invalidate after a mutating, completed run. */
  readonly cacheScopes: readonly string[];
  /** Content fingerprint of what the phase produced; null when nothing is there yet. */
  fingerprint?(ctx: PhaseContext): Promise<string | null>;
  /** Direct deployment inspection: true when the phase's effect is already present. */
  isSatisfied?(ctx: PhaseContext): Promise<boolean>;
  execute(ctx: PhaseContext): Promise<PhaseExecution>;
  verify(ctx: PhaseContext, execution: PhaseExecution): Promise<Verification>;
}
