import { withRetry } from "../core/retry.js";
import { errorMessage } from "../errors.js";
import type { Phase, PhaseContext, PhaseExecution, Verification } from "../types/phase.js";

export type PhaseDefinition = {
  id: string;
  label?: string;
  requires?: readonly string[];
  feature?: string;
  cacheScopes?: readonly string[];
  fingerprint?(ctx: PhaseContext): Promise<string | null>;
  isSatisfied?(ctx: PhaseContext): Promise<boolean>;
  /** Returning nothing counts as a mutating run with no outcomes. */
  execute(ctx: PhaseContext): Promise<Partial<PhaseExecution> | void>;
  verify?(ctx: PhaseContext, execution: PhaseExecution): Promise<Verification>;
};

/** Build a Phase from a partial definition, filling in the defaults. */
export function definePhase(def: PhaseDefinition): Phase {
  const phase: Phase = {
    id: def.id,
    label: def.label ?? def.id,
    requires: [...(def.requires ?? [])],
    feature: def.feature,
    cacheScopes: [...(def.cacheScopes ?? [])],
    async execute(ctx) {
      const result = await def.execute(ctx);
      return {
        mutated: result?.mutated ?? true,
        outcomes: result?.outcomes ?? [],
        warnings: result?.warnings ?? [],
      };
    },
    verify: def.verify ?? (async () => ({ ok: true })),
  };
  if (def.fingerprint) phase.fingerprint = def.fingerprint;
  if (def.isSatisfied) phase.isSatisfied = def.isSatisfied;
  return phase;
}

/** Run one remote step under the phase's retry policy, logging each retry. */
export function withPhaseRetry<T>(ctx: PhaseContext, step: string, fn: () => Promise<T>): Promise<T> {
  return withRetry(() => fn(), ctx.retry, {
    signal: ctx.signal,
    onRetry: (err, attempt, delayMs) => {
      ctx.logger.warn("transient failure, retrying", { step, attempt, delayMs, error: errorMessage(err) });
    },
  });
}
