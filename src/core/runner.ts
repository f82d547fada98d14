import crypto from "node:crypto";
import type { ContainerBridge } from "../bridge/bridge.js";
import { CacheInvalidator } from "../cache/invalidator.js";
import { ValidationFailure, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { isFailedOutcome, type PatchOutcome } from "../types/patch.js";
import type { Phase, PhaseContext, PhaseExecution } from "../types/phase.js";
import type { PhaseReport, RunReport, SkipReason } from "../types/report.js";
import { dependentsOf, resolveOrder, selectPhases, type PhaseSelection } from "./graph.js";
import type { Journal } from "./journal.js";
import { DEFAULT_RETRY, type RetryPolicy } from "./retry.js";
import { nextState, type PhaseStatus } from "./state-machine.js";

export type RunnerOptions = {
  logger?: Logger;
  invalidator?: CacheInvalidator;
  /** Feature keys whose phases (and their dependents) are skipped. */
  excludeFeatures?: readonly string[];
  retry?: RetryPolicy;
  /** Once aborted, no further phase starts. The phase in flight runs to its end. */
  signal?: AbortSignal;
  selection?: PhaseSelection;
  runId?: string;
};

export function makeRunId(now = new Date()): string {
  const ts = now.toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

function describeFailedOutcomes(outcomes: readonly PatchOutcome[]): string | null {
  const failed = outcomes.filter(isFailedOutcome);
  if (failed.length === 0) return null;
  return failed
    .map((o) => new ValidationFailure(o.file, o.diagnostics ? `${o.status} (${o.diagnostics})` : o.status).message)
    .join("; ");
}

type Gate = { skip: SkipReason; diagnostic: string } | null;

/**
 * Walks the phase graph in dependency order against one target.
 *
 * Phases run strictly one after another. The runner never retries a phase;
 * bodies retry transient bridge failures themselves.
 */
export class PhaseRunner {
  private readonly logger: Logger;
  private readonly invalidator: CacheInvalidator;
  private readonly excludeFeatures: ReadonlySet<string>;
  private readonly retry: RetryPolicy;
  private readonly signal: AbortSignal;
  private readonly selection: PhaseSelection;
  private readonly runId?: string;

  constructor(opts: RunnerOptions = {}) {
    this.logger = opts.logger ?? silentLogger;
    this.invalidator = opts.invalidator ?? new CacheInvalidator({ logger: this.logger.child("cache") });
    this.excludeFeatures = new Set(opts.excludeFeatures ?? []);
    this.retry = opts.retry ?? DEFAULT_RETRY;
    this.signal = opts.signal ?? new AbortController().signal;
    this.selection = opts.selection ?? { mode: "all" };
    this.runId = opts.runId;
  }

  async run(phases: readonly Phase[], journal: Journal, bridge: ContainerBridge): Promise<RunReport> {
    // Configuration errors surface here, before anything touches the target.
    const order = resolveOrder(phases);
    const selected = selectPhases(order, this.selection);
    const selectedSet = new Set(selected);
    const byId = new Map(phases.map((p) => [p.id, p]));

    const excluded = new Set<string>();
    for (const phase of phases) {
      if (phase.feature !== undefined && this.excludeFeatures.has(phase.feature)) {
        excluded.add(phase.id);
        for (const dependent of dependentsOf(phases, phase.id)) excluded.add(dependent);
      }
    }

    const report: RunReport = {
      runId: this.runId ?? makeRunId(),
      target: bridge.target.name,
      startedAt: new Date().toISOString(),
      finishedAt: "",
      order: selected,
      cancelled: false,
      phases: {},
    };
    const states = new Map<string, PhaseStatus>();

    this.logger.info("run started", { runId: report.runId, target: report.target, phases: selected.length });

    for (const id of selected) {
      const phase = byId.get(id);
      if (!phase) continue;

      const started = Date.now();
      let gate: Gate = null;
      if (this.signal.aborted) {
        report.cancelled = true;
        gate = { skip: "cancelled", diagnostic: "run cancelled before this phase started" };
      } else {
        gate = this.gate(phase, states, selectedSet, excluded, journal);
      }

      let phaseReport: PhaseReport;
      if (gate) {
        states.set(id, nextState("not-started", { skip: gate.skip }));
        phaseReport = this.skipped(phase, gate.skip, gate.diagnostic, started);
        this.logger.info(`phase skipped (${gate.skip})`, { phase: id, reason: gate.diagnostic });
      } else {
        phaseReport = await this.runPhase(phase, journal, bridge, started);
        states.set(id, phaseReport.state);
      }

      report.phases[id] = phaseReport;
      await journal.save();
    }

    await journal.save();
    report.finishedAt = new Date().toISOString();
    this.logger.info("run finished", { runId: report.runId, cancelled: report.cancelled });
    return report;
  }

  /** Decide, without evaluating the phase, whether it is blocked or excluded. */
  private gate(
    phase: Phase,
    states: ReadonlyMap<string, PhaseStatus>,
    selected: ReadonlySet<string>,
    excluded: ReadonlySet<string>,
    journal: Journal,
  ): Gate {
    for (const dep of phase.requires) {
      if (excluded.has(dep)) continue;
      if (selected.has(dep)) {
        const state = states.get(dep);
        if (state === "failed") return { skip: "blocked", diagnostic: `prerequisite ${dep} failed` };
        if (state === "skipped-blocked") return { skip: "blocked", diagnostic: `prerequisite ${dep} was blocked` };
        if (state === "skipped-cancelled") return { skip: "blocked", diagnostic: `prerequisite ${dep} was cancelled` };
      } else if (!journal.isDone(dep)) {
        return { skip: "blocked", diagnostic: `prerequisite ${dep} has not completed in an earlier run` };
      }
    }

    if (excluded.has(phase.id)) {
      const reason = phase.feature !== undefined && this.excludeFeatures.has(phase.feature)
        ? `feature ${phase.feature} is excluded`
        : "a prerequisite is excluded";
      return { skip: "excluded", diagnostic: reason };
    }
    return null;
  }

  private async runPhase(phase: Phase, journal: Journal, bridge: ContainerBridge, started: number): Promise<PhaseReport> {
    const logger = this.logger.child(phase.id);
    const ctx: PhaseContext = {
      target: bridge.target,
      bridge,
      logger,
      signal: this.signal,
      retry: this.retry,
      journalEntry: (id) => journal.get(id),
    };

    let state: PhaseStatus = "not-started";
    let execution: PhaseExecution = { mutated: false, outcomes: [], warnings: [] };

    try {
      const fingerprint = phase.fingerprint ? await phase.fingerprint(ctx) : null;
      const idempotent = journal.matches(phase.id, fingerprint) || (phase.isSatisfied ? await phase.isSatisfied(ctx) : false);
      if (idempotent) {
        state = nextState(state, { skip: "idempotent" });
        journal.record(phase.id, { status: "skipped-idempotent", fingerprint });
        logger.info("phase already satisfied");
        return this.skipped(phase, "idempotent", undefined, started);
      }

      state = nextState(state, "start");
      logger.info("phase started", { label: phase.label });
      execution = await phase.execute(ctx);
      const verification = await phase.verify(ctx, execution);

      const diagnostic = describeFailedOutcomes(execution.outcomes) ?? (verification.ok ? null : verification.diagnostic);
      if (diagnostic !== null) {
        state = nextState(state, "failure");
        return this.fail(phase, journal, execution, diagnostic, started, logger);
      }
    } catch (e) {
      if (state === "not-started") state = nextState(state, "start");
      state = nextState(state, "failure");
      return this.fail(phase, journal, execution, errorMessage(e), started, logger);
    }

    state = nextState(state, "success");
    const warnings = [...execution.warnings];

    if (execution.mutated && phase.cacheScopes.length > 0) {
      const invalidation = await this.invalidator.invalidate(bridge, phase.cacheScopes);
      warnings.push(...invalidation.warnings);
    }

    let fingerprint: string | null = null;
    if (phase.fingerprint) {
      try {
        fingerprint = await phase.fingerprint(ctx);
      } catch (e) {
        warnings.push(`could not fingerprint result: ${errorMessage(e)}`);
      }
    }

    journal.record(phase.id, { status: "completed", fingerprint, warnings });
    logger.info("phase completed", { warnings: warnings.length, mutated: execution.mutated });
    return {
      id: phase.id,
      label: phase.label,
      state: "completed",
      warnings,
      outcomes: execution.outcomes,
      durationMs: Date.now() - started,
    };
  }

  private fail(
    phase: Phase,
    journal: Journal,
    execution: PhaseExecution,
    diagnostic: string,
    started: number,
    logger: Logger,
  ): PhaseReport {
    journal.record(phase.id, { status: "failed", fingerprint: null, warnings: execution.warnings });
    logger.error("phase failed", { diagnostic });
    return {
      id: phase.id,
      label: phase.label,
      state: "failed",
      diagnostic,
      warnings: [...execution.warnings],
      outcomes: execution.outcomes,
      durationMs: Date.now() - started,
    };
  }

  private skipped(phase: Phase, reason: SkipReason, diagnostic: string | undefined, started: number): PhaseReport {
    return {
      id: phase.id,
      label: phase.label,
      state: `skipped-${reason}`,
      ...(diagnostic ? { diagnostic } : {}),
      warnings: [],
      outcomes: [],
      durationMs: Date.now() - started,
    };
  }
}
