import type { ContainerBridge } from "../bridge/bridge.js";
import { CacheInvalidator } from "../cache/invalidator.js";
import type { PhaseSelection } from "../core/graph.js";
import { PhaseRunner } from "../core/runner.js";
import { ConfigurationError } from "../errors.js";
import type { RunReport } from "../types/report.js";
import { createBridge, loadProject, openJournal, type ProjectOptions } from "./context.js";
import { exitCodeFor } from "./exit-codes.js";
import { failure, formatReport, ok, type CommandOutput, type OutputFormat } from "./format.js";

export type RunCommandOptions = ProjectOptions & {
  from?: string;
  only?: string;
  format?: OutputFormat;
  signal?: AbortSignal;
  /** Replaces the docker bridge; used by tests. */
  bridge?: ContainerBridge;
};

export function selectionFrom(opts: { from?: string; only?: string }): PhaseSelection {
  if (opts.from && opts.only) throw new ConfigurationError("--from and --only are mutually exclusive");
  if (opts.from) return { mode: "from", phaseId: opts.from };
  if (opts.only) return { mode: "only", phaseId: opts.only };
  return { mode: "all" };
}

export async function run(opts: RunCommandOptions): Promise<CommandOutput & { report: RunReport | null }> {
  const format = opts.format ?? "human";
  try {
    const selection = selectionFrom(opts);
    const project = await loadProject(opts);
    const journal = await openJournal(project);
    const bridge = opts.bridge ?? createBridge(project);

    const runner = new PhaseRunner({
      logger: project.logger.child("runner"),
      invalidator: new CacheInvalidator({ timeoutMs: project.config.docker?.timeout_ms, logger: project.logger.child("cache") }),
      excludeFeatures: project.config.exclude_features,
      retry: project.retry,
      signal: opts.signal,
      selection,
    });

    const report = await runner.run(project.phases, journal, bridge);
    const exitCode = exitCodeFor(report);
    return { ...ok(formatReport(report, exitCode, format), exitCode), report };
  } catch (e) {
    return { ...failure(e, format), report: null };
  }
}
