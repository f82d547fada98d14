import { ConfigurationError } from "../errors.js";
import { loadProject, openJournal, type ProjectOptions } from "./context.js";
import { failure, ok, type CommandOutput, type OutputFormat } from "./format.js";

/** Clear one phase's journal entry, or the whole journal, so the next run re-evaluates it. */
export async function reset(opts: ProjectOptions & { phase?: string; format?: OutputFormat }): Promise<CommandOutput> {
  const format = opts.format ?? "human";
  try {
    const project = await loadProject(opts);
    const journal = await openJournal(project);
    const phase = opts.phase;
    if (phase !== undefined && !project.phases.some((p) => p.id === phase) && !(phase in journal.entries())) {
      throw new ConfigurationError(`Unknown phase: ${phase}`, { phase });
    }

    journal.reset(phase);
    await journal.save();

    const cleared = phase ?? "all";
    if (format === "human") return ok([phase ? `cleared ${phase}` : "cleared all phases"]);
    return ok([JSON.stringify({ level: "info", code: "RESET", cleared, journal: project.journalPath })]);
  } catch (e) {
    return failure(e, format);
  }
}
