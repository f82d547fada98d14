import { resolveOrder, selectPhases } from "../core/graph.js";
import { loadProject, type ProjectOptions } from "./context.js";
import { failure, ok, type CommandOutput, type OutputFormat } from "./format.js";
import { selectionFrom } from "./run.js";

export type PlanEntry = {
  id: string;
  label: string;
  requires: string[];
  feature: string | null;
  excluded: boolean;
  cacheScopes: string[];
};

/** Resolved execution order. Never contacts the target. */
export async function plan(opts: ProjectOptions & { from?: string; only?: string; format?: OutputFormat }): Promise<CommandOutput> {
  const format = opts.format ?? "human";
  try {
    const project = await loadProject(opts);
    const order = selectPhases(resolveOrder(project.phases), selectionFrom(opts));
    const excluded = new Set(project.config.exclude_features ?? []);
    const byId = new Map(project.phases.map((p) => [p.id, p]));

    const entries: PlanEntry[] = order.flatMap((id) => {
      const phase = byId.get(id);
      if (!phase) return [];
      return [
        {
          id,
          label: phase.label,
          requires: [...phase.requires],
          feature: phase.feature ?? null,
          excluded: phase.feature !== undefined && excluded.has(phase.feature),
          cacheScopes: [...phase.cacheScopes],
        },
      ];
    });

    if (format === "json") return ok([JSON.stringify(entries, null, 2)]);
    if (format === "jsonl") return ok(entries.map((e) => JSON.stringify(e)));
    return ok(
      entries.map((e, i) => {
        const after = e.requires.length > 0 ? ` (after ${e.requires.join(", ")})` : "";
        return `${String(i + 1).padStart(2)}. ${e.id}${after}${e.excluded ? " [excluded]" : ""}`;
      }),
    );
  } catch (e) {
    return failure(e, format);
  }
}
