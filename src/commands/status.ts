import type { JournalEntry } from "../core/journal.js";
import { loadProject, openJournal, type ProjectOptions } from "./context.js";
import { failure, ok, type CommandOutput, type OutputFormat } from "./format.js";

export type StatusRow = JournalEntry & { id: string; declared: boolean };

/**
 * Journal entries for every declared phase, then any recorded phase that is
 * no longer declared.
 */
export async function status(opts: ProjectOptions & { format?: OutputFormat }): Promise<CommandOutput> {
  const format = opts.format ?? "human";
  try {
    const project = await loadProject(opts);
    const journal = await openJournal(project);
    const declared = new Set(project.phases.map((p) => p.id));

    const rows: StatusRow[] = project.phases.map((p) => ({ id: p.id, declared: true, ...journal.get(p.id) }));
    for (const [id, entry] of Object.entries(journal.entries())) {
      if (!declared.has(id)) rows.push({ id, declared: false, ...entry });
    }

    if (format === "json") {
      return ok([JSON.stringify({ target: project.target.name, journal: project.journalPath, phases: rows }, null, 2)]);
    }
    if (format === "jsonl") return ok(rows.map((r) => JSON.stringify(r)));

    const lines = [`journal ${project.journalPath}`];
    for (const row of rows) {
      lines.push(`  ${row.status.padEnd(18)} ${row.id}  ${row.timestamp ?? "-"}${row.declared ? "" : "  (not declared)"}`);
      for (const warning of row.warnings) lines.push(`    warning: ${warning}`);
    }
    return ok(lines);
  } catch (e) {
    return failure(e, format);
  }
}
