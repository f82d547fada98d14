import { loadProject, type ProjectOptions } from "./context.js";
import { failure, ok, type CommandOutput, type OutputFormat } from "./format.js";

/** List declared patch rules, optionally narrowed to one scope tag. */
export async function listRules(opts: ProjectOptions & { scope?: string; format?: OutputFormat }): Promise<CommandOutput> {
  const format = opts.format ?? "human";
  try {
    const project = await loadProject(opts);
    const rules = project.rules
      .filter((r) => opts.scope === undefined || r.scope === opts.scope)
      .map((r) => ({
        id: r.id,
        scope: r.scope,
        action: r.action,
        version: r.version,
        pattern: r.pattern.source,
        description: r.description,
      }));

    if (format === "json") return ok([JSON.stringify(rules, null, 2)]);
    if (format === "jsonl") return ok(rules.map((r) => JSON.stringify(r)));
    if (rules.length === 0) return ok(["No rules found."]);
    return ok(rules.map((r) => `${r.id}  ${r.scope}  ${r.action}${r.description ? `  ${r.description}` : ""}`));
  } catch (e) {
    return failure(e, format);
  }
}
