import path from "node:path";
import { resolveOrder } from "../core/graph.js";
import { errorMessage, PhasectlError } from "../errors.js";
import { collectDeployFiles } from "../phases/deploy.js";
import { loadProject, type Project, type ProjectOptions } from "./context.js";
import { EXIT } from "./exit-codes.js";
import type { CommandOutput, OutputFormat } from "./format.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
};

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

function diag(level: Diagnostic["level"], code: string, message: string, extra?: Pick<Diagnostic, "path">): Diagnostic {
  return { level, code, message, ...extra };
}

/**
 * Config, rules and phase graph. Deploy sources are checked too, but a
 * missing source only warns: it may be fetched by an earlier phase.
 */
export async function validateAll(opts: ProjectOptions): Promise<ValidateResult> {
  let project: Project;
  try {
    project = await loadProject(opts);
    resolveOrder(project.phases);
  } catch (e) {
    const code = e instanceof PhasectlError ? e.code : "CONFIG_READ_FAILED";
    return { ok: false, errors: [diag("error", code, errorMessage(e))] };
  }

  const warnings: Diagnostic[] = [];
  for (const decl of project.config.phases) {
    if (decl.kind !== "deploy") continue;
    const source = path.resolve(project.configDir, decl.source);
    try {
      if (collectDeployFiles(decl, source, project.target.pluginDir).length === 0) {
        warnings.push(diag("warn", "DEPLOY_NO_FILES", `Phase ${decl.id} matches no files under ${source}`, { path: source }));
      }
    } catch (e) {
      warnings.push(diag("warn", "DEPLOY_SOURCE", errorMessage(e), { path: source }));
    }
  }

  return { ok: true, warnings };
}

export async function validate(opts: ProjectOptions & { format?: OutputFormat }): Promise<CommandOutput> {
  const format = opts.format ?? "human";
  const res = await validateAll(opts);
  const diagnostics = res.ok ? res.warnings : res.errors;
  const exitCode = res.ok ? EXIT.SUCCESS : EXIT.CONFIG_INVALID;

  if (format === "human") {
    return {
      exitCode,
      stdout: res.ok ? ["OK"] : [],
      stderr: diagnostics.map((d) => `${d.level}: ${d.message}`),
    };
  }

  const lines = diagnostics.map((d) => JSON.stringify(d));
  if (res.ok) lines.push(JSON.stringify({ level: "info", code: "OK", message: "OK" }));
  if (format === "json") {
    return { exitCode, stdout: [JSON.stringify({ ok: res.ok, diagnostics }, null, 2)], stderr: [] };
  }
  return { exitCode, stdout: lines, stderr: [] };
}
