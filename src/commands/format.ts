import { ConfigurationError, PhasectlError, errorMessage } from "../errors.js";
import type { RunReport } from "../types/report.js";
import { EXIT } from "./exit-codes.js";

export type OutputFormat = "human" | "json" | "jsonl";

const FORMATS: readonly OutputFormat[] = ["human", "json", "jsonl"];

export function parseFormat(value: string): OutputFormat {
  const found = FORMATS.find((f) => f === value);
  if (!found) throw new ConfigurationError(`Unknown output format: ${value} (expected human, json or jsonl)`);
  return found;
}

/** What a command hands back to the CLI shell: lines for each stream and an exit code. */
export type CommandOutput = {
  exitCode: number;
  stdout: string[];
  stderr: string[];
};

export function ok(stdout: string[], exitCode: number = EXIT.SUCCESS): CommandOutput {
  return { exitCode, stdout, stderr: [] };
}

/** Configuration errors exit 2; anything else is an operational failure. */
export function failure(err: unknown, format: OutputFormat): CommandOutput {
  const exitCode = err instanceof ConfigurationError ? EXIT.CONFIG_INVALID : EXIT.PHASE_FAILED;
  const code = err instanceof PhasectlError ? err.code : "ERROR";
  const message = errorMessage(err);
  if (format === "human") return { exitCode, stdout: [], stderr: [message] };
  return { exitCode, stdout: [JSON.stringify({ level: "error", code, message })], stderr: [] };
}

export function formatReport(report: RunReport, exitCode: number, format: OutputFormat): string[] {
  if (format === "json") return [JSON.stringify({ ...report, exitCode }, null, 2)];

  if (format === "jsonl") {
    const lines = report.order.flatMap((id) => {
      const phase = report.phases[id];
      return phase ? [JSON.stringify({ type: "phase", ...phase })] : [];
    });
    lines.push(
      JSON.stringify({ type: "run", runId: report.runId, target: report.target, cancelled: report.cancelled, exitCode }),
    );
    return lines;
  }

  const lines = [`run ${report.runId} on ${report.target}`];
  for (const id of report.order) {
    const phase = report.phases[id];
    if (!phase) continue;
    lines.push(`  ${phase.state.padEnd(18)} ${id}${phase.diagnostic ? `: ${phase.diagnostic}` : ""}`);
    for (const warning of phase.warnings) lines.push(`    warning: ${warning}`);
  }
  if (report.cancelled) lines.push("run cancelled");
  lines.push(`exit ${exitCode}`);
  return lines;
}
