import pLimit from "p-limit";
import type { ContainerBridge } from "../bridge/bridge.js";
import { computeSha256FromContent } from "../core/checksum.js";
import { silentLogger, type Logger } from "../logger.js";
import type { PatchOutcome, PatchRule } from "../types/patch.js";
import { formatDiagnostics, languageForPath, validate } from "../validation/gate.js";
import { resolveTargets } from "./selector.js";

export const DEFAULT_PATCH_WORKERS = 4;

export type PatchEngineOptions = {
  /** Files patched concurrently. Rules on one file always run one after another. */
  workers?: number;
  logger?: Logger;
};

/** Runs one bridge call; the phase passes its retry policy through here. */
export type StepRunner = <T>(step: string, fn: () => Promise<T>) => Promise<T>;

const runOnce: StepRunner = (_step, fn) => fn();

/**
 * Wait for every task, then surface the first failure. No task is abandoned
 * mid-flight, so no file is left between pull and push when an error escapes.
 */
async function settle<T>(tasks: Promise<T>[]): Promise<T[]> {
  const results = await Promise.allSettled(tasks);
  const values: T[] = [];
  for (const result of results) {
    if (result.status === "rejected") throw result.reason;
    values.push(result.value);
  }
  return values;
}

export class PatchEngine {
  private readonly workers: number;
  private readonly logger: Logger;

  constructor(opts: PatchEngineOptions = {}) {
    this.workers = Math.max(1, Math.floor(opts.workers ?? DEFAULT_PATCH_WORKERS));
    this.logger = opts.logger ?? silentLogger;
  }

  /** Apply one rule to an explicit list of remote files. Outcomes follow `targetFiles` order. */
  async apply(rule: PatchRule, targetFiles: readonly string[], bridge: ContainerBridge, step: StepRunner = runOnce): Promise<PatchOutcome[]> {
    const limit = pLimit(this.workers);
    const unique = [...new Set(targetFiles)];
    return settle(unique.map((file) => limit(() => this.applyToFile(rule, file, bridge, step))));
  }

  /**
   * Resolve every rule's selector, then patch file by file. Each file sees its
   * rules in declaration order; distinct files share the worker pool.
   * Outcomes are ordered by rule, then by file.
   *
   * `step` wraps every bridge call on its own, so a retried ownership change
   * never re-reads a file this run already pushed.
   */
  async applyAll(rules: readonly PatchRule[], bridge: ContainerBridge, step: StepRunner = runOnce): Promise<PatchOutcome[]> {
    const byFile = new Map<string, number[]>();
    for (const [index, rule] of rules.entries()) {
      const files = await step(`select ${rule.id}`, () => resolveTargets(rule.targets, bridge));
      if (files.length === 0) {
        this.logger.info("rule selects no files", { rule: rule.id });
      }
      for (const file of files) {
        const list = byFile.get(file) ?? [];
        list.push(index);
        byFile.set(file, list);
      }
    }

    const limit = pLimit(this.workers);
    const perFile = await settle(
      [...byFile].map(([file, indexes]) =>
        limit(async () => {
          const outcomes: Array<{ index: number; outcome: PatchOutcome }> = [];
          for (const index of indexes) {
            outcomes.push({ index, outcome: await this.applyToFile(rules[index], file, bridge, step) });
          }
          return outcomes;
        }),
      ),
    );

    return perFile
      .flat()
      .sort((a, b) => a.index - b.index || (a.outcome.file < b.outcome.file ? -1 : a.outcome.file > b.outcome.file ? 1 : 0))
      .map(({ outcome }) => outcome);
  }

  private async applyToFile(rule: PatchRule, file: string, bridge: ContainerBridge, step: StepRunner): Promise<PatchOutcome> {
    const base = { ruleId: rule.id, scope: rule.scope, file };
    const pulled = await step(`pull ${file}`, () => bridge.pull(file));
    if (!pulled.found) {
      return { ...base, status: "already-satisfied", fingerprint: null };
    }

    const original = pulled.content;
    if (!rule.pattern.test(original)) {
      return { ...base, status: "already-satisfied", fingerprint: computeSha256FromContent(original) };
    }

    if (rule.action === "remove") {
      await step(`remove ${file}`, () => bridge.remove(file));
      this.logger.info("removed file", { rule: rule.id, file });
      return { ...base, status: "applied", fingerprint: null };
    }

    const language = rule.language ?? languageForPath(file);
    const before = validate(original, language);
    if (!before.valid) {
      this.logger.warn("file invalid before patch", { rule: rule.id, file });
      return {
        ...base,
        status: "validation-failed-before",
        diagnostics: formatDiagnostics(before.diagnostics),
        fingerprint: computeSha256FromContent(original),
      };
    }

    const patched = rule.pattern.replace(original, rule.replacement);
    if (rule.pattern.test(patched)) {
      return {
        ...base,
        status: "validation-failed-after",
        diagnostics: `rule is not idempotent: pattern ${rule.pattern.source} still matches the patched content`,
        fingerprint: computeSha256FromContent(original),
      };
    }

    const after = validate(patched, language);
    if (!after.valid) {
      this.logger.warn("patch would break file; left untouched", { rule: rule.id, file });
      return {
        ...base,
        status: "validation-failed-after",
        diagnostics: formatDiagnostics(after.diagnostics),
        fingerprint: computeSha256FromContent(original),
      };
    }

    const meta = await step(`stat ${file}`, () => bridge.stat(file));
    await step(`push ${file}`, () => bridge.push(patched, file));
    const owner = meta?.owner ?? bridge.target.owner;
    const mode = meta?.mode ?? bridge.target.fileMode;
    await step(`chown ${file}`, () => bridge.setOwnership(file, owner, mode));
    this.logger.info("patched file", { rule: rule.id, file });
    return { ...base, status: "applied", fingerprint: computeSha256FromContent(patched) };
  }
}
