import { combineFingerprints, computeSha256FromContent } from "../core/checksum.js";
import type { PatchEngine } from "../patch/engine.js";
import { resolveTargets } from "../patch/selector.js";
import type { PatchPhaseDeclaration } from "../types/config.js";
import type { PatchRule } from "../types/patch.js";
import type { Phase, PhaseContext } from "../types/phase.js";
import { definePhase, withPhaseRetry } from "./define.js";

type Selection = Array<{ rule: PatchRule; files: string[] }>;

async function select(ctx: PhaseContext, rules: readonly PatchRule[]): Promise<Selection> {
  const selection: Selection = [];
  for (const rule of rules) {
    const files = await withPhaseRetry(ctx, `select ${rule.id}`, () => resolveTargets(rule.targets, ctx.bridge));
    selection.push({ rule, files });
  }
  return selection;
}

/** Apply every rule whose scope the phase lists, in declaration order. */
export function patchPhase(decl: PatchPhaseDeclaration, rules: readonly PatchRule[], engine: PatchEngine): Phase {
  return definePhase({
    id: decl.id,
    label: decl.label,
    requires: decl.requires,
    feature: decl.feature,
    cacheScopes: decl.cache_scopes,

    async fingerprint(ctx) {
      const parts: Array<[string, string]> = rules.map((rule) => [`rule:${rule.id}`, `${rule.version}:${rule.pattern.source}`]);
      const contents = new Map<string, string>();
      for (const { files } of await select(ctx, rules)) {
        for (const file of files) {
          if (contents.has(file)) continue;
          const pulled = await withPhaseRetry(ctx, `pull ${file}`, () => ctx.bridge.pull(file));
          contents.set(file, pulled.found ? computeSha256FromContent(pulled.content) : "absent");
        }
      }
      for (const [file, sha] of contents) parts.push([`file:${file}`, sha]);
      return combineFingerprints(parts);
    },

    async isSatisfied(ctx) {
      for (const { rule, files } of await select(ctx, rules)) {
        for (const file of files) {
          const pulled = await withPhaseRetry(ctx, `pull ${file}`, () => ctx.bridge.pull(file));
          if (pulled.found && rule.pattern.test(pulled.content)) return false;
        }
      }
      return true;
    },

    async execute(ctx) {
      const outcomes = await engine.applyAll(rules, ctx.bridge, (step, fn) => withPhaseRetry(ctx, step, fn));
      return { mutated: outcomes.some((o) => o.status === "applied"), outcomes };
    },

    async verify(ctx, execution) {
      const byId = new Map(rules.map((rule) => [rule.id, rule]));
      for (const outcome of execution.outcomes) {
        if (outcome.status !== "applied") continue;
        const rule = byId.get(outcome.ruleId);
        if (!rule) continue;
        const pulled = await withPhaseRetry(ctx, `pull ${outcome.file}`, () => ctx.bridge.pull(outcome.file));
        if (rule.action === "remove" && pulled.found) {
          return { ok: false, diagnostic: `${outcome.file} still present after removal by ${rule.id}` };
        }
        if (rule.action === "rewrite" && pulled.found && rule.pattern.test(pulled.content)) {
          return { ok: false, diagnostic: `${rule.id}: pattern ${rule.pattern.source} still present in ${outcome.file}` };
        }
      }
      return { ok: true };
    },
  });
}
