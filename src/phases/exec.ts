import { combineFingerprints } from "../core/checksum.js";
import { redactSensitiveInfo } from "../core/security.js";
import { RemoteCommandFailedError } from "../errors.js";
import type { ExecPhaseDeclaration } from "../types/config.js";
import type { Phase } from "../types/phase.js";
import { definePhase, withPhaseRetry } from "./define.js";

/**
 * Run a command inside the target. An optional `check` command short-circuits
 * the phase when it exits 0; an optional `verify` command must exit 0 afterwards.
 */
export function execPhase(decl: ExecPhaseDeclaration): Phase {
  const timeoutMs = decl.timeout_ms;
  const check = decl.check;
  const verify = decl.verify;

  return definePhase({
    id: decl.id,
    label: decl.label,
    requires: decl.requires,
    feature: decl.feature,
    cacheScopes: decl.cache_scopes,

    // Covers the declaration only; a changed command runs again.
    async fingerprint() {
      return combineFingerprints([
        ["command", JSON.stringify(decl.command)],
        ["check", JSON.stringify(decl.check ?? [])],
        ["verify", JSON.stringify(decl.verify ?? [])],
      ]);
    },

    isSatisfied: check
      ? async (ctx) => {
          const res = await withPhaseRetry(ctx, "check", () => ctx.bridge.exec(check, timeoutMs));
          return res.exitCode === 0;
        }
      : undefined,

    async execute(ctx) {
      const res = await withPhaseRetry(ctx, decl.command.join(" "), () => ctx.bridge.exec(decl.command, timeoutMs));
      if (res.exitCode !== 0) {
        throw new RemoteCommandFailedError(decl.command.join(" "), res.exitCode, redactSensitiveInfo(res.stderr));
      }
      if (res.stdout.trim()) ctx.logger.debug("command output", { stdout: redactSensitiveInfo(res.stdout.trim().slice(0, 2000)) });
      return { mutated: true };
    },

    async verify(ctx) {
      if (!verify) return { ok: true };
      const res = await withPhaseRetry(ctx, "verify", () => ctx.bridge.exec(verify, timeoutMs));
      if (res.exitCode === 0) return { ok: true };
      return { ok: false, diagnostic: `verify command exited ${res.exitCode}: ${redactSensitiveInfo(res.stderr.trim())}` };
    },
  });
}
