import fs from "node:fs";
import path from "node:path";
import { combineFingerprints } from "../core/checksum.js";
import { GitOperations, type GitClientFactory } from "../git/operations.js";
import type { GitClonePhaseDeclaration } from "../types/config.js";
import type { Phase } from "../types/phase.js";
import { definePhase } from "./define.js";

/**
 * Clone a repository into a host directory (the plugin sources a later deploy
 * phase pushes). Runs on the host; the target is not contacted.
 */
export function gitClonePhase(decl: GitClonePhaseDeclaration, configDir: string, client?: GitClientFactory): Phase {
  const dest = path.resolve(configDir, decl.dest);
  const git = new GitOperations(dest, client);

  const atWantedCommit = async (): Promise<boolean> => {
    if (!decl.ref) return true;
    return (await git.getCurrentSha()) === (await git.getCurrentSha(decl.ref));
  };

  const isCheckoutOfRepo = async (): Promise<boolean> =>
    (await git.isRepository()) && (await git.getRemoteUrl()) === decl.repo;

  return definePhase({
    id: decl.id,
    label: decl.label,
    requires: decl.requires,
    feature: decl.feature,
    cacheScopes: decl.cache_scopes,

    async fingerprint() {
      if (!(await git.isRepository())) return null;
      return combineFingerprints([
        ["repo", decl.repo],
        ["head", await git.getCurrentSha()],
      ]);
    },

    async isSatisfied() {
      return (await isCheckoutOfRepo()) && (await atWantedCommit());
    },

    async execute(ctx) {
      if (await isCheckoutOfRepo()) {
        if (decl.ref) await git.checkout(decl.ref);
        ctx.logger.info("checked out existing clone", { dest, ref: decl.ref ?? "HEAD" });
        return { mutated: true };
      }

      if (fs.existsSync(dest) && fs.readdirSync(dest).length > 0) {
        throw new Error(`Clone destination is not empty and is not a checkout of ${decl.repo}: ${dest}`);
      }

      await git.clone(decl.repo, decl.ref);
      ctx.logger.info("cloned repository", { repo: decl.repo, dest, ref: decl.ref ?? "HEAD" });
      return { mutated: true };
    },

    async verify() {
      if (!(await isCheckoutOfRepo())) {
        return { ok: false, diagnostic: `${dest} is not a checkout of ${decl.repo}` };
      }
      if (!(await atWantedCommit())) {
        return { ok: false, diagnostic: `${dest} is not at ${decl.ref ?? "HEAD"}` };
      }
      return { ok: true };
    },
  });
}
