import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import { combineFingerprints, computeSha256FromContent } from "../core/checksum.js";
import { safeRemotePath } from "../core/security.js";
import { ConfigurationError } from "../errors.js";
import type { DeployPhaseDeclaration } from "../types/config.js";
import type { Phase, PhaseContext } from "../types/phase.js";
import { definePhase, withPhaseRetry } from "./define.js";

export type DeployFile = {
  /** Path relative to the source directory, POSIX separators. */
  relative: string;
  localPath: string;
  remotePath: string;
};

function matches(rel: string, globs: readonly string[]): boolean {
  return globs.some((glob) => minimatch(rel, glob, { matchBase: !glob.includes("/") }));
}

function walk(root: string, dir = ""): string[] {
  const abs = path.join(root, dir);
  const out: string[] = [];
  for (const entry of fs.readdirSync(abs, { withFileTypes: true })) {
    const rel = dir ? `${dir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) out.push(...walk(root, rel));
    else if (entry.isFile()) out.push(rel);
  }
  return out;
}

/**
 * Local files selected by the declaration, mapped to their remote destinations.
 * Sorted by relative path.
 */
export function collectDeployFiles(decl: DeployPhaseDeclaration, sourceDir: string, pluginDir: string): DeployFile[] {
  if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
    throw new ConfigurationError(`Deploy source directory not found for phase ${decl.id}: ${sourceDir}`, { phase: decl.id });
  }

  const files: DeployFile[] = [];
  const byRemote = new Map<string, string>();
  for (const rel of walk(sourceDir).sort()) {
    if (!matches(rel, decl.include) || matches(rel, decl.exclude ?? [])) continue;
    const target = path.posix.join(decl.dest ?? "", decl.flatten ? path.posix.basename(rel) : rel);
    const remotePath = safeRemotePath(pluginDir, target);
    const clash = byRemote.get(remotePath);
    if (clash) {
      throw new ConfigurationError(`Phase ${decl.id} deploys both ${clash} and ${rel} to ${remotePath}`, { phase: decl.id });
    }
    byRemote.set(remotePath, rel);
    files.push({ relative: rel, localPath: path.join(sourceDir, rel), remotePath });
  }
  return files;
}

/**
 * Push local plugin files into the plugin directory and normalize their
 * owner and mode. Files already identical on the target are left alone.
 */
export function deployPhase(decl: DeployPhaseDeclaration, configDir: string): Phase {
  const sourceDir = path.resolve(configDir, decl.source);

  const files = (ctx: PhaseContext): DeployFile[] => {
    const selected = collectDeployFiles(decl, sourceDir, ctx.target.pluginDir);
    if (selected.length === 0) {
      throw new Error(`No files under ${sourceDir} match ${decl.include.join(", ")}`);
    }
    return selected;
  };

  const readLocal = (file: DeployFile): string => fs.readFileSync(file.localPath, "utf8");

  return definePhase({
    id: decl.id,
    label: decl.label,
    requires: decl.requires,
    feature: decl.feature,
    cacheScopes: decl.cache_scopes,

    // Local content plus remote presence: later patch phases rewrite deployed files.
    async fingerprint(ctx) {
      const parts: Array<[string, string]> = [];
      for (const file of files(ctx)) {
        const meta = await withPhaseRetry(ctx, `stat ${file.remotePath}`, () => ctx.bridge.stat(file.remotePath));
        if (!meta) return null;
        parts.push([file.remotePath, computeSha256FromContent(readLocal(file))]);
      }
      return combineFingerprints(parts);
    },

    async isSatisfied(ctx) {
      for (const file of files(ctx)) {
        const remote = await withPhaseRetry(ctx, `pull ${file.remotePath}`, () => ctx.bridge.pull(file.remotePath));
        if (!remote.found || remote.content !== readLocal(file)) return false;
        const meta = await withPhaseRetry(ctx, `stat ${file.remotePath}`, () => ctx.bridge.stat(file.remotePath));
        if (!meta || meta.owner !== ctx.target.owner || meta.mode !== ctx.target.fileMode) return false;
      }
      return true;
    },

    async execute(ctx) {
      let mutated = false;
      for (const file of files(ctx)) {
        const content = readLocal(file);
        const remote = await withPhaseRetry(ctx, `pull ${file.remotePath}`, () => ctx.bridge.pull(file.remotePath));
        if (!remote.found || remote.content !== content) {
          await withPhaseRetry(ctx, `push ${file.remotePath}`, () => ctx.bridge.push(content, file.remotePath));
          ctx.logger.info("deployed file", { file: file.relative, to: file.remotePath });
          mutated = true;
        }

        const meta = await withPhaseRetry(ctx, `stat ${file.remotePath}`, () => ctx.bridge.stat(file.remotePath));
        if (!meta || meta.owner !== ctx.target.owner || meta.mode !== ctx.target.fileMode) {
          await withPhaseRetry(ctx, `chown ${file.remotePath}`, () =>
            ctx.bridge.setOwnership(file.remotePath, ctx.target.owner, ctx.target.fileMode),
          );
          mutated = true;
        }
      }
      return { mutated };
    },

    async verify(ctx) {
      for (const file of files(ctx)) {
        const remote = await withPhaseRetry(ctx, `pull ${file.remotePath}`, () => ctx.bridge.pull(file.remotePath));
        if (!remote.found) {
          return { ok: false, diagnostic: `${file.remotePath} is missing after deploy` };
        }
        if (computeSha256FromContent(remote.content) !== computeSha256FromContent(readLocal(file))) {
          return { ok: false, diagnostic: `${file.remotePath} differs from ${file.relative} after deploy` };
        }
      }
      return { ok: true };
    },
  });
}
