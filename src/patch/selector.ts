import path from "node:path";
import { minimatch } from "minimatch";
import type { ContainerBridge } from "../bridge/bridge.js";
import { safeRemotePath } from "../core/security.js";
import type { TargetSelector } from "../types/patch.js";

function matchesAny(file: string, globs: readonly string[] | undefined): boolean {
  return (globs ?? []).some((glob) => minimatch(file, glob, { dot: false, matchBase: !glob.includes("/") }));
}

/**
 * Resolve a selector against the plugin directory. Explicit paths count only
 * when the file exists; globs run over the directory listing. Returns absolute
 * remote paths, sorted. Zero matches is not an error.
 */
export async function resolveTargets(selector: TargetSelector, bridge: ContainerBridge): Promise<string[]> {
  const base = bridge.target.pluginDir;
  const listing = await bridge.list(base);
  const present = new Set(listing);
  const selected = new Set<string>();

  for (const rel of selector.paths ?? []) {
    const normalized = path.posix.relative(base, safeRemotePath(base, rel));
    if (present.has(normalized)) selected.add(normalized);
  }

  if (selector.include && selector.include.length > 0) {
    for (const rel of listing) {
      if (matchesAny(rel, selector.include)) selected.add(rel);
    }
  }

  return [...selected]
    .filter((rel) => !matchesAny(rel, selector.exclude))
    .sort()
    .map((rel) => safeRemotePath(base, rel));
}
