import { ConfigurationError } from "../errors.js";
import type { GitClientFactory } from "../git/operations.js";
import type { PatchEngine } from "../patch/engine.js";
import { rulesForScopes } from "../patch/rules.js";
import type { PhaseDeclaration, PhasectlConfig, TargetConfig } from "../types/config.js";
import type { PatchRule } from "../types/patch.js";
import type { Phase } from "../types/phase.js";
import type { DeploymentTarget } from "../types/target.js";
import { deployPhase } from "./deploy.js";
import { execPhase } from "./exec.js";
import { gitClonePhase } from "./git-clone.js";
import { patchPhase } from "./patch.js";

export type CatalogDeps = {
  /** Directory relative paths in the config resolve against. */
  configDir: string;
  rules: readonly PatchRule[];
  engine: PatchEngine;
  gitClient?: GitClientFactory;
};

export function targetFromConfig(target: TargetConfig): DeploymentTarget {
  return {
    name: target.name,
    container: target.container,
    pluginDir: target.plugin_dir,
    owner: target.owner,
    fileMode: target.file_mode,
    cacheScopes: target.cache_scopes,
  };
}

function buildPhase(decl: PhaseDeclaration, deps: CatalogDeps): Phase {
  switch (decl.kind) {
    case "deploy":
      return deployPhase(decl, deps.configDir);
    case "patch": {
      for (const scope of decl.scopes) {
        if (!deps.rules.some((rule) => rule.scope === scope)) {
          throw new ConfigurationError(`Phase ${decl.id} references scope with no rules: ${scope}`, { phase: decl.id, scope });
        }
      }
      return patchPhase(decl, rulesForScopes(deps.rules, decl.scopes), deps.engine);
    }
    case "exec":
      return execPhase(decl);
    case "git-clone":
      return gitClonePhase(decl, deps.configDir, deps.gitClient);
  }
}

/** Build the declared phases in declaration order. */
export function buildPhases(config: PhasectlConfig, deps: CatalogDeps): Phase[] {
  const knownScopes = new Set(Object.keys(config.target.cache_scopes));
  return config.phases.map((decl) => {
    for (const scope of decl.cache_scopes ?? []) {
      if (!knownScopes.has(scope)) {
        throw new ConfigurationError(`Phase ${decl.id} declares unknown cache scope: ${scope}`, { phase: decl.id, scope });
      }
    }
    return buildPhase(decl, deps);
  });
}
