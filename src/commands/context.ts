import path from "node:path";
import { DockerBridge } from "../bridge/docker.js";
import { validateConfig } from "../config/validator.js";
import { loadConfig } from "../config/loader.js";
import { Journal, journalPathFor } from "../core/journal.js";
import { DEFAULT_RETRY, type RetryPolicy } from "../core/retry.js";
import type { GitClientFactory } from "../git/operations.js";
import { silentLogger, type Logger } from "../logger.js";
import { PatchEngine } from "../patch/engine.js";
import { loadRules } from "../patch/rules.js";
import { buildPhases, targetFromConfig } from "../phases/catalog.js";
import { createRegistry } from "../schema/registry.js";
import type { PhasectlConfig } from "../types/config.js";
import type { PatchRule } from "../types/patch.js";
import type { Phase } from "../types/phase.js";
import type { DeploymentTarget } from "../types/target.js";

export type ProjectOptions = {
  configDir: string;
  env?: string;
  /** Defaults to `process.env`. */
  environment?: NodeJS.ProcessEnv;
  schemaDir?: string;
  /** Base for a relative `state_dir`; defaults to the working directory. */
  cwd?: string;
  logger?: Logger;
  gitClient?: GitClientFactory;
};

export type Project = {
  configDir: string;
  config: PhasectlConfig;
  target: DeploymentTarget;
  rules: PatchRule[];
  phases: Phase[];
  journalPath: string;
  retry: RetryPolicy;
  logger: Logger;
};

/**
 * Load, validate and build everything a command needs. Throws
 * ConfigurationError before anything contacts the target.
 */
export async function loadProject(opts: ProjectOptions): Promise<Project> {
  const logger = opts.logger ?? silentLogger;
  const configDir = path.resolve(opts.cwd ?? process.cwd(), opts.configDir);
  const registry = await createRegistry(opts.schemaDir);

  const config = await validateConfig(loadConfig(configDir, opts.env, opts.environment ?? process.env), registry);
  const rules = await loadRules(path.resolve(configDir, config.rules_dir ?? "../rules"), registry);
  const engine = new PatchEngine({ workers: config.concurrency?.patch_workers, logger: logger.child("patch") });
  const phases = buildPhases(config, { configDir, rules, engine, gitClient: opts.gitClient });
  const stateDir = path.resolve(opts.cwd ?? process.cwd(), config.state_dir ?? ".phasectl");

  return {
    configDir,
    config,
    target: targetFromConfig(config.target),
    rules,
    phases,
    journalPath: journalPathFor(stateDir, config.target.name),
    retry: config.retry
      ? { attempts: config.retry.attempts, baseDelayMs: config.retry.base_delay_ms, maxDelayMs: config.retry.max_delay_ms }
      : DEFAULT_RETRY,
    logger,
  };
}

export function openJournal(project: Project): Promise<Journal> {
  return Journal.open(project.journalPath, project.target.name);
}

export function createBridge(project: Project): DockerBridge {
  return new DockerBridge(project.target, {
    command: project.config.docker?.command,
    timeoutMs: project.config.docker?.timeout_ms,
    logger: project.logger.child("docker"),
  });
}
