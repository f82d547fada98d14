/** Configuration types — layered config system (base.yaml ← {env}.yaml ← PHASECTL_* variables). */

export type TargetConfig = {
  name: string;
  container: string;
  plugin_dir: string;
  owner: string;
  file_mode: string;
  cache_scopes: Record<string, string[]>;
};

export type DockerConfig = {
  /** Command prefix used to reach the docker CLI, e.g. ["sudo", "docker"]. */
  command: string[];
  /** Timeout applied to every remote operation. */
  timeout_ms: number;
};

export type RetryConfig = {
  attempts: number;
  base_delay_ms: number;
  max_delay_ms: number;
};

export type ConcurrencyConfig = {
  patch_workers: number;
};

type PhaseDeclarationBase = {
  id: string;
  label?: string;
  requires?: string[];
  feature?: string;
  cache_scopes?: string[];
};

export type DeployPhaseDeclaration = PhaseDeclarationBase & {
  kind: "deploy";
  /** Local directory, relative to the config directory. */
  source: string;
  include: string[];
  exclude?: string[];
  /** Subdirectory of the plugin directory to deploy into. */
  dest?: string;
  /** Drop source subdirectories and deploy every file by basename. */
  flatten?: boolean;
};

export type PatchPhaseDeclaration = PhaseDeclarationBase & {
  kind: "patch";
  scopes: string[];
};

export type ExecPhaseDeclaration = PhaseDeclarationBase & {
  kind: "exec";
  command: string[];
  /** Exit 0 means the phase's effect is already present. */
  check?: string[];
  /** Exit 0 required after the command ran. */
  verify?: string[];
  timeout_ms?: number;
};

export type GitClonePhaseDeclaration = PhaseDeclarationBase & {
  kind: "git-clone";
  repo: string;
  /** Host directory, relative to the config directory unless absolute. */
  dest: string;
  ref?: string;
};

export type PhaseDeclaration =
  | DeployPhaseDeclaration
  | PatchPhaseDeclaration
  | ExecPhaseDeclaration
  | GitClonePhaseDeclaration;

export type PhasectlConfig = {
  schema_version: string;
  target: TargetConfig;
  docker?: DockerConfig;
  /** Directory holding the per-target journal files. */
  state_dir?: string;
  /** Directory holding rules/*.yaml, relative to the config directory. */
  rules_dir?: string;
  exclude_features?: string[];
  concurrency?: ConcurrencyConfig;
  retry?: RetryConfig;
  phases: PhaseDeclaration[];
};
