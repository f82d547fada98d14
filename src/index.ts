export * from "./errors.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./logger.js";

export type { ContainerBridge, ExecResult, FileStat, PullResult, TargetStatus } from "./bridge/bridge.js";
export { DockerBridge, execFileExecutor, type CommandExecutor, type CommandResult, type DockerBridgeOptions } from "./bridge/docker.js";
export { MemoryBridge } from "./bridge/memory.js";

export { validate, languageForPath, formatDiagnostics, type SourceLanguage, type SyntaxDiagnostic, type ValidationResult } from "./validation/gate.js";

export { PatchEngine, type PatchEngineOptions } from "./patch/engine.js";
export { compilePattern } from "./patch/pattern.js";
export { compileRule, loadRules, parseRuleSet, rulesForScopes } from "./patch/rules.js";
export { resolveTargets } from "./patch/selector.js";

export { CacheInvalidator, type InvalidationResult } from "./cache/invalidator.js";

export { resolveOrder, selectPhases, dependentsOf, type PhaseNode, type PhaseSelection } from "./core/graph.js";
export { Journal, journalPathFor, type JournalEntry, type JournalStatus } from "./core/journal.js";
export { PhaseRunner, makeRunId, type RunnerOptions } from "./core/runner.js";
export { withRetry, backoffDelay, DEFAULT_RETRY, type RetryPolicy } from "./core/retry.js";
export { nextState, type PhaseStatus } from "./core/state-machine.js";

export { definePhase, withPhaseRetry, type PhaseDefinition } from "./phases/define.js";
export { buildPhases, targetFromConfig } from "./phases/catalog.js";

export { loadConfig } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { createRegistry, SchemaRegistry } from "./schema/registry.js";
export { loadProject, type Project, type ProjectOptions } from "./commands/context.js";
export { EXIT, exitCodeFor } from "./commands/exit-codes.js";

export type * from "./types/config.js";
export type * from "./types/patch.js";
export type * from "./types/phase.js";
export type * from "./types/report.js";
export type * from "./types/target.js";
