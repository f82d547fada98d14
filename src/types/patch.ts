import type { SourceLanguage } from "../validation/gate.js";

/** Paths and globs are relative to the target's plugin directory. */
export type TargetSelector = {
  paths?: string[];
  include?: string[];
  exclude?: string[];
};

export type MatchPattern = { literal: string } | { regex: string; flags?: string };

export type PatchAction = "rewrite" | "remove";

/** A rule as declared in a rules/*.yaml file. */
export type PatchRuleDeclaration = {
  id: string;
  scope: string;
  description?: string;
  action?: PatchAction;
  targets: TargetSelector;
  match: MatchPattern;
  replacement?: string;
  language?: SourceLanguage;
};

export type RuleSetDeclaration = {
  version: string;
  rules: PatchRuleDeclaration[];
};

export type CompiledPattern = {
  readonly source: string;
  test(text: string): boolean;
  replace(text: string, replacement: string): string;
};

export type PatchRule = {
  id: string;
  scope: string;
  description: string;
  action: PatchAction;
  targets: TargetSelector;
  pattern: CompiledPattern;
  replacement: string;
  language?: SourceLanguage;
  /** Version of the rule set that declared this rule. */
  version: string;
};

export type PatchStatus =
  | "applied"
  | "already-satisfied"
  | "validation-failed-before"
  | "validation-failed-after";

export type PatchOutcome = {
  ruleId: string;
  scope: string;
  file: string;
  status: PatchStatus;
  diagnostics?: string;
  /** sha256 of the remote file after the operation; null when the file is absent. */
  fingerprint: string | null;
};

export function isFailedOutcome(outcome: PatchOutcome): boolean {
  return outcome.status === "validation-failed-before" || outcome.status === "validation-failed-after";
}
