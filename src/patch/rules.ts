import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigurationError, errorMessage } from "../errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { PatchRule, PatchRuleDeclaration, RuleSetDeclaration } from "../types/patch.js";
import { compilePattern } from "./pattern.js";

function listYamlFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((e) => e.isFile() && (e.name.endsWith(".yml") || e.name.endsWith(".yaml")))
    .map((e) => path.join(dir, e.name))
    .sort();
}

/** Turn one validated declaration into an executable rule. */
export function compileRule(decl: PatchRuleDeclaration, version: string): PatchRule {
  const action = decl.action ?? "rewrite";
  const pattern = compilePattern(decl.match, decl.id);

  if (action === "rewrite") {
    if (decl.replacement === undefined) {
      throw new ConfigurationError(`Rule ${decl.id} rewrites but declares no replacement`, { rule: decl.id });
    }
    // A replacement the pattern still matches would re-apply forever.
    if (pattern.test(decl.replacement)) {
      throw new ConfigurationError(`Rule ${decl.id} is not idempotent: its replacement matches its own pattern`, { rule: decl.id });
    }
  }

  return {
    id: decl.id,
    scope: decl.scope,
    description: decl.description ?? "",
    action,
    targets: decl.targets,
    pattern,
    replacement: decl.replacement ?? "",
    language: decl.language,
    version,
  };
}

/** Validate and compile one rule set document. */
export async function parseRuleSet(doc: unknown, registry: SchemaRegistry, source = "<inline>"): Promise<PatchRule[]> {
  const check = await registry.validate("rules", doc);
  if (!check.valid) {
    throw new ConfigurationError(`Rule file invalid (${source}): ${check.errors}`, { path: source });
  }
  const set: RuleSetDeclaration = check.value;
  return set.rules.map((decl) => compileRule(decl, set.version));
}

/**
 * Load every rules/*.yaml file in name order. Rules keep their declaration
 * order across files; ids must be unique.
 */
export async function loadRules(rulesDir: string, registry: SchemaRegistry): Promise<PatchRule[]> {
  const rules: PatchRule[] = [];
  const seen = new Map<string, string>();

  for (const file of listYamlFiles(rulesDir)) {
    let doc: unknown;
    try {
      doc = YAML.parse(fs.readFileSync(file, "utf8"));
    } catch (e) {
      throw new ConfigurationError(`Failed to read rule file (${file}): ${errorMessage(e)}`, { path: file });
    }

    for (const rule of await parseRuleSet(doc, registry, file)) {
      const previous = seen.get(rule.id);
      if (previous) {
        throw new ConfigurationError(`Duplicate rule id ${rule.id} in ${file} (first declared in ${previous})`, { rule: rule.id });
      }
      seen.set(rule.id, file);
      rules.push(rule);
    }
  }

  return rules;
}

/** Rules whose scope tag is listed, in declaration order. */
export function rulesForScopes(rules: readonly PatchRule[], scopes: readonly string[]): PatchRule[] {
  const wanted = new Set(scopes);
  return rules.filter((rule) => wanted.has(rule.scope));
}
