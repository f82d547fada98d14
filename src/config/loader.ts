import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigurationError, errorMessage } from "../errors.js";

export const ENV_PREFIX = "PHASECTL_";

/** PHASECTL_* variables read elsewhere; never merged into the config tree. */
const RESERVED_ENV = new Set(["LOG_LEVEL", "LOG_JSON", "ENV", "CONFIG"]);

type ConfigTree = Record<string, unknown>;

function isTree(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isTree(val) && isTree(current)) {
      result[key] = deepMerge(current, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): ConfigTree {
  if (!fs.existsSync(filePath)) return {};
  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigurationError(`Failed to read config (${filePath}): ${errorMessage(e)}`, { path: filePath });
  }
  if (doc === null || doc === undefined) return {};
  if (!isTree(doc)) throw new ConfigurationError(`Config file must hold a mapping: ${filePath}`, { path: filePath });
  return doc;
}

/** Scalars are read as YAML so numbers, booleans and flow lists keep their type. */
function parseEnvValue(raw: string): unknown {
  try {
    const parsed: unknown = YAML.parse(raw);
    return parsed ?? raw;
  } catch {
    return raw;
  }
}

/**
 * Apply PHASECTL_ prefixed environment variable overrides.
 * `__` separates nested keys: PHASECTL_TARGET__CONTAINER → target.container.
 */
export function applyEnvOverrides(config: ConfigTree, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const name = key.slice(ENV_PREFIX.length);
    if (!name || RESERVED_ENV.has(name)) continue;

    const keys = name.toLowerCase().split("__").filter((k) => k.length > 0);
    let layer: ConfigTree = { [keys[keys.length - 1]]: parseEnvValue(value) };
    for (const k of keys.slice(0, -1).reverse()) layer = { [k]: layer };
    result = deepMerge(result, layer);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {env}.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig`.
 *
 * @param envName - Optional environment name (e.g., "staging").
 *                  Loads `{configDir}/{envName}.yaml` as override layer.
 */
export function loadConfig(configDir: string, envName?: string, env: NodeJS.ProcessEnv = process.env): ConfigTree {
  if (!fs.existsSync(configDir) || !fs.statSync(configDir).isDirectory()) {
    throw new ConfigurationError(`Config directory not found: ${configDir}`, { path: configDir });
  }

  // Layer 1: base.yaml
  let merged = loadYaml(path.join(configDir, "base.yaml"));

  // Layer 2: environment-specific override
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(configDir, `${envName}.yaml`)));
  }

  // Layer 3: environment variables
  return applyEnvOverrides(merged, env);
}
