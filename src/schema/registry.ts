import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { PhasectlConfig } from "../types/config.js";
import type { RuleSetDeclaration } from "../types/patch.js";
import { loadAjv, type AjvInstance } from "./ajv.js";

/** Schema name (file stem of schemas/{name}.schema.json) → the type it admits. */
export type SchemaTypes = {
  config: PhasectlConfig;
  rules: RuleSetDeclaration;
};

export type SchemaName = keyof SchemaTypes;

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaCheck<T> = { valid: true; value: T } | { valid: false; errors: string };

export const DEFAULT_SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

/**
 * Schema registry — discovers and loads all JSON Schemas from a directory.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";
      this.entries.set(name, { name, version, filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Validate data against a named schema; on success the value comes back typed. */
  async validate<K extends SchemaName>(name: K, data: unknown): Promise<SchemaCheck<SchemaTypes[K]>> {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    if (!this.ajv) {
      this.ajv = await loadAjv();
    }

    const check = this.ajv.compile<SchemaTypes[K]>(entry.schema);
    if (check(data)) return { valid: true, value: data };
    return { valid: false, errors: this.ajv.errorsText(check.errors) };
  }
}

/** Extract a semver-like version from schema metadata. */
function extractVersion(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null) return null;
  const version: unknown = Reflect.get(schema, "version");
  if (typeof version === "string") return version;

  const id: unknown = Reflect.get(schema, "$id");
  if (typeof id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(id);
    if (m) return m[1];
  }

  return null;
}

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? DEFAULT_SCHEMA_DIR);
  await registry.load();
  return registry;
}
