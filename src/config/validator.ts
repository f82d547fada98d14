import { checkGraph } from "../core/graph.js";
import { isValidMode, isValidOwner } from "../core/security.js";
import { ConfigurationError } from "../errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { PhasectlConfig } from "../types/config.js";

/**
 * Validate a loaded config against schemas/config.schema.json plus the checks
 * a schema cannot express. Returns the typed config.
 */
export async function validateConfig(config: unknown, registry: SchemaRegistry): Promise<PhasectlConfig> {
  const check = await registry.validate("config", config);
  if (!check.valid) {
    throw new ConfigurationError(`Config invalid: ${check.errors}`);
  }

  const value = check.value;
  if (!isValidOwner(value.target.owner)) {
    throw new ConfigurationError(`Invalid target owner: ${value.target.owner}`);
  }
  if (!isValidMode(value.target.file_mode)) {
    throw new ConfigurationError(`Invalid target file mode: ${value.target.file_mode}`);
  }
  if (value.retry && value.retry.max_delay_ms < value.retry.base_delay_ms) {
    throw new ConfigurationError("retry.max_delay_ms must not be below retry.base_delay_ms");
  }

  checkGraph(value.phases.map((p) => ({ id: p.id, requires: p.requires ?? [] })));
  return value;
}
