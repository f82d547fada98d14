import type { ContainerBridge } from "../bridge/bridge.js";
import { CacheInvalidationFailure, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

/** Empties a directory, keeping the directory itself. A missing directory has nothing to clear. */
const CLEAR_SCRIPT = `[ -d "$1" ] || exit 0; find "$1" -mindepth 1 -delete`;

export type InvalidationResult = {
  /** Remote directories that were emptied. */
  cleared: string[];
  /** One message per scope or directory that could not be cleared. */
  warnings: string[];
};

export type CacheInvalidatorOptions = {
  timeoutMs?: number;
  logger?: Logger;
};

/**
 * Clears derived state (model, view and registry caches) after a mutation.
 * Never throws for a failed clear: a stale cache degrades, it does not corrupt.
 */
export class CacheInvalidator {
  private readonly timeoutMs?: number;
  private readonly logger: Logger;

  constructor(opts: CacheInvalidatorOptions = {}) {
    this.timeoutMs = opts.timeoutMs;
    this.logger = opts.logger ?? silentLogger;
  }

  async invalidate(bridge: ContainerBridge, scopes: readonly string[]): Promise<InvalidationResult> {
    const result: InvalidationResult = { cleared: [], warnings: [] };

    for (const scope of new Set(scopes)) {
      const dirs = bridge.target.cacheScopes[scope];
      if (!dirs) {
        result.warnings.push(new CacheInvalidationFailure(scope, "no directories configured for this scope").message);
        continue;
      }

      for (const dir of dirs) {
        try {
          const res = await bridge.exec(["sh", "-c", CLEAR_SCRIPT, "phasectl", dir], this.timeoutMs);
          if (res.exitCode !== 0) {
            result.warnings.push(new CacheInvalidationFailure(scope, `${dir}: exit ${res.exitCode}: ${res.stderr.trim()}`).message);
            continue;
          }
          result.cleared.push(dir);
        } catch (e) {
          result.warnings.push(new CacheInvalidationFailure(scope, `${dir}: ${errorMessage(e)}`).message);
        }
      }
    }

    for (const warning of result.warnings) this.logger.warn(warning);
    if (result.cleared.length > 0) this.logger.info("cache cleared", { dirs: result.cleared });
    return result;
  }
}
