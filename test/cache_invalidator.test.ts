import { describe, expect, it } from "vitest";
import { MemoryBridge } from "../src/bridge/memory.js";
import { CacheInvalidator } from "../src/cache/invalidator.js";
import { TimeoutError } from "../src/errors.js";
import { MODELS_CACHE, PERSISTENT_CACHE, testTarget } from "./support/target.js";

const CLEAR_SCRIPT = `[ -d "$1" ] || exit 0; find "$1" -mindepth 1 -delete`;

describe("CacheInvalidator", () => {
  it("empties every directory of each scope once", async () => {
    const bridge = new MemoryBridge(testTarget());

    const result = await new CacheInvalidator().invalidate(bridge, ["plugin-registry", "plugin-registry"]);

    expect(result).toEqual({ cleared: [MODELS_CACHE, PERSISTENT_CACHE], warnings: [] });
    expect(bridge.mutations).toEqual([
      { op: "exec", argv: ["sh", "-c", CLEAR_SCRIPT, "phasectl", MODELS_CACHE] },
      { op: "exec", argv: ["sh", "-c", CLEAR_SCRIPT, "phasectl", PERSISTENT_CACHE] },
    ]);
  });

  it("warns about a scope with no directories", async () => {
    const result = await new CacheInvalidator().invalidate(new MemoryBridge(testTarget()), ["compiled-views"]);
    expect(result).toEqual({
      cleared: [],
      warnings: ["Cache invalidation failed for compiled-views: no directories configured for this scope"],
    });
  });

  it("turns failures into warnings and keeps going", async () => {
    const bridge = new MemoryBridge(testTarget());
    bridge.onExec = () => ({ exitCode: 1, stdout: "", stderr: "find: cannot delete: Device busy\n" });
    bridge.fault = (op, target) => (op === "exec" && target.endsWith(PERSISTENT_CACHE) ? new TimeoutError("sh -c", 30000) : undefined);

    const result = await new CacheInvalidator().invalidate(bridge, ["plugin-registry"]);

    expect(result).toEqual({
      cleared: [],
      warnings: [
        `Cache invalidation failed for plugin-registry: ${MODELS_CACHE}: exit 1: find: cannot delete: Device busy`,
        `Cache invalidation failed for plugin-registry: ${PERSISTENT_CACHE}: Timed out after 30000ms: sh -c`,
      ],
    });
  });
});
