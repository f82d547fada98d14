import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger } from "../src/logger.js";

describe("logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("writes JSON lines with the component path", () => {
    const lines: string[] = [];
    const logger = createLogger("phasectl", { level: "info", json: true, sink: (line) => lines.push(line) });

    logger.child("runner").warn("phase skipped", { phase: "deploy-widgets" });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: "warn", component: "phasectl:runner", msg: "phase skipped", data: { phase: "deploy-widgets" } });
  });

  it("drops messages below the level", () => {
    const lines: string[] = [];
    const logger = createLogger("phasectl", { level: "warn", sink: (line) => lines.push(line) });

    logger.debug("noise");
    logger.info("noise");
    logger.error("boom");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[ERROR\] \[phasectl\] boom$/);
  });

  it("falls back to info for an unknown level in the environment", () => {
    vi.stubEnv("PHASECTL_LOG_LEVEL", "constructor");
    const lines: string[] = [];
    const logger = createLogger("phasectl", { json: false, sink: (line) => lines.push(line) });

    logger.debug("noise");
    logger.info("phase started");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/\[INFO\] \[phasectl\] phase started$/);
  });
});
