import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { MemoryBridge } from "../src/bridge/memory.js";
import { doctor } from "../src/commands/doctor.js";
import { parseFormat } from "../src/commands/format.js";
import { plan } from "../src/commands/plan.js";
import { reset } from "../src/commands/reset.js";
import { listRules } from "../src/commands/rules.js";
import { run } from "../src/commands/run.js";
import { status } from "../src/commands/status.js";
import { validate } from "../src/commands/validate.js";
import { testTarget } from "./support/target.js";

const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../schemas");

const BASE_YAML = `schema_version: "1.0.0"
target:
  name: lab
  container: lab-core-1
  plugin_dir: /srv/plugins
  owner: "www-data:www-data"
  file_mode: "644"
  cache_scopes:
    plugin-registry: [/srv/cache/models]
state_dir: state
rules_dir: ../rules
retry: { attempts: 1, base_delay_ms: 0, max_delay_ms: 0 }
phases:
  - id: deploy-widgets
    kind: deploy
    source: ../widgets
    include: ["*Widget.php"]
    cache_scopes: [plugin-registry]
  - id: apply-tag-fix
    kind: patch
    requires: [deploy-widgets]
    scopes: [tag-wildcard-fix]
`;

const RULES_YAML = `version: "1"
rules:
  - id: ics-tag-wildcard
    scope: tag-wildcard-fix
    description: Widen ics tags
    targets: { include: ["*Widget.php"] }
    match: { literal: "'ics:'" }
    replacement: "'ics:%'"
`;

describe("cli commands", () => {
  let tmpDir: string;
  let journalPath: string;

  const labTarget = () =>
    testTarget({ name: "lab", container: "lab-core-1", pluginDir: "/srv/plugins", cacheScopes: { "plugin-registry": ["/srv/cache/models"] } });

  const common = () => ({ configDir: "config", cwd: tmpDir, environment: {}, schemaDir: SCHEMA_DIR });

  function write(rel: string, content: string): void {
    const file = path.join(tmpDir, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "phasectl-cli-"));
    journalPath = path.join(tmpDir, "state", "lab.journal.json");
    write("config/base.yaml", BASE_YAML);
    write("rules/widget-fixes.yaml", RULES_YAML);
    write("widgets/IcsWidget.php", "<?php\n$t = 'ics:';\n");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("plan", () => {
    it("prints the resolved order", async () => {
      const out = await plan(common());
      expect(out).toEqual({ exitCode: 0, stdout: [" 1. deploy-widgets", " 2. apply-tag-fix (after deploy-widgets)"], stderr: [] });
    });

    it("emits JSON entries", async () => {
      const out = await plan({ ...common(), format: "json" });
      const entries: unknown = JSON.parse(out.stdout[0]);
      expect(entries).toEqual([
        { id: "deploy-widgets", label: "deploy-widgets", requires: [], feature: null, excluded: false, cacheScopes: ["plugin-registry"] },
        { id: "apply-tag-fix", label: "apply-tag-fix", requires: ["deploy-widgets"], feature: null, excluded: false, cacheScopes: [] },
      ]);
    });

    it("rejects conflicting selections and unknown phases", async () => {
      expect(await plan({ ...common(), from: "a", only: "b" })).toEqual({
        exitCode: 2,
        stdout: [],
        stderr: ["--from and --only are mutually exclusive"],
      });
      expect(await plan({ ...common(), only: "nope", format: "jsonl" })).toEqual({
        exitCode: 2,
        stdout: [JSON.stringify({ level: "error", code: "CONFIGURATION_ERROR", message: "Unknown phase: nope" })],
        stderr: [],
      });
    });
  });

  describe("run", () => {
    it("deploys, patches and then finds nothing to do", async () => {
      const bridge = new MemoryBridge(labTarget());

      const first = await run({ ...common(), bridge });

      expect(first.exitCode).toBe(0);
      expect(first.stdout.slice(1)).toEqual(["  completed          deploy-widgets", "  completed          apply-tag-fix", "exit 0"]);
      expect(bridge.read("/srv/plugins/IcsWidget.php")).toBe("<?php\n$t = 'ics:%';\n");
      expect(fs.existsSync(journalPath)).toBe(true);
      const mutations = bridge.mutations.length;

      const second = await run({ ...common(), bridge });

      expect(second.stdout.slice(1)).toEqual(["  skipped-idempotent deploy-widgets", "  skipped-idempotent apply-tag-fix", "exit 0"]);
      expect(bridge.mutations).toHaveLength(mutations);
    });

    it("reports a failed phase and blocks its dependents", async () => {
      const bridge = new MemoryBridge(labTarget());
      bridge.live = false;

      const out = await run({ ...common(), bridge });

      expect(out.exitCode).toBe(1);
      expect(out.stdout.slice(1)).toEqual([
        "  failed             deploy-widgets: Target unreachable: lab-core-1 (container is not running)",
        "  skipped-blocked    apply-tag-fix: prerequisite deploy-widgets failed",
        "exit 1",
      ]);
      expect(out.report?.phases["apply-tag-fix"].state).toBe("skipped-blocked");
    });

    it("ends jsonl output with a run summary", async () => {
      const out = await run({ ...common(), format: "jsonl", bridge: new MemoryBridge(labTarget()) });

      expect(out.stdout).toHaveLength(3);
      expect(JSON.parse(out.stdout[0])).toMatchObject({ type: "phase", id: "deploy-widgets", state: "completed" });
      expect(JSON.parse(out.stdout[2])).toMatchObject({ type: "run", target: "lab", cancelled: false, exitCode: 0 });
    });

    it("exits 130 when cancelled before the first phase", async () => {
      const controller = new AbortController();
      controller.abort();
      const bridge = new MemoryBridge(labTarget());

      const out = await run({ ...common(), bridge, signal: controller.signal });

      expect(out.exitCode).toBe(130);
      expect(out.stdout.slice(-2)).toEqual(["run cancelled", "exit 130"]);
      expect(bridge.mutations).toEqual([]);
    });

    it("refuses a cyclic graph without touching the target", async () => {
      write("config/base.yaml", BASE_YAML.replace("    include: [\"*Widget.php\"]\n", "    include: [\"*Widget.php\"]\n    requires: [apply-tag-fix]\n"));
      const bridge = new MemoryBridge(labTarget());

      const out = await run({ ...common(), bridge });

      expect(out.exitCode).toBe(2);
      expect(out.stderr).toEqual(["Phase graph has a cycle: deploy-widgets -> apply-tag-fix -> deploy-widgets"]);
      expect(bridge.mutations).toEqual([]);
      expect(out.report).toBeNull();
    });

    it("refuses an invalid config", async () => {
      write("config/base.yaml", 'schema_version: "1.0.0"\nphases: []\n');
      const out = await run({ ...common(), bridge: new MemoryBridge(labTarget()) });
      expect(out.exitCode).toBe(2);
      expect(out.stderr[0]).toMatch(/^Config invalid: /);
    });
  });

  describe("status and reset", () => {
    it("shows journal entries and clears them", async () => {
      await run({ ...common(), bridge: new MemoryBridge(labTarget()) });

      const before = await status(common());
      expect(before.stdout[0]).toBe(`journal ${journalPath}`);
      expect(before.stdout[1]).toMatch(/^ {2}completed {10}deploy-widgets {2}\d{4}-\d{2}-\d{2}T/);

      expect(await reset({ ...common(), phase: "deploy-widgets" })).toEqual({ exitCode: 0, stdout: ["cleared deploy-widgets"], stderr: [] });

      const after = await status(common());
      expect(after.stdout[1]).toBe("  pending            deploy-widgets  -");
      expect(after.stdout[2]).toMatch(/^ {2}completed {10}apply-tag-fix {2}/);
    });

    it("lists undeclared journal entries", async () => {
      write("state/lab.journal.json", JSON.stringify({ schemaVersion: 1, target: "lab", phases: { "old-phase": { status: "completed", timestamp: null, fingerprint: null, warnings: [] } } }));

      const out = await status({ ...common(), format: "jsonl" });

      expect(out.stdout.map((line) => JSON.parse(line))).toEqual([
        { id: "deploy-widgets", declared: true, status: "pending", timestamp: null, fingerprint: null, warnings: [] },
        { id: "apply-tag-fix", declared: true, status: "pending", timestamp: null, fingerprint: null, warnings: [] },
        { id: "old-phase", declared: false, status: "completed", timestamp: null, fingerprint: null, warnings: [] },
      ]);
    });

    it("rejects an unknown phase and reports a full reset", async () => {
      expect(await reset({ ...common(), phase: "nope" })).toEqual({ exitCode: 2, stdout: [], stderr: ["Unknown phase: nope"] });

      const out = await reset({ ...common(), format: "json" });
      expect(JSON.parse(out.stdout[0])).toEqual({ level: "info", code: "RESET", cleared: "all", journal: journalPath });
    });
  });

  describe("rules", () => {
    it("lists rules, optionally by scope", async () => {
      expect((await listRules(common())).stdout).toEqual(["ics-tag-wildcard  tag-wildcard-fix  rewrite  Widen ics tags"]);
      expect((await listRules({ ...common(), scope: "other" })).stdout).toEqual(["No rules found."]);
    });

    it("emits JSON", async () => {
      const out = await listRules({ ...common(), format: "jsonl" });
      expect(JSON.parse(out.stdout[0])).toEqual({
        id: "ics-tag-wildcard",
        scope: "tag-wildcard-fix",
        action: "rewrite",
        version: "1",
        pattern: "'ics:'",
        description: "Widen ics tags",
      });
    });
  });

  describe("doctor", () => {
    it("reports a running target", async () => {
      expect(await doctor({ ...common(), bridge: new MemoryBridge(labTarget()) })).toEqual({
        exitCode: 0,
        stdout: ["lab (lab-core-1): running, health healthy"],
        stderr: [],
      });
    });

    it("exits 3 for a stopped target", async () => {
      const bridge = new MemoryBridge(labTarget());
      bridge.live = false;
      const out = await doctor({ ...common(), format: "json", bridge });
      expect(out.exitCode).toBe(3);
      expect(JSON.parse(out.stdout[0])).toEqual({ target: "lab", container: "lab-core-1", running: false, health: "unreachable" });
    });
  });

  describe("validate", () => {
    it("accepts a consistent project", async () => {
      expect(await validate(common())).toEqual({ exitCode: 0, stdout: ["OK"], stderr: [] });
    });

    it("warns about a missing deploy source", async () => {
      fs.rmSync(path.join(tmpDir, "widgets"), { recursive: true, force: true });
      const out = await validate(common());
      expect(out).toEqual({
        exitCode: 0,
        stdout: ["OK"],
        stderr: [`warn: Deploy source directory not found for phase deploy-widgets: ${path.join(tmpDir, "widgets")}`],
      });
    });

    it("reports a broken rule file", async () => {
      write("rules/widget-fixes.yaml", RULES_YAML.replace(`    replacement: "'ics:%'"\n`, ""));
      const out = await validate({ ...common(), format: "json" });
      expect(out.exitCode).toBe(2);
      expect(JSON.parse(out.stdout[0])).toEqual({
        ok: false,
        diagnostics: [{ level: "error", code: "CONFIGURATION_ERROR", message: "Rule ics-tag-wildcard rewrites but declares no replacement" }],
      });
    });
  });

  it("rejects an unknown output format", () => {
    expect(() => parseFormat("xml")).toThrow("Unknown output format: xml (expected human, json or jsonl)");
  });
});
