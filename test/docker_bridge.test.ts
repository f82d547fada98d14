import { describe, expect, it } from "vitest";
import fs from "node:fs";
import { setTimeout as sleep } from "node:timers/promises";
import { DockerBridge, type CommandExecutor, type CommandResult } from "../src/bridge/docker.js";
import { PermissionDeniedError, RemoteCommandFailedError, TargetUnreachableError, TimeoutError } from "../src/errors.js";
import { inPlugins, PLUGIN_DIR, testTarget } from "./support/target.js";

type Call = { file: string; args: string[] };

const CONTAINER = "misp-misp-core-1";
const INSPECT_FORMAT = "{{.State.Status}}|{{if .State.Health}}{{.State.Health.Status}}{{else}}none{{end}}";

function done(stdout = "", exitCode = 0, stderr = ""): CommandResult {
  return { exitCode, stdout, stderr, timedOut: false };
}

/**
 * Fake docker CLI. `inspect` reports a healthy running container unless
 * `respond` says otherwise; `exec` arguments are handed over without the
 * `exec <container>` prefix.
 */
function fakeDocker(respond: (call: Call, remote: string[] | null) => CommandResult | undefined = () => undefined) {
  const calls: Call[] = [];
  const executor: CommandExecutor = async (file, args) => {
    const call = { file, args: [...args] };
    calls.push(call);
    const execAt = call.args.indexOf("exec");
    const remote = execAt >= 0 ? call.args.slice(execAt + 2) : null;
    const answer = respond(call, remote);
    if (answer) return answer;
    if (call.args.includes("inspect")) return done("running|healthy\n");
    return done();
  };
  return { calls, executor };
}

function remoteCalls(calls: Call[]): string[][] {
  return calls.filter((c) => c.args[0] === "exec").map((c) => c.args.slice(2));
}

describe("DockerBridge", () => {
  it("probes the container before every operation", async () => {
    const { calls, executor } = fakeDocker();
    const bridge = new DockerBridge(testTarget(), { executor });

    await bridge.remove(inPlugins("BaseWidget.php"));

    expect(calls).toEqual([
      { file: "docker", args: ["inspect", "--format", INSPECT_FORMAT, CONTAINER] },
      { file: "docker", args: ["exec", CONTAINER, "rm", "-f", "--", inPlugins("BaseWidget.php")] },
    ]);
  });

  it("honours a command prefix", async () => {
    const { calls, executor } = fakeDocker();
    const bridge = new DockerBridge(testTarget(), { executor, command: ["sudo", "docker"] });

    await bridge.exec(["php", "-v"]);

    expect(calls[1]).toEqual({ file: "sudo", args: ["docker", "exec", CONTAINER, "php", "-v"] });
  });

  it("pulls file content and reports a missing file", async () => {
    const file = inPlugins("IcsWidget.php");
    const { executor } = fakeDocker((_call, remote) => {
      if (remote?.[4] === file) return done("<?php\n");
      if (remote) return done("", 3);
      return undefined;
    });
    const bridge = new DockerBridge(testTarget(), { executor });

    expect(await bridge.pull(file)).toEqual({ found: true, content: "<?php\n" });
    expect(await bridge.pull(inPlugins("Gone.php"))).toEqual({ found: false });
  });

  it("pushes through a temporary file renamed into place", async () => {
    const dest = inPlugins("IcsWidget.php");
    let uploaded: string | undefined;
    const { calls, executor } = fakeDocker((call) => {
      if (call.args[0] === "cp") uploaded = fs.readFileSync(call.args[1], "utf8");
      return undefined;
    });
    const bridge = new DockerBridge(testTarget(), { executor });

    await bridge.push("<?php\nclass IcsWidget {}\n", dest);

    expect(uploaded).toBe("<?php\nclass IcsWidget {}\n");
    const cp = calls.find((c) => c.args[0] === "cp");
    const tmpTarget = cp?.args[2] ?? "";
    expect(tmpTarget).toMatch(new RegExp(`^${CONTAINER}:${PLUGIN_DIR}/\\.IcsWidget\\.php\\.phasectl-[0-9a-f]{8}$`));
    const tmpRemote = tmpTarget.slice(CONTAINER.length + 1);
    expect(remoteCalls(calls)).toEqual([
      ["mkdir", "-p", "--", PLUGIN_DIR],
      ["mv", "-f", "--", tmpRemote, dest],
    ]);
    expect(fs.existsSync(cp?.args[1] ?? "")).toBe(false);
  });

  it("removes the temporary upload when the rename fails", async () => {
    const dest = inPlugins("IcsWidget.php");
    const { calls, executor } = fakeDocker((_call, remote) =>
      remote?.[0] === "mv" ? done("", 1, "mv: cannot move: Permission denied") : undefined,
    );
    const bridge = new DockerBridge(testTarget(), { executor });

    await expect(bridge.push("x", dest)).rejects.toThrow(`Permission denied: ${dest}: mv: cannot move: Permission denied`);

    const remote = remoteCalls(calls);
    const mv = remote[1];
    expect(remote[2]).toEqual(["rm", "-f", "--", mv[3]]);
  });

  it("sets owner then mode", async () => {
    const file = inPlugins("IcsWidget.php");
    const { calls, executor } = fakeDocker();
    const bridge = new DockerBridge(testTarget(), { executor });

    await bridge.setOwnership(file, "www-data:www-data", "644");

    expect(remoteCalls(calls)).toEqual([
      ["chown", "www-data:www-data", "--", file],
      ["chmod", "644", "--", file],
    ]);
  });

  it("parses stat output", async () => {
    const { executor } = fakeDocker((_call, remote) => {
      if (!remote) return undefined;
      return remote[4] === inPlugins("IcsWidget.php") ? done("www-data:www-data 644\n") : done("", 3);
    });
    const bridge = new DockerBridge(testTarget(), { executor });

    expect(await bridge.stat(inPlugins("IcsWidget.php"))).toEqual({ owner: "www-data:www-data", mode: "644" });
    expect(await bridge.stat(inPlugins("Gone.php"))).toBeNull();
  });

  it("lists files relative to the directory", async () => {
    const { executor } = fakeDocker((_call, remote) =>
      remote ? done(`${PLUGIN_DIR}/Sub/B.php\n${PLUGIN_DIR}/A.php\n`) : undefined,
    );
    const bridge = new DockerBridge(testTarget(), { executor });

    expect(await bridge.list(PLUGIN_DIR)).toEqual(["A.php", "Sub/B.php"]);
  });

  it("reports a stopped container as unreachable", async () => {
    const { calls, executor } = fakeDocker((call) =>
      call.args[0] === "inspect" ? done("", 1, `Error: No such object: ${CONTAINER}`) : undefined,
    );
    const bridge = new DockerBridge(testTarget(), { executor });

    expect(await bridge.isLive()).toBe(false);
    expect(await bridge.status()).toEqual({ running: false, health: "not-found" });
    await expect(bridge.pull(inPlugins("IcsWidget.php"))).rejects.toThrow(
      new TargetUnreachableError(CONTAINER, "status: not-found").message,
    );
    expect(calls.every((c) => c.args[0] === "inspect")).toBe(true);
  });

  it("reads health from inspect output", async () => {
    const { executor } = fakeDocker((call) => (call.args[0] === "inspect" ? done("running|none\n") : undefined));
    expect(await new DockerBridge(testTarget(), { executor }).status()).toEqual({ running: true, health: "none" });
  });

  it("maps daemon errors during exec to unreachable", async () => {
    const { executor } = fakeDocker((_call, remote) =>
      remote ? done("", 1, `Error response from daemon: container ${CONTAINER} is not running`) : undefined,
    );
    const bridge = new DockerBridge(testTarget(), { executor });

    await expect(bridge.exec(["php", "-v"])).rejects.toBeInstanceOf(TargetUnreachableError);
  });

  it("maps a timed-out command to TimeoutError", async () => {
    const { executor } = fakeDocker((_call, remote) => (remote ? { ...done(), exitCode: 1, timedOut: true } : undefined));
    const bridge = new DockerBridge(testTarget(), { executor });

    const err = await bridge.exec(["php", "-v"], 5000).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TimeoutError);
    expect(err).toHaveProperty("message", "Timed out after 5000ms: php -v");
  });

  it("distinguishes permission problems from other failures", async () => {
    const file = inPlugins("BaseWidget.php");
    let stderr = "rm: cannot remove: Permission denied";
    const { executor } = fakeDocker((_call, remote) => (remote ? done("", 1, stderr) : undefined));
    const bridge = new DockerBridge(testTarget(), { executor });

    await expect(bridge.remove(file)).rejects.toBeInstanceOf(PermissionDeniedError);

    stderr = "boom";
    const err = await bridge.remove(file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteCommandFailedError);
    expect(err).toHaveProperty("message", `Remote command failed (exit 1): rm -f -- ${file}: boom`);
  });

  it("returns a non-zero exec result without throwing", async () => {
    const { executor } = fakeDocker((_call, remote) => (remote ? done("", 2, "no such file") : undefined));
    const bridge = new DockerBridge(testTarget(), { executor });

    expect(await bridge.exec(["ls", "/missing"])).toEqual({ exitCode: 2, stdout: "", stderr: "no such file" });
  });

  it("never runs two docker commands at once", async () => {
    let active = 0;
    let peak = 0;
    const executor: CommandExecutor = async (_file, args) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(5);
      active--;
      return args.includes("inspect") ? done("running|healthy") : done("www-data:www-data 644");
    };
    const bridge = new DockerBridge(testTarget(), { executor });

    await Promise.all([
      bridge.stat(inPlugins("A.php")),
      bridge.stat(inPlugins("B.php")),
      bridge.exec(["true"]),
      bridge.isLive(),
    ]);

    expect(peak).toBe(1);
  });
});
