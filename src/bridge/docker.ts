import { execFile } from "node:child_process";
import { randomBytes } from "node:crypto";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import pLimit from "p-limit";
import {
  PermissionDeniedError,
  RemoteCommandFailedError,
  TargetUnreachableError,
  TimeoutError,
  errorMessage,
} from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { DeploymentTarget } from "../types/target.js";
import type { ContainerBridge, ExecResult, FileStat, PullResult, TargetStatus } from "./bridge.js";

const pExecFile = promisify(execFile);

const MAX_BUFFER = 50 * 1024 * 1024;
export const DEFAULT_REMOTE_TIMEOUT_MS = 30_000;

/** Exit status the helper scripts below use for "path does not exist". */
const NOT_FOUND_EXIT = 3;

const PULL_SCRIPT = `[ -f "$1" ] || exit ${NOT_FOUND_EXIT}; cat -- "$1"`;
const STAT_SCRIPT = `[ -e "$1" ] || exit ${NOT_FOUND_EXIT}; stat -c '%U:%G %a' -- "$1"`;
const LIST_SCRIPT = `[ -d "$1" ] || exit ${NOT_FOUND_EXIT}; find "$1" -type f`;

const PERMISSION_RE = /permission denied|operation not permitted|read-only file system/i;
const UNREACHABLE_RE = /no such container|is not running|cannot connect to the docker daemon|no such object/i;

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

/** Runs a local program. Injected in tests; defaults to `execFile`. */
export type CommandExecutor = (file: string, args: readonly string[], opts: { timeoutMs: number }) => Promise<CommandResult>;

export const execFileExecutor: CommandExecutor = async (file, args, { timeoutMs }) => {
  try {
    const { stdout, stderr } = await pExecFile(file, [...args], {
      timeout: timeoutMs,
      maxBuffer: MAX_BUFFER,
      encoding: "utf8",
    });
    return { exitCode: 0, stdout, stderr, timedOut: false };
  } catch (e) {
    if (!(e instanceof Error)) throw e;
    const code: unknown = Reflect.get(e, "code");
    const stdout: unknown = Reflect.get(e, "stdout");
    const stderr: unknown = Reflect.get(e, "stderr");
    return {
      exitCode: typeof code === "number" ? code : 127,
      stdout: typeof stdout === "string" ? stdout : "",
      stderr: typeof stderr === "string" && stderr.length > 0 ? stderr : e.message,
      timedOut: Reflect.get(e, "killed") === true && Reflect.get(e, "signal") === "SIGTERM",
    };
  }
};

export type DockerBridgeOptions = {
  /** Command prefix that reaches the docker CLI, e.g. ["sudo", "docker"]. */
  command?: string[];
  timeoutMs?: number;
  executor?: CommandExecutor;
  logger?: Logger;
};

/**
 * Container bridge over the docker CLI. One queue per instance: every public
 * operation waits for the previous one, so remote commands never interleave.
 */
export class DockerBridge implements ContainerBridge {
  private readonly serial = pLimit(1);
  private readonly command: string[];
  private readonly timeoutMs: number;
  private readonly executor: CommandExecutor;
  private readonly logger: Logger;

  constructor(
    readonly target: DeploymentTarget,
    opts: DockerBridgeOptions = {},
  ) {
    this.command = opts.command && opts.command.length > 0 ? opts.command : ["docker"];
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;
    this.executor = opts.executor ?? execFileExecutor;
    this.logger = opts.logger ?? silentLogger;
  }

  isLive(): Promise<boolean> {
    return this.serial(async () => {
      try {
        return (await this.probe()).running;
      } catch (e) {
        this.logger.debug("liveness probe failed", { error: errorMessage(e) });
        return false;
      }
    });
  }

  status(): Promise<TargetStatus> {
    return this.serial(() => this.probe());
  }

  exec(argv: readonly string[], timeoutMs?: number): Promise<ExecResult> {
    return this.serial(async () => {
      await this.ensureLive();
      return this.remote(argv, timeoutMs);
    });
  }

  pull(remotePath: string): Promise<PullResult> {
    return this.serial(async () => {
      await this.ensureLive();
      const argv = ["sh", "-c", PULL_SCRIPT, "phasectl", remotePath];
      const res = await this.remote(argv);
      if (res.exitCode === NOT_FOUND_EXIT) return { found: false };
      this.check(res, argv, remotePath);
      return { found: true, content: res.stdout };
    });
  }

  stat(remotePath: string): Promise<FileStat | null> {
    return this.serial(async () => {
      await this.ensureLive();
      const argv = ["sh", "-c", STAT_SCRIPT, "phasectl", remotePath];
      const res = await this.remote(argv);
      if (res.exitCode === NOT_FOUND_EXIT) return null;
      this.check(res, argv, remotePath);
      const [owner, mode] = res.stdout.trim().split(/\s+/);
      if (!owner || !mode) {
        throw new RemoteCommandFailedError(argv.join(" "), res.exitCode, `unexpected stat output: ${res.stdout}`);
      }
      return { owner, mode };
    });
  }

  list(remoteDir: string): Promise<string[]> {
    return this.serial(async () => {
      await this.ensureLive();
      const argv = ["sh", "-c", LIST_SCRIPT, "phasectl", remoteDir];
      const res = await this.remote(argv);
      if (res.exitCode === NOT_FOUND_EXIT) return [];
      this.check(res, argv, remoteDir);
      return res.stdout
        .split("\n")
        .map((line) => line.trim())
        .filter((line) => line.length > 0)
        .map((file) => path.posix.relative(remoteDir, file))
        .sort();
    });
  }

  /**
   * Copy next to the destination under a temporary name, then rename over it.
   * The destination is never observed half-written.
   */
  push(content: string, remotePath: string): Promise<void> {
    return this.serial(async () => {
      await this.ensureLive();
      const dir = path.posix.dirname(remotePath);
      const tmpRemote = path.posix.join(dir, `.${path.posix.basename(remotePath)}.phasectl-${randomBytes(4).toString("hex")}`);
      const localDir = await mkdtemp(path.join(os.tmpdir(), "phasectl-"));
      const localFile = path.join(localDir, "payload");

      try {
        await writeFile(localFile, content, "utf8");
        const mkdirArgv = ["mkdir", "-p", "--", dir];
        this.check(await this.remote(mkdirArgv), mkdirArgv, dir);

        const cp = await this.docker(["cp", localFile, `${this.target.container}:${tmpRemote}`], this.timeoutMs, `cp ${remotePath}`);
        this.check(cp, ["docker", "cp"], remotePath);

        const mvArgv = ["mv", "-f", "--", tmpRemote, remotePath];
        try {
          this.check(await this.remote(mvArgv), mvArgv, remotePath);
        } catch (e) {
          await this.remote(["rm", "-f", "--", tmpRemote]).catch((cleanupErr: unknown) => {
            this.logger.warn("could not remove temporary upload", { path: tmpRemote, error: errorMessage(cleanupErr) });
          });
          throw e;
        }
      } finally {
        await rm(localDir, { recursive: true, force: true });
      }
    });
  }

  setOwnership(remotePath: string, owner: string, mode: string): Promise<void> {
    return this.serial(async () => {
      await this.ensureLive();
      const chown = ["chown", owner, "--", remotePath];
      this.check(await this.remote(chown), chown, remotePath);
      const chmod = ["chmod", mode, "--", remotePath];
      this.check(await this.remote(chmod), chmod, remotePath);
    });
  }

  remove(remotePath: string): Promise<void> {
    return this.serial(async () => {
      await this.ensureLive();
      const argv = ["rm", "-f", "--", remotePath];
      this.check(await this.remote(argv), argv, remotePath);
    });
  }

  // --- internals: never re-enter the queue ---

  private async probe(): Promise<TargetStatus> {
    const res = await this.docker(
      ["inspect", "--format", "{{.State.Status}}|{{if .State.Health}}{{.State.Health.Status}}{{else}}none{{end}}", this.target.container],
      this.timeoutMs,
      "inspect",
    );
    if (res.exitCode !== 0) {
      return { running: false, health: /no such object|no such container/i.test(res.stderr) ? "not-found" : "unreachable" };
    }
    const [state, health] = res.stdout.trim().split("|");
    return { running: state === "running", health: health || "none" };
  }

  private async ensureLive(): Promise<void> {
    const status = await this.probe();
    if (!status.running) throw new TargetUnreachableError(this.target.container, `status: ${status.health}`);
  }

  private async remote(argv: readonly string[], timeoutMs?: number): Promise<ExecResult> {
    const res = await this.docker(["exec", this.target.container, ...argv], timeoutMs ?? this.timeoutMs, argv.join(" "));
    if (res.exitCode !== 0 && UNREACHABLE_RE.test(res.stderr)) {
      throw new TargetUnreachableError(this.target.container, res.stderr.trim());
    }
    return { exitCode: res.exitCode, stdout: res.stdout, stderr: res.stderr };
  }

  private async docker(args: readonly string[], timeoutMs: number, operation: string): Promise<CommandResult> {
    const [file, ...prefix] = this.command;
    this.logger.debug("docker", { args: [...prefix, ...args].slice(0, 6) });
    const res = await this.executor(file, [...prefix, ...args], { timeoutMs });
    if (res.timedOut) throw new TimeoutError(operation, timeoutMs);
    return res;
  }

  private check(res: ExecResult, argv: readonly string[], remotePath: string): void {
    if (res.exitCode === 0) return;
    if (PERMISSION_RE.test(res.stderr)) throw new PermissionDeniedError(remotePath, res.stderr);
    throw new RemoteCommandFailedError(argv.join(" "), res.exitCode, res.stderr);
  }
}
