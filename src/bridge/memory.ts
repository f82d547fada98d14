import path from "node:path";
import pLimit from "p-limit";
import { PermissionDeniedError, TargetUnreachableError } from "../errors.js";
import type { DeploymentTarget } from "../types/target.js";
import type { ContainerBridge, ExecResult, FileStat, PullResult, TargetStatus } from "./bridge.js";

export type MemoryFile = {
  content: string;
  owner: string;
  mode: string;
};

export type Mutation =
  | { op: "push"; path: string }
  | { op: "chown"; path: string; owner: string; mode: string }
  | { op: "remove"; path: string }
  | { op: "exec"; argv: string[] };

export type BridgeOperation = "push" | "pull" | "exec" | "stat" | "chown" | "list" | "remove";

/**
 * In-process stand-in for a deployment target. Records every mutation so tests
 * can assert that a re-run touched nothing.
 */
export class MemoryBridge implements ContainerBridge {
  readonly files = new Map<string, MemoryFile>();
  readonly mutations: Mutation[] = [];
  live = true;
  /** Return an error to make the next matching operation fail with it. */
  fault: ((op: BridgeOperation, target: string) => Error | undefined) | null = null;
  /** Handles `exec`; the default succeeds with empty output. */
  onExec: (argv: readonly string[]) => ExecResult = () => ({ exitCode: 0, stdout: "", stderr: "" });

  private readonly serial = pLimit(1);

  constructor(readonly target: DeploymentTarget) {}

  /** Seed a file without recording a mutation. */
  seed(remotePath: string, content: string, meta: Partial<Omit<MemoryFile, "content">> = {}): void {
    this.files.set(remotePath, {
      content,
      owner: meta.owner ?? this.target.owner,
      mode: meta.mode ?? this.target.fileMode,
    });
  }

  read(remotePath: string): string | undefined {
    return this.files.get(remotePath)?.content;
  }

  async isLive(): Promise<boolean> {
    return this.live;
  }

  async status(): Promise<TargetStatus> {
    return { running: this.live, health: this.live ? "healthy" : "unreachable" };
  }

  push(content: string, remotePath: string): Promise<void> {
    return this.op("push", remotePath, () => {
      const existing = this.files.get(remotePath);
      this.files.set(remotePath, {
        content,
        owner: existing?.owner ?? "root:root",
        mode: existing?.mode ?? "600",
      });
      this.mutations.push({ op: "push", path: remotePath });
    });
  }

  pull(remotePath: string): Promise<PullResult> {
    return this.op("pull", remotePath, (): PullResult => {
      const file = this.files.get(remotePath);
      return file ? { found: true, content: file.content } : { found: false };
    });
  }

  exec(argv: readonly string[]): Promise<ExecResult> {
    return this.op("exec", argv.join(" "), () => {
      this.mutations.push({ op: "exec", argv: [...argv] });
      return this.onExec(argv);
    });
  }

  stat(remotePath: string): Promise<FileStat | null> {
    return this.op("stat", remotePath, () => {
      const file = this.files.get(remotePath);
      return file ? { owner: file.owner, mode: file.mode } : null;
    });
  }

  setOwnership(remotePath: string, owner: string, mode: string): Promise<void> {
    return this.op("chown", remotePath, () => {
      const file = this.files.get(remotePath);
      if (!file) throw new PermissionDeniedError(remotePath, "No such file or directory");
      file.owner = owner;
      file.mode = mode;
      this.mutations.push({ op: "chown", path: remotePath, owner, mode });
    });
  }

  list(remoteDir: string): Promise<string[]> {
    return this.op("list", remoteDir, () => {
      const prefix = remoteDir.endsWith("/") ? remoteDir : remoteDir + "/";
      return [...this.files.keys()]
        .filter((p) => p.startsWith(prefix))
        .map((p) => path.posix.relative(remoteDir, p))
        .sort();
    });
  }

  remove(remotePath: string): Promise<void> {
    return this.op("remove", remotePath, () => {
      this.files.delete(remotePath);
      this.mutations.push({ op: "remove", path: remotePath });
    });
  }

  private op<T>(op: BridgeOperation, targetPath: string, fn: () => T): Promise<T> {
    return this.serial(() => {
      if (!this.live) throw new TargetUnreachableError(this.target.container, "container is not running");
      const injected = this.fault?.(op, targetPath);
      if (injected) throw injected;
      return fn();
    });
  }
}
