import type { DeploymentTarget } from "../types/target.js";

export type PullResult = { found: true; content: string } | { found: false };

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type FileStat = {
  /** `user:group` */
  owner: string;
  /** Octal permission bits, e.g. "644". */
  mode: string;
};

export type TargetStatus = {
  running: boolean;
  /** Container health as reported by the runtime, or "none" / "not-found". */
  health: string;
};

/**
 * Narrow interface over the deployment target. No orchestration logic.
 *
 * Every operation is one logical unit: a failed push leaves the remote file
 * either unchanged or fully replaced. Operations against one target are
 * serialized by the implementation.
 *
 * Failures surface as TargetUnreachableError, PermissionDeniedError,
 * TimeoutError or RemoteCommandFailedError.
 */
export interface ContainerBridge {
  readonly target: DeploymentTarget;
  push(content: string, remotePath: string): Promise<void>;
  pull(remotePath: string): Promise<PullResult>;
  exec(argv: readonly string[], timeoutMs?: number): Promise<ExecResult>;
  stat(remotePath: string): Promise<FileStat | null>;
  setOwnership(remotePath: string, owner: string, mode: string): Promise<void>;
  /** Files under `remoteDir`, as POSIX paths relative to it. Missing directory → []. */
  list(remoteDir: string): Promise<string[]>;
  remove(remotePath: string): Promise<void>;
  isLive(): Promise<boolean>;
  status(): Promise<TargetStatus>;
}
