import { simpleGit } from "simple-git";
import fs from "node:fs";
import path from "node:path";

/** The slice of simple-git this project uses. A `SimpleGit` instance satisfies it. */
export interface GitClient {
  clone(repo: string, dest: string): Promise<unknown>;
  checkout(ref: string): Promise<unknown>;
  revparse(args: string[]): Promise<string>;
  remote(args: string[]): Promise<string | void>;
  checkIsRepo(): Promise<boolean>;
}

export type GitClientFactory = (baseDir: string) => GitClient;

export const defaultGitClient: GitClientFactory = (baseDir) => simpleGit(baseDir);

/**
 * Git operations wrapper — abstracts simple-git for testability.
 */
export class GitOperations {
  private readonly client: GitClientFactory;

  constructor(
    readonly repoPath: string,
    client?: GitClientFactory,
  ) {
    this.client = client ?? defaultGitClient;
  }

  /** True when `repoPath` exists and is a git working tree. */
  async isRepository(): Promise<boolean> {
    if (!fs.existsSync(path.join(this.repoPath, ".git"))) return false;
    return this.client(this.repoPath).checkIsRepo();
  }

  /** Clone `repo` into `repoPath`, then check out `ref` when given. */
  async clone(repo: string, ref?: string): Promise<void> {
    const parent = path.dirname(this.repoPath);
    fs.mkdirSync(parent, { recursive: true });
    await this.client(parent).clone(repo, this.repoPath);
    if (ref) await this.checkout(ref);
  }

  async checkout(ref: string): Promise<void> {
    await this.client(this.repoPath).checkout(ref);
  }

  /** Get HEAD SHA (or the commit a ref points at). */
  async getCurrentSha(ref = "HEAD"): Promise<string> {
    const result = await this.client(this.repoPath).revparse([`${ref}^{commit}`]);
    return result.trim();
  }

  /** URL of a remote, or null when it is not configured. */
  async getRemoteUrl(remote = "origin"): Promise<string | null> {
    const result = await this.client(this.repoPath).remote(["get-url", remote]);
    return typeof result === "string" && result.trim() ? result.trim() : null;
  }
}
