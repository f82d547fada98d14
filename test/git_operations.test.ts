import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { GitOperations } from "../src/git/operations.js";
import { FakeGit } from "./support/fake-git.js";

const REPO = "https://git.example.test/widgets.git";

describe("GitOperations", () => {
  let tmpDir: string;
  let git: FakeGit;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "phasectl-git-"));
    git = new FakeGit();
    git.addRemote(REPO, { HEAD: "a".repeat(40), "v1.2.0": "b".repeat(40) });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reports a missing directory as not a repository", async () => {
    expect(await new GitOperations(path.join(tmpDir, "widgets"), git.factory).isRepository()).toBe(false);
  });

  it("clones into a nested destination and checks out a ref", async () => {
    const dest = path.join(tmpDir, "vendor", "widgets");
    const ops = new GitOperations(dest, git.factory);

    await ops.clone(REPO, "v1.2.0");

    expect(git.calls).toEqual([`clone ${REPO} ${dest}`, "checkout v1.2.0"]);
    expect(await ops.isRepository()).toBe(true);
    expect(await ops.getCurrentSha()).toBe("b".repeat(40));
    expect(await ops.getCurrentSha("HEAD")).toBe("b".repeat(40));
    expect(await ops.getRemoteUrl()).toBe(REPO);
  });

  it("returns null for an unconfigured remote", async () => {
    const dest = path.join(tmpDir, "widgets");
    const ops = new GitOperations(dest, git.factory);
    await ops.clone(REPO);

    expect(await ops.getRemoteUrl("upstream")).toBeNull();
    expect(await ops.getCurrentSha()).toBe("a".repeat(40));
  });

  it("surfaces clone failures", async () => {
    const ops = new GitOperations(path.join(tmpDir, "widgets"), git.factory);
    await expect(ops.clone("https://git.example.test/missing.git")).rejects.toThrow(
      "fatal: repository 'https://git.example.test/missing.git' not found",
    );
  });
});
