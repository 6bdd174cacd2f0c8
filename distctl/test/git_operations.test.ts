import { beforeEach, describe, expect, it, vi } from "vitest";
import { PipelineError } from "../src/core/errors.js";
import { GitOperations } from "../src/git/operations.js";

const git = vi.hoisted(() => ({ revparse: vi.fn(), fetch: vi.fn(), raw: vi.fn() }));

vi.mock("simple-git", () => ({ simpleGit: () => git }));

const SHA = "4".repeat(40);

describe("GitOperations.resolveRef", () => {
  beforeEach(() => {
    git.revparse.mockReset();
    git.fetch.mockReset();
    git.raw.mockReset();
  });

  it("resolves a local ref", async () => {
    git.revparse.mockResolvedValueOnce(`${SHA}\n`);
    await expect(new GitOperations("/repo").resolveRef("master")).resolves.toBe(SHA);
    expect(git.revparse).toHaveBeenCalledWith(["--verify", "--quiet", "master^{commit}"]);
  });

  it("falls back to the remote-tracking ref", async () => {
    git.revparse.mockRejectedValueOnce(new Error("unknown")).mockResolvedValueOnce(SHA);
    await expect(new GitOperations("/repo").resolveRef("branch-3.1", { remote: "upstream" })).resolves.toBe(SHA);
    expect(git.revparse).toHaveBeenLastCalledWith(["--verify", "--quiet", "upstream/branch-3.1^{commit}"]);
  });

  it("fetches refs that only exist on the remote", async () => {
    git.revparse
      .mockRejectedValueOnce(new Error("unknown"))
      .mockRejectedValueOnce(new Error("unknown"))
      .mockResolvedValueOnce(SHA);
    git.fetch.mockResolvedValueOnce({});

    await expect(new GitOperations("/repo").resolveRef("refs/pull/7/merge", { fetch: true })).resolves.toBe(SHA);
    expect(git.fetch).toHaveBeenCalledWith("origin", "refs/pull/7/merge");
    expect(git.revparse).toHaveBeenLastCalledWith(["--verify", "--quiet", "FETCH_HEAD^{commit}"]);
  });

  it("fails with a resolution error when nothing matches", async () => {
    git.revparse.mockRejectedValue(new Error("unknown"));
    const err: unknown = await new GitOperations("/repo").resolveRef("gone").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PipelineError);
    expect(err instanceof PipelineError && [err.kind, err.message]).toEqual(["resolution", "Cannot resolve revision 'gone'"]);
    expect(git.fetch).not.toHaveBeenCalled();
  });

  it("reports a failed fetch", async () => {
    git.revparse.mockRejectedValue(new Error("unknown"));
    git.fetch.mockRejectedValueOnce(new Error("network down"));
    await expect(new GitOperations("/repo").resolveRef("gone", { fetch: true })).rejects.toThrow(
      "Cannot fetch 'gone' from origin: network down",
    );
  });
});

describe("GitOperations worktrees", () => {
  beforeEach(() => {
    git.raw.mockReset();
    git.revparse.mockReset();
  });

  it("adds a detached worktree and removes it by force", async () => {
    git.raw.mockResolvedValue("");
    const ops = new GitOperations("/repo");
    await ops.addWorktree("/runs/r1/dev/workspace", SHA);
    await ops.removeWorktree("/runs/r1/dev/workspace");

    expect(git.raw.mock.calls).toEqual([
      [["worktree", "add", "--detach", "/runs/r1/dev/workspace", SHA]],
      [["worktree", "remove", "--force", "/runs/r1/dev/workspace"]],
    ]);
  });

  it("turns a failed checkout into a resolution error", async () => {
    git.raw.mockRejectedValueOnce(new Error("already exists"));
    await expect(new GitOperations("/repo").addWorktree("/w", SHA)).rejects.toThrow(`Cannot check out ${SHA} into /w: already exists`);
  });

  it("reads the current branch", async () => {
    git.revparse.mockResolvedValueOnce("branch-3.1\n");
    await expect(new GitOperations("/repo").getCurrentBranch()).resolves.toBe("branch-3.1");
  });
});
