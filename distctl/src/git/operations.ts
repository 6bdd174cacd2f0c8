import { simpleGit, type SimpleGit } from "simple-git";
import { PipelineError, errorMessage } from "../core/errors.js";

/**
 * What source preparation needs from version control. `GitOperations` is the
 * real implementation; tests supply their own.
 */
export interface SourceControl {
  /** Resolve a branch, tag or SHA to a full commit SHA. Throws a resolution error. */
  resolveRef(ref: string, opts?: { fetch?: boolean; remote?: string }): Promise<string>;
  /** Create a detached worktree of `sha` at `dir`. */
  addWorktree(dir: string, sha: string): Promise<void>;
  removeWorktree(dir: string): Promise<void>;
}

/** Source control over simple-git, for the repository at `repoPath`. */
export class GitOperations implements SourceControl {
  private readonly git: SimpleGit;

  constructor(repoPath: string) {
    this.git = simpleGit(repoPath);
  }

  /**
   * Try `<ref>`, then `<remote>/<ref>`, then fetch `<ref>` from the remote and
   * use FETCH_HEAD. Pull-request merge refs only resolve through the fetch.
   */
  async resolveRef(ref: string, opts: { fetch?: boolean; remote?: string } = {}): Promise<string> {
    const remote = opts.remote ?? "origin";
    const candidates = [ref, `${remote}/${ref}`];

    for (const candidate of candidates) {
      const sha = await this.tryVerify(candidate);
      if (sha) return sha;
    }

    if (opts.fetch) {
      try {
        await this.git.fetch(remote, ref);
      } catch (e) {
        throw new PipelineError("resolution", `Cannot fetch '${ref}' from ${remote}: ${errorMessage(e)}`, { ref });
      }
      const sha = await this.tryVerify("FETCH_HEAD");
      if (sha) return sha;
    }

    throw new PipelineError("resolution", `Cannot resolve revision '${ref}'`, { ref });
  }

  async addWorktree(dir: string, sha: string): Promise<void> {
    try {
      await this.git.raw(["worktree", "add", "--detach", dir, sha]);
    } catch (e) {
      throw new PipelineError("resolution", `Cannot check out ${sha} into ${dir}: ${errorMessage(e)}`, { sha });
    }
  }

  async removeWorktree(dir: string): Promise<void> {
    await this.git.raw(["worktree", "remove", "--force", dir]);
  }

  /** Get current branch name. */
  async getCurrentBranch(): Promise<string> {
    const result = await this.git.revparse(["--abbrev-ref", "HEAD"]);
    return result.trim();
  }

  private async tryVerify(ref: string): Promise<string | null> {
    try {
      const out = await this.git.revparse(["--verify", "--quiet", `${ref}^{commit}`]);
      const sha = out.trim();
      return sha.length > 0 ? sha : null;
    } catch {
      // rev-parse --verify exits non-zero for unknown refs
      return null;
    }
  }
}
