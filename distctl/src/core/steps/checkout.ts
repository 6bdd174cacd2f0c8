import type { JobContext } from "../job-context.js";

/**
 * Checkout step: resolve the run's checkout ref and give the job its own
 * detached worktree.
 */
export async function runCheckout(ctx: JobContext, signal: AbortSignal): Promise<void> {
  const { fetch, remote } = ctx.config.source;
  const sha = await ctx.source.resolveRef(ctx.run.checkout_ref, { fetch, remote });
  signal.throwIfAborted();

  await ctx.source.addWorktree(ctx.workspace, sha);
  ctx.sha = sha;
  ctx.outputs.set("sha", sha);
  ctx.reporter.info("CHECKED_OUT", `${ctx.run.checkout_ref} at ${sha.slice(0, 12)}`, { sha });
}
