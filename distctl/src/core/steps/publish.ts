import fs from "node:fs";
import path from "node:path";
import { publicationSummary } from "../../publish/summary.js";
import { CancelledError, PipelineError } from "../errors.js";
import type { JobContext } from "../job-context.js";
import { DIST_DIR } from "./build-dist.js";

export const ARTIFACT_RECORD = "artifact.json";

/**
 * Publish step: upload the verified package. A run that lost its
 * concurrency key publishes nothing.
 */
export async function runPublish(ctx: JobContext, signal: AbortSignal): Promise<void> {
  const dists = ctx.dists;
  if (!dists) throw new PipelineError("publication", "No package to publish");

  signal.throwIfAborted();
  if (!ctx.stillCurrent()) {
    throw new CancelledError(`Superseded by a newer run for ${ctx.run.concurrency_key}`);
  }

  const { retention_days } = ctx.config.publish;
  const artifact = ctx.store.upload({
    name: dists.package.name,
    filePath: dists.package.path,
    pattern: ctx.config.dist.package_pattern,
    retentionDays: retention_days,
    runId: ctx.run.run_id,
    variant: ctx.variant.name,
  });
  ctx.published = artifact;

  ctx.records.writeRecord({ relativePath: ARTIFACT_RECORD, content: artifact, schema: "published-artifact", producedBy: "publish" });
  ctx.outputs.set("artifact-url", artifact.url);
  ctx.outputs.appendSummary(publicationSummary(artifact, retention_days));
  ctx.reporter.info("PUBLISHED", `${artifact.file} -> ${artifact.url}`, { url: artifact.url });
}

/** Discard step: non-publishing runs drop their copies of the distributions. */
export async function runDiscard(ctx: JobContext): Promise<void> {
  fs.rmSync(path.join(ctx.jobDir, DIST_DIR), { recursive: true, force: true });
  ctx.reporter.info("DISCARDED", `${ctx.run.event} runs do not publish; distributions discarded`);
}
