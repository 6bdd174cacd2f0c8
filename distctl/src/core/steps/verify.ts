import path from "node:path";
import { runChecks } from "../../verify/sequence.js";
import { toJunitXml } from "../../verify/junit.js";
import { PipelineError } from "../errors.js";
import type { JobContext } from "../job-context.js";
import { buildDistributions } from "./build-dist.js";

export const VERIFICATION_FILE = "verification.json";
export const JUNIT_FILE = "verification.xml";

/**
 * Verify step: run the check sequence against the built distributions and
 * record the results. Any failed check fails the step.
 */
export async function runVerify(ctx: JobContext, signal: AbortSignal): Promise<void> {
  const dists = ctx.dists;
  if (!dists) throw new PipelineError("build", "No distributions to verify");

  const report = await runChecks(
    {
      run: ctx.run,
      variant: ctx.variant,
      config: ctx.config,
      runner: ctx.runner,
      reporter: ctx.reporter,
      workspace: ctx.workspace,
      scratchDir: ctx.scratchDir,
      dists,
      signal,
      versions: {},
      listings: {},
      rebuild: () => buildDistributions(ctx, path.join(ctx.scratchDir, "rebuild"), signal),
    },
    ctx.checks,
  );

  ctx.records.writeRecord({ relativePath: VERIFICATION_FILE, content: report, schema: "verification", producedBy: "verify" });
  ctx.records.writeRecord({ relativePath: JUNIT_FILE, content: toJunitXml([report]), producedBy: "verify" });

  if (report.versions.package) ctx.outputs.set("package-version", report.versions.package);

  const failed = report.checks.find((c) => c.status === "failed");
  if (failed) {
    throw new PipelineError(failed.error_kind ?? "integrity", `${failed.description}: ${failed.message}`, { check: failed.id });
  }
}
