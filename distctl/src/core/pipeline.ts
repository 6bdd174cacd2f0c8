import fs from "node:fs";
import path from "node:path";
import { RecordWriter } from "../artifact-writer/writer.js";
import type { CommandRunner } from "../exec/runner.js";
import type { SourceControl } from "../git/operations.js";
import type { ArtifactStore, PublishedArtifact } from "../publish/store.js";
import { runSummary } from "../publish/summary.js";
import type { DistctlConfig, VariantConfig } from "../types/config.js";
import type { PipelineRun } from "../types/trigger.js";
import type { VerificationCheck } from "../verify/checks.js";
import { errorMessage } from "./errors.js";
import type { JobContext } from "./job-context.js";
import { runMatrix } from "./matrix.js";
import { JobOrchestrator, STATE_FILE, type JobResult, type StepRunner } from "./orchestrator.js";
import { JobOutputs, OUTPUTS_FILE, SUMMARY_FILE } from "./outputs.js";
import type { Reporter } from "./reporter.js";
import { failedStep, type JobStep } from "./state-machine.js";
import { runBuildDist } from "./steps/build-dist.js";
import { runBuildUi } from "./steps/build-ui.js";
import { runCheckout } from "./steps/checkout.js";
import { runDiscard, runPublish } from "./steps/publish.js";
import { runVerify } from "./steps/verify.js";

export const RUN_FILE = "run.json";
export const WORKSPACE_DIR = "workspace";
export const SCRATCH_DIR = "scratch";

export type PipelineDeps = {
  config: DistctlConfig;
  runner: CommandRunner;
  source: SourceControl;
  store: ArtifactStore;
  reporter: Reporter;
  /** Absolute runs directory; each run gets `<runsDir>/<run_id>`. */
  runsDir: string;
  keepWorkspace?: boolean;
  checks?: readonly VerificationCheck[];
  stillCurrent?: () => boolean;
  /** Environment for `$GITHUB_OUTPUT` / `$GITHUB_STEP_SUMMARY` mirroring. */
  env?: NodeJS.ProcessEnv;
};

export type JobOutcome = JobResult & {
  job_dir: string;
  package: string | null;
  artifact: PublishedArtifact | null;
};

export type PipelineResult = {
  run: PipelineRun;
  run_dir: string;
  jobs: JobOutcome[];
  success: boolean;
  /** Some job failed or timed out. */
  failed: boolean;
  cancelled: boolean;
};

export function runDirFor(runsDir: string, runId: string): string {
  return path.join(runsDir, runId);
}

/**
 * Run the variant matrix of one pipeline run and write the run summary.
 */
export async function runPipeline(deps: PipelineDeps, run: PipelineRun, signal?: AbortSignal): Promise<PipelineResult> {
  const runDir = runDirFor(deps.runsDir, run.run_id);
  fs.mkdirSync(runDir, { recursive: true });
  fs.writeFileSync(path.join(runDir, RUN_FILE), JSON.stringify(run, null, 2) + "\n", "utf8");

  const reporter = deps.reporter.child({ run_id: run.run_id });
  reporter.info("RUN_START", `${run.event} ${run.ref}: ${run.variants.join(", ")}${run.publish ? " (publishing)" : ""}`, {
    concurrency_key: run.concurrency_key,
  });

  const variants = run.variants.map((name) => {
    const variant = deps.config.variants.find((v) => v.name === name);
    if (!variant) throw new Error(`Unknown variant: ${name}`);
    return variant;
  });

  const matrix = await runMatrix(
    variants.map((variant) => ({
      name: variant.name,
      run: (jobSignal: AbortSignal) => runJob({ ...deps, reporter }, run, variant, jobSignal),
    })),
    { failFast: deps.config.matrix.fail_fast, signal },
  );

  const jobs = matrix.results;
  fs.writeFileSync(
    path.join(runDir, SUMMARY_FILE),
    runSummary(
      run,
      jobs.map((j) => ({
        variant: j.variant,
        status: j.final_status,
        package: j.package,
        url: j.artifact?.url ?? null,
        error: j.error ?? null,
      })),
    ),
    "utf8",
  );

  const failed = jobs.some((j) => failedStep(j.final_status) !== null);
  const cancelled = jobs.some((j) => j.final_status === "cancelled");
  reporter.info("RUN_DONE", `${jobs.filter((j) => j.success).length}/${jobs.length} jobs succeeded`, {
    statuses: Object.fromEntries(jobs.map((j) => [j.variant, j.final_status])),
  });

  return { run, run_dir: runDir, jobs, success: matrix.success, failed, cancelled };
}

/**
 * One variant job: orchestrate the steps, then clean up and write the
 * manifest regardless of how the job ended.
 */
export async function runJob(deps: PipelineDeps, run: PipelineRun, variant: VariantConfig, signal: AbortSignal): Promise<JobOutcome> {
  const jobDir = path.join(runDirFor(deps.runsDir, run.run_id), variant.name);
  const records = new RecordWriter(jobDir, run.run_id, variant.name);
  records.init();

  const ctx: JobContext = {
    run,
    variant,
    config: deps.config,
    runner: deps.runner,
    source: deps.source,
    store: deps.store,
    reporter: deps.reporter.child({ variant: variant.name }),
    jobDir,
    workspace: path.join(jobDir, WORKSPACE_DIR),
    scratchDir: path.join(jobDir, SCRATCH_DIR),
    outputs: new JobOutputs(jobDir, deps.env),
    records,
    checks: deps.checks,
    stillCurrent: deps.stillCurrent ?? (() => true),
    sha: null,
    dists: null,
    published: null,
  };

  const orchestrator = new JobOrchestrator(jobDir, deps.config.job, stepRunnerFor(ctx), ctx.reporter);
  let result: JobResult;
  try {
    result = await orchestrator.run({ runId: run.run_id, variant: variant.name, publish: run.publish, signal });
  } finally {
    await cleanup(ctx, deps.keepWorkspace ?? false);
  }

  records.track(STATE_FILE, "orchestrator", "job-state");
  records.track(OUTPUTS_FILE, "pipeline");
  records.track(SUMMARY_FILE, "pipeline");
  records.writeManifest({
    source: { ref: run.checkout_ref, sha: ctx.sha },
    distributions: ctx.dists ? [ctx.dists.archive, ctx.dists.package] : [],
  });

  return {
    ...result,
    job_dir: jobDir,
    package: ctx.dists?.package.name ?? null,
    artifact: ctx.published,
  };
}

function stepRunnerFor(ctx: JobContext): StepRunner {
  const steps: Record<JobStep, (signal: AbortSignal) => Promise<void>> = {
    checkout: (signal) => runCheckout(ctx, signal),
    build_ui: (signal) => runBuildUi(ctx, signal),
    build_dist: (signal) => runBuildDist(ctx, signal),
    verify: (signal) => runVerify(ctx, signal),
    publish: (signal) => runPublish(ctx, signal),
    discard: () => runDiscard(ctx),
  };

  return async (step, _state, signal) => {
    await steps[step](signal);
    return { success: true };
  };
}

async function cleanup(ctx: JobContext, keepWorkspace: boolean): Promise<void> {
  fs.rmSync(ctx.scratchDir, { recursive: true, force: true });
  if (keepWorkspace || ctx.sha === null) return;
  try {
    await ctx.source.removeWorktree(ctx.workspace);
  } catch (e) {
    ctx.reporter.warn("WORKTREE_CLEANUP_FAILED", `Could not remove ${ctx.workspace}: ${errorMessage(e)}`);
  }
}
