#!/usr/bin/env node

import path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { listArtifacts } from "./commands/artifacts.js";
import { EXIT } from "./commands/exit-codes.js";
import { variantMatrix } from "./commands/matrix.js";
import { run } from "./commands/run.js";
import { listRuns, status } from "./commands/status.js";
import { validateAll } from "./commands/validate.js";
import { loadConfig } from "./config/validator.js";
import { CancelledError, errorMessage } from "./core/errors.js";
import { Reporter, type OutputFormat } from "./core/reporter.js";
import { GitOperations } from "./git/operations.js";
import type { DistctlConfig } from "./types/config.js";

type CommonOpts = { config?: string; env?: string; format: OutputFormat; verbose?: boolean };

const program = new Command();

program
  .name("distctl")
  .description("Build, verify and publish distribution variants")
  .version("0.1.0");

function parseFormat(value: string): OutputFormat {
  if (value !== "human" && value !== "jsonl") throw new InvalidArgumentError("Expected human or jsonl.");
  return value;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

function reporterFor(opts: CommonOpts): Reporter {
  return new Reporter(opts.format, opts.verbose ? "debug" : "info");
}

function configOrExit(opts: CommonOpts, reporter: Reporter): DistctlConfig {
  try {
    return loadConfig(opts.env, opts.config);
  } catch (e) {
    reporter.error("CONFIG_INVALID", errorMessage(e));
    process.exit(EXIT.CONFIG_INVALID);
  }
}

function withCommon(cmd: Command): Command {
  return cmd
    .option("--config <dir>", "Config directory (default: bundled config)")
    .option("--env <name>", "Config environment layer, e.g. ci")
    .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
    .option("--verbose", "Include debug output");
}

withCommon(
  program
    .command("run")
    .description("Evaluate a trigger and run the build matrix")
    .requiredOption("--event <event>", "push|pull_request|workflow_dispatch")
    .option("--ref <ref>", "Pushed ref, or the dispatch ref input")
    .option("--trigger-ref <ref>", "Branch a dispatch was started from (default: default_ref)")
    .option("--pr <number>", "Pull request number", parsePositiveInt)
    .option("--draft", "The pull request is a draft")
    .option("--action <action>", "Pull request action (default: opened)")
    .option("--event-path <file>", "GitHub event payload file")
    .option("--variant <names...>", "Run only these variants")
    .option("--runs-dir <dir>", "Runs directory (default: runs_dir from config)")
    .option("--store-dir <dir>", "Artifact store (default: publish.store_dir from config)")
    .option("--repo <path>", "Repository to build from", ".")
    .option("--keep-workspace", "Keep job worktrees after the run"),
).action(
  async (
    opts: CommonOpts & {
      event: string;
      ref?: string;
      triggerRef?: string;
      pr?: number;
      draft?: boolean;
      action?: string;
      eventPath?: string;
      variant?: string[];
      runsDir?: string;
      storeDir?: string;
      repo: string;
      keepWorkspace?: boolean;
    },
  ) => {
    const reporter = reporterFor(opts);

    let ref = opts.ref;
    if (opts.event === "push" && ref === undefined && opts.eventPath === undefined) {
      try {
        ref = `refs/heads/${await new GitOperations(path.resolve(opts.repo)).getCurrentBranch()}`;
      } catch (e) {
        reporter.warn("BRANCH_UNKNOWN", `Cannot determine current branch, using default_ref: ${errorMessage(e)}`);
      }
    }

    const controller = new AbortController();
    const cancel = (sig: NodeJS.Signals) => controller.abort(new CancelledError(`Received ${sig}`));
    process.once("SIGTERM", cancel);
    process.once("SIGINT", cancel);

    const res = await run(
      {
        event: opts.event,
        ref,
        triggerRef: opts.triggerRef,
        pr: opts.pr,
        draft: opts.draft,
        action: opts.action,
        eventPath: opts.eventPath,
        variants: opts.variant,
        configDir: opts.config,
        envName: opts.env,
        runsDir: opts.runsDir,
        storeDir: opts.storeDir,
        repoPath: opts.repo,
        keepWorkspace: opts.keepWorkspace,
      },
      { reporter, signal: controller.signal },
    );

    process.off("SIGTERM", cancel);
    process.off("SIGINT", cancel);

    if (res.kind === "error") {
      reporter.error("RUN_ERROR", res.error);
    } else if (res.kind === "completed") {
      for (const job of res.result.jobs) {
        const url = job.artifact ? ` ${job.artifact.url}` : "";
        const level = job.success ? "info" : "error";
        reporter.emit({
          level,
          code: "JOB_RESULT",
          message: `${job.variant}: ${job.final_status}${url}`,
          details: { run_id: job.run_id, variant: job.variant, status: job.final_status, job_dir: job.job_dir },
        });
      }
    }
    process.exit(res.exitCode);
  },
);

withCommon(
  program
    .command("validate")
    .description("Validate config and (optionally) the records of a run")
    .option("--run-dir <dir>", "Run directory to check"),
).action((opts: CommonOpts & { runDir?: string }) => {
  const reporter = reporterFor(opts);
  const res = validateAll({ configDir: opts.config, envName: opts.env, runDir: opts.runDir });
  if (!res.ok) {
    for (const err of res.errors) reporter.emit(err);
    const configOnly = res.errors.every((e) => e.code.startsWith("CONFIG_"));
    process.exit(configOnly ? EXIT.CONFIG_INVALID : EXIT.JOB_FAILED);
  }
  reporter.info("OK", "OK");
});

withCommon(
  program
    .command("status")
    .description("Show job states of a run (omit the id to list runs)")
    .argument("[run-id]", "Run ID")
    .option("--runs-dir <dir>", "Runs directory (default: runs_dir from config)"),
).action((runId: string | undefined, opts: CommonOpts & { runsDir?: string }) => {
  const reporter = reporterFor(opts);
  const runsDir = opts.runsDir ?? configOrExit(opts, reporter).runs_dir;

  if (!runId) {
    const runs = listRuns(runsDir);
    if (runs.length === 0) reporter.info("NO_RUNS", "No runs found.");
    for (const r of runs) reporter.info("RUN", `${r.id}  ${r.event}  ${r.ref}  ${r.created_at}`, r);
    return;
  }

  const res = status({ runsDir, runId });
  if (!res.ok) {
    reporter.error("STATUS_FAILED", res.error);
    process.exit(EXIT.INVALID_ARGS);
  }
  for (const job of res.jobs) {
    const line = `${job.variant}  ${job.status}${job.finished ? "" : " (running)"}  ${job.updated_at}`;
    if (job.failed_step) reporter.warn("JOB", `${line}  ${job.failed_step}: ${job.error ?? "no error recorded"}`, job);
    else reporter.info("JOB", `${line}${job.error ? `  ${job.error}` : ""}`, job);
  }
});

withCommon(
  program
    .command("artifacts")
    .description("List published artifacts")
    .option("--store-dir <dir>", "Artifact store (default: publish.store_dir from config)")
    .option("--prune", "Delete artifacts past their retention first"),
).action((opts: CommonOpts & { storeDir?: string; prune?: boolean }) => {
  const reporter = reporterFor(opts);
  const storeDir = opts.storeDir ?? configOrExit(opts, reporter).publish.store_dir;
  const res = listArtifacts({ storeDir, prune: opts.prune });
  for (const a of res.pruned) reporter.info("PRUNED", `pruned ${a.id}/${a.file} (expired ${a.expires_at})`, { id: a.id });
  for (const a of res.artifacts) {
    reporter.info("ARTIFACT", `${a.id}  ${a.file}  ${a.size} bytes  expires ${a.expires_at}`, { ...a });
  }
});

withCommon(program.command("matrix").description("Print the variant matrix as JSON")).action((opts: CommonOpts) => {
  const reporter = reporterFor(opts);
  process.stdout.write(JSON.stringify(variantMatrix(configOrExit(opts, reporter))) + "\n");
});

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(JSON.stringify({ ok: false, error: errorMessage(err) }) + "\n");
  process.exit(EXIT.JOB_FAILED);
});
