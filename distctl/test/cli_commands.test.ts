import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { RecordWriter } from "../src/artifact-writer/writer.js";
import { listArtifacts } from "../src/commands/artifacts.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { variantMatrix } from "../src/commands/matrix.js";
import { LOCKS_DIR, run, type RunDeps, type RunOptions } from "../src/commands/run.js";
import { listRuns, status } from "../src/commands/status.js";
import { validateAll, validateJobDir } from "../src/commands/validate.js";
import { SingleFlight } from "../src/core/concurrency.js";
import { CancelledError } from "../src/core/errors.js";
import { JobOrchestrator, STATE_FILE } from "../src/core/orchestrator.js";
import { RUN_FILE } from "../src/core/pipeline.js";
import { silentReporter } from "../src/core/reporter.js";
import { generateRunId, refSlug } from "../src/core/run-id.js";
import { FileArtifactStore } from "../src/publish/store.js";
import { createRegistry } from "../src/schema/registry.js";
import type { PipelineRun } from "../src/types/trigger.js";
import { FakeRunner, FakeSource, SHA_MASTER, baseConfig, projectHandler, sleep, tmpDir } from "./helpers.js";

function pipelineRun(runId: string, createdAt: string): PipelineRun {
  return {
    run_id: runId,
    workflow: "build-dist",
    event: "push",
    ref: "refs/heads/master",
    checkout_ref: "master",
    repository: "example-org/example-project",
    pull_request: null,
    concurrency_key: "build-dist-push-refs/heads/master",
    publish: false,
    variants: ["dev", "skinny"],
    created_at: createdAt,
  };
}

function writeRun(runsDir: string, runId: string, createdAt: string): string {
  const dir = path.join(runsDir, runId);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, RUN_FILE), JSON.stringify(pipelineRun(runId, createdAt)));
  return dir;
}

/** A job directory whose steps all succeed without doing anything. */
async function finishedJob(jobDir: string): Promise<void> {
  const orchestrator = new JobOrchestrator(jobDir, baseConfig().job, async () => ({ success: true }));
  await orchestrator.run({ runId: "r1", variant: path.basename(jobDir), publish: false });
}

/** A job directory that stopped at checkout, so it owes no verification records. */
async function unresolvedJob(jobDir: string): Promise<void> {
  const orchestrator = new JobOrchestrator(jobDir, baseConfig().job, async () => ({
    success: false,
    error: "Cannot resolve revision 'gone'",
    kind: "resolution",
  }));
  await orchestrator.run({ runId: "r1", variant: path.basename(jobDir), publish: false });
}

describe("exit codes", () => {
  it("keeps stable values", () => {
    expect(EXIT).toEqual({ SUCCESS: 0, JOB_FAILED: 1, CANCELLED: 2, INVALID_ARGS: 3, CONFIG_INVALID: 4 });
  });
});

describe("run ids", () => {
  const now = new Date("2026-03-01T10:00:00.000Z");

  it("combines event, ref, date and a sequence number", () => {
    expect(generateRunId("workflow_dispatch", "v3.1.0", tmpDir("ids"), now)).toBe("workflow-dispatch-v3-1-0-20260301-001");
  });

  it("continues after the highest existing sequence", () => {
    const dir = tmpDir("ids");
    fs.mkdirSync(path.join(dir, "push-master-20260301-001"));
    fs.mkdirSync(path.join(dir, "push-master-20260301-007"));
    fs.mkdirSync(path.join(dir, "push-master-20260228-009"));
    expect(generateRunId("push", "refs/heads/master", dir, now)).toBe("push-master-20260301-008");
  });

  it("claims the run directory so the next call moves on", () => {
    const dir = tmpDir("ids");
    expect(generateRunId("push", "refs/heads/master", dir, now)).toBe("push-master-20260301-001");
    expect(fs.statSync(path.join(dir, "push-master-20260301-001")).isDirectory()).toBe(true);
    expect(generateRunId("push", "refs/heads/master", dir, now)).toBe("push-master-20260301-002");
  });

  it("skips a sequence number taken after the scan", () => {
    const dir = tmpDir("ids");
    // Not a directory, so the scan ignores it, but the name is still taken.
    fs.writeFileSync(path.join(dir, "push-master-20260301-001"), "");
    expect(generateRunId("push", "refs/heads/master", dir, now)).toBe("push-master-20260301-002");
  });

  it("slugs refs", () => {
    expect(refSlug("refs/heads/branch-3.1")).toBe("branch-3-1");
    expect(refSlug("refs/pull/7/merge")).toBe("pull-7-merge");
    expect(refSlug("refs/tags/v3.1.0")).toBe("v3-1-0");
    expect(refSlug("///")).toBe("ref");
  });
});

describe("status", () => {
  it("reports each job's state, flagging unreadable ones", async () => {
    const runsDir = tmpDir("status");
    const runDir = writeRun(runsDir, "push-master-20260301-001", "2026-03-01T10:00:00.000Z");
    await finishedJob(path.join(runDir, "dev"));
    fs.mkdirSync(path.join(runDir, "skinny"));
    fs.writeFileSync(path.join(runDir, "skinny", STATE_FILE), JSON.stringify({ status: "weird" }));

    const res = status({ runsDir, runId: "push-master-20260301-001" });
    if (!res.ok) throw new Error(res.error);

    expect(res.run?.run_id).toBe("push-master-20260301-001");
    expect(res.jobs.map((j) => [j.variant, j.status])).toEqual([
      ["dev", "discarded"],
      ["skinny", "corrupted"],
    ]);
    expect(res.jobs[0].error).toBeNull();
    expect(res.jobs.map((j) => [j.finished, j.failed_step])).toEqual([
      [true, null],
      [false, null],
    ]);
  });

  it("names the step a failed job stopped at", async () => {
    const runsDir = tmpDir("status");
    const runDir = writeRun(runsDir, "push-master-20260301-001", "2026-03-01T10:00:00.000Z");
    await unresolvedJob(path.join(runDir, "dev"));

    const res = status({ runsDir, runId: "push-master-20260301-001" });
    if (!res.ok) throw new Error(res.error);

    expect(res.jobs).toHaveLength(1);
    expect(res.jobs[0]).toMatchObject({
      variant: "dev",
      status: "failed_checkout",
      finished: true,
      failed_step: "checkout",
      error: "Cannot resolve revision 'gone'",
    });
  });

  it("reports a missing run", () => {
    expect(status({ runsDir: tmpDir("status"), runId: "nope" })).toEqual({ ok: false, error: "No run found: nope" });
  });

  it("lists runs newest first", () => {
    const runsDir = tmpDir("status");
    writeRun(runsDir, "push-master-20260301-001", "2026-03-01T10:00:00.000Z");
    writeRun(runsDir, "push-master-20260302-001", "2026-03-02T10:00:00.000Z");
    fs.mkdirSync(path.join(runsDir, LOCKS_DIR));

    expect(listRuns(runsDir)).toEqual([
      { id: "push-master-20260302-001", event: "push", ref: "refs/heads/master", created_at: "2026-03-02T10:00:00.000Z" },
      { id: "push-master-20260301-001", event: "push", ref: "refs/heads/master", created_at: "2026-03-01T10:00:00.000Z" },
    ]);
    expect(listRuns(path.join(runsDir, "absent"))).toEqual([]);
  });
});

describe("artifacts", () => {
  it("prunes expired artifacts before listing", () => {
    const storeDir = tmpDir("store");
    const src = path.join(tmpDir("src"), "example_project-3.1.0-py3-none-any.whl");
    fs.writeFileSync(src, "pkg");
    const store = new FileArtifactStore(storeDir, null, () => new Date("2026-03-01T00:00:00.000Z"));
    store.upload({ name: "pkg", filePath: src, pattern: "*.whl", retentionDays: 7, runId: "r1", variant: "dev" });

    const kept = listArtifacts({ storeDir, prune: true, now: new Date("2026-03-02T00:00:00.000Z") });
    expect(kept.pruned).toEqual([]);
    expect(kept.artifacts.map((a) => a.id)).toEqual(["r1-dev"]);

    const gone = listArtifacts({ storeDir, prune: true, now: new Date("2026-03-09T00:00:00.000Z") });
    expect(gone.pruned.map((a) => a.id)).toEqual(["r1-dev"]);
    expect(gone.artifacts).toEqual([]);
  });
});

describe("matrix", () => {
  it("lists variants as matrix include entries", () => {
    expect(variantMatrix(baseConfig())).toEqual({
      include: [
        { name: "dev", selector: "dev", subdirectory: null },
        { name: "skinny", selector: "skinny", subdirectory: "libs/skinny" },
        { name: "tracing", selector: "tracing", subdirectory: "libs/tracing" },
      ],
    });
  });
});

describe("validate", () => {
  it("accepts the bundled config", () => {
    expect(validateAll({ env: {} })).toEqual({ ok: true });
  });

  it("reports a missing config directory", () => {
    const res = validateAll({ configDir: "/nonexistent/distctl-config", env: {} });
    expect(res.ok).toBe(false);
    expect(!res.ok && res.errors.map((e) => e.code)).toEqual(["CONFIG_DIR_MISSING"]);
  });

  it("reports a config that does not match the schema", () => {
    const dir = tmpDir("config");
    fs.writeFileSync(path.join(dir, "base.yaml"), "workflow: 5\n");
    const res = validateAll({ configDir: dir, env: {} });
    expect(!res.ok && res.errors.map((e) => e.code)).toEqual(["CONFIG_INVALID"]);
  });

  it("reports a missing run directory", () => {
    const res = validateAll({ env: {}, runDir: "/nonexistent/distctl-run" });
    expect(!res.ok && res.errors.map((e) => e.code)).toEqual(["RUN_DIR_MISSING"]);
  });

  it("detects a record changed after the manifest was written", async () => {
    const jobDir = path.join(tmpDir("job"), "dev");
    await unresolvedJob(jobDir);
    const records = new RecordWriter(jobDir, "r1", "dev");
    records.track(STATE_FILE, "orchestrator", "job-state");
    records.writeManifest({ source: { ref: "master", sha: SHA_MASTER }, distributions: [] });
    const registry = createRegistry();

    expect(validateJobDir(jobDir, registry)).toEqual([]);

    fs.appendFileSync(path.join(jobDir, STATE_FILE), "\n");
    expect(validateJobDir(jobDir, registry).map((d) => d.code)).toEqual(["RECORD_SHA256_MISMATCH"]);
  });

  it("requires the manifest", async () => {
    const jobDir = path.join(tmpDir("job"), "dev");
    await unresolvedJob(jobDir);
    expect(validateJobDir(jobDir, createRegistry()).map((d) => d.message)).toEqual([`Missing record: ${path.join(jobDir, "manifest.json")}`]);
  });

  it("requires verification records once a job was packaged", async () => {
    const jobDir = path.join(tmpDir("job"), "dev");
    await finishedJob(jobDir);
    expect(validateJobDir(jobDir, createRegistry()).map((d) => d.message)).toEqual([
      `Missing record: ${path.join(jobDir, "manifest.json")}`,
      `Missing record: ${path.join(jobDir, "outputs.env")}`,
      `Missing record: ${path.join(jobDir, "verification.json")}`,
    ]);
  });
});

describe("run", () => {
  function deps(): RunDeps {
    return {
      reporter: silentReporter(),
      runner: new FakeRunner(projectHandler()),
      source: new FakeSource(),
      store: new FileArtifactStore(tmpDir("store"), null),
      flight: new SingleFlight(),
      proc: { isAlive: () => false, terminate: () => {} },
    };
  }

  function options(overrides: Partial<RunOptions> = {}): RunOptions {
    return { event: "push", ref: "refs/heads/master", runsDir: tmpDir("runs"), env: {}, variants: ["dev"], ...overrides };
  }

  it("rejects an unknown event", async () => {
    expect(await run(options({ event: "release" }), deps())).toEqual({ kind: "error", exitCode: EXIT.INVALID_ARGS, error: "Unknown event: release" });
  });

  it("rejects an invalid config", async () => {
    const dir = tmpDir("config");
    fs.writeFileSync(path.join(dir, "base.yaml"), "workflow: 5\n");
    const res = await run(options({ configDir: dir }), deps());
    expect(res.kind).toBe("error");
    expect(res.exitCode).toBe(EXIT.CONFIG_INVALID);
  });

  it("rejects an unreadable event payload", async () => {
    const file = path.join(tmpDir("payload"), "event.json");
    fs.writeFileSync(file, "[]");
    const res = await run(options({ ref: undefined, eventPath: file }), deps());
    expect(res).toEqual({
      kind: "error",
      exitCode: EXIT.INVALID_ARGS,
      error: "Cannot read event payload: Event payload is not a JSON object",
    });
  });

  it("skips pushes to other branches", async () => {
    const res = await run(options({ ref: "refs/heads/feature" }), deps());
    expect(res).toEqual({
      kind: "skipped",
      exitCode: EXIT.SUCCESS,
      reason: "branch 'feature' does not match master, branch-+([0-9]).+([0-9])",
    });
  });

  it("skips draft pull requests", async () => {
    const res = await run(options({ event: "pull_request", ref: undefined, pr: 7, draft: true }), deps());
    expect(res).toEqual({ kind: "skipped", exitCode: EXIT.SUCCESS, reason: "pull request #7 is a draft" });
  });

  it("completes a run and releases its lock", async () => {
    const opts = options();
    const res = await run(opts, deps());
    if (res.kind !== "completed") throw new Error(res.kind);

    expect(res.exitCode).toBe(EXIT.SUCCESS);
    expect(res.result.jobs.map((j) => j.final_status)).toEqual(["discarded"]);
    expect(fs.readdirSync(path.join(opts.runsDir ?? "", LOCKS_DIR))).toEqual([]);
  });

  it("reports a job failure when fail-fast cancelled the other variants", async () => {
    const failing = {
      ...deps(),
      runner: new FakeRunner(
        projectHandler({
          override: async (spec) => {
            if (spec.command !== "yarn" || spec.args[0] !== "build") return undefined;
            if ((spec.cwd ?? "").includes(`${path.sep}skinny${path.sep}`)) return { exitCode: 2 };
            await sleep(5_000, spec.signal);
            return undefined;
          },
        }),
      ),
    };
    const res = await run(options({ variants: undefined, env: { DISTCTL_MATRIX__FAIL_FAST: "true" } }), failing);
    if (res.kind !== "completed") throw new Error(res.kind);

    expect(res.result.jobs.map((j) => j.final_status)).toEqual(["cancelled", "failed_build_ui", "cancelled"]);
    expect(res.exitCode).toBe(EXIT.JOB_FAILED);
  });

  it("reports a cancellation that came from outside the run", async () => {
    const controller = new AbortController();
    controller.abort(new CancelledError("Received SIGTERM"));
    const res = await run(options(), { ...deps(), signal: controller.signal });
    if (res.kind !== "completed") throw new Error(res.kind);

    expect(res.result.jobs.map((j) => [j.final_status, j.error])).toEqual([["cancelled", "Received SIGTERM"]]);
    expect(res.result.failed).toBe(false);
    expect(res.exitCode).toBe(EXIT.CANCELLED);
  });

  it("cancels the older of two runs for the same ref", async () => {
    const opts = options();
    const shared = deps();

    const [first, second] = await Promise.all([run(opts, shared), run(opts, shared)]);
    if (first.kind !== "completed" || second.kind !== "completed") throw new Error("run did not complete");

    expect(first.result.run.run_id.endsWith("-001")).toBe(true);
    expect(second.result.run.run_id.endsWith("-002")).toBe(true);
    expect(first.exitCode).toBe(EXIT.CANCELLED);
    expect(first.result.jobs[0].final_status).toBe("cancelled");
    expect(first.result.jobs[0].error).toBe("Superseded by a newer run for build-dist-push-refs/heads/master");
    expect(second.exitCode).toBe(EXIT.SUCCESS);
    expect(fs.readdirSync(path.join(opts.runsDir ?? "", LOCKS_DIR))).toEqual([]);
  });
});
