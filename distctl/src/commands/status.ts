import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../core/errors.js";
import { STATE_FILE, type JobState } from "../core/orchestrator.js";
import { RUN_FILE } from "../core/pipeline.js";
import { failedStep, isTerminal, type JobStep } from "../core/state-machine.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import type { PipelineRun } from "../types/trigger.js";

export type JobStatusEntry = {
  variant: string;
  status: string;
  /** False while the job is still between steps, or its state is unreadable. */
  finished: boolean;
  failed_step: JobStep | null;
  updated_at: string;
  error: string | null;
};

export type StatusResult =
  | { ok: true; run: PipelineRun | null; jobs: JobStatusEntry[] }
  | { ok: false; error: string };

/**
 * Read the job states of one run.
 */
export function status(opts: { runsDir: string; runId: string; registry?: SchemaRegistry }): StatusResult {
  const runDir = path.join(opts.runsDir, opts.runId);
  if (!fs.existsSync(runDir)) {
    return { ok: false, error: `No run found: ${opts.runId}` };
  }

  const registry = opts.registry ?? createRegistry();
  try {
    const jobs = fs
      .readdirSync(runDir, { withFileTypes: true })
      .filter((e) => e.isDirectory() && fs.existsSync(path.join(runDir, e.name, STATE_FILE)))
      .map((e) => readJobStatus(path.join(runDir, e.name), e.name, registry))
      .sort((a, b) => a.variant.localeCompare(b.variant));
    return { ok: true, run: readRun(runDir), jobs };
  } catch (e) {
    return { ok: false, error: `Failed to read state: ${errorMessage(e)}` };
  }
}

export type RunListEntry = { id: string; event: string; ref: string; created_at: string };

/**
 * List all runs, newest first.
 */
export function listRuns(runsDir: string): RunListEntry[] {
  if (!fs.existsSync(runsDir)) return [];

  const results: RunListEntry[] = [];
  for (const entry of fs.readdirSync(runsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const run = readRun(path.join(runsDir, entry.name));
    if (run) results.push({ id: entry.name, event: run.event, ref: run.ref, created_at: run.created_at });
  }

  return results.sort((a, b) => b.created_at.localeCompare(a.created_at));
}

function readJobStatus(jobDir: string, variant: string, registry: SchemaRegistry): JobStatusEntry {
  const state: unknown = JSON.parse(fs.readFileSync(path.join(jobDir, STATE_FILE), "utf8"));
  if (!registry.is<JobState>("job-state", state)) {
    return {
      variant,
      status: "corrupted",
      finished: false,
      failed_step: null,
      updated_at: "",
      error: registry.validate("job-state", state).errors,
    };
  }
  return {
    variant,
    status: state.status,
    finished: isTerminal(state.status),
    failed_step: failedStep(state.status),
    updated_at: state.updated_at,
    error: state.error,
  };
}

function readRun(runDir: string): PipelineRun | null {
  const file = path.join(runDir, RUN_FILE);
  if (!fs.existsSync(file)) return null;
  const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return isPipelineRun(parsed) ? parsed : null;
}

function isPipelineRun(value: unknown): value is PipelineRun {
  if (typeof value !== "object" || value === null) return false;
  return (
    "run_id" in value && typeof value.run_id === "string" &&
    "event" in value && typeof value.event === "string" &&
    "ref" in value && typeof value.ref === "string" &&
    "created_at" in value && typeof value.created_at === "string" &&
    "variants" in value && Array.isArray(value.variants)
  );
}
