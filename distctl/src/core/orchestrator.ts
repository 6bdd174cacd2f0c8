import fs from "node:fs";
import path from "node:path";
import type { JobConfig } from "../types/config.js";
import { CancelledError, TimeoutError, errorKind, errorMessage, type ErrorKind } from "./errors.js";
import type { Reporter } from "./reporter.js";
import {
  type JobStatus,
  type JobStep,
  getJobTimeoutMs,
  getStepTimeout,
  isPhase,
  isSuccess,
  nextState,
  stepFor,
} from "./state-machine.js";

export const STATE_FILE = "state.json";

export type StepResult = {
  status: "success" | "failed" | "timeout" | "cancelled";
  duration_ms: number;
  error?: string;
  kind?: ErrorKind;
};

/** Persistent job state stored in `<jobDir>/state.json`. */
export type JobState = {
  run_id: string;
  variant: string;
  publish: boolean;
  status: JobStatus;
  current_step: JobStep | null;
  started_at: string;
  updated_at: string;
  finished_at: string | null;
  step_started_at: string | null;
  step_results: Partial<Record<JobStep, StepResult>>;
  error: string | null;
  error_kind: ErrorKind | null;
};

export type JobResult = {
  success: boolean;
  run_id: string;
  variant: string;
  final_status: JobStatus;
  step_results: JobState["step_results"];
  error?: string;
  error_kind?: ErrorKind;
};

export type StepOutcome = { success: true } | { success: false; error: string; kind?: ErrorKind };

export type StepRunner = (step: JobStep, state: JobState, signal: AbortSignal) => Promise<StepOutcome>;

/**
 * Drives one variant job through the state machine.
 *
 * Main loop: pick the step for the current milestone → execute under its
 * deadline → persist → advance. The first unsuccessful step ends the job;
 * nothing is retried.
 */
export class JobOrchestrator {
  constructor(
    private readonly jobDir: string,
    private readonly config: JobConfig,
    private readonly stepRunner: StepRunner,
    private readonly reporter?: Reporter,
  ) {}

  async run(opts: { runId: string; variant: string; publish: boolean; signal?: AbortSignal }): Promise<JobResult> {
    const statePath = path.join(this.jobDir, STATE_FILE);
    fs.mkdirSync(this.jobDir, { recursive: true });

    const now = new Date().toISOString();
    const state: JobState = {
      run_id: opts.runId,
      variant: opts.variant,
      publish: opts.publish,
      status: "pending",
      current_step: null,
      started_at: now,
      updated_at: now,
      finished_at: null,
      step_started_at: null,
      step_results: {},
      error: null,
      error_kind: null,
    };
    saveState(statePath, state);

    const jobDeadline = Date.now() + getJobTimeoutMs(this.config);

    while (isPhase(state.status)) {
      const phase = state.status;
      const step = stepFor(phase, opts.publish);

      if (opts.signal?.aborted) {
        this.finishStep(state, step, "cancel", { status: "cancelled", duration_ms: 0, error: reasonOf(opts.signal), kind: "cancelled" });
        break;
      }

      state.current_step = step;
      state.step_started_at = new Date().toISOString();
      state.updated_at = state.step_started_at;
      saveState(statePath, state);
      this.reporter?.info("STEP_START", `${step} started`, { step });

      const stepStart = Date.now();
      const limitMs = Math.min(getStepTimeout(step, this.config) * 1000, jobDeadline - stepStart);
      const controller = new AbortController();
      const forward = () => controller.abort(opts.signal?.reason ?? new CancelledError());
      opts.signal?.addEventListener("abort", forward, { once: true });
      const timer = setTimeout(
        () => controller.abort(new TimeoutError(`Step ${step} exceeded ${formatLimit(limitMs)}`)),
        Math.max(0, limitMs),
      );

      try {
        const outcome = await Promise.race([this.stepRunner(step, state, controller.signal), rejectOnAbort(controller.signal)]);
        const duration_ms = Date.now() - stepStart;
        if (outcome.success) {
          this.finishStep(state, step, "success", { status: "success", duration_ms });
          this.reporter?.info("STEP_OK", `${step} finished in ${duration_ms}ms`, { step, duration_ms });
        } else {
          this.finishStep(state, step, "failure", { status: "failed", duration_ms, error: outcome.error, kind: outcome.kind });
        }
      } catch (e) {
        const duration_ms = Date.now() - stepStart;
        const reason: unknown = controller.signal.aborted ? controller.signal.reason : e;
        if (reason instanceof TimeoutError) {
          this.finishStep(state, step, "timeout", { status: "timeout", duration_ms, error: reason.message, kind: "timeout" });
        } else if (reason instanceof CancelledError || opts.signal?.aborted) {
          this.finishStep(state, step, "cancel", { status: "cancelled", duration_ms, error: errorMessage(reason), kind: "cancelled" });
        } else {
          this.finishStep(state, step, "failure", { status: "failed", duration_ms, error: errorMessage(e), kind: errorKind(e) });
        }
      } finally {
        clearTimeout(timer);
        opts.signal?.removeEventListener("abort", forward);
      }

      const result = state.step_results[step];
      if (result && result.status !== "success") {
        this.reporter?.error("STEP_FAILED", `${step} ${result.status}: ${result.error ?? ""}`.trimEnd(), {
          step,
          kind: result.kind,
        });
      }

      state.step_started_at = null;
      state.updated_at = new Date().toISOString();
      if (!isPhase(state.status)) state.finished_at = state.updated_at;
      saveState(statePath, state);
    }

    return {
      success: isSuccess(state.status),
      run_id: state.run_id,
      variant: state.variant,
      final_status: state.status,
      step_results: state.step_results,
      error: state.error ?? undefined,
      error_kind: state.error_kind ?? undefined,
    };
  }

  private finishStep(state: JobState, step: JobStep, event: "success" | "failure" | "timeout" | "cancel", result: StepResult): void {
    const phase = state.status;
    if (!isPhase(phase)) return;
    state.step_results[step] = result;
    state.status = nextState(phase, event, state.publish);
    state.current_step = null;
    if (event !== "success") {
      state.error = result.error ?? `${step} ${result.status}`;
      state.error_kind = result.kind ?? (event === "timeout" ? "timeout" : event === "cancel" ? "cancelled" : null);
      state.finished_at = new Date().toISOString();
    }
  }
}

export function saveState(statePath: string, state: JobState): void {
  fs.mkdirSync(path.dirname(statePath), { recursive: true });
  fs.writeFileSync(statePath, JSON.stringify(state, null, 2) + "\n", "utf8");
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) reject(signal.reason);
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

function reasonOf(signal: AbortSignal): string {
  return errorMessage(signal.reason ?? "cancelled");
}

/** Whole seconds, rounded up; sub-second limits in milliseconds. */
export function formatLimit(ms: number): string {
  return ms >= 1000 ? `${Math.ceil(ms / 1000)}s` : `${Math.max(0, Math.round(ms))}ms`;
}
