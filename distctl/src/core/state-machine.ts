import type { JobConfig } from "../types/config.js";

/**
 * Milestones a variant job passes through, in order.
 */
export const JOB_PHASES = ["pending", "checked_out", "ui_built", "packaged", "verified"] as const;

export type JobPhase = (typeof JOB_PHASES)[number];

/**
 * Steps that move a job from one milestone to the next.
 * `publish` and `discard` are alternatives out of `verified`.
 */
export const JOB_STEPS = ["checkout", "build_ui", "build_dist", "verify", "publish", "discard"] as const;

export type JobStep = (typeof JOB_STEPS)[number];

export type JobStatus =
  | JobPhase
  | "published"
  | "discarded"
  | "cancelled"
  | `failed_${JobStep}`
  | `timeout_${JobStep}`;

export type TransitionEvent = "success" | "failure" | "timeout" | "cancel";

const STEP_FOR_PHASE: Record<Exclude<JobPhase, "verified">, JobStep> = {
  pending: "checkout",
  checked_out: "build_ui",
  ui_built: "build_dist",
  packaged: "verify",
};

const PHASE_AFTER_STEP: Record<Exclude<JobStep, "publish" | "discard">, JobPhase> = {
  checkout: "checked_out",
  build_ui: "ui_built",
  build_dist: "packaged",
  verify: "verified",
};

/**
 * The step that runs out of a given milestone.
 */
export function stepFor(phase: JobPhase, publish: boolean): JobStep {
  if (phase === "verified") return publish ? "publish" : "discard";
  return STEP_FOR_PHASE[phase];
}

/**
 * Pure function: given the current milestone and the outcome of its step, return the next status.
 */
export function nextState(current: JobPhase, event: TransitionEvent, publish: boolean): JobStatus {
  const step = stepFor(current, publish);
  if (event === "failure") return `failed_${step}`;
  if (event === "timeout") return `timeout_${step}`;
  if (event === "cancel") return "cancelled";

  if (step === "publish") return "published";
  if (step === "discard") return "discarded";
  return PHASE_AFTER_STEP[step];
}

export function isPhase(status: JobStatus): status is JobPhase {
  return (JOB_PHASES as readonly string[]).includes(status);
}

export function isTerminal(status: JobStatus): boolean {
  return !isPhase(status);
}

/** A job succeeded when it reached either of the two intended end states. */
export function isSuccess(status: JobStatus): boolean {
  return status === "published" || status === "discarded";
}

/** The step a failed or timed-out status points at, if any. */
export function failedStep(status: JobStatus): JobStep | null {
  const m = /^(?:failed|timeout)_(.+)$/.exec(status);
  if (!m) return null;
  return JOB_STEPS.find((s) => s === m[1]) ?? null;
}

/**
 * Get the timeout for a step in seconds.
 */
export function getStepTimeout(step: JobStep, config?: JobConfig): number {
  const defaults: Record<JobStep, number> = {
    checkout: 120,
    build_ui: 600,
    build_dist: 600,
    verify: 900,
    publish: 120,
    discard: 60,
  };
  return config?.step_timeouts[step] ?? defaults[step];
}

/** Wall-clock ceiling for a whole job, in milliseconds. */
export function getJobTimeoutMs(config?: JobConfig): number {
  return (config?.timeout_minutes ?? 20) * 60 * 1000;
}
