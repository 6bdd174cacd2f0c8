/** Trigger and pipeline-run types. */

export const TRIGGER_EVENTS = ["push", "pull_request", "workflow_dispatch"] as const;

export type TriggerEvent = (typeof TRIGGER_EVENTS)[number];

export type PullRequestInfo = {
  number: number;
  draft: boolean;
  action: string;
};

export type TriggerInput = {
  event: TriggerEvent;
  /** Pushed ref for `push`, the dispatch input for `workflow_dispatch`. */
  ref?: string;
  /** Branch a `workflow_dispatch` was started from; defaults to the trunk. */
  triggerRef?: string;
  pullRequest?: PullRequestInfo;
  /** Restrict the matrix to these variant names. */
  variants?: string[];
};

export type PipelineRun = {
  run_id: string;
  workflow: string;
  event: TriggerEvent;
  /** The ref the run is identified by (used in the concurrency key and remote installs). */
  ref: string;
  /** What source preparation checks out. */
  checkout_ref: string;
  repository: string;
  pull_request: PullRequestInfo | null;
  concurrency_key: string;
  publish: boolean;
  variants: string[];
  created_at: string;
};

export type TriggerDecision =
  | { run: true; pipeline: Omit<PipelineRun, "run_id" | "created_at"> }
  | { run: false; reason: string };
