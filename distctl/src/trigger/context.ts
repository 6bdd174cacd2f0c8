import { minimatch } from "minimatch";
import type { DistctlConfig } from "../types/config.js";
import { TRIGGER_EVENTS, type PipelineRun, type TriggerDecision, type TriggerEvent, type TriggerInput } from "../types/trigger.js";

const HEADS_PREFIX = "refs/heads/";

/** `refs/heads/x` → `x`; other refs (tags, pull refs) → null; bare names pass through. */
export function branchName(ref: string): string | null {
  if (ref.startsWith(HEADS_PREFIX)) return ref.slice(HEADS_PREFIX.length);
  if (ref.startsWith("refs/")) return null;
  return ref;
}

export function isTriggerEvent(value: string): value is TriggerEvent {
  return TRIGGER_EVENTS.some((e) => e === value);
}

export function concurrencyKey(workflow: string, event: string, ref: string): string {
  return `${workflow}-${event}-${ref}`;
}

/**
 * Decide whether a trigger starts a pipeline run, and with what identity.
 */
export function evaluateTrigger(input: TriggerInput, config: DistctlConfig): TriggerDecision {
  const variants = selectVariants(input.variants, config);
  if (typeof variants === "string") return { run: false, reason: variants };

  const base = {
    workflow: config.workflow,
    event: input.event,
    repository: config.repository,
    publish: config.triggers.publish_on.includes(input.event),
    variants,
  };

  switch (input.event) {
    case "push": {
      const ref = input.ref ?? `${HEADS_PREFIX}${config.default_ref}`;
      const branch = branchName(ref);
      if (branch === null) return { run: false, reason: `push to ${ref} is not a branch push` };
      if (!config.triggers.push.branches.some((p) => minimatch(branch, p))) {
        return { run: false, reason: `branch '${branch}' does not match ${config.triggers.push.branches.join(", ")}` };
      }
      const fullRef = `${HEADS_PREFIX}${branch}`;
      return {
        run: true,
        pipeline: {
          ...base,
          ref: fullRef,
          checkout_ref: branch,
          pull_request: null,
          concurrency_key: concurrencyKey(config.workflow, input.event, fullRef),
        },
      };
    }

    case "pull_request": {
      const pr = input.pullRequest;
      if (!pr) return { run: false, reason: "pull_request trigger without a pull request number" };
      if (!config.triggers.pull_request.types.includes(pr.action)) {
        return { run: false, reason: `pull request action '${pr.action}' does not trigger a build` };
      }
      if (pr.draft && config.triggers.pull_request.skip_drafts) {
        return { run: false, reason: `pull request #${pr.number} is a draft` };
      }
      const ref = `refs/pull/${pr.number}/merge`;
      return {
        run: true,
        pipeline: {
          ...base,
          ref,
          checkout_ref: ref,
          pull_request: pr,
          concurrency_key: concurrencyKey(config.workflow, input.event, ref),
        },
      };
    }

    case "workflow_dispatch": {
      // Branch, tag or SHA, as given; the remote install resolves it the same way.
      const ref = input.ref?.trim() || config.default_ref;
      const dispatchedFrom = qualifyBranch(input.triggerRef?.trim() || config.default_ref);
      return {
        run: true,
        pipeline: {
          ...base,
          ref,
          checkout_ref: ref,
          pull_request: null,
          concurrency_key: concurrencyKey(config.workflow, input.event, dispatchedFrom),
        },
      };
    }
  }
}

function qualifyBranch(ref: string): string {
  return ref.startsWith("refs/") ? ref : `${HEADS_PREFIX}${ref}`;
}

/** Build the full run record once a run id has been assigned. */
export function toPipelineRun(decision: Extract<TriggerDecision, { run: true }>, runId: string): PipelineRun {
  return { ...decision.pipeline, run_id: runId, created_at: new Date().toISOString() };
}

function selectVariants(requested: string[] | undefined, config: DistctlConfig): string[] | string {
  const known = config.variants.map((v) => v.name);
  if (!requested || requested.length === 0) return known;
  const unknown = requested.filter((r) => !known.includes(r));
  if (unknown.length > 0) return `unknown variant(s): ${unknown.join(", ")}`;
  return known.filter((k) => requested.includes(k));
}
