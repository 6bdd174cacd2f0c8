import { describe, expect, it } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { branchName, evaluateTrigger, isTriggerEvent, toPipelineRun } from "../src/trigger/context.js";
import { fieldsFromPayload, readEventPayload } from "../src/trigger/event-payload.js";
import type { TriggerDecision } from "../src/types/trigger.js";
import { baseConfig, tmpDir } from "./helpers.js";

const config = baseConfig();

function pipelineOf(decision: TriggerDecision) {
  if (!decision.run) throw new Error(`expected a run, got skip: ${decision.reason}`);
  return decision.pipeline;
}

function reasonOf(decision: TriggerDecision): string {
  if (decision.run) throw new Error("expected a skip");
  return decision.reason;
}

describe("evaluateTrigger: push", () => {
  it("defaults to the trunk branch and runs every variant without publishing", () => {
    const p = pipelineOf(evaluateTrigger({ event: "push" }, config));
    expect(p.ref).toBe("refs/heads/master");
    expect(p.checkout_ref).toBe("master");
    expect(p.concurrency_key).toBe("build-dist-push-refs/heads/master");
    expect(p.variants).toEqual(["dev", "skinny", "tracing"]);
    expect(p.publish).toBe(false);
    expect(p.pull_request).toBeNull();
  });

  it("accepts release branches", () => {
    const p = pipelineOf(evaluateTrigger({ event: "push", ref: "refs/heads/branch-3.1" }, config));
    expect(p.checkout_ref).toBe("branch-3.1");
  });

  it("accepts a bare branch name", () => {
    expect(pipelineOf(evaluateTrigger({ event: "push", ref: "master" }, config)).ref).toBe("refs/heads/master");
  });

  it("skips branches outside the filter", () => {
    expect(reasonOf(evaluateTrigger({ event: "push", ref: "refs/heads/branch-3.x" }, config))).toBe(
      "branch 'branch-3.x' does not match master, branch-+([0-9]).+([0-9])",
    );
  });

  it("skips tag pushes", () => {
    expect(reasonOf(evaluateTrigger({ event: "push", ref: "refs/tags/v3.1.0" }, config))).toBe(
      "push to refs/tags/v3.1.0 is not a branch push",
    );
  });
});

describe("evaluateTrigger: pull_request", () => {
  it("builds the merge ref of an opened pull request", () => {
    const p = pipelineOf(
      evaluateTrigger({ event: "pull_request", pullRequest: { number: 7, draft: false, action: "opened" } }, config),
    );
    expect(p.ref).toBe("refs/pull/7/merge");
    expect(p.checkout_ref).toBe("refs/pull/7/merge");
    expect(p.concurrency_key).toBe("build-dist-pull_request-refs/pull/7/merge");
    expect(p.publish).toBe(false);
    expect(p.pull_request).toEqual({ number: 7, draft: false, action: "opened" });
  });

  it("skips drafts", () => {
    expect(
      reasonOf(evaluateTrigger({ event: "pull_request", pullRequest: { number: 7, draft: true, action: "synchronize" } }, config)),
    ).toBe("pull request #7 is a draft");
  });

  it("builds a draft once it is marked ready", () => {
    const decision = evaluateTrigger(
      { event: "pull_request", pullRequest: { number: 7, draft: false, action: "ready_for_review" } },
      config,
    );
    expect(decision.run).toBe(true);
  });

  it("skips actions that do not trigger builds", () => {
    expect(
      reasonOf(evaluateTrigger({ event: "pull_request", pullRequest: { number: 7, draft: false, action: "closed" } }, config)),
    ).toBe("pull request action 'closed' does not trigger a build");
  });

  it("skips without a pull request", () => {
    expect(reasonOf(evaluateTrigger({ event: "pull_request" }, config))).toBe(
      "pull_request trigger without a pull request number",
    );
  });
});

describe("evaluateTrigger: workflow_dispatch", () => {
  it("publishes the requested ref", () => {
    const p = pipelineOf(evaluateTrigger({ event: "workflow_dispatch", ref: "v3.1.0" }, config));
    expect(p.ref).toBe("v3.1.0");
    expect(p.checkout_ref).toBe("v3.1.0");
    expect(p.publish).toBe(true);
    expect(p.concurrency_key).toBe("build-dist-workflow_dispatch-refs/heads/master");
  });

  it("keys dispatches by the branch they were started from", () => {
    const newer = pipelineOf(evaluateTrigger({ event: "workflow_dispatch", ref: "v3.1.0", triggerRef: "branch-3.1" }, config));
    const older = pipelineOf(
      evaluateTrigger({ event: "workflow_dispatch", ref: "v3.0.0", triggerRef: "refs/heads/branch-3.1" }, config),
    );
    expect(newer.concurrency_key).toBe("build-dist-workflow_dispatch-refs/heads/branch-3.1");
    expect(older.concurrency_key).toBe(newer.concurrency_key);
    expect([older.checkout_ref, newer.checkout_ref]).toEqual(["v3.0.0", "v3.1.0"]);
  });

  it("falls back to the trunk when the input is blank", () => {
    expect(pipelineOf(evaluateTrigger({ event: "workflow_dispatch", ref: "  " }, config)).ref).toBe("master");
  });
});

describe("variant selection", () => {
  it("keeps config order", () => {
    const p = pipelineOf(evaluateTrigger({ event: "push", variants: ["tracing", "dev"] }, config));
    expect(p.variants).toEqual(["dev", "tracing"]);
  });

  it("rejects unknown variants", () => {
    expect(reasonOf(evaluateTrigger({ event: "push", variants: ["nope"] }, config))).toBe("unknown variant(s): nope");
  });
});

describe("trigger helpers", () => {
  it("extracts branch names", () => {
    expect(branchName("refs/heads/feature/x")).toBe("feature/x");
    expect(branchName("refs/pull/1/merge")).toBeNull();
    expect(branchName("master")).toBe("master");
  });

  it("recognises events", () => {
    expect(isTriggerEvent("workflow_dispatch")).toBe(true);
    expect(isTriggerEvent("schedule")).toBe(false);
  });

  it("stamps a run id onto the decision", () => {
    const decision = evaluateTrigger({ event: "push" }, config);
    if (!decision.run) throw new Error("expected a run");
    const run = toPipelineRun(decision, "push-master-20260101-001");
    expect(run.run_id).toBe("push-master-20260101-001");
    expect(run.created_at).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });
});

describe("event payload", () => {
  it("reads the pushed ref", () => {
    expect(fieldsFromPayload("push", { ref: "refs/heads/master", after: "abc" })).toEqual({ ref: "refs/heads/master" });
  });

  it("reads the dispatch input", () => {
    expect(fieldsFromPayload("workflow_dispatch", { ref: "refs/heads/branch-3.1", inputs: { ref: "v3.1.0" } })).toEqual({
      ref: "v3.1.0",
      triggerRef: "refs/heads/branch-3.1",
    });
    expect(fieldsFromPayload("workflow_dispatch", {})).toEqual({ ref: undefined, triggerRef: undefined });
  });

  it("reads pull request number, draft flag and action", () => {
    expect(fieldsFromPayload("pull_request", { action: "synchronize", pull_request: { number: 12, draft: true } })).toEqual({
      pullRequest: { number: 12, draft: true, action: "synchronize" },
    });
  });

  it("rejects a pull request payload without a number", () => {
    expect(() => fieldsFromPayload("pull_request", { pull_request: {} })).toThrow("pull_request payload has no pull_request.number");
  });

  it("reads a payload file", () => {
    const dir = tmpDir("event");
    const file = path.join(dir, "event.json");
    fs.writeFileSync(file, JSON.stringify({ action: "opened", pull_request: { number: 3, draft: false } }));
    expect(readEventPayload("pull_request", file).pullRequest).toEqual({ number: 3, draft: false, action: "opened" });
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
