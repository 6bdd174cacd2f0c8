import path from "node:path";
import { loadConfig } from "../config/validator.js";
import {
  SingleFlight,
  claimLock,
  linkSignals,
  nodeProcessControl,
  ownsLock,
  releaseLock,
  type ProcessControl,
} from "../core/concurrency.js";
import { errorMessage } from "../core/errors.js";
import { runPipeline, type PipelineResult } from "../core/pipeline.js";
import { Reporter } from "../core/reporter.js";
import { generateRunId } from "../core/run-id.js";
import { ExecFileRunner, type CommandRunner } from "../exec/runner.js";
import { GitOperations, type SourceControl } from "../git/operations.js";
import { FileArtifactStore, type ArtifactStore } from "../publish/store.js";
import { evaluateTrigger, isTriggerEvent, toPipelineRun } from "../trigger/context.js";
import { readEventPayload, type PayloadFields } from "../trigger/event-payload.js";
import type { DistctlConfig } from "../types/config.js";
import type { TriggerInput } from "../types/trigger.js";
import type { VerificationCheck } from "../verify/checks.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export const LOCKS_DIR = "locks";

export type RunOptions = {
  event: string;
  ref?: string;
  /** Branch a dispatch was started from. */
  triggerRef?: string;
  pr?: number;
  draft?: boolean;
  action?: string;
  /** GitHub-style event payload; explicit flags win over its fields. */
  eventPath?: string;
  variants?: string[];
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  runsDir?: string;
  storeDir?: string;
  repoPath?: string;
  keepWorkspace?: boolean;
};

/** Collaborators `run` builds for itself unless given. */
export type RunDeps = {
  reporter?: Reporter;
  runner?: CommandRunner;
  source?: SourceControl;
  store?: ArtifactStore;
  proc?: ProcessControl;
  flight?: SingleFlight;
  checks?: readonly VerificationCheck[];
  signal?: AbortSignal;
};

export type RunResult =
  | { kind: "skipped"; exitCode: ExitCode; reason: string }
  | { kind: "completed"; exitCode: ExitCode; result: PipelineResult }
  | { kind: "error"; exitCode: ExitCode; error: string };

const processFlight = new SingleFlight();

/**
 * Evaluate a trigger and, if it starts a run, drive the variant matrix while
 * holding the run's concurrency key.
 */
export async function run(opts: RunOptions, deps: RunDeps = {}): Promise<RunResult> {
  const reporter = deps.reporter ?? new Reporter();
  const event = opts.event;
  if (!isTriggerEvent(event)) {
    return { kind: "error", exitCode: EXIT.INVALID_ARGS, error: `Unknown event: ${event}` };
  }

  let config: DistctlConfig;
  try {
    config = loadConfig(opts.envName, opts.configDir, opts.env);
  } catch (e) {
    return { kind: "error", exitCode: EXIT.CONFIG_INVALID, error: errorMessage(e) };
  }

  let fields: PayloadFields = {};
  if (opts.eventPath) {
    try {
      fields = readEventPayload(event, opts.eventPath);
    } catch (e) {
      return { kind: "error", exitCode: EXIT.INVALID_ARGS, error: `Cannot read event payload: ${errorMessage(e)}` };
    }
  }

  const input: TriggerInput = {
    event,
    ref: opts.ref ?? fields.ref,
    triggerRef: opts.triggerRef ?? fields.triggerRef,
    pullRequest:
      opts.pr !== undefined
        ? {
            number: opts.pr,
            draft: opts.draft ?? fields.pullRequest?.draft ?? false,
            action: opts.action ?? fields.pullRequest?.action ?? "opened",
          }
        : fields.pullRequest,
    variants: opts.variants,
  };

  const decision = evaluateTrigger(input, config);
  if (!decision.run) {
    reporter.info("SKIPPED", `Not running: ${decision.reason}`);
    return { kind: "skipped", exitCode: EXIT.SUCCESS, reason: decision.reason };
  }

  const runsDir = path.resolve(opts.runsDir ?? config.runs_dir);
  const pipelineRun = toPipelineRun(decision, generateRunId(event, decision.pipeline.ref, runsDir));
  const key = pipelineRun.concurrency_key;

  const claim = claimLock(path.join(runsDir, LOCKS_DIR), key, pipelineRun.run_id, deps.proc ?? nodeProcessControl);
  if (claim.superseded) {
    reporter.warn("SUPERSEDED", `Cancelled run ${claim.superseded.run_id} (pid ${claim.superseded.pid}) for ${key}`);
  }
  const slot = (deps.flight ?? processFlight).acquire(key);

  try {
    const result = await runPipeline(
      {
        config,
        runner: deps.runner ?? new ExecFileRunner(),
        source: deps.source ?? new GitOperations(path.resolve(opts.repoPath ?? ".")),
        store: deps.store ?? new FileArtifactStore(path.resolve(opts.storeDir ?? config.publish.store_dir), config.publish.base_url),
        reporter,
        runsDir,
        keepWorkspace: opts.keepWorkspace,
        checks: deps.checks,
        stillCurrent: () => slot.isCurrent() && ownsLock(claim.lockPath, pipelineRun.run_id),
        env: opts.env,
      },
      pipelineRun,
      linkSignals(slot.signal, deps.signal),
    );

    // Siblings cancelled by fail-fast do not hide the failure that caused it.
    const exitCode = result.success ? EXIT.SUCCESS : result.failed ? EXIT.JOB_FAILED : EXIT.CANCELLED;
    return { kind: "completed", exitCode, result };
  } catch (e) {
    return { kind: "error", exitCode: EXIT.JOB_FAILED, error: errorMessage(e) };
  } finally {
    slot.release();
    releaseLock(claim.lockPath, pipelineRun.run_id);
  }
}
