export { run, type RunOptions, type RunDeps, type RunResult } from "./commands/run.js";
export { validateAll, validateJobDir, validateRunDir } from "./commands/validate.js";
export { status, listRuns } from "./commands/status.js";
export { listArtifacts } from "./commands/artifacts.js";
export { variantMatrix } from "./commands/matrix.js";
export { EXIT, type ExitCode } from "./commands/exit-codes.js";

export { loadConfig, validateConfig } from "./config/validator.js";
export { loadConfigLayers, applyEnvOverrides, deepMerge } from "./config/loader.js";
export { SchemaRegistry, createRegistry } from "./schema/registry.js";

export { runPipeline, runJob, type PipelineDeps, type PipelineResult, type JobOutcome } from "./core/pipeline.js";
export { JobOrchestrator, type JobState, type JobResult, type StepRunner } from "./core/orchestrator.js";
export { runMatrix, type MatrixJob } from "./core/matrix.js";
export { SingleFlight, claimLock, releaseLock, ownsLock, type RunSlot, type ProcessControl } from "./core/concurrency.js";
export { JobOutputs, parseOutputs, readOutputs } from "./core/outputs.js";
export { Reporter, silentReporter, type OutputFormat, type Diagnostic } from "./core/reporter.js";
export { PipelineError, CancelledError, TimeoutError, type ErrorKind } from "./core/errors.js";
export * from "./core/state-machine.js";

export { evaluateTrigger, toPipelineRun, concurrencyKey } from "./trigger/context.js";
export { readEventPayload, fieldsFromPayload } from "./trigger/event-payload.js";

export { ExecFileRunner, type CommandRunner, type CommandSpec, type CommandResult } from "./exec/runner.js";
export { GitOperations, type SourceControl } from "./git/operations.js";
export { FileArtifactStore, type ArtifactStore, type PublishedArtifact } from "./publish/store.js";
export { DEFAULT_CHECKS, type VerificationCheck, type CheckContext } from "./verify/checks.js";
export { runChecks } from "./verify/sequence.js";
export { toJunitXml } from "./verify/junit.js";
export { compareListings, normalizeArchiveListing, normalizePackageListing } from "./dist/parity.js";

export type * from "./types/config.js";
export type * from "./types/trigger.js";
export type * from "./types/manifest.js";
export type * from "./types/verification.js";
