import type { RecordWriter } from "../artifact-writer/writer.js";
import type { CommandRunner } from "../exec/runner.js";
import type { SourceControl } from "../git/operations.js";
import type { ArtifactStore, PublishedArtifact } from "../publish/store.js";
import type { DistctlConfig, VariantConfig } from "../types/config.js";
import type { PipelineRun } from "../types/trigger.js";
import type { BuiltDists, VerificationCheck } from "../verify/checks.js";
import type { JobOutputs } from "./outputs.js";
import type { Reporter } from "./reporter.js";

/**
 * Everything the steps of one variant job share. Steps fill in `sha`,
 * `dists` and `published` as they complete.
 */
export type JobContext = {
  run: PipelineRun;
  variant: VariantConfig;
  config: DistctlConfig;
  runner: CommandRunner;
  source: SourceControl;
  store: ArtifactStore;
  reporter: Reporter;
  /** `<runs_dir>/<run_id>/<variant>` */
  jobDir: string;
  /** Detached worktree the job builds in. */
  workspace: string;
  scratchDir: string;
  outputs: JobOutputs;
  records: RecordWriter;
  checks?: readonly VerificationCheck[];
  /** False once a newer run has taken this run's concurrency key. */
  stillCurrent: () => boolean;
  sha: string | null;
  dists: BuiltDists | null;
  published: PublishedArtifact | null;
};
