/** Layered configuration types. */
import type { TriggerEvent } from "./trigger.js";

export type VariantConfig = {
  name: string;
  /** Passed to the build script as `--package-type <selector>`. */
  selector: string;
  /** Sub-path used when installing straight from the remote (null for the default variant). */
  subdirectory: string | null;
  extra_build_args: string[];
};

export type TriggersConfig = {
  push: { branches: string[] };
  pull_request: { types: string[]; skip_drafts: boolean };
  workflow_dispatch: Record<string, never>;
  /** Events whose runs may publish. */
  publish_on: TriggerEvent[];
};

export type JobConfig = {
  timeout_minutes: number;
  step_timeouts: Record<string, number>;
};

export type SourceConfig = {
  fetch: boolean;
  remote: string;
};

export type UiConfig = {
  dir: string | null;
  output_dir: string | null;
  commands: string[][];
};

export type DistConfig = {
  dir: string;
  setup_commands: string[][];
  build_command: string[];
  archive_pattern: string;
  package_pattern: string;
};

export type ParityConfig = {
  fatal: boolean;
  ignore: string[];
};

export type VerifyConfig = {
  python: string;
  import_name: string;
  lint_command: string[];
  uv: string;
  pr_install_script: string | null;
  parity: ParityConfig;
  reproducibility: boolean;
};

export type PublishConfig = {
  store_dir: string;
  retention_days: number;
  base_url: string | null;
};

export type MatrixConfig = {
  fail_fast: boolean;
};

export type RemoteConfig = {
  base_url: string;
};

export type DistctlConfig = {
  schema_version: string;
  workflow: string;
  repository: string;
  default_ref: string;
  runs_dir: string;
  remote: RemoteConfig;
  triggers: TriggersConfig;
  matrix: MatrixConfig;
  job: JobConfig;
  source: SourceConfig;
  ui: UiConfig;
  dist: DistConfig;
  verify: VerifyConfig;
  publish: PublishConfig;
  variants: VariantConfig[];
};
